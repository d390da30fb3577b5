export function canonicalJsonBytes(value: unknown): Uint8Array {
  const json = canonical(value);
  return new TextEncoder().encode(json);
}

// Words are rendered as 0x-prefixed lowercase hex strings.
function canonical(v: unknown): string {
  if (v === null) return 'null';
  if (typeof v === 'number') {
    if (!Number.isInteger(v)) throw new Error('E_CANON_FLOAT');
    return String(v);
  }
  if (typeof v === 'bigint') {
    if (v < 0n) throw new Error('E_CANON_NEGATIVE');
    return JSON.stringify('0x' + v.toString(16));
  }
  if (typeof v === 'string') return JSON.stringify(v);
  if (typeof v === 'boolean') return v ? 'true' : 'false';
  if (Array.isArray(v)) {
    return '[' + v.map(canonical).join(',') + ']';
  }
  if (typeof v === 'object') {
    const rec: Record<string, unknown> = { ...v };
    const keys = Object.keys(rec).filter(k => rec[k] !== undefined).sort();
    const entries = keys.map(k => JSON.stringify(k) + ':' + canonical(rec[k]));
    return '{' + entries.join(',') + '}';
  }
  throw new Error('E_CANON_TYPE');
}
