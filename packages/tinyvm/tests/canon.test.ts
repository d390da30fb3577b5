import { describe, it, expect } from 'vitest';
import { canonicalJsonBytes, blake3hex, storageId } from '../src/canon/index.js';
import { ContractStorage } from '../src/vm/storage.js';

const td = new TextDecoder();

describe('canonical', () => {
  it('sorts object keys and preserves arrays', () => {
    const bytes = canonicalJsonBytes({ b: 1, a: [2, 1] });
    expect(td.decode(bytes)).toBe('{"a":[2,1],"b":1}');
  });

  it('renders words as hex strings', () => {
    expect(td.decode(canonicalJsonBytes([0n, 255n]))).toBe('["0x0","0xff"]');
  });

  it('rejects floats and negative words', () => {
    expect(() => canonicalJsonBytes(1.1)).toThrowError('E_CANON_FLOAT');
    expect(() => canonicalJsonBytes(-1n)).toThrowError('E_CANON_NEGATIVE');
  });

  it('normalizes -0 to 0', () => {
    expect(canonicalJsonBytes(-0)).toEqual(canonicalJsonBytes(0));
  });

  it('blake3 hex', () => {
    const hex = blake3hex(new Uint8Array());
    expect(hex).toBe('af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262');
  });

  it('storage ids follow content', () => {
    const a = storageId(ContractStorage.of([0n]));
    expect(a).toBe(`st:${blake3hex('["0x0"]')}`);
    expect(storageId(ContractStorage.empty().allocate().storage)).toBe(a);
    expect(storageId(ContractStorage.of([1n]))).not.toBe(a);
  });
});
