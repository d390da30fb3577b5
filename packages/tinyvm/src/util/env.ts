// Centralized, cached environment feature flags for the runtime.
let _trace: boolean | undefined;
let _traceStdout: boolean | undefined;

function flag(name: string): boolean {
  const v = (process.env[name] || '').toLowerCase();
  return v === '1' || v === 'true';
}

export function traceEnabled(): boolean {
  if (_trace === undefined) {
    _trace = flag('TINYVM_TRACE');
  }
  return _trace;
}

export function traceStdoutEnabled(): boolean {
  if (_traceStdout === undefined) {
    _traceStdout = flag('TINYVM_TRACE_STDOUT');
  }
  return _traceStdout;
}

// For tests only: reset the cached flags.
export function __resetEnvCacheForTests__() {
  _trace = undefined;
  _traceStdout = undefined;
}
