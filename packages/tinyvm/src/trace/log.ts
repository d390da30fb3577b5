import type { TraceTag } from './tags.js';
import { traceEnabled, traceStdoutEnabled, __resetEnvCacheForTests__ } from '../util/env.js';

const log: TraceTag[] = [];

export function emit(tag: TraceTag): void {
  if (!traceEnabled()) return;
  if (traceStdoutEnabled()) {
    process.stdout.write(JSON.stringify({ ts: Date.now(), tag }) + '\n');
  }
  log.push(tag);
}

export function flush(): TraceTag[] {
  const out = log.slice();
  log.length = 0;
  return out;
}

export function resetTraceForTest(): void {
  __resetEnvCacheForTests__();
  log.length = 0;
}
