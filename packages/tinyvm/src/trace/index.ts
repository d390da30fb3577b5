export * from './tags.js';
export { emit, flush, resetTraceForTest } from './log.js';
