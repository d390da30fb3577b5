export { VM } from './interpreter.js';
export type { ExecutionResult, VmOptions } from './types.js';
export { WordStack, STACK_CAPACITY } from './stack.js';
export { ContractStorage, MutableStorage } from './storage.js';
