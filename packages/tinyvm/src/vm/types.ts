import type { ContractStorage } from './storage.js';
import type { WordStack } from './stack.js';

export interface VmOptions {
  /** Defaults to 1024 words. */
  stackCapacity?: number;
}

export interface ExecutionResult {
  storage: ContractStorage;
  /** Whatever is left on the stack is the return buffer. */
  stack: WordStack;
  pc: number;
  halted: boolean;
}
