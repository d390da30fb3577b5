import type { Word } from './word.js';

export type Instr =
  | { op: 'PUSH_WORD', word: Word }
  | { op: 'PUSH_BYTE', byte: number }
  | { op: 'POP' }
  | { op: 'DUP1' }
  | { op: 'SWAP1' }
  | { op: 'LOAD' }
  | { op: 'STORE' }
  | { op: 'ISZERO' }
  | { op: 'RETURN' };

export type OpName = Instr['op'];

/** Straight-line: there is no jump, so every run ends within `length` steps. */
export type Program = readonly Instr[];

export const Op = {
  pushWord: (word: Word): Instr => ({ op: 'PUSH_WORD', word }),
  pushByte: (byte: number): Instr => ({ op: 'PUSH_BYTE', byte }),
  pop: (): Instr => ({ op: 'POP' }),
  dup1: (): Instr => ({ op: 'DUP1' }),
  swap1: (): Instr => ({ op: 'SWAP1' }),
  load: (): Instr => ({ op: 'LOAD' }),
  store: (): Instr => ({ op: 'STORE' }),
  isZero: (): Instr => ({ op: 'ISZERO' }),
  ret: (): Instr => ({ op: 'RETURN' }),
} as const;
