import { VmError } from '../errors.js';

/** 256-bit unsigned machine word. */
export type Word = bigint;

export const WORD_BITS = 256;
export const WORD_MAX: Word = (1n << 256n) - 1n;
export const ZERO: Word = 0n;
export const ONE: Word = 1n;

export function isWord(v: unknown): v is Word {
  return typeof v === 'bigint' && v >= 0n && v <= WORD_MAX;
}

export function expectWord(v: bigint): Word {
  if (!isWord(v)) throw new VmError('E_UNSUPPORTED', `word out of range: ${v}`);
  return v;
}

export function expectByte(v: number): number {
  if (!Number.isInteger(v) || v < 0 || v > 0xff) {
    throw new VmError('E_UNSUPPORTED', `byte out of range: ${v}`);
  }
  return v;
}

export function wordToHex(w: Word): string {
  return '0x' + w.toString(16).padStart(64, '0');
}
