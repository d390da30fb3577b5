import { VmError } from '../errors.js';
import { expectByte, expectWord, type Word } from '../model/word.js';

export const STACK_CAPACITY = 1024;

/**
 * Fixed-capacity LIFO of words backed by a preallocated buffer.
 * Invariant: 0 <= top <= capacity.
 */
export class WordStack {
  private readonly buf: Word[];
  private top = 0;

  constructor(readonly capacity: number = STACK_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new VmError('E_UNSUPPORTED', `stack capacity: ${capacity}`);
    }
    this.buf = new Array<Word>(capacity).fill(0n);
  }

  get depth(): number {
    return this.top;
  }

  push(word: Word): void {
    expectWord(word);
    if (this.top >= this.capacity) {
      throw new VmError('E_STACK_OVERFLOW', `capacity ${this.capacity} reached`);
    }
    this.buf[this.top] = word;
    this.top += 1;
  }

  pushByte(byte: number): void {
    this.push(BigInt(expectByte(byte)));
  }

  pop(): Word {
    if (this.top === 0) throw new VmError('E_STACK_UNDERFLOW', 'pop on empty stack');
    this.top -= 1;
    return this.buf[this.top];
  }

  swapTop2(): void {
    if (this.top < 2) throw new VmError('E_STACK_UNDERFLOW', `swap needs 2 entries, have ${this.top}`);
    const a = this.top - 1;
    const b = this.top - 2;
    const tmp = this.buf[a];
    this.buf[a] = this.buf[b];
    this.buf[b] = tmp;
  }

  /** Bottom to top. */
  toArray(): Word[] {
    return this.buf.slice(0, this.top);
  }
}
