import { VmError } from '../errors.js';
import { expectWord, ZERO, type Word } from '../model/word.js';
import type { Slot } from '../model/types.js';

function checkSlot(key: Word | number, length: number): number {
  const k = typeof key === 'number' ? BigInt(key) : key;
  if (k < 0n || k >= BigInt(length)) {
    throw new VmError('E_STORAGE_SLOT', `slot ${k} out of range (length ${length})`, {
      details: { slot: k.toString(), length },
    });
  }
  return Number(k);
}

/** Immutable storage snapshot. Slots only ever get appended. */
export class ContractStorage {
  private readonly slots: readonly Word[];

  private constructor(slots: readonly Word[]) {
    this.slots = Object.freeze(slots.slice());
  }

  static empty(): ContractStorage {
    return new ContractStorage([]);
  }

  static of(words: readonly Word[]): ContractStorage {
    return new ContractStorage(words.map(expectWord));
  }

  get length(): number {
    return this.slots.length;
  }

  allocate(): { storage: ContractStorage; slot: Slot } {
    return { storage: new ContractStorage([...this.slots, ZERO]), slot: this.slots.length };
  }

  load(slot: Word | number): Word {
    return this.slots[checkSlot(slot, this.slots.length)];
  }

  words(): Word[] {
    return this.slots.slice();
  }

  toMutable(): MutableStorage {
    return new MutableStorage(this.slots.slice());
  }

  equals(other: ContractStorage): boolean {
    return this.slots.length === other.slots.length && this.slots.every((w, i) => w === other.slots[i]);
  }
}

/** Working copy owned by one engine run. */
export class MutableStorage {
  constructor(private readonly slots: Word[]) {}

  get length(): number {
    return this.slots.length;
  }

  load(key: Word): Word {
    return this.slots[checkSlot(key, this.slots.length)];
  }

  store(key: Word, value: Word): void {
    this.slots[checkSlot(key, this.slots.length)] = expectWord(value);
  }

  freeze(): ContractStorage {
    return ContractStorage.of(this.slots);
  }
}
