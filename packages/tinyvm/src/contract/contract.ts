import type { CompiledFunction, DecodedValue, Selector, Slot } from '../model/types.js';
import { isReadOnly } from '../model/types.js';
import { selectorOf } from '../abi/selector.js';
import { decodeReturns } from '../abi/decode.js';
import type { HashFn } from '../canon/hash.js';
import { storageId } from '../canon/index.js';
import { VM } from '../vm/interpreter.js';
import type { VmOptions } from '../vm/types.js';
import { ContractStorage } from '../vm/storage.js';
import { isVmError, type VmError } from '../errors.js';
import { emit } from '../trace/log.js';
import { traceEnabled } from '../util/env.js';

export interface CallOutcome {
  contract: Contract;
  returns: DecodedValue[];
}

export type CallResult =
  | { ok: true, value: CallOutcome }
  | { ok: false, error: VmError };

export interface ContractInit {
  name: string;
  functions?: ReadonlyMap<Selector, CompiledFunction>;
  slots?: ReadonlyMap<string, Slot>;
  storage?: ContractStorage;
  /** Hash used by `callSignature`; should match the one used at lowering. */
  hash?: HashFn;
  vm?: VmOptions;
}

/**
 * A contract value. Calls never mutate it: a state-changing call hands back a
 * new Contract that shares everything but the storage snapshot.
 */
export class Contract {
  readonly name: string;
  readonly functions: ReadonlyMap<Selector, CompiledFunction>;
  readonly slots: ReadonlyMap<string, Slot>;
  readonly storage: ContractStorage;
  private readonly hash: HashFn | undefined;
  private readonly vm: VM;

  constructor(init: ContractInit) {
    this.name = init.name;
    this.functions = init.functions ?? new Map();
    this.slots = init.slots ?? new Map();
    this.storage = init.storage ?? ContractStorage.empty();
    this.hash = init.hash;
    this.vm = new VM(init.vm);
  }

  private withStorage(storage: ContractStorage): Contract {
    return new Contract({
      name: this.name,
      functions: this.functions,
      slots: this.slots,
      storage,
      hash: this.hash,
      vm: { stackCapacity: this.vm.stackCapacity },
    });
  }

  lookup(selector: Selector): CompiledFunction | undefined {
    return this.functions.get(selector);
  }

  /**
   * Unknown selectors are not an error: the same contract comes back with no
   * return values. Execution faults propagate and leave `this` untouched.
   */
  call(selector: Selector): CallOutcome {
    const fn = this.functions.get(selector);
    emit({ kind: 'Dispatch', contract: this.name, selector, found: fn !== undefined });
    if (!fn) return { contract: this, returns: [] };

    const result = this.vm.run(fn.program, this.storage);
    const returns = decodeReturns(result.stack, fn.returns);
    const committed = !isReadOnly(fn.mutability);
    const next = committed ? this.withStorage(result.storage) : this;
    if (traceEnabled()) {
      emit({
        kind: 'Commit',
        selector,
        mutability: fn.mutability,
        committed,
        before: storageId(this.storage),
        after: storageId(next.storage),
      });
    }
    return { contract: next, returns };
  }

  callSignature(signature: string): CallOutcome {
    return this.call(selectorOf(signature, this.hash));
  }

  tryCall(selector: Selector): CallResult {
    try {
      return { ok: true, value: this.call(selector) };
    } catch (err) {
      if (isVmError(err)) return { ok: false, error: err };
      throw err;
    }
  }

  slotOf(name: string): Slot | undefined {
    return this.slots.get(name);
  }
}
