import { describe, it, expect } from 'vitest';
import { createContracts } from '../src/compiler/lower.js';
import { Contract } from '../src/contract/contract.js';
import { selectorOf } from '../src/abi/selector.js';
import { Op } from '../src/model/bytecode.js';
import { ast } from '../src/model/ast.js';
import type { CompiledFunction } from '../src/model/types.js';
import { ContractStorage } from '../src/vm/storage.js';
import { fn, flagUnit, pub, pure, stateVar, unit, view } from './helpers/flag.js';

const TRUE = [{ kind: 'BoolLiteral', value: true }];
const FALSE = [{ kind: 'BoolLiteral', value: false }];

function flag(): Contract {
  const [c] = createContracts(flagUnit());
  return c;
}

describe('Contract.call', () => {
  it('get() on a fresh contract returns false and leaves storage alone', () => {
    const c = flag();
    const { contract, returns } = c.call(selectorOf('get()'));
    expect(returns).toEqual(FALSE);
    expect(contract).toBe(c);
    expect(contract.storage.words()).toEqual([0n]);
  });

  it('setTrue() commits, then get() returns true', () => {
    const c0 = flag();
    const { contract: c1, returns } = c0.call(selectorOf('setTrue()'));
    expect(returns).toEqual([]);
    expect(c1).not.toBe(c0);
    expect(c1.storage.words()).toEqual([1n]);
    expect(c0.storage.words()).toEqual([0n]);
    expect(c1.call(selectorOf('get()')).returns).toEqual(TRUE);
  });

  it('toggle() flips the stored flag each time', () => {
    const c1 = flag().callSignature('toggle()').contract;
    expect(c1.callSignature('get()').returns).toEqual(TRUE);
    const c2 = c1.callSignature('toggle()').contract;
    expect(c2.callSignature('get()').returns).toEqual(FALSE);
  });

  it('view and pure calls discard storage writes', () => {
    const [c] = createContracts(unit('Gate', [
      stateVar('x'),
      fn('sneakyView', [{ kind: 'ExpressionStatement', expression: ast.assign(ast.variable('x'), ast.bool(true)) }], {
        attributes: [pub, view],
      }),
      fn('sneakyPure', [{ kind: 'ExpressionStatement', expression: ast.assign(ast.variable('x'), ast.bool(true)) }], {
        attributes: [pure],
      }),
      fn('paid', [{ kind: 'ExpressionStatement', expression: ast.assign(ast.variable('x'), ast.bool(true)) }], {
        attributes: [{ kind: 'Mutability', value: 'payable' }],
      }),
    ]));
    expect(c.callSignature('sneakyView()').contract.storage.words()).toEqual([0n]);
    expect(c.callSignature('sneakyPure()').contract.storage.words()).toEqual([0n]);
    expect(c.callSignature('paid()').contract.storage.words()).toEqual([1n]);
  });

  it('pure functions can compute without storage', () => {
    const [c] = createContracts(unit('P', [
      fn('yes', [{ kind: 'Return', expression: ast.not(ast.bool(false)) }], { attributes: [pure], returns: ['bool'] }),
    ]));
    expect(c.callSignature('yes()').returns).toEqual(TRUE);
  });

  it('an unregistered selector returns the same contract and no values', () => {
    const c = flag();
    const out = c.call('deadbeef');
    expect(out.contract).toBe(c);
    expect(out.returns).toEqual([]);
  });

  it('missing return word faults and the contract is untouched', () => {
    const [c] = createContracts(unit('Broken', [
      stateVar('x'),
      fn('f', [{ kind: 'ExpressionStatement', expression: ast.assign(ast.variable('x'), ast.bool(true)) }], {
        returns: ['bool'],
      }),
    ]));
    const res = c.tryCall(selectorOf('f()'));
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe('E_STACK_UNDERFLOW');
      expect(res.error.kind).toBe('StackUnderflow');
    }
    expect(c.storage.words()).toEqual([0n]);
  });

  it('execution faults surface through tryCall', () => {
    const bad: CompiledFunction = {
      name: 'bad',
      signature: 'bad()',
      program: [Op.pushByte(5), Op.load()],
      visibility: 'Public',
      mutability: 'NonPayable',
      returns: [],
    };
    const c = new Contract({
      name: 'Manual',
      functions: new Map([['0badf00d', bad]]),
      storage: ContractStorage.of([0n]),
    });
    const res = c.tryCall('0badf00d');
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe('E_STORAGE_SLOT');
    expect(() => c.call('0badf00d')).toThrowError(/^E_STORAGE_SLOT slot 5/);
  });

  it('tryCall wraps successful calls', () => {
    const res = flag().tryCall(selectorOf('get()'));
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.value.returns).toEqual(FALSE);
  });

  it('returns of other types consume a word but decode to nothing', () => {
    const weird: CompiledFunction = {
      name: 'w',
      signature: 'w()',
      program: [Op.pushByte(1), Op.pushByte(2), Op.ret()],
      visibility: 'Public',
      mutability: 'View',
      returns: [ast.typeName('bool'), ast.typeName('uint256')],
    };
    const c = new Contract({ name: 'W', functions: new Map([['00000001', weird]]) });
    // top of stack (2) is popped for the first return parameter
    expect(c.call('00000001').returns).toEqual(FALSE);
  });

  it('stack capacity configured at compile time reaches the engine', () => {
    const [tiny] = createContracts(flagUnit(), { vm: { stackCapacity: 0 } });
    expect(tiny.tryCall(selectorOf('get()')).ok).toBe(false);

    // setTrue needs two entries; the committed contract keeps the same limit
    const [c] = createContracts(flagUnit(), { vm: { stackCapacity: 2 } });
    const after = c.callSignature('setTrue()').contract;
    expect(after.callSignature('get()').returns).toEqual(TRUE);

    const [one] = createContracts(flagUnit(), { vm: { stackCapacity: 1 } });
    const res = one.tryCall(selectorOf('setTrue()'));
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.code).toBe('E_STACK_OVERFLOW');
  });

  it('slotOf exposes the slot map', () => {
    expect(flag().slotOf('flag')).toBe(0);
    expect(flag().slotOf('missing')).toBeUndefined();
  });
});
