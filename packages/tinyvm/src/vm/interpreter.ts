import type { Program } from '../model/bytecode.js';
import { ONE, ZERO } from '../model/word.js';
import { isVmError } from '../errors.js';
import { emit } from '../trace/log.js';
import { WordStack, STACK_CAPACITY } from './stack.js';
import type { ContractStorage } from './storage.js';
import type { ExecutionResult, VmOptions } from './types.js';

export class VM {
  readonly stackCapacity: number;

  constructor(options: VmOptions = {}) {
    this.stackCapacity = options.stackCapacity ?? STACK_CAPACITY;
  }

  /** Runs `prog` against a private copy of `storage`; the input snapshot is never touched. */
  run(prog: Program, storage: ContractStorage): ExecutionResult {
    const stack = new WordStack(this.stackCapacity);
    const slots = storage.toMutable();
    let pc = 0;
    let halted = false;

    try {
      while (pc < prog.length && !halted) {
        const ins = prog[pc];
        emit({ kind: 'Step', pc, op: ins.op, depth: stack.depth });
        switch (ins.op) {
          case 'PUSH_WORD': stack.push(ins.word); break;
          case 'PUSH_BYTE': stack.pushByte(ins.byte); break;
          case 'POP': stack.pop(); break;
          case 'DUP1': {
            const v = stack.pop();
            stack.push(v);
            stack.push(v);
            break;
          }
          case 'SWAP1': stack.swapTop2(); break;
          case 'LOAD': {
            const key = stack.pop();
            stack.push(slots.load(key));
            break;
          }
          case 'STORE': {
            const key = stack.pop();
            const value = stack.pop();
            slots.store(key, value);
            break;
          }
          case 'ISZERO': stack.push(stack.pop() === ZERO ? ONE : ZERO); break;
          case 'RETURN': halted = true; break;
          default: {
            const _: never = ins;
            throw new Error('unknown opcode');
          }
        }
        pc += 1;
      }
    } catch (err) {
      if (isVmError(err)) emit({ kind: 'Fault', code: err.code, msg: err.message, pc });
      throw err;
    }

    return { storage: slots.freeze(), stack, pc, halted };
  }
}
