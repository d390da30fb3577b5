import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { programFromHex } from '../src/codec/bytecode.js';
import { isVmError } from '../src/errors.js';
import { VM } from '../src/vm/interpreter.js';
import { ContractStorage } from '../src/vm/storage.js';

interface Vector {
  name: string;
  code: string;
  storage: string[];
  expected:
    | { error: string }
    | { stack: string[], storage: string[], pc: number, halted: boolean };
}

const dir = fileURLToPath(new URL('./vectors/', import.meta.url));
const toWords = (xs: string[]) => xs.map(x => BigInt(x));

function runVector(vec: Vector) {
  const program = programFromHex(vec.code);
  return new VM().run(program, ContractStorage.of(toWords(vec.storage)));
}

describe('bytecode vectors', () => {
  for (const file of readdirSync(dir).filter(f => f.endsWith('.json')).sort()) {
    const vec: Vector = JSON.parse(readFileSync(dir + file, 'utf8'));
    it(vec.name, () => {
      const expected = vec.expected;
      if ('error' in expected) {
        let code = 'none';
        try {
          runVector(vec);
        } catch (err) {
          if (!isVmError(err)) throw err;
          code = err.code;
        }
        expect(code).toBe(expected.error);
        return;
      }
      const out = runVector(vec);
      expect(out.stack.toArray()).toEqual(toWords(expected.stack));
      expect(out.storage.words()).toEqual(toWords(expected.storage));
      expect(out.pc).toBe(expected.pc);
      expect(out.halted).toBe(expected.halted);
    });
  }
});
