import type { TypeName } from '../model/ast.js';
import type { DecodedValue } from '../model/types.js';
import { ONE } from '../model/word.js';
import type { WordStack } from '../vm/stack.js';

/**
 * Pops one word per declared return parameter, in declaration order. Types
 * other than `bool` consume their word but decode to nothing.
 */
export function decodeReturns(stack: WordStack, returns: readonly TypeName[]): DecodedValue[] {
  const out: DecodedValue[] = [];
  for (const ty of returns) {
    const word = stack.pop();
    if (ty.name === 'bool') {
      out.push({ kind: 'BoolLiteral', value: word === ONE });
    }
  }
  return out;
}
