import type { Program } from './bytecode.js';
import type { TypeName } from './ast.js';

export type Selector = string;
export type Slot = number;

export type Visibility = 'Public' | 'Private' | 'Internal' | 'External';
export type Mutability = 'Pure' | 'View' | 'NonPayable' | 'Payable' | 'Constant';

export const DEFAULT_VISIBILITY: Visibility = 'Internal';
export const DEFAULT_MUTABILITY: Mutability = 'NonPayable';

export interface CompiledFunction {
  readonly name: string;
  readonly signature: string;
  readonly program: Program;
  readonly visibility: Visibility;
  readonly mutability: Mutability;
  readonly returns: readonly TypeName[];
}

/** View and pure calls never commit storage. */
export function isReadOnly(mutability: Mutability): boolean {
  return mutability === 'View' || mutability === 'Pure';
}

export interface DecodedBool {
  kind: 'BoolLiteral';
  value: boolean;
}

export type DecodedValue = DecodedBool;
