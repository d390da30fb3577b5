import type {
  ContractDefinition,
  Expression,
  FunctionDefinition,
  Parameter,
  SourceUnit,
  Statement,
} from '../model/ast.js';
import { Op, type Instr } from '../model/bytecode.js';
import type { CompiledFunction, Selector, Slot } from '../model/types.js';
import { canonicalSignature, selectorOf } from '../abi/selector.js';
import type { HashFn } from '../canon/hash.js';
import { Contract } from '../contract/contract.js';
import { VmError, type VmErrorCode, type VmErrorKind } from '../errors.js';
import { emit } from '../trace/log.js';
import type { VmOptions } from '../vm/types.js';
import { ContractStorage } from '../vm/storage.js';
import { resolveAttributes } from './attributes.js';

export interface CompileOptions {
  /** Selector hash; Keccak-256 when omitted. */
  hash?: HashFn;
  /** Handed to every produced contract's engine. */
  vm?: VmOptions;
}

export interface LoweringScope {
  contract: string;
  fn?: string;
  slots: ReadonlyMap<string, Slot>;
}

const ENCODABLE_TYPES = new Set(['bool']);

function fault(scope: LoweringScope, code: VmErrorCode, detail: string, kind?: VmErrorKind): VmError {
  const where = scope.fn ? `${scope.contract}.${scope.fn}` : scope.contract;
  return new VmError(code, `${detail} in ${where}`, {
    kind,
    details: { contract: scope.contract, function: scope.fn ?? null },
  });
}

function resolveSlot(name: string, scope: LoweringScope): Slot {
  const slot = scope.slots.get(name);
  if (slot === undefined) throw fault(scope, 'E_UNKNOWN_IDENTIFIER', `'${name}'`);
  return slot;
}

// PUSH_BYTE only carries 0..255; anything above needs a full word.
function pushSlot(slot: Slot): Instr {
  return slot <= 0xff ? Op.pushByte(slot) : Op.pushWord(BigInt(slot));
}

export function lowerExpression(expr: Expression, scope: LoweringScope): Instr[] {
  switch (expr.kind) {
    case 'BoolLiteral':
      return [Op.pushByte(expr.value ? 1 : 0)];
    case 'Variable':
      return [pushSlot(resolveSlot(expr.name, scope)), Op.load()];
    case 'Assign': {
      if (expr.left.kind !== 'Variable') {
        throw fault(scope, 'E_UNSUPPORTED', `assignment target ${expr.left.kind}`, 'UnsupportedAssignmentTarget');
      }
      const slot = resolveSlot(expr.left.name, scope);
      return [...lowerExpression(expr.right, scope), pushSlot(slot), Op.store()];
    }
    case 'Not':
      return [...lowerExpression(expr.operand, scope), Op.isZero()];
    case 'Type':
      // A bare type produces no value.
      return [];
    default: {
      const _: never = expr;
      throw new Error('unknown expression');
    }
  }
}

export function lowerStatement(stmt: Statement, scope: LoweringScope): Instr[] {
  switch (stmt.kind) {
    case 'ExpressionStatement':
      return lowerExpression(stmt.expression, scope);
    case 'Return':
      return stmt.expression
        ? [...lowerExpression(stmt.expression, scope), Op.ret()]
        : [Op.ret()];
  }
}

export function lowerBody(body: readonly Statement[], scope: LoweringScope): Instr[] {
  const program = body.flatMap(stmt => lowerStatement(stmt, scope));
  const last = body[body.length - 1];
  if (!last || last.kind !== 'Return') program.push(Op.ret());
  return program;
}

function abiTypes(params: readonly Parameter[], what: string, scope: LoweringScope): string[] {
  if (params.length > 1) {
    throw fault(scope, 'E_UNSUPPORTED', `${params.length} ${what}, at most 1 supported`);
  }
  return params.map(p => {
    if (!ENCODABLE_TYPES.has(p.type.name)) {
      throw fault(scope, 'E_UNSUPPORTED', `${what} type ${p.type.name}`);
    }
    return p.type.name;
  });
}

export interface LoweredFunction {
  selector: Selector;
  fn: CompiledFunction;
}

export function lowerFunction(
  def: FunctionDefinition,
  slots: ReadonlyMap<string, Slot>,
  contract: string,
  hash?: HashFn,
): LoweredFunction | null {
  if (!def.body) return null;
  const scope: LoweringScope = { contract, fn: def.name, slots };
  const paramTypes = abiTypes(def.params, 'parameters', scope);
  abiTypes(def.returns, 'return parameters', scope);

  const program = lowerBody(def.body, scope);
  const { visibility, mutability } = resolveAttributes(def.attributes);
  const signature = canonicalSignature(def.name, paramTypes);
  const selector = selectorOf(signature, hash);

  emit({ kind: 'Lowered', contract, signature, selector, size: program.length });
  return {
    selector,
    fn: {
      name: def.name,
      signature,
      program: Object.freeze(program),
      visibility,
      mutability,
      returns: def.returns.map(p => p.type),
    },
  };
}

export function lowerContract(def: ContractDefinition, options: CompileOptions = {}): Contract {
  const functions = new Map<Selector, CompiledFunction>();
  const slots = new Map<string, Slot>();
  let storage = ContractStorage.empty();

  for (const part of def.parts) {
    switch (part.kind) {
      case 'VariableDefinition': {
        const next = storage.allocate();
        storage = next.storage;
        slots.set(part.name, next.slot);
        break;
      }
      case 'FunctionDefinition': {
        const lowered = lowerFunction(part, slots, def.name, options.hash);
        // Identical signatures collide; the later definition replaces the earlier.
        if (lowered) functions.set(lowered.selector, lowered.fn);
        break;
      }
      case 'ConstructorDefinition':
        // Creation semantics belong to the deployer.
        break;
    }
  }

  return new Contract({ name: def.name, functions, slots, storage, hash: options.hash, vm: options.vm });
}

export function createContracts(unit: SourceUnit, options: CompileOptions = {}): Contract[] {
  const out: Contract[] = [];
  for (const part of unit.parts) {
    if (part.kind === 'ContractDefinition') out.push(lowerContract(part, options));
  }
  return out;
}
