export type VmErrorCode =
  | 'E_STACK_OVERFLOW'
  | 'E_STACK_UNDERFLOW'
  | 'E_STORAGE_SLOT'
  | 'E_UNKNOWN_IDENTIFIER'
  | 'E_UNSUPPORTED'
  | 'E_BYTECODE'
  | 'E_AST_TYPE'
  | 'E_AST_KIND'
  | 'E_AST_FIELD_MISSING'
  | 'E_AST_FIELD_UNKNOWN'
  | 'E_AST_VALUE';

export type VmErrorKind =
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'InvalidStorageSlot'
  | 'UnknownIdentifier'
  | 'UnsupportedConstruct'
  | 'UnsupportedAssignmentTarget'
  | 'MalformedBytecode'
  | 'MalformedAst';

const KIND_BY_CODE: Record<VmErrorCode, VmErrorKind> = {
  E_STACK_OVERFLOW: 'StackOverflow',
  E_STACK_UNDERFLOW: 'StackUnderflow',
  E_STORAGE_SLOT: 'InvalidStorageSlot',
  E_UNKNOWN_IDENTIFIER: 'UnknownIdentifier',
  E_UNSUPPORTED: 'UnsupportedConstruct',
  E_BYTECODE: 'MalformedBytecode',
  E_AST_TYPE: 'MalformedAst',
  E_AST_KIND: 'MalformedAst',
  E_AST_FIELD_MISSING: 'MalformedAst',
  E_AST_FIELD_UNKNOWN: 'MalformedAst',
  E_AST_VALUE: 'MalformedAst',
};

export interface VmErrorOptions {
  kind?: VmErrorKind;
  details?: Record<string, unknown>;
}

/**
 * Every recoverable fault raised by the stack, the engine, the lowering pass
 * and the input adapters. The message always starts with the code.
 */
export class VmError extends Error {
  readonly code: VmErrorCode;
  readonly kind: VmErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(code: VmErrorCode, detail: string, options: VmErrorOptions = {}) {
    super(detail ? `${code} ${detail}` : code);
    this.name = 'VmError';
    this.code = code;
    this.kind = options.kind ?? KIND_BY_CODE[code];
    if (options.details !== undefined) this.details = options.details;
  }
}

export function isVmError(err: unknown): err is VmError {
  return err instanceof VmError;
}
