export * as model from './model/index.js';
export * as vm from './vm/index.js';
export * as trace from './trace/index.js';
export { VmError, isVmError } from './errors.js';
export type { VmErrorCode, VmErrorKind } from './errors.js';
export { Contract } from './contract/contract.js';
export type { CallOutcome, CallResult, ContractInit } from './contract/contract.js';
export { createContracts, lowerContract, lowerFunction, lowerBody, lowerStatement, lowerExpression } from './compiler/lower.js';
export type { CompileOptions, LoweringScope, LoweredFunction } from './compiler/lower.js';
export { resolveAttributes } from './compiler/attributes.js';
export { canonicalSignature, selectorOf } from './abi/selector.js';
export { decodeReturns } from './abi/decode.js';
export { parseSourceUnit } from './ast/adapter.js';
export { encodeProgram, decodeProgram, programToHex, programFromHex } from './codec/bytecode.js';
export { formatProgram, formatInstr } from './codec/disasm.js';
export { canonicalJsonBytes, blake3hex, storageId } from './canon/index.js';
export { keccak256 } from './canon/hash.js';
export type { HashFn } from './canon/hash.js';
