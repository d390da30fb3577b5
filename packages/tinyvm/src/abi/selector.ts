import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import { keccak256, type HashFn } from '../canon/hash.js';
import type { Selector } from '../model/types.js';
import { VmError } from '../errors.js';

export const SELECTOR_BYTES = 4;

/** `name(type,type,...)`; only `bool` parameters are encodable today. */
export function canonicalSignature(name: string, paramTypes: readonly string[]): string {
  return `${name}(${paramTypes.join(',')})`;
}

export function selectorOf(signature: string, hash: HashFn = keccak256): Selector {
  const digest = hash(utf8ToBytes(signature));
  if (digest.length < SELECTOR_BYTES) {
    throw new VmError('E_UNSUPPORTED', `digest shorter than ${SELECTOR_BYTES} bytes`);
  }
  return bytesToHex(digest.subarray(0, SELECTOR_BYTES));
}

