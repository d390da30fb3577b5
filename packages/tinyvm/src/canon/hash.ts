import { blake3 } from '@noble/hashes/blake3.js';
import { keccak_256 } from '@noble/hashes/sha3.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';

/** Opaque digest primitive: bytes in, fixed-length digest out. */
export type HashFn = (bytes: Uint8Array) => Uint8Array;

export const keccak256: HashFn = (bytes) => keccak_256(bytes);

export function blake3hex(data: Uint8Array | string): string {
  const input = typeof data === 'string' ? utf8ToBytes(data) : data;
  return bytesToHex(blake3(input));
}
