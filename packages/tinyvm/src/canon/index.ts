import type { ContractStorage } from '../vm/storage.js';
import { blake3hex } from './hash.js';
import { canonicalJsonBytes } from './json.js';

export { canonicalJsonBytes } from './json.js';
export { blake3hex } from './hash.js';

/** Content id of a storage snapshot, stable across runs. */
export function storageId(storage: ContractStorage): string {
  return `st:${blake3hex(canonicalJsonBytes(storage.words()))}`;
}
