/**
 * Keccak-256 hashing helpers
 */

import { keccak_256 } from '@noble/hashes/sha3';
import type { Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex, stringToBytes } from './hex.js';

/**
 * Compute keccak256. Hex input is hashed as bytes, any other string as UTF-8.
 */
export function keccak256(data: Hex | Uint8Array | string): Hash {
  let bytes: Uint8Array;
  if (data instanceof Uint8Array) {
    bytes = data;
  } else if (isHex(data)) {
    bytes = hexToBytes(data);
  } else {
    bytes = stringToBytes(data);
  }
  return bytesToHex(keccak_256(bytes)) as Hash;
}

/**
 * 4-byte selector of a canonical signature
 * e.g., "transfer(address,uint256)" -> "0xa9059cbb"
 */
export function selectorOf(signature: string): Hex {
  return `0x${keccak256(signature).slice(2, 10)}`;
}

/**
 * 32-byte event topic of a canonical signature
 */
export function topicOf(signature: string): Hash {
  return keccak256(signature);
}
