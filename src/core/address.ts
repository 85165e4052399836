/**
 * Ethereum address utilities
 * Validation, checksum encoding (EIP-55), CREATE address derivation
 */

import type { Address } from './types.js';
import { keccak256 } from './hash.js';
import { bytesToHex, isHex } from './hex.js';
import { encode as rlpEncode } from './rlp.js';
import { ValidationError } from './errors.js';

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && value.length === 42 && isHex(value);
}

export function assertAddress(value: unknown, name = 'address'): asserts value is Address {
  if (!isAddress(value)) {
    throw new ValidationError(`${name} must be 0x followed by 40 hex characters`, {
      value: String(value),
    });
  }
}

/**
 * Convert an address to checksum format (EIP-55)
 */
export function toChecksumAddress(address: string): Address {
  assertAddress(address);
  const lower = address.slice(2).toLowerCase();
  const hash = keccak256(lower).slice(2);

  let out = '0x';
  for (let i = 0; i < lower.length; i++) {
    const char = lower.charAt(i);
    out += parseInt(hash.charAt(i), 16) >= 8 ? char.toUpperCase() : char;
  }
  return out as Address;
}

/**
 * Mixed-case input must carry a valid checksum; all-lower or all-upper is accepted as is
 */
export function isChecksumValid(address: string): boolean {
  if (!isAddress(address)) return false;
  const body = address.slice(2);
  if (body === body.toLowerCase() || body === body.toUpperCase()) {
    return true;
  }
  return address === toChecksumAddress(address);
}

export function addressFromBytes(bytes: Uint8Array): Address {
  if (bytes.length !== 20) {
    throw new ValidationError(`Address must be 20 bytes, got ${bytes.length}`);
  }
  return toChecksumAddress(bytesToHex(bytes));
}

export function addressEquals(a: string, b: string): boolean {
  return isAddress(a) && isAddress(b) && a.toLowerCase() === b.toLowerCase();
}

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as Address;

/**
 * Address of a contract created by `from` with `nonce`
 */
export function computeContractAddress(from: Address, nonce: number): Address {
  const hash = keccak256(rlpEncode([from, nonce]));
  return toChecksumAddress(`0x${hash.slice(-40)}`);
}
