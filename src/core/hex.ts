/**
 * Hex string and byte utilities
 */

import type { Hex } from './types.js';
import { ValidationError } from './errors.js';

const hexChars = '0123456789abcdef';
const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;

export function isHex(value: unknown): value is Hex {
  return typeof value === 'string' && HEX_PATTERN.test(value);
}

export function assertHex(value: unknown, name = 'value'): asserts value is Hex {
  if (!isHex(value)) {
    throw new ValidationError(`${name} must be a hex string starting with 0x`, {
      value: String(value),
    });
  }
}

export function bytesToHex(bytes: Uint8Array): Hex {
  let hex = '0x';
  for (const byte of bytes) {
    hex += hexChars[byte >> 4];
    hex += hexChars[byte & 0x0f];
  }
  return hex as Hex;
}

function nibble(code: number): number {
  if (code >= 48 && code <= 57) return code - 48; // 0-9
  if (code >= 97 && code <= 102) return code - 87; // a-f
  if (code >= 65 && code <= 70) return code - 55; // A-F
  return -1;
}

/**
 * Decode a hex string. Odd-length input is left-padded with one zero nibble.
 */
export function hexToBytes(hex: string): Uint8Array {
  assertHex(hex);
  const body = hex.length % 2 === 0 ? hex.slice(2) : `0${hex.slice(2)}`;
  const bytes = new Uint8Array(body.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const hi = nibble(body.charCodeAt(i * 2));
    const lo = nibble(body.charCodeAt(i * 2 + 1));
    bytes[i] = (hi << 4) | lo;
  }
  return bytes;
}

/**
 * Accept either representation of raw bytes
 */
export function toBytes(value: Hex | Uint8Array): Uint8Array {
  return value instanceof Uint8Array ? value : hexToBytes(value);
}

export function numberToHex(value: number | bigint): Hex {
  if (typeof value === 'number' && (!Number.isInteger(value) || value < 0)) {
    throw new ValidationError(`Cannot convert ${value} to hex: must be a non-negative integer`);
  }
  if (value < 0) {
    throw new ValidationError(`Cannot convert negative value to hex: ${value}`);
  }
  return `0x${value.toString(16)}`;
}

export function hexToNumber(hex: Hex): number {
  const value = hexToBigInt(hex);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError(`Hex value ${hex} is too large for a safe integer`);
  }
  return Number(value);
}

export function hexToBigInt(hex: Hex): bigint {
  assertHex(hex);
  if (hex === '0x') return 0n;
  return BigInt(hex);
}

/**
 * Left-pad to `byteLength` bytes
 */
export function padHex(hex: Hex, byteLength: number): Hex {
  assertHex(hex);
  const body = hex.slice(2);
  if (body.length > byteLength * 2) {
    throw new ValidationError(`Hex string ${hex} exceeds ${byteLength} bytes`);
  }
  return `0x${body.padStart(byteLength * 2, '0')}`;
}

export function concatHex(...parts: Hex[]): Hex {
  let result = '0x';
  for (const part of parts) {
    assertHex(part);
    result += part.slice(2);
  }
  return result as Hex;
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Byte length of a hex string
 */
export function hexLength(hex: Hex): number {
  assertHex(hex);
  return Math.ceil((hex.length - 2) / 2);
}

export function hexEquals(a: Hex, b: Hex): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function stringToBytes(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}
