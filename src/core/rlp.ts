/**
 * RLP (Recursive Length Prefix) encoding/decoding
 * Serializes transaction payloads for signing and the CREATE address derivation
 */

import type { Hex } from './types.js';
import { bytesToHex, concatBytes, hexToBytes, isHex, stringToBytes } from './hex.js';
import { MalformedEncodingError } from './errors.js';

export type RLPInput = Uint8Array | string | bigint | number | null | RLPInput[];
export type RLPDecoded = Uint8Array | RLPDecoded[];

export function encode(input: RLPInput): Uint8Array {
  if (input === null) {
    return new Uint8Array([0x80]);
  }
  if (input instanceof Uint8Array) {
    return encodeBytes(input);
  }
  if (typeof input === 'string') {
    return encodeBytes(isHex(input) ? hexToBytes(input) : stringToBytes(input));
  }
  if (typeof input === 'number' || typeof input === 'bigint') {
    return encodeBytes(integerToBytes(BigInt(input)));
  }
  const items = input.map(encode);
  return concatBytes(lengthPrefix(items.reduce((sum, item) => sum + item.length, 0), 0xc0), ...items);
}

function encodeBytes(bytes: Uint8Array): Uint8Array {
  const first = bytes[0];
  if (bytes.length === 1 && first !== undefined && first < 0x80) {
    return bytes;
  }
  return concatBytes(lengthPrefix(bytes.length, 0x80), bytes);
}

function lengthPrefix(length: number, offset: number): Uint8Array {
  if (length <= 55) {
    return new Uint8Array([offset + length]);
  }
  const lenBytes = integerToBytes(BigInt(length));
  return concatBytes(new Uint8Array([offset + 55 + lenBytes.length]), lenBytes);
}

/**
 * Minimal big-endian representation, empty for zero
 */
export function integerToBytes(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new RangeError(`Cannot RLP encode negative integer ${value}`);
  }
  const bytes: number[] = [];
  let n = value;
  while (n > 0n) {
    bytes.unshift(Number(n & 0xffn));
    n >>= 8n;
  }
  return new Uint8Array(bytes);
}

export function bytesToInteger(bytes: Uint8Array): bigint {
  let n = 0n;
  for (const byte of bytes) {
    n = (n << 8n) | BigInt(byte);
  }
  return n;
}

/**
 * Decode a single RLP item spanning the whole input
 */
export function decode(input: Uint8Array | Hex): RLPDecoded {
  const bytes = input instanceof Uint8Array ? input : hexToBytes(input);
  const [item, end] = decodeItem(bytes, 0);
  if (end !== bytes.length) {
    throw new MalformedEncodingError('trailing bytes after RLP item', { end, length: bytes.length });
  }
  return item;
}

function readLength(bytes: Uint8Array, offset: number, lenLen: number): number {
  if (offset + lenLen > bytes.length) {
    throw new MalformedEncodingError('RLP length prefix out of bounds', { offset });
  }
  return Number(bytesToInteger(bytes.subarray(offset, offset + lenLen)));
}

function take(bytes: Uint8Array, start: number, len: number): Uint8Array {
  if (start + len > bytes.length) {
    throw new MalformedEncodingError('RLP item exceeds input', { start, len });
  }
  return bytes.slice(start, start + len);
}

function decodeItem(bytes: Uint8Array, offset: number): [RLPDecoded, number] {
  const prefix = bytes[offset];
  if (prefix === undefined) {
    throw new MalformedEncodingError('unexpected end of RLP input', { offset });
  }

  if (prefix < 0x80) {
    return [new Uint8Array([prefix]), offset + 1];
  }
  if (prefix <= 0xb7) {
    const len = prefix - 0x80;
    return [take(bytes, offset + 1, len), offset + 1 + len];
  }
  if (prefix <= 0xbf) {
    const lenLen = prefix - 0xb7;
    const len = readLength(bytes, offset + 1, lenLen);
    return [take(bytes, offset + 1 + lenLen, len), offset + 1 + lenLen + len];
  }
  if (prefix <= 0xf7) {
    return decodeList(bytes, offset + 1, prefix - 0xc0);
  }
  const lenLen = prefix - 0xf7;
  return decodeList(bytes, offset + 1 + lenLen, readLength(bytes, offset + 1, lenLen));
}

function decodeList(bytes: Uint8Array, start: number, len: number): [RLPDecoded[], number] {
  const end = start + len;
  if (end > bytes.length) {
    throw new MalformedEncodingError('RLP list exceeds input', { start, len });
  }
  const items: RLPDecoded[] = [];
  let offset = start;
  while (offset < end) {
    const [item, next] = decodeItem(bytes, offset);
    items.push(item);
    offset = next;
  }
  if (offset !== end) {
    throw new MalformedEncodingError('RLP list items overrun the declared length', { start, len });
  }
  return [items, end];
}

export function encodeHex(input: RLPInput): Hex {
  return bytesToHex(encode(input));
}
