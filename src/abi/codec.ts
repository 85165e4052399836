/**
 * Head/tail ABI codec
 *
 * Static values sit inline in their head section; dynamic values get a head
 * slot holding a byte offset relative to the start of that section, and their
 * tails follow in declaration order. Decoding is strict: nonzero padding,
 * high bits outside a type's width and out-of-range offsets are rejected
 * with MalformedEncodingError.
 */

import type { Hex } from '../core/types.js';
import { bytesToHex, concatBytes, stringToBytes, toBytes } from '../core/hex.js';
import { ArgumentMismatchError, MalformedEncodingError } from '../core/errors.js';
import type { AbiType } from './types.js';
import { WORD_SIZE, headSizeOf } from './types.js';
import type { AbiValue } from './value.js';
import { expectBoolean, expectBytes, expectInteger, expectList, expectString } from './value.js';
import { Word, wordsFromBytes } from './word.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

// ============ Encoding ============

/**
 * Encode `values` against `types` into words
 */
export function encode(types: ReadonlyArray<AbiType>, values: ReadonlyArray<AbiValue>): Word[] {
  return wordsFromBytes(encodeBytes(types, values));
}

export function encodeParameters(types: ReadonlyArray<AbiType>, values: ReadonlyArray<AbiValue>): Hex {
  return bytesToHex(encodeBytes(types, values));
}

function encodeBytes(types: ReadonlyArray<AbiType>, values: ReadonlyArray<AbiValue>): Uint8Array {
  if (types.length !== values.length) {
    throw new ArgumentMismatchError(`expected ${types.length} values, got ${values.length}`, {
      expected: types.length,
      received: values.length,
    });
  }
  return encodeSequence(types, values, 'arg');
}

function encodeSequence(
  types: ReadonlyArray<AbiType>,
  values: ReadonlyArray<AbiValue>,
  path: string
): Uint8Array {
  const heads: Uint8Array[] = [];
  const tails: Uint8Array[] = [];
  let tailOffset = headSizeOf(types);

  types.forEach((type, i) => {
    const value = values[i];
    if (value === undefined) {
      throw new ArgumentMismatchError(`${path}[${i}] is missing`);
    }
    const encoded = encodeValue(type, value, `${path}[${i}]`);
    if (type.dynamic) {
      heads.push(uintWord(BigInt(tailOffset)));
      tails.push(encoded);
      tailOffset += encoded.length;
    } else {
      heads.push(encoded);
    }
  });

  return concatBytes(...heads, ...tails);
}

function uintWord(value: bigint): Uint8Array {
  return Word.fromBigInt(value).bytes();
}

function padRight(bytes: Uint8Array): Uint8Array {
  const padded = new Uint8Array(Math.ceil(bytes.length / WORD_SIZE) * WORD_SIZE);
  padded.set(bytes);
  return padded;
}

function encodeValue(type: AbiType, value: AbiValue, path: string): Uint8Array {
  switch (type.kind) {
    case 'uint':
    case 'int':
      return uintWord(expectInteger(type, value, path));
    case 'bool':
      return uintWord(expectBoolean(type, value, path) ? 1n : 0n);
    case 'address': {
      const word = new Uint8Array(WORD_SIZE);
      word.set(expectBytes(type, value, path, 20), 12);
      return word;
    }
    case 'fixedBytes': {
      const word = new Uint8Array(WORD_SIZE);
      word.set(expectBytes(type, value, path, type.size));
      return word;
    }
    case 'bytes':
      return encodeDynamicBytes(expectBytes(type, value, path));
    case 'string':
      return encodeDynamicBytes(stringToBytes(expectString(type, value, path)));
    case 'fixedArray': {
      const items = expectList(type, value, path, type.length);
      return encodeSequence(repeat(type.element, items.length), items, path);
    }
    case 'array': {
      const items = expectList(type, value, path);
      return concatBytes(
        uintWord(BigInt(items.length)),
        encodeSequence(repeat(type.element, items.length), items, path)
      );
    }
    case 'tuple': {
      const items = expectList(type, value, path, type.components.length);
      return encodeSequence(
        type.components.map((c) => c.type),
        items,
        path
      );
    }
  }
}

function encodeDynamicBytes(bytes: Uint8Array): Uint8Array {
  return concatBytes(uintWord(BigInt(bytes.length)), padRight(bytes));
}

function repeat(type: AbiType, count: number): AbiType[] {
  return new Array<AbiType>(count).fill(type);
}

// ============ Decoding ============

/**
 * Decode a full encoding. The input length must be a multiple of 32.
 */
export function decode(types: ReadonlyArray<AbiType>, input: ReadonlyArray<Word> | Uint8Array | Hex): AbiValue[] {
  let bytes: Uint8Array;
  if (input instanceof Uint8Array || typeof input === 'string') {
    bytes = toBytes(input);
    if (bytes.length % WORD_SIZE !== 0) {
      throw new MalformedEncodingError(`length ${bytes.length} is not a multiple of ${WORD_SIZE}`);
    }
  } else {
    bytes = concatBytes(...input.map((w) => w.bytes()));
  }
  return decodeSequence(types, bytes, 0);
}

export function decodeParameters(types: ReadonlyArray<AbiType>, data: Hex | Uint8Array): AbiValue[] {
  return decode(types, data);
}

/**
 * Decode the static value held in one 32-byte topic or word
 */
export function decodeWord(type: AbiType, word: Uint8Array): AbiValue {
  if (type.dynamic || type.headSize !== WORD_SIZE || word.length !== WORD_SIZE) {
    throw new MalformedEncodingError(`cannot decode ${type.kind} from a single word`);
  }
  return decodeValue(type, word, 0);
}

function readWord(data: Uint8Array, position: number): Uint8Array {
  if (position < 0 || position + WORD_SIZE > data.length) {
    throw new MalformedEncodingError(`read of word at ${position} past end of ${data.length}-byte buffer`, {
      position,
      length: data.length,
    });
  }
  return data.subarray(position, position + WORD_SIZE);
}

function wordToBigInt(word: Uint8Array): bigint {
  let n = 0n;
  for (const byte of word) {
    n = (n << 8n) | BigInt(byte);
  }
  return n;
}

/**
 * Read an offset or length word as a safe integer
 */
function readSize(data: Uint8Array, position: number, what: string): number {
  const value = wordToBigInt(readWord(data, position));
  if (value > BigInt(data.length)) {
    throw new MalformedEncodingError(`${what} ${value} exceeds buffer of ${data.length} bytes`, {
      position,
    });
  }
  return Number(value);
}

function allZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}

function decodeSequence(types: ReadonlyArray<AbiType>, data: Uint8Array, base: number): AbiValue[] {
  const headEnd = base + headSizeOf(types);
  if (headEnd > data.length) {
    throw new MalformedEncodingError(`head of ${headEnd - base} bytes at ${base} exceeds buffer`, {
      base,
      length: data.length,
    });
  }

  const values: AbiValue[] = [];
  let cursor = base;
  for (const type of types) {
    if (type.dynamic) {
      const target = base + readSize(data, cursor, 'offset');
      if (target < headEnd || target >= data.length) {
        throw new MalformedEncodingError(`offset to ${target} outside [${headEnd}, ${data.length})`, {
          position: cursor,
        });
      }
      values.push(decodeValue(type, data, target));
    } else {
      values.push(decodeValue(type, data, cursor));
    }
    cursor += type.headSize;
  }
  return values;
}

function decodeValue(type: AbiType, data: Uint8Array, position: number): AbiValue {
  switch (type.kind) {
    case 'uint': {
      const value = wordToBigInt(readWord(data, position));
      if (value >> BigInt(type.bits) !== 0n) {
        throw new MalformedEncodingError(`uint${type.bits} has bits set above its width`, { position });
      }
      return value;
    }
    case 'int': {
      const raw = wordToBigInt(readWord(data, position));
      const value = BigInt.asIntN(type.bits, raw);
      if (BigInt.asUintN(256, value) !== raw) {
        throw new MalformedEncodingError(`int${type.bits} is not sign-extended`, { position });
      }
      return value;
    }
    case 'bool': {
      const value = wordToBigInt(readWord(data, position));
      if (value > 1n) {
        throw new MalformedEncodingError(`bool word holds ${value}`, { position });
      }
      return value === 1n;
    }
    case 'address': {
      const word = readWord(data, position);
      if (!allZero(word.subarray(0, 12))) {
        throw new MalformedEncodingError('address has nonzero high bytes', { position });
      }
      return word.slice(12);
    }
    case 'fixedBytes': {
      const word = readWord(data, position);
      if (!allZero(word.subarray(type.size))) {
        throw new MalformedEncodingError(`bytes${type.size} has nonzero padding`, { position });
      }
      return word.slice(0, type.size);
    }
    case 'bytes':
      return decodeDynamicBytes(data, position);
    case 'string':
      try {
        return utf8.decode(decodeDynamicBytes(data, position));
      } catch (error) {
        if (error instanceof MalformedEncodingError) throw error;
        throw new MalformedEncodingError('string is not valid UTF-8', { position });
      }
    case 'fixedArray':
      return decodeSequence(repeat(type.element, type.length), data, position);
    case 'array': {
      const count = readSize(data, position, 'element count');
      const start = position + WORD_SIZE;
      if (count * type.element.headSize > data.length - start) {
        throw new MalformedEncodingError(`array of ${count} elements cannot fit in remaining bytes`, {
          position,
        });
      }
      return decodeSequence(repeat(type.element, count), data, start);
    }
    case 'tuple':
      return decodeSequence(
        type.components.map((c) => c.type),
        data,
        position
      );
  }
}

function decodeDynamicBytes(data: Uint8Array, position: number): Uint8Array {
  const length = readSize(data, position, 'length');
  const start = position + WORD_SIZE;
  const paddedEnd = start + Math.ceil(length / WORD_SIZE) * WORD_SIZE;
  if (paddedEnd > data.length) {
    throw new MalformedEncodingError(`${length} bytes at ${start} exceed buffer`, { position });
  }
  if (!allZero(data.subarray(start + length, paddedEnd))) {
    throw new MalformedEncodingError('dynamic bytes have nonzero padding', { position });
  }
  return data.slice(start, start + length);
}
