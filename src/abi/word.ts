/**
 * 32-byte words, the unit of ABI encoding
 */

import type { Hex } from '../core/types.js';
import { bytesToHex, bytesEqual, concatBytes, toBytes } from '../core/hex.js';
import { MalformedEncodingError } from '../core/errors.js';
import { WORD_SIZE } from './types.js';

const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Immutable 32-byte block. Reads return copies.
 */
export class Word {
  private readonly data: Uint8Array;

  private constructor(data: Uint8Array) {
    this.data = data;
  }

  static fromBytes(bytes: Uint8Array): Word {
    if (bytes.length !== WORD_SIZE) {
      throw new MalformedEncodingError(`word must be ${WORD_SIZE} bytes, got ${bytes.length}`);
    }
    return new Word(new Uint8Array(bytes));
  }

  /**
   * Big-endian word; negative values use two's complement
   */
  static fromBigInt(value: bigint): Word {
    if (value > MAX_UINT256 || value < -(1n << 255n)) {
      throw new RangeError(`${value} does not fit in a word`);
    }
    let n = BigInt.asUintN(256, value);
    const data = new Uint8Array(WORD_SIZE);
    for (let i = WORD_SIZE - 1; i >= 0 && n > 0n; i--) {
      data[i] = Number(n & 0xffn);
      n >>= 8n;
    }
    return new Word(data);
  }

  static zero(): Word {
    return new Word(new Uint8Array(WORD_SIZE));
  }

  bytes(): Uint8Array {
    return new Uint8Array(this.data);
  }

  toBigInt(): bigint {
    let n = 0n;
    for (const byte of this.data) {
      n = (n << 8n) | BigInt(byte);
    }
    return n;
  }

  toHex(): Hex {
    return bytesToHex(this.data);
  }

  equals(other: Word): boolean {
    return bytesEqual(this.data, other.data);
  }
}

export function wordsToBytes(words: ReadonlyArray<Word>): Uint8Array {
  return concatBytes(...words.map((w) => w.bytes()));
}

export function wordsToHex(words: ReadonlyArray<Word>): Hex {
  return bytesToHex(wordsToBytes(words));
}

/**
 * Split a full encoding into words; its length must be a multiple of 32
 */
export function wordsFromBytes(input: Uint8Array | Hex): Word[] {
  const bytes = toBytes(input);
  if (bytes.length % WORD_SIZE !== 0) {
    throw new MalformedEncodingError(`length ${bytes.length} is not a multiple of ${WORD_SIZE}`);
  }
  const words: Word[] = [];
  for (let i = 0; i < bytes.length; i += WORD_SIZE) {
    words.push(Word.fromBytes(bytes.subarray(i, i + WORD_SIZE)));
  }
  return words;
}
