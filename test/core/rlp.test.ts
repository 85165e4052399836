import { describe, it, expect } from 'vitest';
import { encode, encodeHex, decode, integerToBytes, bytesToInteger } from '../../src/core/rlp.js';
import { bytesToHex } from '../../src/core/hex.js';
import { MalformedEncodingError } from '../../src/core/errors.js';

describe('RLP', () => {
  describe('encode', () => {
    it('encodes short strings', () => {
      expect(encodeHex('dog')).toBe('0x83646f67');
      expect(encodeHex('')).toBe('0x80');
    });

    it('encodes single bytes below 0x80 as themselves', () => {
      expect(encodeHex(new Uint8Array([0x0f]))).toBe('0x0f');
      expect(encodeHex(new Uint8Array([0x80]))).toBe('0x8180');
    });

    it('encodes integers minimally', () => {
      expect(encodeHex(0)).toBe('0x80');
      expect(encodeHex(15)).toBe('0x0f');
      expect(encodeHex(1024)).toBe('0x820400');
      expect(encodeHex(0n)).toBe('0x80');
    });

    it('encodes null as the empty string', () => {
      expect(encodeHex(null)).toBe('0x80');
    });

    it('encodes lists', () => {
      expect(encodeHex([])).toBe('0xc0');
      expect(encodeHex(['cat', 'dog'])).toBe('0xc88363617483646f67');
      expect(encodeHex([[], [[]], [[], [[]]]])).toBe('0xc7c0c1c0c3c0c1c0');
    });

    it('uses a long-form length prefix above 55 bytes', () => {
      const text = 'Lorem ipsum dolor sit amet, consectetur adipisicing elit';
      const encoded = encode(text);
      expect(encoded.length).toBe(58);
      expect(bytesToHex(encoded.subarray(0, 2))).toBe('0xb838');
    });

    it('treats hex strings as bytes', () => {
      expect(encodeHex('0x0400')).toBe('0x820400');
    });

    it('rejects negative integers', () => {
      expect(() => encode(-1)).toThrow(RangeError);
    });
  });

  describe('decode', () => {
    it('decodes strings and lists', () => {
      expect(decode('0x83646f67')).toEqual(new Uint8Array([0x64, 0x6f, 0x67]));
      expect(decode('0xc88363617483646f67')).toEqual([
        new Uint8Array([0x63, 0x61, 0x74]),
        new Uint8Array([0x64, 0x6f, 0x67]),
      ]);
    });

    it('decodes long strings', () => {
      const payload = new Uint8Array(60).fill(7);
      expect(decode(encode(payload))).toEqual(payload);
    });

    it('rejects trailing bytes', () => {
      expect(() => decode('0x83646f6700')).toThrow(MalformedEncodingError);
    });

    it('rejects truncated items', () => {
      expect(() => decode('0x83646f')).toThrow(MalformedEncodingError);
      expect(() => decode('0xc883636174')).toThrow(MalformedEncodingError);
      expect(() => decode('0x')).toThrow(MalformedEncodingError);
    });
  });

  describe('integers', () => {
    it('round-trips through minimal bytes', () => {
      expect(integerToBytes(0n)).toEqual(new Uint8Array([]));
      expect(integerToBytes(0x0400n)).toEqual(new Uint8Array([4, 0]));
      expect(bytesToInteger(new Uint8Array([4, 0]))).toBe(1024n);
    });
  });
});
