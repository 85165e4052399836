import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { bytesToHex, hexToBytes, numberToHex, hexToBigInt, padHex, hexLength } from '../../src/core/hex.js';

describe('hex property-based tests', () => {
  test.prop([fc.uint8Array()])('bytesToHex/hexToBytes roundtrip', (bytes) => {
    expect(hexToBytes(bytesToHex(bytes))).toEqual(bytes);
  });

  test.prop([fc.bigInt({ min: 0n, max: 2n ** 256n - 1n })])('numberToHex/hexToBigInt roundtrip', (value) => {
    expect(hexToBigInt(numberToHex(value))).toBe(value);
  });

  test.prop([fc.uint8Array({ maxLength: 32 }), fc.integer({ min: 0, max: 64 })])(
    'padHex keeps the value and reaches the target length',
    (bytes, target) => {
      fc.pre(bytes.length <= target);
      const padded = padHex(bytesToHex(bytes), target);
      expect(hexLength(padded)).toBe(target);
      expect(hexToBigInt(padded)).toBe(hexToBigInt(bytesToHex(bytes)));
    }
  );
});
