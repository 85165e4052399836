import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { encodeParameters, decodeParameters } from '../../src/abi/codec.js';
import { uintType, intType, stringType, bytesType, arrayType, tupleType } from '../../src/abi/types.js';
import { MalformedEncodingError } from '../../src/core/errors.js';

describe('word codec property-based tests', () => {
  const uint256 = fc.bigInt({ min: 0n, max: 2n ** 256n - 1n });
  const int64 = fc.bigInt({ min: -(2n ** 63n), max: 2n ** 63n - 1n });

  test.prop([uint256, fc.string(), fc.uint8Array({ maxLength: 80 })])(
    'decode(encode(x)) returns x for mixed static and dynamic values',
    (n, s, b) => {
      const types = [uintType(), stringType, bytesType];
      expect(decodeParameters(types, encodeParameters(types, [n, s, b]))).toEqual([n, s, b]);
    }
  );

  test.prop([fc.array(fc.tuple(int64, fc.string({ maxLength: 40 })), { maxLength: 5 })])(
    'arrays of dynamic tuples survive encoding',
    (items) => {
      const type = arrayType(tupleType([intType(64), stringType]));
      expect(decodeParameters([type], encodeParameters([type], [items]))).toEqual([items]);
    }
  );

  test.prop([fc.uint8Array({ minLength: 1, maxLength: 200 })])('arbitrary bytes either decode or raise MalformedEncodingError', (bytes) => {
    try {
      decodeParameters([uintType(8), stringType, arrayType(uintType())], bytes);
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedEncodingError);
    }
  });

  test.prop([uint256, fc.string()])('every encoding is a whole number of words', (n, s) => {
    const encoded = encodeParameters([uintType(), stringType], [n, s]);
    expect((encoded.length - 2) % 64).toBe(0);
  });
});
