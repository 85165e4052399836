import { describe, it, expect } from 'vitest';
import {
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  fromThrowable,
  fromPromise,
} from '../../src/core/result.js';
import { InvalidAbiError, EthBindError, ValidationError } from '../../src/core/errors.js';

describe('Result', () => {
  it('constructs and narrows', () => {
    const good = ok(1);
    const bad = err(new ValidationError('bad'));
    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
    expect(good.value).toBe(1);
    expect(bad.error.code).toBe('VALIDATION_ERROR');
  });

  it('unwraps', () => {
    expect(unwrap(ok('x'))).toBe('x');
    expect(() => unwrap(err(new ValidationError('bad')))).toThrow('bad');
    expect(unwrapOr(err(new ValidationError('bad')), 5)).toBe(5);
  });

  it('maps values and errors', () => {
    expect(map(ok(2), (n) => n * 2)).toEqual(ok(4));
    const mapped = mapErr(err('boom'), (e) => e.length);
    expect(mapped).toEqual(err(4));
  });

  describe('fromThrowable', () => {
    it('captures errors of the given class', () => {
      const result = fromThrowable(() => {
        throw new InvalidAbiError('entry 0 has no type');
      }, EthBindError);
      expect(result.ok).toBe(false);
      expect(result.error).toBeInstanceOf(InvalidAbiError);
    });

    it('rethrows other errors', () => {
      expect(() =>
        fromThrowable(() => {
          throw new TypeError('unrelated');
        }, EthBindError)
      ).toThrow(TypeError);
    });
  });

  describe('fromPromise', () => {
    it('resolves to Ok', async () => {
      await expect(fromPromise(Promise.resolve(3), EthBindError)).resolves.toEqual(ok(3));
    });

    it('captures rejections of the given class', async () => {
      const result = await fromPromise(Promise.reject(new ValidationError('nope')), EthBindError);
      expect(isErr(result)).toBe(true);
      expect(result.error?.message).toBe('nope');
    });

    it('rethrows other rejections', async () => {
      await expect(fromPromise(Promise.reject(new RangeError('x')), EthBindError)).rejects.toThrow(RangeError);
    });
  });
});
