/**
 * Wire-level ABI values
 *
 * The accompanying AbiType is the tag: integers are bigint, bool is boolean,
 * address / bytesN / bytes are Uint8Array, string is string, arrays and
 * tuples are ordered lists.
 */

import { ArgumentMismatchError } from '../core/errors.js';
import type { AbiType, IntType, UintType } from './types.js';
import { canonicalType } from './types.js';

export type AbiValue = bigint | boolean | Uint8Array | string | ReadonlyArray<AbiValue>;

function describe(value: AbiValue): string {
  if (value instanceof Uint8Array) return `${value.length}-byte array`;
  if (Array.isArray(value)) return `list of ${value.length}`;
  return typeof value;
}

function mismatch(type: AbiType, value: AbiValue, path: string, extra?: string): ArgumentMismatchError {
  return new ArgumentMismatchError(
    `${path}: expected ${canonicalType(type)}, got ${describe(value)}${extra ? ` (${extra})` : ''}`,
    { path, type: canonicalType(type) }
  );
}

export function integerBounds(type: UintType | IntType): [bigint, bigint] {
  const bits = BigInt(type.bits);
  if (type.kind === 'uint') {
    return [0n, (1n << bits) - 1n];
  }
  return [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n];
}

export function expectInteger(type: UintType | IntType, value: AbiValue, path: string): bigint {
  if (typeof value !== 'bigint') {
    throw mismatch(type, value, path);
  }
  const [min, max] = integerBounds(type);
  if (value < min || value > max) {
    throw mismatch(type, value, path, `${value} out of range`);
  }
  return value;
}

export function expectBoolean(type: AbiType, value: AbiValue, path: string): boolean {
  if (typeof value !== 'boolean') {
    throw mismatch(type, value, path);
  }
  return value;
}

export function expectBytes(type: AbiType, value: AbiValue, path: string, size?: number): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw mismatch(type, value, path);
  }
  if (size !== undefined && value.length !== size) {
    throw mismatch(type, value, path, `expected exactly ${size} bytes`);
  }
  return value;
}

export function expectString(type: AbiType, value: AbiValue, path: string): string {
  if (typeof value !== 'string') {
    throw mismatch(type, value, path);
  }
  return value;
}

export function expectList(
  type: AbiType,
  value: AbiValue,
  path: string,
  length?: number
): ReadonlyArray<AbiValue> {
  if (!Array.isArray(value)) {
    throw mismatch(type, value, path);
  }
  if (length !== undefined && value.length !== length) {
    throw mismatch(type, value, path, `expected ${length} elements`);
  }
  return value;
}

/**
 * Check that `value` has exactly the shape `type` requires, recursively
 */
export function assertValueMatches(type: AbiType, value: AbiValue, path = 'value'): void {
  switch (type.kind) {
    case 'uint':
    case 'int':
      expectInteger(type, value, path);
      return;
    case 'bool':
      expectBoolean(type, value, path);
      return;
    case 'address':
      expectBytes(type, value, path, 20);
      return;
    case 'fixedBytes':
      expectBytes(type, value, path, type.size);
      return;
    case 'bytes':
      expectBytes(type, value, path);
      return;
    case 'string':
      expectString(type, value, path);
      return;
    case 'fixedArray':
    case 'array': {
      const items = expectList(type, value, path, type.kind === 'fixedArray' ? type.length : undefined);
      items.forEach((item, i) => assertValueMatches(type.element, item, `${path}[${i}]`));
      return;
    }
    case 'tuple': {
      const items = expectList(type, value, path, type.components.length);
      type.components.forEach((c, i) => {
        const item = items[i];
        if (item === undefined) throw mismatch(type, value, path);
        assertValueMatches(c.type, item, `${path}.${c.name ?? i}`);
      });
      return;
    }
  }
}
