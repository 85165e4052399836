/**
 * Mapping between ABI values and the TypeScript values bindings expose
 *
 * | Solidity              | input                 | output              |
 * |-----------------------|-----------------------|---------------------|
 * | uintN / intN, N <= 48 | number, bigint        | number              |
 * | uintN / intN, N > 48  | number, bigint        | bigint              |
 * | bool                  | boolean               | boolean             |
 * | address               | Address               | checksummed Address |
 * | bytesN / bytes        | Hex, Uint8Array       | Hex                 |
 * | string                | string                | string              |
 * | T[] / T[k]            | array                 | array               |
 * | tuple                 | object or array       | object when every component is named |
 */

import { bytesToHex, hexToBytes, isHex } from '../core/hex.js';
import { addressFromBytes, isAddress, isChecksumValid } from '../core/address.js';
import { ArgumentMismatchError } from '../core/errors.js';
import type { AbiType, TupleType } from './types.js';
import { canonicalType } from './types.js';
import type { AbiValue } from './value.js';
import { expectBoolean, expectBytes, expectInteger, expectList, expectString, integerBounds } from './value.js';

export type NativeValue =
  | number
  | bigint
  | boolean
  | string
  | Uint8Array
  | ReadonlyArray<NativeValue>
  | { readonly [key: string]: NativeValue };

/** Widest integer that still maps to `number` */
export const MAX_NUMBER_BITS = 48;

export function usesNumber(type: AbiType): boolean {
  return (type.kind === 'uint' || type.kind === 'int') && type.bits <= MAX_NUMBER_BITS;
}

/**
 * Tuples decode to objects only when all components carry distinct names
 */
export function hasNamedComponents(type: TupleType): boolean {
  const names = type.components.map((c) => c.name ?? '');
  return names.length > 0 && names.every((n) => n !== '') && new Set(names).size === names.length;
}

function isRecord(value: unknown): value is { readonly [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function mismatch(type: AbiType, value: unknown, path: string, detail?: string): ArgumentMismatchError {
  const got = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
  return new ArgumentMismatchError(
    `${path}: expected ${canonicalType(type)}, got ${got}${detail ? ` (${detail})` : ''}`,
    { path, type: canonicalType(type) }
  );
}

function toBytesInput(type: AbiType, value: unknown, path: string, size?: number): Uint8Array {
  let bytes: Uint8Array;
  if (value instanceof Uint8Array) {
    bytes = value;
  } else if (isHex(value) && value.length % 2 === 0) {
    bytes = hexToBytes(value);
  } else {
    throw mismatch(type, value, path);
  }
  if (size !== undefined && bytes.length !== size) {
    throw mismatch(type, value, path, `expected ${size} bytes, got ${bytes.length}`);
  }
  return bytes;
}

/**
 * Convert a caller-supplied value into its ABI value, validating shape and range
 */
export function toAbiValue(type: AbiType, value: unknown, path = 'value'): AbiValue {
  switch (type.kind) {
    case 'uint':
    case 'int': {
      let n: bigint;
      if (typeof value === 'bigint') {
        n = value;
      } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
        n = BigInt(value);
      } else {
        throw mismatch(type, value, path, typeof value === 'number' ? 'not a safe integer' : undefined);
      }
      const [min, max] = integerBounds(type);
      if (n < min || n > max) {
        throw mismatch(type, value, path, `${n} out of range`);
      }
      return n;
    }
    case 'bool':
      if (typeof value !== 'boolean') throw mismatch(type, value, path);
      return value;
    case 'address':
      if (typeof value === 'string') {
        if (!isAddress(value)) throw mismatch(type, value, path, 'not a 20-byte hex address');
        if (!isChecksumValid(value)) throw mismatch(type, value, path, 'bad checksum');
        return hexToBytes(value);
      }
      return toBytesInput(type, value, path, 20);
    case 'fixedBytes':
      return toBytesInput(type, value, path, type.size);
    case 'bytes':
      return toBytesInput(type, value, path);
    case 'string':
      if (typeof value !== 'string') throw mismatch(type, value, path);
      return value;
    case 'fixedArray':
    case 'array': {
      if (!Array.isArray(value)) throw mismatch(type, value, path);
      if (type.kind === 'fixedArray' && value.length !== type.length) {
        throw mismatch(type, value, path, `expected ${type.length} elements, got ${value.length}`);
      }
      return value.map((item: unknown, i) => toAbiValue(type.element, item, `${path}[${i}]`));
    }
    case 'tuple':
      return tupleToAbiValue(type, value, path);
  }
}

function tupleToAbiValue(type: TupleType, value: unknown, path: string): AbiValue {
  if (Array.isArray(value)) {
    if (value.length !== type.components.length) {
      throw mismatch(type, value, path, `expected ${type.components.length} fields, got ${value.length}`);
    }
    return type.components.map((c, i) => toAbiValue(c.type, value[i], `${path}.${c.name || i}`));
  }
  if (isRecord(value) && hasNamedComponents(type)) {
    const known = new Set(type.components.map((c) => c.name));
    const unknown = Object.keys(value).filter((k) => !known.has(k));
    if (unknown.length > 0) {
      throw mismatch(type, value, path, `unknown fields ${unknown.join(', ')}`);
    }
    return type.components.map((c) => {
      const key = c.name ?? '';
      if (!(key in value)) {
        throw mismatch(type, value, path, `missing field ${key}`);
      }
      return toAbiValue(c.type, value[key], `${path}.${key}`);
    });
  }
  throw mismatch(type, value, path);
}

/**
 * Convert a decoded ABI value into its native form
 */
export function fromAbiValue(type: AbiType, value: AbiValue, path = 'value'): NativeValue {
  switch (type.kind) {
    case 'uint':
    case 'int': {
      const n = expectInteger(type, value, path);
      return type.bits <= MAX_NUMBER_BITS ? Number(n) : n;
    }
    case 'bool':
      return expectBoolean(type, value, path);
    case 'address':
      return addressFromBytes(expectBytes(type, value, path, 20));
    case 'fixedBytes':
      return bytesToHex(expectBytes(type, value, path, type.size));
    case 'bytes':
      return bytesToHex(expectBytes(type, value, path));
    case 'string':
      return expectString(type, value, path);
    case 'fixedArray':
    case 'array':
      return expectList(type, value, path).map((item, i) => fromAbiValue(type.element, item, `${path}[${i}]`));
    case 'tuple': {
      const items = expectList(type, value, path, type.components.length);
      const natives = type.components.map((c, i) => {
        const item = items[i];
        if (item === undefined) throw mismatch(type, value, path);
        return fromAbiValue(c.type, item, `${path}.${c.name || i}`);
      });
      if (!hasNamedComponents(type)) {
        return natives;
      }
      const record: Record<string, NativeValue> = {};
      type.components.forEach((c, i) => {
        const native = natives[i];
        if (c.name && native !== undefined) record[c.name] = native;
      });
      return record;
    }
  }
}

/**
 * Convert a list of caller arguments, reporting parameter names in errors
 */
export function toAbiValues(
  params: ReadonlyArray<{ readonly name: string; readonly type: AbiType }>,
  args: ReadonlyArray<unknown>,
  context: string
): AbiValue[] {
  if (args.length !== params.length) {
    throw new ArgumentMismatchError(`${context}: expected ${params.length} arguments, got ${args.length}`, {
      expected: params.length,
      received: args.length,
    });
  }
  return params.map((p, i) => toAbiValue(p.type, args[i], `${context}.${p.name || `arg${i}`}`));
}
