/**
 * ABI type model
 *
 * Every type object is frozen and carries its `dynamic` flag and `headSize`
 * (bytes it occupies inside an enclosing head section), computed once here.
 */

import type { ABIParameter } from '../core/types.js';
import { InvalidAbiError } from '../core/errors.js';

export const WORD_SIZE = 32;

interface TypeBase {
  readonly dynamic: boolean;
  readonly headSize: number;
}

export interface UintType extends TypeBase {
  readonly kind: 'uint';
  readonly bits: number;
}

export interface IntType extends TypeBase {
  readonly kind: 'int';
  readonly bits: number;
}

export interface BoolType extends TypeBase {
  readonly kind: 'bool';
}

export interface AddressType extends TypeBase {
  readonly kind: 'address';
}

export interface FixedBytesType extends TypeBase {
  readonly kind: 'fixedBytes';
  readonly size: number;
}

export interface BytesType extends TypeBase {
  readonly kind: 'bytes';
}

export interface StringType extends TypeBase {
  readonly kind: 'string';
}

export interface FixedArrayType extends TypeBase {
  readonly kind: 'fixedArray';
  readonly element: AbiType;
  readonly length: number;
}

export interface ArrayType extends TypeBase {
  readonly kind: 'array';
  readonly element: AbiType;
}

export interface TupleComponent {
  readonly name?: string;
  readonly type: AbiType;
}

export interface TupleType extends TypeBase {
  readonly kind: 'tuple';
  readonly components: ReadonlyArray<TupleComponent>;
}

export type AbiType =
  | UintType
  | IntType
  | BoolType
  | AddressType
  | FixedBytesType
  | BytesType
  | StringType
  | FixedArrayType
  | ArrayType
  | TupleType;

export type AbiTypeKind = AbiType['kind'];

// ============ Constructors ============

function checkBits(bits: number): void {
  if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new InvalidAbiError(`integer width must be a multiple of 8 in 8..256, got ${bits}`);
  }
}

export function uintType(bits = 256): UintType {
  checkBits(bits);
  return Object.freeze({ kind: 'uint', bits, dynamic: false, headSize: WORD_SIZE });
}

export function intType(bits = 256): IntType {
  checkBits(bits);
  return Object.freeze({ kind: 'int', bits, dynamic: false, headSize: WORD_SIZE });
}

export const boolType: BoolType = Object.freeze({ kind: 'bool', dynamic: false, headSize: WORD_SIZE });

export const addressType: AddressType = Object.freeze({
  kind: 'address',
  dynamic: false,
  headSize: WORD_SIZE,
});

export function fixedBytesType(size: number): FixedBytesType {
  if (!Number.isInteger(size) || size < 1 || size > 32) {
    throw new InvalidAbiError(`fixed bytes width must be in 1..32, got ${size}`);
  }
  return Object.freeze({ kind: 'fixedBytes', size, dynamic: false, headSize: WORD_SIZE });
}

export const bytesType: BytesType = Object.freeze({ kind: 'bytes', dynamic: true, headSize: WORD_SIZE });

export const stringType: StringType = Object.freeze({
  kind: 'string',
  dynamic: true,
  headSize: WORD_SIZE,
});

export function fixedArrayType(element: AbiType, length: number): FixedArrayType {
  if (!Number.isSafeInteger(length) || length < 1) {
    throw new InvalidAbiError(`fixed array length must be a positive integer, got ${length}`);
  }
  const dynamic = element.dynamic;
  return Object.freeze({
    kind: 'fixedArray',
    element,
    length,
    dynamic,
    headSize: dynamic ? WORD_SIZE : element.headSize * length,
  });
}

export function arrayType(element: AbiType): ArrayType {
  return Object.freeze({ kind: 'array', element, dynamic: true, headSize: WORD_SIZE });
}

export function tupleType(components: ReadonlyArray<TupleComponent | AbiType>): TupleType {
  const normalized = Object.freeze(
    components.map((c): TupleComponent => Object.freeze('kind' in c ? { type: c } : { ...c }))
  );
  const dynamic = normalized.some((c) => c.type.dynamic);
  const headSize = dynamic
    ? WORD_SIZE
    : normalized.reduce((sum, c) => sum + c.type.headSize, 0);
  return Object.freeze({ kind: 'tuple', components: normalized, dynamic, headSize });
}

// ============ Canonical form ============

/**
 * Canonical type string used in signatures, e.g. `(address,uint256)[]`
 */
export function canonicalType(type: AbiType): string {
  switch (type.kind) {
    case 'uint':
    case 'int':
      return `${type.kind}${type.bits}`;
    case 'fixedBytes':
      return `bytes${type.size}`;
    case 'bool':
    case 'address':
    case 'bytes':
    case 'string':
      return type.kind;
    case 'fixedArray':
      return `${canonicalType(type.element)}[${type.length}]`;
    case 'array':
      return `${canonicalType(type.element)}[]`;
    case 'tuple':
      return `(${type.components.map((c) => canonicalType(c.type)).join(',')})`;
  }
}

/**
 * Total head size of a parameter list
 */
export function headSizeOf(types: ReadonlyArray<AbiType>): number {
  return types.reduce((sum, t) => sum + t.headSize, 0);
}

// ============ Parsing ============

const ARRAY_SUFFIX = /\[(\d*)\]$/;

/**
 * Parse a Solidity ABI type string. `components` supplies tuple members for
 * the JSON form (`"type": "tuple[]", "components": [...]`).
 */
export function parseAbiType(source: string, components?: ReadonlyArray<ABIParameter>): AbiType {
  const text = source.trim();
  const suffix = ARRAY_SUFFIX.exec(text);
  if (suffix) {
    const inner = parseAbiType(text.slice(0, suffix.index), components);
    const size = suffix[1];
    if (size === undefined || size === '') {
      return arrayType(inner);
    }
    return fixedArrayType(inner, Number(size));
  }

  if (text.startsWith('tuple(')) {
    return parseAbiType(text.slice('tuple'.length), components);
  }

  if (text.startsWith('(')) {
    if (!text.endsWith(')')) {
      throw new InvalidAbiError(`malformed tuple type "${source}"`);
    }
    if (components !== undefined) {
      throw new InvalidAbiError(`inline tuple "${source}" must not also declare components`);
    }
    return tupleType(splitTupleBody(text.slice(1, -1)).map((part) => parseAbiType(part)));
  }

  if (text === 'tuple') {
    if (components === undefined) {
      throw new InvalidAbiError('tuple type without components');
    }
    return tupleType(components.map(parseParameter));
  }

  if (components !== undefined && components.length > 0) {
    throw new InvalidAbiError(`components given for non-tuple type "${source}"`);
  }

  return parseElementary(text, source);
}

function parseElementary(text: string, source: string): AbiType {
  switch (text) {
    case 'bool':
      return boolType;
    case 'address':
      return addressType;
    case 'bytes':
      return bytesType;
    case 'string':
      return stringType;
    case 'uint':
      return uintType(256);
    case 'int':
      return intType(256);
    case 'function':
      // external function reference: address + selector
      return fixedBytesType(24);
  }

  const sized = /^(uint|int|bytes)(\d+)$/.exec(text);
  if (sized) {
    const [, base, width] = sized;
    const n = Number(width);
    if (base === 'bytes') return fixedBytesType(n);
    if (base === 'uint') return uintType(n);
    return intType(n);
  }

  throw new InvalidAbiError(`unknown type "${source}"`);
}

/**
 * Split `a,(b,c)[],d` at top-level commas
 */
function splitTupleBody(body: string): string[] {
  if (body.trim() === '') return [];
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(body.slice(start, i));
      start = i + 1;
    }
    if (depth < 0) {
      throw new InvalidAbiError(`unbalanced parentheses in "(${body})"`);
    }
  }
  if (depth !== 0) {
    throw new InvalidAbiError(`unbalanced parentheses in "(${body})"`);
  }
  parts.push(body.slice(start));
  return parts.map((p) => p.trim());
}

/**
 * Parse a JSON ABI parameter into a tuple component
 */
export function parseParameter(param: ABIParameter): TupleComponent {
  if (typeof param.type !== 'string') {
    throw new InvalidAbiError('parameter without a type', { name: param.name });
  }
  const type = parseAbiType(param.type, param.components);
  return param.name ? { name: param.name, type } : { type };
}
