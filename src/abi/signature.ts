/**
 * Canonical signatures: `name(type1,type2)`
 */

import { InvalidAbiError } from '../core/errors.js';
import type { AbiType } from './types.js';
import { canonicalType, parseAbiType } from './types.js';

export const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function formatSignature(name: string, types: ReadonlyArray<AbiType>): string {
  return `${name}(${types.map(canonicalType).join(',')})`;
}

export interface ParsedSignature {
  name: string;
  types: AbiType[];
}

/**
 * Parse `name(type, type ...)`. Whitespace, parameter names and type aliases
 * such as `uint` are accepted; `formatSignature` of the result is canonical.
 */
export function parseSignature(text: string): ParsedSignature {
  const trimmed = text.trim();
  const open = trimmed.indexOf('(');
  if (open <= 0 || !trimmed.endsWith(')')) {
    throw new InvalidAbiError(`malformed signature "${text}"`);
  }
  const name = trimmed.slice(0, open).trim();
  if (!IDENTIFIER.test(name)) {
    throw new InvalidAbiError(`malformed signature name "${name}"`);
  }
  const tuple = parseAbiType(trimmed.slice(open).replace(/(?<=[\w\])])\s+[A-Za-z_$][A-Za-z0-9_$]*(?=\s*[,)])/g, ''));
  if (tuple.kind !== 'tuple') {
    throw new InvalidAbiError(`malformed signature "${text}"`);
  }
  return { name, types: tuple.components.map((c) => c.type) };
}

/**
 * Normalize any accepted signature spelling to its canonical form
 */
export function normalizeSignature(text: string): string {
  const { name, types } = parseSignature(text);
  return formatSignature(name, types);
}

/**
 * True when `text` looks like a signature rather than a bare name
 */
export function isSignature(text: string): boolean {
  return text.includes('(');
}
