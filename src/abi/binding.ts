/**
 * Binding generator
 *
 * Resolves a ContractDescriptor into a typed call/event surface: one distinct
 * callable name per function, native TypeScript types per parameter, and
 * overload groups classified as call-site ambiguous or not. Every naming
 * problem is reported here, at generation time, never at call time.
 */

import { ArgumentMismatchError, BindingError } from '../core/errors.js';
import type { AbiType } from './types.js';
import { canonicalType } from './types.js';
import type { ContractDescriptor, EventDescriptor, FunctionDescriptor, Param } from './descriptor.js';
import { isReadOnly } from './descriptor.js';
import { IDENTIFIER, isSignature, normalizeSignature } from './signature.js';
import type { NativeValue } from './native.js';
import { hasNamedComponents, toAbiValue, usesNumber } from './native.js';
import type { RawLog } from './events.js';
import { decodeEventLog, eventArgsToRecord } from './events.js';

export interface NativeParam {
  readonly name: string;
  /** Canonical Solidity type */
  readonly abiType: string;
  /** TypeScript type text */
  readonly tsType: string;
}

export interface FunctionBinding {
  readonly callableName: string;
  readonly descriptor: FunctionDescriptor;
  readonly inputs: ReadonlyArray<NativeParam>;
  readonly outputs: ReadonlyArray<NativeParam>;
  readonly kind: 'read' | 'write';
}

export interface EventBinding {
  readonly callableName: string;
  readonly descriptor: EventDescriptor;
  readonly fields: ReadonlyArray<NativeParam>;
  decode(log: RawLog): Record<string, NativeValue>;
}

export interface OverloadGroup {
  readonly name: string;
  readonly members: ReadonlyArray<FunctionBinding>;
  /** Two members accept the same call-site arguments; no bare-name entry exists */
  readonly ambiguous: boolean;
}

export interface BindingOptions {
  /**
   * Explicit callable names keyed by signature, e.g. `{ 'getValue(bool)': 'getBoolValue' }`
   */
  aliases?: Readonly<Record<string, string>>;
  /**
   * `'suffix'` (default) derives names for overloads from their parameter types;
   * `'strict'` requires an alias for every overloaded function
   */
  overloads?: 'suffix' | 'strict';
}

// Keys that would shadow object machinery on the generated surface
const RESERVED_NAMES = new Set([
  'constructor',
  '__proto__',
  'prototype',
  'then',
  'toString',
  'valueOf',
  'hasOwnProperty',
]);

// ============ Native types ============

/**
 * TypeScript type text of `type` as an input (what callers may pass) or output (what decoding yields)
 */
export function describeNativeType(type: AbiType, direction: 'input' | 'output'): string {
  switch (type.kind) {
    case 'uint':
    case 'int':
      if (direction === 'input') return 'number | bigint';
      return usesNumber(type) ? 'number' : 'bigint';
    case 'bool':
      return 'boolean';
    case 'address':
      return 'Address';
    case 'fixedBytes':
    case 'bytes':
      return direction === 'input' ? 'Hex | Uint8Array' : 'Hex';
    case 'string':
      return 'string';
    case 'fixedArray':
    case 'array': {
      const element = describeNativeType(type.element, direction);
      return element.includes('|') ? `readonly (${element})[]` : `readonly ${element}[]`;
    }
    case 'tuple': {
      if (hasNamedComponents(type)) {
        const fields = type.components.map((c) => `${c.name ?? ''}: ${describeNativeType(c.type, direction)}`);
        return `{ ${fields.join('; ')} }`;
      }
      const items = type.components.map((c) => describeNativeType(c.type, direction));
      return `readonly [${items.join(', ')}]`;
    }
  }
}

function toNativeParams(params: ReadonlyArray<Param>, direction: 'input' | 'output'): NativeParam[] {
  return params.map((p) =>
    Object.freeze({ name: p.name, abiType: canonicalType(p.type), tsType: describeNativeType(p.type, direction) })
  );
}

// ============ Overload analysis ============

type TypeFamily = 'integer' | 'boolean' | 'text' | 'list';

/**
 * Native values a parameter accepts, coarsened to families: address, bytes
 * and string all accept strings; arrays and tuples all accept arrays
 */
function familyOf(type: AbiType): TypeFamily {
  switch (type.kind) {
    case 'uint':
    case 'int':
      return 'integer';
    case 'bool':
      return 'boolean';
    case 'address':
    case 'fixedBytes':
    case 'bytes':
    case 'string':
      return 'text';
    case 'fixedArray':
    case 'array':
    case 'tuple':
      return 'list';
  }
}

/**
 * Could a single native value be accepted by both `a` and `b`?
 */
export function typesOverlap(a: AbiType, b: AbiType): boolean {
  if (familyOf(a) !== familyOf(b)) return false;
  if (familyOf(a) !== 'list') return true;

  // An empty array fits every dynamic array
  if (a.kind === 'array' || b.kind === 'array') return true;
  const shape = (t: AbiType): AbiType[] => {
    if (t.kind === 'fixedArray') return new Array<AbiType>(t.length).fill(t.element);
    if (t.kind === 'tuple') return t.components.map((c) => c.type);
    return [];
  };
  const left = shape(a);
  const right = shape(b);
  return left.length === right.length && left.every((t, i) => {
    const other = right[i];
    return other !== undefined && typesOverlap(t, other);
  });
}

/**
 * Two overloads are call-site ambiguous when some argument list fits both
 */
export function overloadsConflict(a: FunctionDescriptor, b: FunctionDescriptor): boolean {
  if (a.inputs.length !== b.inputs.length) return false;
  return a.inputs.every((p, i) => {
    const other = b.inputs[i];
    return other !== undefined && typesOverlap(p.type, other.type);
  });
}

// ============ Naming ============

function typeSuffix(type: AbiType): string {
  switch (type.kind) {
    case 'fixedArray':
      return `${typeSuffix(type.element)}Array${type.length}`;
    case 'array':
      return `${typeSuffix(type.element)}Array`;
    case 'tuple':
      return `${type.components.map((c) => typeSuffix(c.type)).join('_')}Tuple`;
    default:
      return canonicalType(type);
  }
}

/**
 * Distinct name for one member of an overload set,
 * e.g. `transfer(address,uint256)` -> `transfer_address_uint256`
 */
export function overloadName(fn: { name: string; inputs: ReadonlyArray<Param> }): string {
  if (fn.inputs.length === 0) return `${fn.name}_noArgs`;
  return `${fn.name}_${fn.inputs.map((p) => typeSuffix(p.type)).join('_')}`;
}

function safeName(name: string): string {
  return RESERVED_NAMES.has(name) ? `${name}_` : name;
}

function normalizeAliases(aliases: Readonly<Record<string, string>>): Map<string, string> {
  const normalized = new Map<string, string>();
  for (const [signature, alias] of Object.entries(aliases)) {
    if (!IDENTIFIER.test(alias) || RESERVED_NAMES.has(alias)) {
      throw new BindingError(`alias "${alias}" for ${signature} is not a usable identifier`, { signature, alias });
    }
    normalized.set(normalizeSignature(signature), alias);
  }
  return normalized;
}

interface Named<T> {
  readonly name: string;
  readonly signature: string;
  readonly item: T;
}

function assignNames<T extends { name: string; signature: string; inputs: ReadonlyArray<Param> }>(
  items: ReadonlyArray<T>,
  aliases: Map<string, string>,
  strict: boolean,
  what: string
): Named<T>[] {
  const counts = new Map<string, number>();
  for (const item of items) counts.set(item.name, (counts.get(item.name) ?? 0) + 1);

  const named = items.map((item): Named<T> => {
    const alias = aliases.get(item.signature);
    if (alias !== undefined) return { name: alias, signature: item.signature, item };
    const overloaded = (counts.get(item.name) ?? 0) > 1;
    if (overloaded && strict) {
      throw new BindingError(`overloaded ${what} ${item.signature} needs an alias`, { signature: item.signature });
    }
    return { name: safeName(overloaded ? overloadName(item) : item.name), signature: item.signature, item };
  });

  const seen = new Map<string, string>();
  for (const entry of named) {
    const previous = seen.get(entry.name);
    if (previous !== undefined) {
      throw new BindingError(`${what}s ${previous} and ${entry.signature} both bind to "${entry.name}"`, {
        name: entry.name,
        signatures: [previous, entry.signature],
      });
    }
    seen.set(entry.name, entry.signature);
  }
  return named;
}

// ============ Bindings ============

/**
 * Generated surface for one contract
 */
export class ContractBindings {
  readonly descriptor: ContractDescriptor;
  readonly functions: ReadonlyArray<FunctionBinding>;
  readonly events: ReadonlyArray<EventBinding>;
  readonly groups: ReadonlyArray<OverloadGroup>;

  private readonly byCallable = new Map<string, FunctionBinding>();
  private readonly bySignature = new Map<string, FunctionBinding>();
  private readonly byGroup = new Map<string, OverloadGroup>();
  private readonly eventsByCallable = new Map<string, EventBinding>();

  constructor(descriptor: ContractDescriptor, options: BindingOptions = {}) {
    const aliases = normalizeAliases(options.aliases ?? {});
    const strict = options.overloads === 'strict';

    const knownSignatures = new Set([
      ...descriptor.functions.map((f) => f.signature),
      ...descriptor.events.map((e) => e.signature),
    ]);
    for (const signature of aliases.keys()) {
      if (!knownSignatures.has(signature)) {
        throw new BindingError(`alias given for unknown signature ${signature}`, { signature });
      }
    }

    const functions = assignNames(descriptor.functions, aliases, strict, 'function').map(
      ({ name, item }): FunctionBinding =>
        Object.freeze({
          callableName: name,
          descriptor: item,
          inputs: Object.freeze(toNativeParams(item.inputs, 'input')),
          outputs: Object.freeze(toNativeParams(item.outputs, 'output')),
          kind: isReadOnly(item) ? 'read' : 'write',
        })
    );

    const events = assignNames(descriptor.events, aliases, strict, 'event').map(
      ({ name, item }): EventBinding =>
        Object.freeze({
          callableName: name,
          descriptor: item,
          fields: Object.freeze(toNativeParams(item.inputs, 'output')),
          decode: (log: RawLog) => eventArgsToRecord(item, decodeEventLog(item, log)),
        })
    );

    for (const binding of functions) {
      this.byCallable.set(binding.callableName, binding);
      this.bySignature.set(binding.descriptor.signature, binding);
    }
    for (const binding of events) {
      this.eventsByCallable.set(binding.callableName, binding);
    }

    const groups: OverloadGroup[] = [];
    for (const fn of descriptor.functions) {
      if (this.byGroup.has(fn.name)) continue;
      const members = descriptor.functionsByName(fn.name).flatMap((d) => {
        const binding = this.bySignature.get(d.signature);
        return binding ? [binding] : [];
      });
      if (members.length < 2) continue;
      const ambiguous = members.some((a, i) =>
        members.slice(i + 1).some((b) => overloadsConflict(a.descriptor, b.descriptor))
      );
      const claimed = this.byCallable.get(fn.name);
      if (!ambiguous && claimed !== undefined) {
        throw new BindingError(`"${fn.name}" is both an overload set and the name of ${claimed.descriptor.signature}`, {
          name: fn.name,
        });
      }
      const group = Object.freeze({ name: fn.name, members: Object.freeze(members), ambiguous });
      this.byGroup.set(fn.name, group);
      groups.push(group);
    }

    this.descriptor = descriptor;
    this.functions = Object.freeze(functions);
    this.events = Object.freeze(events);
    this.groups = Object.freeze(groups);
    Object.freeze(this);
  }

  /**
   * Binding by callable name
   */
  function(callableName: string): FunctionBinding | undefined {
    return this.byCallable.get(callableName);
  }

  event(callableName: string): EventBinding | undefined {
    return this.eventsByCallable.get(callableName) ?? this.eventBySignature(callableName);
  }

  private eventBySignature(signature: string): EventBinding | undefined {
    if (!isSignature(signature)) return undefined;
    const canonical = normalizeSignature(signature);
    return this.events.find((e) => e.descriptor.signature === canonical);
  }

  /**
   * Resolve a callable name, a signature, or the bare name of a
   * non-ambiguous overload set (selected by `args`)
   */
  resolve(fn: string, args?: ReadonlyArray<unknown>): FunctionBinding {
    const direct = this.byCallable.get(fn);
    if (direct) return direct;

    if (isSignature(fn)) {
      const binding = this.bySignature.get(normalizeSignature(fn));
      if (binding) return binding;
      throw new ArgumentMismatchError(`no function with signature ${fn}`);
    }

    const group = this.byGroup.get(fn);
    if (!group) {
      throw new ArgumentMismatchError(`no function named "${fn}"`);
    }
    const names = group.members.map((m) => m.callableName).join(', ');
    if (group.ambiguous) {
      throw new ArgumentMismatchError(`"${fn}" is overloaded ambiguously; call one of ${names}`, { candidates: names });
    }
    if (args === undefined) {
      throw new ArgumentMismatchError(`"${fn}" is overloaded; pass arguments or call one of ${names}`);
    }

    const matches = group.members.filter((m) => accepts(m.descriptor, args));
    const [only, ...rest] = matches;
    if (only === undefined) {
      throw new ArgumentMismatchError(`no overload of "${fn}" accepts these arguments; expected one of ${names}`);
    }
    if (rest.length > 0) {
      throw new ArgumentMismatchError(`arguments match several overloads of "${fn}"`, {
        candidates: matches.map((m) => m.callableName),
      });
    }
    return only;
  }
}

function accepts(fn: FunctionDescriptor, args: ReadonlyArray<unknown>): boolean {
  if (fn.inputs.length !== args.length) return false;
  try {
    fn.inputs.forEach((p, i) => toAbiValue(p.type, args[i]));
    return true;
  } catch (error) {
    if (error instanceof ArgumentMismatchError) return false;
    throw error;
  }
}

/**
 * Generate bindings. Throws BindingError for unresolvable naming.
 */
export function generateBindings(descriptor: ContractDescriptor, options: BindingOptions = {}): ContractBindings {
  return new ContractBindings(descriptor, options);
}
