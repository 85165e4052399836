/**
 * Contract descriptor: the parsed, validated and indexed form of an ABI
 */

import type {
  ABI,
  ABIConstructor,
  ABIError,
  ABIEvent,
  ABIFunction,
  ABIItem,
  ABIParameter,
  Hash,
  Hex,
  StateMutability,
} from '../core/types.js';
import { selectorOf, topicOf } from '../core/hash.js';
import { InvalidAbiError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import { fromThrowable } from '../core/result.js';
import type { AbiType } from './types.js';
import { parseAbiType } from './types.js';
import { IDENTIFIER, formatSignature, normalizeSignature } from './signature.js';

export interface Param {
  /** Empty string when the ABI leaves the parameter unnamed */
  readonly name: string;
  readonly type: AbiType;
}

export interface EventParam extends Param {
  readonly indexed: boolean;
}

export interface FunctionDescriptor {
  readonly name: string;
  readonly inputs: ReadonlyArray<Param>;
  readonly outputs: ReadonlyArray<Param>;
  readonly stateMutability: StateMutability;
  readonly signature: string;
  readonly selector: Hex;
}

export interface EventDescriptor {
  readonly name: string;
  readonly inputs: ReadonlyArray<EventParam>;
  readonly signature: string;
  readonly topic: Hash;
  readonly anonymous: boolean;
}

export interface ErrorDescriptor {
  readonly name: string;
  readonly inputs: ReadonlyArray<Param>;
  readonly signature: string;
  readonly selector: Hex;
}

export interface ConstructorDescriptor {
  readonly inputs: ReadonlyArray<Param>;
  readonly payable: boolean;
}

export function isReadOnly(fn: FunctionDescriptor): boolean {
  return fn.stateMutability === 'view' || fn.stateMutability === 'pure';
}

/**
 * Immutable parsed ABI. Lookups by selector, name, canonical signature and topic.
 */
export class ContractDescriptor {
  readonly abi: ABI;
  readonly functions: ReadonlyArray<FunctionDescriptor>;
  readonly events: ReadonlyArray<EventDescriptor>;
  readonly errors: ReadonlyArray<ErrorDescriptor>;
  readonly deploy: ConstructorDescriptor | undefined;
  readonly hasFallback: boolean;
  readonly hasReceive: boolean;

  private readonly bySignature = new Map<string, FunctionDescriptor>();
  private readonly bySelector = new Map<string, FunctionDescriptor[]>();
  private readonly byName = new Map<string, FunctionDescriptor[]>();
  private readonly byTopic = new Map<string, EventDescriptor>();
  private readonly eventNameIndex = new Map<string, EventDescriptor[]>();
  private readonly errorsBySelector = new Map<string, ErrorDescriptor>();

  constructor(abi: ABI) {
    const functions: FunctionDescriptor[] = [];
    const events: EventDescriptor[] = [];
    const errors: ErrorDescriptor[] = [];
    const eventSignatures = new Set<string>();
    const errorSignatures = new Set<string>();
    let deploy: ConstructorDescriptor | undefined;
    let fallbacks = 0;
    let receives = 0;

    for (const item of abi) {
      switch (item.type) {
        case 'function': {
          const fn = buildFunction(item);
          if (this.bySignature.has(fn.signature)) {
            throw new InvalidAbiError(`duplicate function signature ${fn.signature}`);
          }
          this.bySignature.set(fn.signature, fn);
          push(this.bySelector, fn.selector, fn);
          push(this.byName, fn.name, fn);
          functions.push(fn);
          break;
        }
        case 'event': {
          const event = buildEvent(item);
          if (eventSignatures.has(event.signature)) {
            throw new InvalidAbiError(`duplicate event signature ${event.signature}`);
          }
          eventSignatures.add(event.signature);
          if (!event.anonymous) this.byTopic.set(event.topic, event);
          push(this.eventNameIndex, event.name, event);
          events.push(event);
          break;
        }
        case 'error': {
          const error = buildError(item);
          if (errorSignatures.has(error.signature)) {
            throw new InvalidAbiError(`duplicate error signature ${error.signature}`);
          }
          errorSignatures.add(error.signature);
          this.errorsBySelector.set(error.selector, error);
          errors.push(error);
          break;
        }
        case 'constructor':
          if (deploy) {
            throw new InvalidAbiError('more than one constructor');
          }
          deploy = buildConstructor(item);
          break;
        case 'fallback':
          fallbacks++;
          break;
        case 'receive':
          receives++;
          break;
      }
    }

    if (fallbacks > 1 || receives > 1) {
      throw new InvalidAbiError('more than one fallback or receive function');
    }

    this.abi = abi;
    this.functions = Object.freeze(functions);
    this.events = Object.freeze(events);
    this.errors = Object.freeze(errors);
    this.deploy = deploy;
    this.hasFallback = fallbacks === 1;
    this.hasReceive = receives === 1;
    Object.freeze(this);
  }

  /**
   * Function by canonical signature (any accepted spelling).
   * A malformed signature throws InvalidAbiError.
   */
  functionBySignature(signature: string): FunctionDescriptor | undefined {
    return this.bySignature.get(signature) ?? this.bySignature.get(normalizeSignature(signature));
  }

  /**
   * Every overload sharing `name`, in declaration order
   */
  functionsByName(name: string): ReadonlyArray<FunctionDescriptor> {
    return this.byName.get(name) ?? [];
  }

  functionsBySelector(selector: Hex): ReadonlyArray<FunctionDescriptor> {
    return this.bySelector.get(selector.toLowerCase()) ?? [];
  }

  eventByTopic(topic: Hash | Hex): EventDescriptor | undefined {
    return this.byTopic.get(topic.toLowerCase());
  }

  eventsByName(name: string): ReadonlyArray<EventDescriptor> {
    return this.eventNameIndex.get(name) ?? [];
  }

  errorBySelector(selector: Hex): ErrorDescriptor | undefined {
    return this.errorsBySelector.get(selector.toLowerCase());
  }
}

function push<V>(map: Map<string, V[]>, key: string, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function buildParams(params: ReadonlyArray<ABIParameter>): Param[] {
  return params.map((p) => Object.freeze({ name: p.name ?? '', type: parseAbiType(p.type, p.components) }));
}

function checkName(name: string, kind: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new InvalidAbiError(`${kind} has an invalid name "${name}"`);
  }
}

function buildFunction(item: ABIFunction): FunctionDescriptor {
  checkName(item.name, 'function');
  const inputs = buildParams(item.inputs);
  const signature = formatSignature(
    item.name,
    inputs.map((p) => p.type)
  );
  return Object.freeze({
    name: item.name,
    inputs: Object.freeze(inputs),
    outputs: Object.freeze(buildParams(item.outputs ?? [])),
    stateMutability: resolveMutability(item),
    signature,
    selector: selectorOf(signature),
  });
}

function resolveMutability(item: ABIFunction): StateMutability {
  if (item.stateMutability !== undefined) return item.stateMutability;
  if (item.constant === true) return 'view';
  if (item.payable === true) return 'payable';
  return 'nonpayable';
}

function buildEvent(item: ABIEvent): EventDescriptor {
  checkName(item.name, 'event');
  const anonymous = item.anonymous === true;
  const inputs = item.inputs.map((p): EventParam =>
    Object.freeze({
      name: p.name ?? '',
      type: parseAbiType(p.type, p.components),
      indexed: p.indexed === true,
    })
  );
  const indexed = inputs.filter((p) => p.indexed).length;
  if (indexed > (anonymous ? 4 : 3)) {
    throw new InvalidAbiError(`event ${item.name} has ${indexed} indexed parameters`);
  }
  const signature = formatSignature(
    item.name,
    inputs.map((p) => p.type)
  );
  return Object.freeze({
    name: item.name,
    inputs: Object.freeze(inputs),
    signature,
    topic: topicOf(signature),
    anonymous,
  });
}

function buildError(item: ABIError): ErrorDescriptor {
  checkName(item.name, 'error');
  const inputs = buildParams(item.inputs);
  const signature = formatSignature(
    item.name,
    inputs.map((p) => p.type)
  );
  return Object.freeze({ name: item.name, inputs: Object.freeze(inputs), signature, selector: selectorOf(signature) });
}

function buildConstructor(item: ABIConstructor): ConstructorDescriptor {
  return Object.freeze({
    inputs: Object.freeze(buildParams(item.inputs)),
    payable: item.stateMutability === 'payable' || item.payable === true,
  });
}

// ============ JSON validation ============

const MUTABILITIES: ReadonlyArray<string> = ['pure', 'view', 'nonpayable', 'payable'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidAbiError(`${where}: "${key}" must be a string`);
  }
  return value;
}

function optionalBoolean(raw: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidAbiError(`${where}: "${key}" must be a boolean`);
  }
  return value;
}

function readParams(raw: unknown, where: string): ABIParameter[] {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw new InvalidAbiError(`${where}: parameters must be an array`);
  }
  return raw.map((p: unknown, i) => readParam(p, `${where}[${i}]`));
}

function readParam(raw: unknown, where: string): ABIParameter {
  if (!isRecord(raw)) {
    throw new InvalidAbiError(`${where}: parameter must be an object`);
  }
  const type = optionalString(raw, 'type', where);
  if (type === undefined) {
    throw new InvalidAbiError(`${where}: parameter without a type`);
  }
  const param: {
    name?: string;
    type: string;
    indexed?: boolean;
    components?: ABIParameter[];
  } = { type };
  const name = optionalString(raw, 'name', where);
  if (name !== undefined) param.name = name;
  const indexed = optionalBoolean(raw, 'indexed', where);
  if (indexed !== undefined) param.indexed = indexed;
  if (raw['components'] !== undefined) {
    param.components = readParams(raw['components'], `${where}.components`);
  }
  return param;
}

function readMutability(raw: Record<string, unknown>, where: string): StateMutability | undefined {
  const value = optionalString(raw, 'stateMutability', where);
  if (value === undefined) return undefined;
  switch (value) {
    case 'pure':
    case 'view':
    case 'nonpayable':
    case 'payable':
      return value;
  }
  throw new InvalidAbiError(`${where}: unknown stateMutability "${value}", expected one of ${MUTABILITIES.join(', ')}`);
}

function requireName(raw: Record<string, unknown>, where: string): string {
  const name = optionalString(raw, 'name', where);
  if (name === undefined || name === '') {
    throw new InvalidAbiError(`${where}: missing name`);
  }
  return name;
}

function readItem(raw: unknown, index: number): ABIItem {
  const where = `item ${index}`;
  if (!isRecord(raw)) {
    throw new InvalidAbiError(`${where} must be an object`);
  }
  const type = optionalString(raw, 'type', where) ?? 'function';
  const stateMutability = readMutability(raw, where);
  const payable = optionalBoolean(raw, 'payable', where);

  switch (type) {
    case 'function': {
      const fn: ABIFunction = {
        type: 'function',
        name: requireName(raw, where),
        inputs: readParams(raw['inputs'], `${where}.inputs`),
        outputs: readParams(raw['outputs'], `${where}.outputs`),
        ...(stateMutability !== undefined ? { stateMutability } : {}),
        ...(optionalBoolean(raw, 'constant', where) === true ? { constant: true } : {}),
        ...(payable !== undefined ? { payable } : {}),
      };
      return fn;
    }
    case 'event':
      return {
        type: 'event',
        name: requireName(raw, where),
        inputs: readParams(raw['inputs'], `${where}.inputs`),
        anonymous: optionalBoolean(raw, 'anonymous', where) === true,
      };
    case 'error':
      return {
        type: 'error',
        name: requireName(raw, where),
        inputs: readParams(raw['inputs'], `${where}.inputs`),
      };
    case 'constructor':
      if (stateMutability === 'pure' || stateMutability === 'view') {
        throw new InvalidAbiError(`${where}: constructor cannot be ${stateMutability}`);
      }
      return {
        type: 'constructor',
        inputs: readParams(raw['inputs'], `${where}.inputs`),
        ...(stateMutability !== undefined ? { stateMutability } : {}),
        ...(payable !== undefined ? { payable } : {}),
      };
    case 'fallback':
      if (stateMutability === 'pure' || stateMutability === 'view') {
        throw new InvalidAbiError(`${where}: fallback cannot be ${stateMutability}`);
      }
      return { type: 'fallback', ...(stateMutability !== undefined ? { stateMutability } : {}) };
    case 'receive':
      if (stateMutability !== undefined && stateMutability !== 'payable') {
        throw new InvalidAbiError(`${where}: receive must be payable`);
      }
      return { type: 'receive', stateMutability: 'payable' };
  }
  throw new InvalidAbiError(`${where}: unknown item type "${type}"`);
}

/**
 * Extract the ABI array from a JSON string, an array, or an artifact with an `abi` field
 */
export function readAbiJson(input: unknown): ABI {
  let value = input;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch (error) {
      throw new InvalidAbiError(`not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  if (isRecord(value) && value['abi'] !== undefined) {
    value = value['abi'];
  }
  if (!Array.isArray(value)) {
    throw new InvalidAbiError('expected an array of ABI items');
  }
  return value.map((item: unknown, i) => readItem(item, i));
}

/**
 * Parse and validate an ABI. Throws InvalidAbiError.
 */
export function parseContractDescriptor(input: unknown): ContractDescriptor {
  return new ContractDescriptor(readAbiJson(input));
}

export function tryParseContractDescriptor(input: unknown): Result<ContractDescriptor, InvalidAbiError> {
  return fromThrowable(() => parseContractDescriptor(input), InvalidAbiError);
}
