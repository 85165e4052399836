/**
 * Event log decoding and topic filters
 */

import type { Hash, Hex, Log } from '../core/types.js';
import { keccak256 } from '../core/hash.js';
import { bytesToHex, hexToBytes, isHex } from '../core/hex.js';
import { ArgumentMismatchError, MalformedEncodingError } from '../core/errors.js';
import type { AbiType } from './types.js';
import { decodeParameters, decodeWord, encodeParameters } from './codec.js';
import type { AbiValue } from './value.js';
import type { ContractDescriptor, EventDescriptor, EventParam } from './descriptor.js';
import type { NativeValue } from './native.js';
import { fromAbiValue, toAbiValue } from './native.js';

/** Minimal log shape needed for decoding */
export interface RawLog {
  readonly topics: ReadonlyArray<Hex>;
  readonly data: Hex;
}

/**
 * Indexed parameters of these kinds are stored as the keccak hash of their
 * encoding and cannot be recovered from the topic
 */
export function isHashedWhenIndexed(type: AbiType): boolean {
  switch (type.kind) {
    case 'string':
    case 'bytes':
    case 'array':
    case 'fixedArray':
    case 'tuple':
      return true;
    default:
      return false;
  }
}

/**
 * Decoded event argument: the value, or the topic hash for hashed indexed parameters
 */
export type EventArgValue = { readonly hashed: false; readonly value: AbiValue } | { readonly hashed: true; readonly topic: Hash };

/**
 * Decode one log against `event`, returning arguments in declaration order
 */
export function decodeEventLog(event: EventDescriptor, log: RawLog): EventArgValue[] {
  const topics = [...log.topics];
  if (!event.anonymous) {
    const topic0 = topics.shift();
    if (topic0 === undefined || topic0.toLowerCase() !== event.topic) {
      throw new MalformedEncodingError(`log topic does not match event ${event.signature}`, {
        expected: event.topic,
        received: topic0,
      });
    }
  }

  const indexed = event.inputs.filter((p) => p.indexed);
  if (topics.length !== indexed.length) {
    throw new MalformedEncodingError(
      `event ${event.signature} expects ${indexed.length} indexed topics, got ${topics.length}`
    );
  }

  const dataParams = event.inputs.filter((p) => !p.indexed);
  const dataValues = decodeParameters(
    dataParams.map((p) => p.type),
    log.data
  );

  let topicIndex = 0;
  let dataIndex = 0;
  return event.inputs.map((param): EventArgValue => {
    if (param.indexed) {
      const topic = topics[topicIndex++];
      if (topic === undefined || !isHex(topic) || topic.length !== 66) {
        throw new MalformedEncodingError(`malformed topic for ${param.name || 'indexed parameter'}`);
      }
      if (isHashedWhenIndexed(param.type)) {
        return { hashed: true, topic: bytesToHex(hexToBytes(topic)) as Hash };
      }
      return { hashed: false, value: decodeWord(param.type, hexToBytes(topic)) };
    }
    const value = dataValues[dataIndex++];
    if (value === undefined) {
      throw new MalformedEncodingError(`missing data value for ${param.name || 'parameter'}`);
    }
    return { hashed: false, value };
  });
}

/**
 * Native view of a decoded argument; hashed indexed parameters surface as their topic
 */
export function eventArgToNative(param: EventParam, arg: EventArgValue): NativeValue {
  return arg.hashed ? arg.topic : fromAbiValue(param.type, arg.value, param.name || 'arg');
}

/**
 * Record with one field per parameter. Unnamed parameters are keyed by position.
 */
export function eventArgsToRecord(
  event: EventDescriptor,
  args: ReadonlyArray<EventArgValue>
): Record<string, NativeValue> {
  const record: Record<string, NativeValue> = {};
  event.inputs.forEach((param, i) => {
    const arg = args[i];
    if (arg !== undefined) {
      record[param.name || String(i)] = eventArgToNative(param, arg);
    }
  });
  return record;
}

export interface DecodedEvent<L extends RawLog = Log> {
  readonly event: EventDescriptor;
  readonly args: Record<string, NativeValue>;
  readonly log: L;
}

/**
 * Decode a heterogeneous log stream. Logs whose topic[0] matches no known
 * event are skipped, and so are logs whose topic count differs from the
 * matched event's: ERC-20 and ERC-721 `Transfer` share a topic but not their
 * indexed parameters. A log of the right shape that fails to decode throws.
 */
export function* scanLogs<L extends RawLog>(
  descriptor: ContractDescriptor,
  logs: Iterable<L>
): Generator<DecodedEvent<L>> {
  for (const log of logs) {
    const topic0 = log.topics[0];
    if (topic0 === undefined) continue;
    const event = descriptor.eventByTopic(topic0);
    if (!event || log.topics.length !== topicCount(event)) continue;
    yield { event, args: eventArgsToRecord(event, decodeEventLog(event, log)), log };
  }
}

function topicCount(event: EventDescriptor): number {
  return event.inputs.filter((p) => p.indexed).length + (event.anonymous ? 0 : 1);
}

export function decodeLogs<L extends RawLog>(descriptor: ContractDescriptor, logs: Iterable<L>): DecodedEvent<L>[] {
  return [...scanLogs(descriptor, logs)];
}

// ============ Topic filters ============

export type TopicFilter = ReadonlyArray<Hash | ReadonlyArray<Hash> | null>;

/**
 * Filter value per indexed parameter: a value, an array of alternatives, or
 * null/undefined for any. Indexed arrays and tuples take their precomputed topic hash. Keyed by parameter name or given positionally over
 * the indexed parameters.
 */
export type EventFilterArgs = ReadonlyArray<unknown> | { readonly [name: string]: unknown };

function topicForValue(param: EventParam, value: unknown, path: string): Hash {
  if (isHashedWhenIndexed(param.type)) {
    if (param.type.kind === 'string' && typeof value === 'string') {
      return keccak256(new TextEncoder().encode(value));
    }
    if (param.type.kind === 'bytes') {
      const bytes = toAbiValue(param.type, value, path);
      if (bytes instanceof Uint8Array) return keccak256(bytes);
    }
    if (isHex(value) && value.length === 66) {
      return bytesToHex(hexToBytes(value)) as Hash;
    }
    throw new ArgumentMismatchError(
      `${path}: filter on indexed ${param.type.kind} needs a precomputed 32-byte topic hash`
    );
  }
  return encodeParameters([param.type], [toAbiValue(param.type, value, path)]) as Hash;
}

/**
 * Build an eth_getLogs topic filter for `event`. Trailing wildcards are trimmed.
 */
export function encodeEventTopics(event: EventDescriptor, args: EventFilterArgs = []): TopicFilter {
  const indexed = event.inputs.filter((p) => p.indexed);
  const pick = (param: EventParam, i: number): unknown => {
    if (isPositional(args)) return args[i];
    return param.name ? args[param.name] : undefined;
  };

  if (isPositional(args) && args.length > indexed.length) {
    throw new ArgumentMismatchError(
      `event ${event.name} has ${indexed.length} indexed parameters, got ${args.length} filter values`
    );
  }

  const topics: Array<Hash | ReadonlyArray<Hash> | null> = event.anonymous ? [] : [event.topic];
  indexed.forEach((param, i) => {
    const value = pick(param, i);
    const path = `${event.name}.${param.name || i}`;
    if (value === null || value === undefined) {
      topics.push(null);
    } else if (Array.isArray(value)) {
      topics.push(value.map((v: unknown) => topicForValue(param, v, path)));
    } else {
      topics.push(topicForValue(param, value, path));
    }
  });

  while (topics.length > 0 && topics[topics.length - 1] === null) {
    topics.pop();
  }
  return topics;
}

function isPositional(args: EventFilterArgs): args is ReadonlyArray<unknown> {
  return Array.isArray(args);
}
