/**
 * Typed contract surface with ABI inference
 *
 * Usage:
 * ```typescript
 * const abi = defineAbi([
 *   { type: 'function', name: 'balanceOf', inputs: [{ name: 'account', type: 'address' }],
 *     outputs: [{ name: '', type: 'uint256' }], stateMutability: 'view' },
 * ]);
 *
 * const token = bindContract({ abi, address, client });
 *
 * // balance is inferred as bigint
 * const balance = await token.read.balanceOf(['0x...']);
 * ```
 *
 * Members are keyed by callable name, so overloads appear under their
 * generated or aliased names.
 */

import type { Address, Hex, Log } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type {
  AbiAliases,
  AbiEventArgs,
  AbiEvents,
  AbiFunctionInputs,
  AbiFunctionOutputs,
  AbiFunctions,
  AbiReadFunctions,
  AbiWriteFunctions,
  CallableName,
  TypedAbi,
  TypedAbiEvent,
  TypedAbiFunction,
} from '../abi/abi-types.js';
import type { EventDescriptor } from '../abi/descriptor.js';
import { parseContractDescriptor } from '../abi/descriptor.js';
import type { DescriptorCache } from '../abi/descriptor-cache.js';
import type { RawLog, TopicFilter } from '../abi/events.js';
import { encodeEventTopics } from '../abi/events.js';
import type { NodeClient } from './rpc.js';
import type { Account } from './account.js';
import type { GasEstimator } from './gas.js';
import type { PendingTransaction, PipelineConfig, SendOptions } from './pipeline.js';
import type { TransactionRequest } from './transaction.js';
import type { CallOptions } from './contract.js';
import { ContractInstance } from './contract.js';
import type { EventQueryOptions, SubscriptionOptions } from './events.js';

// ============ Typed surface ============

type Fn<F> = Extract<F, TypedAbiFunction>;
type Ev<E> = Extract<E, TypedAbiEvent>;

/**
 * `(args, options?)`; `args` may be omitted for functions without inputs
 */
type MethodParams<F extends TypedAbiFunction, TOptions> = AbiFunctionInputs<F> extends []
  ? [args?: [], options?: TOptions]
  : [args: AbiFunctionInputs<F>, options?: TOptions];

export type TypedReadMethods<TAbi extends TypedAbi, TAliases extends AbiAliases = {}> = {
  [F in AbiReadFunctions<TAbi> as CallableName<TAbi, Fn<F>, TAliases>]: (
    ...params: MethodParams<Fn<F>, CallOptions>
  ) => Promise<AbiFunctionOutputs<Fn<F>>>;
};

export type TypedWriteMethods<TAbi extends TypedAbi, TAliases extends AbiAliases = {}> = {
  [F in AbiWriteFunctions<TAbi> as CallableName<TAbi, Fn<F>, TAliases>]: (
    ...params: MethodParams<Fn<F>, SendOptions>
  ) => Promise<PendingTransaction>;
};

export type TypedPrepareMethods<TAbi extends TypedAbi, TAliases extends AbiAliases = {}> = {
  [F in AbiWriteFunctions<TAbi> as CallableName<TAbi, Fn<F>, TAliases>]: (
    ...params: MethodParams<Fn<F>, SendOptions>
  ) => TransactionRequest;
};

export type TypedEncodeMethods<TAbi extends TypedAbi, TAliases extends AbiAliases = {}> = {
  [F in AbiFunctions<TAbi> as CallableName<TAbi, Fn<F>, TAliases>]: (...params: MethodParams<Fn<F>, never>) => Hex;
};

export interface TypedDecodedEvent<E extends TypedAbiEvent> {
  readonly event: EventDescriptor;
  readonly args: AbiEventArgs<E>;
  readonly log: Log;
}

export interface TypedEventSubscription<E extends TypedAbiEvent> extends AsyncIterable<TypedDecodedEvent<E>> {
  readonly isCancelled: boolean;
  cancel(): Promise<void>;
}

/**
 * Filter values for indexed parameters, by name
 */
export type TypedEventFilter<E extends TypedAbiEvent> = {
  [P in E['inputs'][number] as P['indexed'] extends true ? (P['name'] extends string ? P['name'] : never) : never]?: unknown;
};

export interface TypedEventMethods<E extends TypedAbiEvent> {
  query(
    options?: Omit<EventQueryOptions, 'address' | 'event' | 'args'> & { args?: TypedEventFilter<E> }
  ): AsyncGenerator<TypedDecodedEvent<E>>;
  subscribe(
    options?: Omit<SubscriptionOptions, 'address' | 'event' | 'args'> & { args?: TypedEventFilter<E> }
  ): TypedEventSubscription<E>;
  decode(log: RawLog): AbiEventArgs<E>;
  topics(args?: TypedEventFilter<E>): TopicFilter;
}

export type TypedEvents<TAbi extends TypedAbi, TAliases extends AbiAliases = {}> = {
  [E in AbiEvents<TAbi> as CallableName<TAbi, Ev<E>, TAliases>]: TypedEventMethods<Ev<E>>;
};

export interface TypedContract<TAbi extends TypedAbi, TAliases extends AbiAliases = {}> {
  readonly address: Address;
  readonly abi: TAbi;
  /** Untyped dispatcher the surface delegates to */
  readonly instance: ContractInstance;
  readonly read: TypedReadMethods<TAbi, TAliases>;
  readonly write: TypedWriteMethods<TAbi, TAliases>;
  readonly prepare: TypedPrepareMethods<TAbi, TAliases>;
  readonly encode: TypedEncodeMethods<TAbi, TAliases>;
  readonly events: TypedEvents<TAbi, TAliases>;
}

export interface BindContractConfig<TAbi extends TypedAbi, TAliases extends AbiAliases> {
  address: Address;
  abi: TAbi;
  client: NodeClient;
  account?: Account;
  /** Callable names by canonical signature */
  aliases?: TAliases;
  /** Reuse parsed descriptors across bindings of the same ABI */
  cache?: DescriptorCache;
  gasEstimator?: GasEstimator;
  defaults?: Partial<PipelineConfig>;
  logger?: Logger;
}

// ============ Implementation ============

/**
 * Surface whose members are looked up by callable name; unknown names read as undefined
 */
function namespace<T extends object, M>(lookup: (name: string) => M | undefined): T {
  const cache = new Map<string, M>();
  return new Proxy({} as T, {
    get(_target, prop) {
      if (typeof prop !== 'string') return undefined;
      let member = cache.get(prop);
      if (member === undefined) {
        member = lookup(prop);
        if (member !== undefined) cache.set(prop, member);
      }
      return member;
    },
    has(_target, prop) {
      return typeof prop === 'string' && lookup(prop) !== undefined;
    },
  });
}

/**
 * Bind `abi` at `address`. Declare the ABI `as const` (or with defineAbi) for
 * inferred argument and result types.
 */
export function bindContract<const TAbi extends TypedAbi, const TAliases extends AbiAliases = {}>(
  config: BindContractConfig<TAbi, TAliases>
): TypedContract<TAbi, TAliases> {
  const descriptor = config.cache ? config.cache.get(config.abi) : parseContractDescriptor(config.abi);
  const instance = new ContractInstance({
    descriptor,
    address: config.address,
    client: config.client,
    ...(config.account ? { account: config.account } : {}),
    ...(config.aliases ? { aliases: config.aliases } : {}),
    ...(config.gasEstimator ? { gasEstimator: config.gasEstimator } : {}),
    ...(config.defaults ? { defaults: config.defaults } : {}),
    ...(config.logger ? { logger: config.logger } : {}),
  });
  const { bindings } = instance;

  const functionOf = (kind: 'read' | 'write' | 'any') => (name: string) => {
    const binding = bindings.function(name);
    if (binding === undefined || (kind !== 'any' && binding.kind !== kind)) return undefined;
    return binding.descriptor.signature;
  };
  const readable = functionOf('read');
  const writable = functionOf('write');
  const callable = functionOf('any');

  const read = namespace<TypedReadMethods<TAbi, TAliases>, unknown>((name) => {
    const signature = readable(name);
    if (signature === undefined) return undefined;
    return (args: ReadonlyArray<unknown> = [], options?: CallOptions) => instance.call(signature, args, options);
  });

  const write = namespace<TypedWriteMethods<TAbi, TAliases>, unknown>((name) => {
    const signature = writable(name);
    if (signature === undefined) return undefined;
    return (args: ReadonlyArray<unknown> = [], options?: SendOptions) => instance.transact(signature, args, options);
  });

  const prepare = namespace<TypedPrepareMethods<TAbi, TAliases>, unknown>((name) => {
    const signature = writable(name);
    if (signature === undefined) return undefined;
    return (args: ReadonlyArray<unknown> = [], options?: SendOptions) => instance.send(signature, args, options);
  });

  const encode = namespace<TypedEncodeMethods<TAbi, TAliases>, unknown>((name) => {
    const signature = callable(name);
    if (signature === undefined) return undefined;
    return (args: ReadonlyArray<unknown> = []) => instance.encode(signature, args);
  });

  const events = namespace<TypedEvents<TAbi, TAliases>, unknown>((name) => {
    const binding = bindings.event(name);
    if (binding === undefined || binding.callableName !== name) return undefined;
    const event = binding.descriptor.signature;
    return {
      query: (options: Omit<EventQueryOptions, 'address' | 'event'> = {}) => instance.queryEvents({ ...options, event }),
      subscribe: (options: Omit<SubscriptionOptions, 'address' | 'event'> = {}) => instance.subscribe({ ...options, event }),
      decode: (log: RawLog) => binding.decode(log),
      topics: (args?: EventQueryOptions['args']) => encodeEventTopics(binding.descriptor, args),
    };
  });

  return Object.freeze({ address: config.address, abi: config.abi, instance, read, write, prepare, encode, events });
}
