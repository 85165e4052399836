/**
 * Contract instance: reflective call dispatcher over a descriptor
 */

import type { Address, BlockTag, Hex, Log } from '../core/types.js';
import {
  ArgumentMismatchError,
  ContractRevertError,
  EthBindError,
  MalformedEncodingError,
  ValidationError,
} from '../core/errors.js';
import { concatHex } from '../core/hex.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger, noopLogger } from '../core/logger.js';
import type { Result } from '../core/result.js';
import { fromPromise } from '../core/result.js';
import type { ContractDescriptor, FunctionDescriptor } from '../abi/descriptor.js';
import type { BindingOptions, ContractBindings, FunctionBinding } from '../abi/binding.js';
import { generateBindings } from '../abi/binding.js';
import { decodeParameters, encodeParameters } from '../abi/codec.js';
import type { NativeValue } from '../abi/native.js';
import { fromAbiValue, toAbiValues } from '../abi/native.js';
import type { DecodedEvent } from '../abi/events.js';
import { scanLogs } from '../abi/events.js';
import { decodeRevertData } from '../abi/revert.js';
import type { CallRequest, NodeClient } from './rpc.js';
import { isExecutionRevert, revertDataOf } from './rpc.js';
import type { Account } from './account.js';
import type { GasEstimator } from './gas.js';
import type { PendingTransaction, PipelineConfig, SendOptions } from './pipeline.js';
import { TransactionPipeline } from './pipeline.js';
import { TransactionRequest } from './transaction.js';
import type { EventQueryOptions, SubscriptionOptions } from './events.js';
import { EventSubscription, queryEvents } from './events.js';

export interface CallOptions {
  from?: Address;
  value?: bigint;
  /** Block to execute against (default: 'latest') */
  blockTag?: BlockTag;
}

/** Decoded call output: nothing, a single value, or several */
export type CallResult = NativeValue | undefined;

export interface ContractInstanceConfig {
  descriptor: ContractDescriptor;
  address: Address;
  client: NodeClient;
  /** Needed for transact(); without one the instance is read-only */
  account?: Account;
  /** Shared pipeline; built from `account` when omitted */
  pipeline?: TransactionPipeline;
  gasEstimator?: GasEstimator;
  /** Pipeline defaults for transactions sent through this instance */
  defaults?: Partial<PipelineConfig>;
  /** Pre-generated bindings; generated from `descriptor` when omitted */
  bindings?: ContractBindings;
  aliases?: BindingOptions['aliases'];
  overloads?: BindingOptions['overloads'];
  logger?: Logger;
}

/**
 * Decode return data against a function's outputs
 */
export function decodeFunctionResult(fn: FunctionDescriptor, data: Hex): CallResult {
  if (fn.outputs.length === 0) {
    return undefined;
  }
  if (data === '0x') {
    throw new MalformedEncodingError(`${fn.signature} returned no data`, { signature: fn.signature });
  }
  const values = decodeParameters(
    fn.outputs.map((o) => o.type),
    data
  );
  const natives = fn.outputs.map((o, i) => {
    const value = values[i];
    if (value === undefined) {
      throw new MalformedEncodingError(`${fn.signature} output ${i} missing`);
    }
    return fromAbiValue(o.type, value, o.name || `output${i}`);
  });

  const [first] = natives;
  if (natives.length === 1 && first !== undefined) {
    return first;
  }
  const names = fn.outputs.map((o) => o.name);
  if (names.every((n) => n !== '') && new Set(names).size === names.length) {
    const record: Record<string, NativeValue> = {};
    natives.forEach((native, i) => {
      const name = names[i];
      if (name !== undefined) record[name] = native;
    });
    return record;
  }
  return natives;
}

/**
 * A descriptor bound to a deployed address
 *
 * ```typescript
 * const token = new ContractInstance({ descriptor, address, client, account });
 * const balance = await token.call('balanceOf', [owner]);
 * const pending = await token.transact('transfer', [to, 10n ** 18n]);
 * await pending.wait();
 * ```
 */
export class ContractInstance {
  readonly descriptor: ContractDescriptor;
  readonly address: Address;
  readonly client: NodeClient;
  readonly bindings: ContractBindings;

  private readonly pipeline: TransactionPipeline | undefined;
  private readonly logger: Logger;

  constructor(config: ContractInstanceConfig) {
    this.descriptor = config.descriptor;
    this.address = config.address;
    this.client = config.client;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'contract');

    const bindingOptions: BindingOptions = {};
    if (config.aliases !== undefined) bindingOptions.aliases = config.aliases;
    if (config.overloads !== undefined) bindingOptions.overloads = config.overloads;
    this.bindings = config.bindings ?? generateBindings(config.descriptor, bindingOptions);
    if (this.bindings.descriptor !== config.descriptor) {
      throw new ValidationError('Bindings were generated for a different descriptor');
    }

    if (config.pipeline) {
      this.pipeline = config.pipeline;
    } else if (config.account) {
      this.pipeline = new TransactionPipeline({
        client: config.client,
        account: config.account,
        ...(config.gasEstimator ? { gasEstimator: config.gasEstimator } : {}),
        ...(config.defaults ? { defaults: config.defaults } : {}),
        ...(config.logger ? { logger: config.logger } : {}),
      });
    }
  }

  /** Account transactions are signed with, if any */
  get account(): Account | undefined {
    return this.pipeline?.account;
  }

  /**
   * Same contract, sending through `account`
   */
  connect(account: Account, options: { gasEstimator?: GasEstimator; defaults?: Partial<PipelineConfig> } = {}): ContractInstance {
    return new ContractInstance({
      descriptor: this.descriptor,
      address: this.address,
      client: this.client,
      bindings: this.bindings,
      account,
      ...options,
    });
  }

  /**
   * Binding for `fn`: a callable name, a signature, or the bare name of a
   * non-ambiguous overload set
   */
  function(fn: string, args?: ReadonlyArray<unknown>): FunctionBinding {
    return this.bindings.resolve(fn, args);
  }

  /**
   * Calldata for `fn(args)`: selector followed by the encoded arguments
   */
  encode(fn: string, args: ReadonlyArray<unknown> = []): Hex {
    const { descriptor } = this.function(fn, args);
    const values = toAbiValues(descriptor.inputs, args, descriptor.name);
    return concatHex(
      descriptor.selector,
      encodeParameters(
        descriptor.inputs.map((p) => p.type),
        values
      )
    );
  }

  decodeResult(fn: string, data: Hex): CallResult {
    return decodeFunctionResult(this.function(fn).descriptor, data);
  }

  /**
   * Execute `fn` with eth_call and decode the output.
   * Throws ContractRevertError when execution fails on the node and
   * MalformedEncodingError when the returned bytes do not decode.
   */
  async call(fn: string, args: ReadonlyArray<unknown> = [], options: CallOptions = {}): Promise<CallResult> {
    const binding = this.function(fn, args);
    const request: CallRequest = { to: this.address, data: this.encode(binding.descriptor.signature, args) };
    const from = options.from ?? this.account?.address;
    if (from !== undefined) request.from = from;
    if (options.value !== undefined) request.value = options.value;

    let data: Hex;
    try {
      data = await this.client.call(request, options.blockTag ?? 'latest');
    } catch (error) {
      if (isExecutionRevert(error)) {
        const revert = new ContractRevertError(decodeRevertData(revertDataOf(error), this.descriptor));
        this.logger.debug('Call reverted', { signature: binding.descriptor.signature, reason: revert.reason });
        throw revert;
      }
      throw error;
    }
    return decodeFunctionResult(binding.descriptor, data);
  }

  /**
   * call() that reports library errors as a Result instead of throwing
   */
  tryCall(fn: string, args: ReadonlyArray<unknown> = [], options: CallOptions = {}): Promise<Result<CallResult, EthBindError>> {
    return fromPromise(this.call(fn, args, options), EthBindError);
  }

  /**
   * Build the transaction for `fn(args)` without submitting it
   */
  send(fn: string, args: ReadonlyArray<unknown> = [], options: SendOptions = {}): TransactionRequest {
    const { descriptor } = this.function(fn, args);
    if (options.value !== undefined && options.value > 0n && descriptor.stateMutability !== 'payable') {
      throw new ArgumentMismatchError(`${descriptor.signature} is not payable`, { value: options.value.toString() });
    }
    const request = new TransactionRequest({ to: this.address, data: this.encode(descriptor.signature, args) });
    request.set({
      from: this.account?.address,
      value: options.value,
      gasLimit: options.gasLimit,
      gasPrice: options.gasPrice,
      maxFeePerGas: options.maxFeePerGas,
      maxPriorityFeePerGas: options.maxPriorityFeePerGas,
      nonce: options.nonce,
      chainId: options.chainId,
      type: options.type,
    });
    return request;
  }

  /**
   * Build, sign and submit `fn(args)`. The returned transaction tracks confirmation.
   */
  async transact(fn: string, args: ReadonlyArray<unknown> = [], options: SendOptions = {}): Promise<PendingTransaction> {
    const pipeline = this.requirePipeline();
    const request = this.send(fn, args, options);
    return pipeline.submit(request, options, this.descriptor);
  }

  /**
   * Decode this contract's events from `logs`, e.g. a receipt's. Logs from
   * other addresses or with unknown topics are skipped.
   */
  decodeEvents(logs: ReadonlyArray<Log>): DecodedEvent[] {
    const own = logs.filter((log) => log.address.toLowerCase() === this.address.toLowerCase());
    return [...scanLogs(this.descriptor, own)];
  }

  queryEvents(options: Omit<EventQueryOptions, 'address'> = {}): AsyncGenerator<DecodedEvent> {
    return queryEvents(this.client, this.descriptor, { ...options, address: this.address });
  }

  subscribe(options: Omit<SubscriptionOptions, 'address'> = {}): EventSubscription {
    return new EventSubscription(this.client, this.descriptor, { ...options, address: this.address });
  }

  private requirePipeline(): TransactionPipeline {
    if (!this.pipeline) {
      throw new ValidationError('An account is required to send transactions; pass `account` or use connect(account)');
    }
    return this.pipeline;
  }
}
