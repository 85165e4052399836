/**
 * Transaction pipeline
 *
 * building → estimating → signing → submitted → pending → confirmed | dropped | timed-out
 *
 * The raw transaction is sent exactly once. After submission a
 * ConfirmationTracker polls the node; transient node failures while polling
 * are absorbed until the timeout, everything else reaches the caller.
 */

import type { Hash, SignedTransaction, TransactionReceipt, TransactionType } from '../core/types.js';
import {
  EthBindError,
  TransactionDroppedError,
  TransactionRevertedError,
  TransactionTimeoutError,
  ValidationError,
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger, noopLogger } from '../core/logger.js';
import type { ContractDescriptor } from '../abi/descriptor.js';
import type { NodeClient } from './rpc.js';
import { isTransientNodeFailure, sleep } from './rpc.js';
import type { Account } from './account.js';
import type { GasEstimator } from './gas.js';
import { NodeGasEstimator } from './gas.js';
import type { NonceSource } from './nonce.js';
import { PendingNonceSource } from './nonce.js';
import { TransactionRequest, signTransaction } from './transaction.js';

export type TransactionState =
  | 'building'
  | 'estimating'
  | 'signing'
  | 'submitted'
  | 'pending'
  | 'confirmed'
  | 'dropped'
  | 'timed-out';

/** States a submitted transaction moves through */
export type ConfirmationState = Extract<TransactionState, 'submitted' | 'pending' | 'confirmed' | 'dropped' | 'timed-out'>;

const TERMINAL_STATES: ReadonlySet<ConfirmationState> = new Set(['confirmed', 'dropped', 'timed-out']);

export function isTerminal(state: TransactionState): boolean {
  return state === 'confirmed' || state === 'dropped' || state === 'timed-out';
}

// ============ Configuration ============

export interface PipelineConfig {
  /** Delay between confirmation polls in ms */
  pollInterval: number;
  /** Total confirmation wait in ms, measured from submission */
  timeout: number;
  /** Blocks including the receipt's block required for confirmation */
  confirmations: number;
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  pollInterval: 1000,
  timeout: 120_000,
  confirmations: 1,
});

/**
 * Merge caller overrides onto defaults and validate the result
 */
export function resolvePipelineConfig(...overrides: Array<Partial<PipelineConfig> | undefined>): PipelineConfig {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG };
  for (const override of overrides) {
    if (override?.pollInterval !== undefined) config.pollInterval = override.pollInterval;
    if (override?.timeout !== undefined) config.timeout = override.timeout;
    if (override?.confirmations !== undefined) config.confirmations = override.confirmations;
  }
  if (!(config.pollInterval > 0)) {
    throw new ValidationError(`pollInterval must be positive, got ${config.pollInterval}`);
  }
  if (!(config.timeout > 0)) {
    throw new ValidationError(`timeout must be positive, got ${config.timeout}`);
  }
  if (!Number.isInteger(config.confirmations) || config.confirmations < 1) {
    throw new ValidationError(`confirmations must be a positive integer, got ${config.confirmations}`);
  }
  return config;
}

/**
 * Per-transaction options. `to`, `data` and `value` come from the caller only.
 */
export interface SendOptions extends Partial<PipelineConfig> {
  value?: bigint;
  gasLimit?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  nonce?: number;
  chainId?: number;
  type?: TransactionType;
  /** Sign legacy transactions without a chain id (pre-EIP-155). Default: true */
  replayProtection?: boolean;
  /** Nonce allocation; defaults to the node's pending count */
  nonces?: NonceSource;
  /** Observe every state the transaction enters */
  onStateChange?: (state: TransactionState) => void;
}

// ============ Outcome ============

export type TransactionOutcome =
  | { readonly state: 'confirmed'; readonly hash: Hash; readonly receipt: TransactionReceipt; readonly confirmations: number }
  | { readonly state: 'dropped'; readonly hash: Hash }
  | { readonly state: 'timed-out'; readonly hash: Hash; readonly receipt?: TransactionReceipt };

/**
 * Polls a submitted transaction until it reaches a terminal state.
 * The outcome is computed once; `state` never changes after it is terminal.
 */
export class ConfirmationTracker {
  readonly hash: Hash;
  readonly signed: SignedTransaction;
  readonly config: Readonly<PipelineConfig>;

  private currentState: ConfirmationState = 'submitted';
  private latestReceipt: TransactionReceipt | undefined;
  private readonly client: NodeClient;
  private readonly logger: Logger;
  private readonly listener: ((state: TransactionState) => void) | undefined;
  private readonly settled: Promise<TransactionOutcome>;

  constructor(options: {
    client: NodeClient;
    signed: SignedTransaction;
    config?: Partial<PipelineConfig>;
    logger?: Logger;
    onStateChange?: (state: TransactionState) => void;
  }) {
    this.client = options.client;
    this.signed = options.signed;
    this.hash = options.signed.hash;
    this.config = Object.freeze(resolvePipelineConfig(options.config));
    this.logger = options.logger ?? noopLogger;
    this.listener = options.onStateChange;
    this.settled = this.poll();
    // Failures are delivered through wait()/outcome(); keep the rejection handled meanwhile
    this.settled.catch(() => undefined);
  }

  get state(): ConfirmationState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this.currentState);
  }

  /** Latest receipt seen, if any */
  get receipt(): TransactionReceipt | undefined {
    return this.latestReceipt;
  }

  /**
   * Terminal outcome. Rejects only for non-transient node errors while polling.
   */
  outcome(): Promise<TransactionOutcome> {
    return this.settled;
  }

  /**
   * Receipt of the confirmed transaction. Rejects with TransactionDroppedError,
   * TransactionTimeoutError, or TransactionRevertedError when mined with status 0.
   */
  async wait(): Promise<TransactionReceipt> {
    const outcome = await this.settled;
    switch (outcome.state) {
      case 'confirmed':
        if (outcome.receipt.status === 'reverted') {
          throw new TransactionRevertedError(this.hash, outcome.receipt.blockNumber);
        }
        return outcome.receipt;
      case 'dropped':
        throw new TransactionDroppedError(this.hash);
      case 'timed-out':
        throw new TransactionTimeoutError(this.hash, this.config.timeout);
    }
  }

  private transition(state: ConfirmationState, context: Record<string, unknown> = {}): void {
    if (this.isTerminal || state === this.currentState) return;
    this.currentState = state;
    this.logger.debug(`Transaction ${state}`, { hash: this.hash, ...context });
    this.listener?.(state);
  }

  private async poll(): Promise<TransactionOutcome> {
    const { pollInterval, timeout, confirmations } = this.config;
    const deadline = Date.now() + timeout;
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        const receipt = await this.client.getTransactionReceipt(this.hash);
        if (receipt) {
          this.latestReceipt = receipt;
          this.transition('pending', { blockNumber: receipt.blockNumber });
          const head = await this.client.getBlockNumber();
          const depth = head - receipt.blockNumber + 1;
          if (depth >= confirmations) {
            this.transition('confirmed', { blockNumber: receipt.blockNumber, confirmations: depth, status: receipt.status });
            return { state: 'confirmed', hash: this.hash, receipt, confirmations: depth };
          }
        } else {
          if (this.currentState === 'pending') {
            this.logger.warn('Receipt disappeared, waiting for re-inclusion', { hash: this.hash });
            this.latestReceipt = undefined;
            this.transition('submitted');
          }
          const known = await this.client.getTransaction(this.hash);
          if (known === null) {
            this.transition('dropped');
            this.logger.error('Transaction dropped', { hash: this.hash });
            return { state: 'dropped', hash: this.hash };
          }
        }
      } catch (error) {
        if (!isTransientNodeFailure(error)) {
          this.logger.error('Confirmation polling failed', {
            hash: this.hash,
            error: error instanceof Error ? error.message : String(error),
          });
          throw error;
        }
        this.logger.warn('Node unavailable while polling, retrying', {
          hash: this.hash,
          attempt,
          error: error instanceof EthBindError ? error.code : String(error),
        });
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.transition('timed-out', { attempts: attempt });
        this.logger.error('Transaction not confirmed in time', { hash: this.hash, timeout });
        return this.latestReceipt
          ? { state: 'timed-out', hash: this.hash, receipt: this.latestReceipt }
          : { state: 'timed-out', hash: this.hash };
      }
      await sleep(Math.min(pollInterval, remaining));
    }
  }
}

export type PendingTransaction = ConfirmationTracker;

// ============ Pipeline ============

export interface PipelineOptions {
  client: NodeClient;
  account: Account;
  gasEstimator?: GasEstimator;
  /** Defaults for every transaction this pipeline sends */
  defaults?: Partial<PipelineConfig>;
  logger?: Logger;
}

/**
 * Drives a request from building to submission and hands back its tracker
 */
export class TransactionPipeline {
  readonly client: NodeClient;
  readonly account: Account;
  private readonly gasEstimator: GasEstimator;
  private readonly defaults: PipelineConfig;
  private readonly logger: Logger;

  constructor(options: PipelineOptions) {
    this.client = options.client;
    this.account = options.account;
    this.logger = createPrefixedLogger(options.logger ?? noopLogger, 'pipeline');
    this.gasEstimator = options.gasEstimator ?? new NodeGasEstimator(options.client, { logger: this.logger });
    this.defaults = resolvePipelineConfig(options.defaults);
  }

  /**
   * Fill, sign and submit `request`. Estimation failures and submission
   * errors are thrown here; confirmation is observed through the tracker.
   */
  async submit(
    request: TransactionRequest,
    options: SendOptions = {},
    descriptor?: ContractDescriptor
  ): Promise<ConfirmationTracker> {
    const config = resolvePipelineConfig(this.defaults, options);
    const notify = (state: TransactionState, context: Record<string, unknown> = {}): void => {
      this.logger.debug(`Transaction ${state}`, { to: request.to, ...context });
      options.onStateChange?.(state);
    };

    notify('building');
    this.build(request, options);

    notify('estimating');
    if (request.gasLimit === undefined) {
      request.gasLimit = await this.gasEstimator.estimateGas(request.toCallRequest(), descriptor);
    }
    if (!request.hasFees()) {
      await this.fillFees(request);
    }

    notify('signing');
    if (request.nonce === undefined) {
      const nonces = options.nonces ?? new PendingNonceSource(this.client);
      request.nonce = await nonces.next(this.account.address);
    }
    if (request.chainId === undefined && options.replayProtection !== false) {
      request.chainId = await this.client.getChainId();
    }
    const signed = await signTransaction(request.finalize(), this.account);

    const returned = await this.client.sendRawTransaction(signed.raw);
    if (returned.toLowerCase() !== signed.hash) {
      this.logger.warn('Node reported a different transaction hash', { expected: signed.hash, returned });
    }
    notify('submitted', { hash: signed.hash, nonce: request.nonce });

    const trackerOptions = {
      client: this.client,
      signed,
      config,
      logger: this.logger,
      ...(options.onStateChange ? { onStateChange: options.onStateChange } : {}),
    };
    return new ConfirmationTracker(trackerOptions);
  }

  /**
   * Complete the fee fields the caller left open. A partial fee-market
   * request stays fee-market, and a caller's cap is never raised.
   */
  private async fillFees(request: TransactionRequest): Promise<void> {
    const partialFeeMarket = request.maxFeePerGas !== undefined || request.maxPriorityFeePerGas !== undefined;
    const fees = await this.gasEstimator.getFees(request.type ?? (partialFeeMarket ? 'eip1559' : undefined));

    if (fees.type === 'legacy') {
      if (request.gasPrice === undefined) request.gasPrice = fees.gasPrice;
      if (request.type === undefined) request.type = 'legacy';
      return;
    }
    request.type = 'eip1559';
    const maxFeePerGas = request.maxFeePerGas ?? fees.maxFeePerGas;
    request.maxFeePerGas = maxFeePerGas;
    if (request.maxPriorityFeePerGas === undefined) {
      request.maxPriorityFeePerGas =
        fees.maxPriorityFeePerGas < maxFeePerGas ? fees.maxPriorityFeePerGas : maxFeePerGas;
    }
  }

  private build(request: TransactionRequest, options: SendOptions): void {
    if (request.from !== undefined && request.from.toLowerCase() !== this.account.address.toLowerCase()) {
      throw new ValidationError(`Request is from ${request.from} but the account is ${this.account.address}`);
    }
    request.from = this.account.address;
    request.set({
      value: options.value,
      gasLimit: options.gasLimit,
      gasPrice: options.gasPrice,
      maxFeePerGas: options.maxFeePerGas,
      maxPriorityFeePerGas: options.maxPriorityFeePerGas,
      nonce: options.nonce,
      chainId: options.chainId,
      type: options.type,
    });
    if (options.replayProtection === false) {
      if (request.transactionType !== 'legacy') {
        throw new ValidationError('Only legacy transactions can be signed without replay protection');
      }
      if (request.chainId !== undefined) {
        throw new ValidationError('replayProtection: false cannot be combined with a chainId');
      }
    }
  }
}
