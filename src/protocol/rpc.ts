/**
 * JSON-RPC client for Ethereum
 * Type-safe, minimal RPC implementation behind the NodeClient interface
 */

import type {
  Hex,
  Address,
  Hash,
  Block,
  BlockTag,
  TransactionResponse,
  TransactionReceipt,
  Log,
  JSONRPCRequest,
  JSONRPCResponse,
} from '../core/types.js';
import { hexToBigInt, hexToNumber, isHex, numberToHex } from '../core/hex.js';
import { EthBindError, NodeUnavailableError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { noopLogger } from '../core/logger.js';
import type { TopicFilter } from '../abi/events.js';

// ============ Node interface ============

export interface CallRequest {
  to?: Address;
  from?: Address;
  data?: Hex;
  value?: bigint;
  gasLimit?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
}

export interface LogFilter {
  address?: Address | Address[];
  topics?: TopicFilter;
  fromBlock?: BlockTag;
  toBlock?: BlockTag;
  blockHash?: Hash;
}

/**
 * Execution backend. `RPCClient` implements it over HTTP JSON-RPC;
 * tests substitute an in-process node.
 */
export interface NodeClient {
  call(request: CallRequest, block?: BlockTag): Promise<Hex>;
  estimateGas(request: CallRequest): Promise<bigint>;
  sendRawTransaction(raw: Hex): Promise<Hash>;
  getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null>;
  getTransaction(hash: Hash): Promise<TransactionResponse | null>;
  getTransactionCount(address: Address, block?: BlockTag): Promise<number>;
  getBlockNumber(): Promise<number>;
  getChainId(): Promise<number>;
  getGasPrice(): Promise<bigint>;
  getMaxPriorityFeePerGas(): Promise<bigint>;
  getBlock(block: BlockTag): Promise<Block | null>;
  getLogs(filter: LogFilter): Promise<Log[]>;
  newFilter(filter: LogFilter): Promise<Hex>;
  getFilterChanges(id: Hex): Promise<Log[]>;
  uninstallFilter(id: Hex): Promise<boolean>;
}

// ============ HTTP client ============

export interface RPCOptions {
  url: string;
  /** Per-request timeout in ms (default: 30000) */
  timeout?: number;
  /** Transport retries for idempotent methods (default: 3) */
  retries?: number;
  /** Base delay between retries in ms, multiplied by the attempt (default: 1000) */
  retryDelay?: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

// Sending these twice has side effects
const NON_IDEMPOTENT_METHODS = new Set(['eth_sendRawTransaction', 'eth_estimateGas', 'eth_newFilter']);

export class RPCClient implements NodeClient {
  private readonly url: string;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelay: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;
  // Start with random offset to prevent ID collisions between multiple instances
  private requestId = Math.floor(Math.random() * 1_000_000_000);

  constructor(options: RPCOptions | string) {
    const config = typeof options === 'string' ? { url: options } : options;
    this.url = config.url;
    this.timeout = config.timeout ?? 30000;
    this.retries = config.retries ?? 3;
    this.retryDelay = config.retryDelay ?? 1000;
    this.headers = config.headers ?? {};
    this.logger = config.logger ?? noopLogger;
  }

  /**
   * Create RPC client from URL
   */
  static connect(url: string): RPCClient {
    return new RPCClient(url);
  }

  /**
   * Send a raw JSON-RPC request. Transport failures surface as
   * NodeUnavailableError once retries are exhausted; node errors as RPCRequestError.
   */
  async request<T>(method: string, params: unknown[] = []): Promise<T> {
    const request: JSONRPCRequest = {
      jsonrpc: '2.0',
      id: ++this.requestId,
      method,
      params,
    };
    const retries = NON_IDEMPOTENT_METHODS.has(method) ? 0 : this.retries;

    let lastError: unknown;

    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        return await this.send<T>(request);
      } catch (err) {
        lastError = err;

        // Only retry transient RPC errors
        if (err instanceof RPCRequestError && !err.isTransient()) {
          throw err;
        }

        if (attempt < retries) {
          this.logger.warn('RPC request failed, retrying', {
            method,
            attempt: attempt + 1,
            error: err instanceof Error ? err.message : String(err),
          });
          await sleep(this.retryDelay * (attempt + 1));
        }
      }
    }

    if (lastError instanceof RPCRequestError) {
      throw lastError;
    }
    this.logger.error('RPC request failed', { method, error: describe(lastError) });
    throw new NodeUnavailableError(method, describe(lastError));
  }

  private async send<T>(request: JSONRPCRequest): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.headers,
        },
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const json = (await response.json()) as JSONRPCResponse<T>;

      if (json.error) {
        throw new RPCRequestError(json.error.code, json.error.message, json.error.data);
      }

      return json.result as T;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  // ============ Standard Ethereum RPC Methods ============

  async getChainId(): Promise<number> {
    return hexToNumber(await this.request<Hex>('eth_chainId'));
  }

  async getBlockNumber(): Promise<number> {
    return hexToNumber(await this.request<Hex>('eth_blockNumber'));
  }

  async getGasPrice(): Promise<bigint> {
    return hexToBigInt(await this.request<Hex>('eth_gasPrice'));
  }

  /**
   * Get max priority fee per gas (EIP-1559)
   */
  async getMaxPriorityFeePerGas(): Promise<bigint> {
    return hexToBigInt(await this.request<Hex>('eth_maxPriorityFeePerGas'));
  }

  /**
   * Get transaction count (nonce)
   */
  async getTransactionCount(address: Address, block: BlockTag = 'pending'): Promise<number> {
    return hexToNumber(await this.request<Hex>('eth_getTransactionCount', [address, toBlockParam(block)]));
  }

  async getBlock(block: BlockTag): Promise<Block | null> {
    const result = await this.request<RawBlock | null>('eth_getBlockByNumber', [toBlockParam(block), false]);
    return result ? parseBlock(result) : null;
  }

  async getTransaction(hash: Hash): Promise<TransactionResponse | null> {
    const result = await this.request<RawTransaction | null>('eth_getTransactionByHash', [hash]);
    return result ? parseTransaction(result) : null;
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null> {
    const result = await this.request<RawReceipt | null>('eth_getTransactionReceipt', [hash]);
    return result ? parseReceipt(result) : null;
  }

  /**
   * Call a contract (read-only)
   */
  async call(request: CallRequest, block: BlockTag = 'latest'): Promise<Hex> {
    return this.request<Hex>('eth_call', [toCallObject(request), toBlockParam(block)]);
  }

  async estimateGas(request: CallRequest): Promise<bigint> {
    return hexToBigInt(await this.request<Hex>('eth_estimateGas', [toCallObject(request)]));
  }

  /**
   * Send a signed transaction. Never retried.
   */
  async sendRawTransaction(raw: Hex): Promise<Hash> {
    return this.request<Hash>('eth_sendRawTransaction', [raw]);
  }

  async getLogs(filter: LogFilter): Promise<Log[]> {
    const result = await this.request<RawLog[]>('eth_getLogs', [toFilterObject(filter)]);
    return result.map(parseLog);
  }

  async newFilter(filter: LogFilter): Promise<Hex> {
    return this.request<Hex>('eth_newFilter', [toFilterObject(filter)]);
  }

  async getFilterChanges(id: Hex): Promise<Log[]> {
    const result = await this.request<RawLog[] | Hash[]>('eth_getFilterChanges', [id]);
    return result.flatMap((entry) => (typeof entry === 'string' ? [] : [parseLog(entry)]));
  }

  async uninstallFilter(id: Hex): Promise<boolean> {
    return this.request<boolean>('eth_uninstallFilter', [id]);
  }
}

// ============ Request shaping ============

export function toBlockParam(block: BlockTag): string {
  return typeof block === 'number' ? numberToHex(block) : block;
}

function toCallObject(request: CallRequest): Record<string, unknown> {
  const callObject: Record<string, unknown> = {};
  if (request.to) callObject['to'] = request.to;
  if (request.from) callObject['from'] = request.from;
  if (request.data) callObject['data'] = request.data;
  if (request.value !== undefined) callObject['value'] = numberToHex(request.value);
  if (request.gasLimit !== undefined) callObject['gas'] = numberToHex(request.gasLimit);
  if (request.gasPrice !== undefined) callObject['gasPrice'] = numberToHex(request.gasPrice);
  if (request.maxFeePerGas !== undefined) callObject['maxFeePerGas'] = numberToHex(request.maxFeePerGas);
  if (request.maxPriorityFeePerGas !== undefined) {
    callObject['maxPriorityFeePerGas'] = numberToHex(request.maxPriorityFeePerGas);
  }
  return callObject;
}

function toFilterObject(filter: LogFilter): Record<string, unknown> {
  const filterObject: Record<string, unknown> = {};
  if (filter.address) filterObject['address'] = filter.address;
  if (filter.topics) filterObject['topics'] = filter.topics;
  if (filter.blockHash) {
    filterObject['blockHash'] = filter.blockHash;
  } else {
    if (filter.fromBlock !== undefined) filterObject['fromBlock'] = toBlockParam(filter.fromBlock);
    if (filter.toBlock !== undefined) filterObject['toBlock'] = toBlockParam(filter.toBlock);
  }
  return filterObject;
}

// ============ Error Types ============

/**
 * Error object returned by the node for a well-formed request
 */
export class RPCRequestError extends EthBindError {
  readonly rpcCode: number;
  readonly data?: unknown;

  constructor(rpcCode: number, message: string, data?: unknown) {
    const transient = isTransient(rpcCode, message);
    super({
      code: 'RPC_ERROR',
      message,
      details: { rpcCode, data },
      suggestion: transient ? 'Retry the request later' : 'Check the request parameters',
      retryable: transient,
    });
    this.name = 'RPCRequestError';
    this.rpcCode = rpcCode;
    if (data !== undefined) this.data = data;
  }

  /**
   * Check if this error is transient (may succeed on retry)
   */
  isTransient(): boolean {
    return isTransientRPCError(this);
  }
}

// ============ Error Classification ============

/**
 * Standard JSON-RPC error codes that indicate permanent failures
 */
const PERMANENT_ERROR_CODES = new Set([
  -32700, // Parse error
  -32600, // Invalid request
  -32601, // Method not found
  -32602, // Invalid params
  -32603, // Internal error
  3, // Execution reverted
]);

/**
 * Patterns in error messages that indicate transient failures
 */
const TRANSIENT_ERROR_PATTERNS = [
  'rate limit',
  'too many requests',
  'timeout',
  'timed out',
  'overloaded',
  'capacity',
  'try again',
  'temporarily unavailable',
  'service unavailable',
  'connection reset',
  'econnreset',
  'socket hang up',
  'network error',
];

/**
 * Patterns that indicate permanent Ethereum errors even with -32000 code
 */
const PERMANENT_ETH_ERROR_PATTERNS = [
  'nonce too low',
  'nonce too high',
  'insufficient funds',
  'gas too low',
  'intrinsic gas too low',
  'exceeds block gas limit',
  'already known',
  'replacement transaction underpriced',
  'transaction underpriced',
  'invalid sender',
  'invalid signature',
  'execution reverted',
];

function isTransient(code: number, rawMessage: string): boolean {
  const message = rawMessage.toLowerCase();

  if (PERMANENT_ERROR_CODES.has(code)) {
    return false;
  }
  if (code === -32000 && PERMANENT_ETH_ERROR_PATTERNS.some((pattern) => message.includes(pattern))) {
    return false;
  }
  if (TRANSIENT_ERROR_PATTERNS.some((pattern) => message.includes(pattern))) {
    return true;
  }
  // -32005: limit exceeded
  if (code === -32005) {
    return true;
  }

  // Unknown errors are permanent to avoid retrying forever
  return false;
}

/**
 * Determine if an RPC error is transient (may succeed on retry)
 */
export function isTransientRPCError(error: RPCRequestError): boolean {
  return isTransient(error.rpcCode, error.message);
}

/**
 * Failures worth another attempt: the node was unreachable or reported a transient condition
 */
export function isTransientNodeFailure(error: unknown): boolean {
  return error instanceof NodeUnavailableError || (error instanceof RPCRequestError && error.isTransient());
}

/**
 * The node reported that execution reverted (eth_call or eth_estimateGas)
 */
export function isExecutionRevert(error: unknown): error is RPCRequestError {
  if (!(error instanceof RPCRequestError)) return false;
  return error.rpcCode === 3 || error.message.toLowerCase().includes('revert');
}

/**
 * Revert payload attached to a node error, in either of the shapes nodes use
 */
export function revertDataOf(error: RPCRequestError): Hex | undefined {
  const { data } = error;
  if (isHex(data)) return data;
  if (typeof data === 'object' && data !== null && 'data' in data && isHex(data.data)) {
    return data.data;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============ Raw Types (from RPC) ============

interface RawBlock {
  number: Hex;
  hash: Hash;
  parentHash: Hash;
  gasLimit: Hex;
  gasUsed: Hex;
  timestamp: Hex;
  baseFeePerGas?: Hex;
}

interface RawTransaction {
  hash: Hash;
  nonce: Hex;
  blockHash?: Hash | null;
  blockNumber?: Hex | null;
  from: Address;
  to?: Address | null;
  value: Hex;
  gasPrice?: Hex;
  gas: Hex;
  input: Hex;
}

interface RawReceipt {
  transactionHash: Hash;
  transactionIndex: Hex;
  blockHash: Hash;
  blockNumber: Hex;
  from: Address;
  to?: Address | null;
  cumulativeGasUsed: Hex;
  gasUsed: Hex;
  effectiveGasPrice?: Hex;
  contractAddress?: Address | null;
  logs: RawLog[];
  status: Hex;
}

interface RawLog {
  address: Address;
  topics: Hash[];
  data: Hex;
  blockNumber: Hex;
  transactionHash: Hash;
  transactionIndex: Hex;
  blockHash: Hash;
  logIndex: Hex;
  removed?: boolean;
}

// ============ Parsing Functions ============

function parseBlock(raw: RawBlock): Block {
  const block: Block = {
    number: hexToNumber(raw.number),
    hash: raw.hash,
    parentHash: raw.parentHash,
    gasLimit: hexToBigInt(raw.gasLimit),
    gasUsed: hexToBigInt(raw.gasUsed),
    timestamp: hexToNumber(raw.timestamp),
  };
  if (raw.baseFeePerGas) {
    block.baseFeePerGas = hexToBigInt(raw.baseFeePerGas);
  }
  return block;
}

function parseTransaction(raw: RawTransaction): TransactionResponse {
  const tx: TransactionResponse = {
    hash: raw.hash,
    nonce: hexToNumber(raw.nonce),
    from: raw.from,
    value: hexToBigInt(raw.value),
    gas: hexToBigInt(raw.gas),
    input: raw.input,
  };
  if (raw.blockHash) tx.blockHash = raw.blockHash;
  if (raw.blockNumber) tx.blockNumber = hexToNumber(raw.blockNumber);
  if (raw.to) tx.to = raw.to;
  if (raw.gasPrice) tx.gasPrice = hexToBigInt(raw.gasPrice);
  return tx;
}

function parseReceipt(raw: RawReceipt): TransactionReceipt {
  const receipt: TransactionReceipt = {
    transactionHash: raw.transactionHash,
    transactionIndex: hexToNumber(raw.transactionIndex),
    blockHash: raw.blockHash,
    blockNumber: hexToNumber(raw.blockNumber),
    from: raw.from,
    cumulativeGasUsed: hexToBigInt(raw.cumulativeGasUsed),
    gasUsed: hexToBigInt(raw.gasUsed),
    logs: raw.logs.map(parseLog),
    status: raw.status === '0x1' ? 'success' : 'reverted',
  };
  if (raw.effectiveGasPrice) receipt.effectiveGasPrice = hexToBigInt(raw.effectiveGasPrice);
  if (raw.to) receipt.to = raw.to;
  if (raw.contractAddress) receipt.contractAddress = raw.contractAddress;
  return receipt;
}

function parseLog(raw: RawLog): Log {
  return {
    address: raw.address,
    topics: raw.topics,
    data: raw.data,
    blockNumber: hexToNumber(raw.blockNumber),
    transactionHash: raw.transactionHash,
    transactionIndex: hexToNumber(raw.transactionIndex),
    blockHash: raw.blockHash,
    logIndex: hexToNumber(raw.logIndex),
    removed: raw.removed === true,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
