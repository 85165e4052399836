/**
 * Core type definitions shared by the codec, binding and execution layers
 */

// Hex string type (0x prefixed)
export type Hex = `0x${string}`;

// Address is a 20-byte hex string
export type Address = Hex & { readonly __brand: 'Address' };

// Hash is a 32-byte hex string
export type Hash = Hex & { readonly __brand: 'Hash' };

// Block selector accepted by read operations
export type BlockTag = 'latest' | 'pending' | 'earliest' | number;

// Signature components
export interface Signature {
  readonly r: Hex;
  readonly s: Hex;
  readonly v: number;
  readonly yParity: 0 | 1;
}

export type TransactionType = 'legacy' | 'eip1559';

interface TransactionBase {
  readonly to?: Address;
  readonly value?: bigint;
  readonly data?: Hex;
  readonly nonce?: number;
  readonly chainId?: number;
  readonly gasLimit?: bigint;
}

// Legacy transaction (type 0). Without chainId it is signed pre-EIP-155.
export interface LegacyTransaction extends TransactionBase {
  readonly type?: 'legacy';
  readonly gasPrice?: bigint;
}

// EIP-1559 transaction (type 2)
export interface EIP1559Transaction extends TransactionBase {
  readonly type: 'eip1559';
  readonly maxFeePerGas?: bigint;
  readonly maxPriorityFeePerGas?: bigint;
}

export type Transaction = LegacyTransaction | EIP1559Transaction;

// Signed transaction, produced exactly once per submission
export interface SignedTransaction {
  readonly raw: Hex;
  readonly hash: Hash;
  readonly transaction: Transaction;
  readonly signature: Signature;
}

// Event log as returned by the node
export interface Log {
  address: Address;
  topics: Hash[];
  data: Hex;
  blockNumber: number;
  transactionHash: Hash;
  transactionIndex: number;
  blockHash: Hash;
  logIndex: number;
  removed: boolean;
}

export interface TransactionReceipt {
  transactionHash: Hash;
  transactionIndex: number;
  blockHash: Hash;
  blockNumber: number;
  from: Address;
  to?: Address;
  cumulativeGasUsed: bigint;
  gasUsed: bigint;
  effectiveGasPrice?: bigint;
  contractAddress?: Address;
  logs: Log[];
  status: 'success' | 'reverted';
}

// Transaction as known by the node (mempool or mined)
export interface TransactionResponse {
  hash: Hash;
  nonce: number;
  blockHash?: Hash;
  blockNumber?: number;
  from: Address;
  to?: Address;
  value: bigint;
  gas: bigint;
  gasPrice?: bigint;
  input: Hex;
}

export interface Block {
  number: number;
  hash: Hash;
  parentHash: Hash;
  timestamp: number;
  gasLimit: bigint;
  gasUsed: bigint;
  baseFeePerGas?: bigint;
}

// ============ ABI JSON ============

export interface ABIParameter {
  readonly name?: string;
  readonly type: string;
  readonly indexed?: boolean;
  readonly internalType?: string;
  readonly components?: ReadonlyArray<ABIParameter>;
}

export type StateMutability = 'pure' | 'view' | 'nonpayable' | 'payable';

export interface ABIFunction {
  readonly type: 'function';
  readonly name: string;
  readonly inputs: ReadonlyArray<ABIParameter>;
  readonly outputs?: ReadonlyArray<ABIParameter>;
  readonly stateMutability?: StateMutability;
  readonly constant?: boolean;
  readonly payable?: boolean;
}

export interface ABIEvent {
  readonly type: 'event';
  readonly name: string;
  readonly inputs: ReadonlyArray<ABIParameter>;
  readonly anonymous?: boolean;
}

export interface ABIError {
  readonly type: 'error';
  readonly name: string;
  readonly inputs: ReadonlyArray<ABIParameter>;
}

export interface ABIConstructor {
  readonly type: 'constructor';
  readonly inputs: ReadonlyArray<ABIParameter>;
  readonly stateMutability?: 'nonpayable' | 'payable';
  readonly payable?: boolean;
}

export interface ABIFallback {
  readonly type: 'fallback';
  readonly stateMutability?: 'nonpayable' | 'payable';
}

export interface ABIReceive {
  readonly type: 'receive';
  readonly stateMutability?: 'payable';
}

export type ABIItem = ABIFunction | ABIEvent | ABIError | ABIConstructor | ABIFallback | ABIReceive;
export type ABI = ReadonlyArray<ABIItem>;

// ============ JSON-RPC ============

export interface RPCError {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

export interface JSONRPCRequest {
  readonly jsonrpc: '2.0';
  readonly id: number | string;
  readonly method: string;
  readonly params?: ReadonlyArray<unknown>;
}

export interface JSONRPCResponse<T = unknown> {
  readonly jsonrpc: '2.0';
  readonly id: number | string;
  readonly result?: T;
  readonly error?: RPCError;
}
