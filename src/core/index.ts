/**
 * Core primitives layer
 * Byte, hash, key and error building blocks shared by the ABI and protocol layers
 */

// Types
export type {
  Hex,
  Address,
  Hash,
  BlockTag,
  Signature,
  TransactionType,
  LegacyTransaction,
  EIP1559Transaction,
  Transaction,
  SignedTransaction,
  TransactionReceipt,
  TransactionResponse,
  Log,
  Block,
  ABIParameter,
  StateMutability,
  ABIFunction,
  ABIEvent,
  ABIError,
  ABIConstructor,
  ABIFallback,
  ABIReceive,
  ABIItem,
  ABI,
  RPCError,
  JSONRPCRequest,
  JSONRPCResponse,
} from './types.js';

// Hex utilities
export {
  isHex,
  assertHex,
  bytesToHex,
  hexToBytes,
  toBytes,
  numberToHex,
  hexToNumber,
  hexToBigInt,
  padHex,
  concatHex,
  concatBytes,
  bytesEqual,
  hexLength,
  hexEquals,
  stringToBytes,
} from './hex.js';

// Hashing
export { keccak256, selectorOf, topicOf } from './hash.js';

// RLP
export * as rlp from './rlp.js';
export type { RLPInput, RLPDecoded } from './rlp.js';

// Addresses
export {
  isAddress,
  assertAddress,
  toChecksumAddress,
  isChecksumValid,
  addressFromBytes,
  addressEquals,
  computeContractAddress,
  ZERO_ADDRESS,
} from './address.js';

// Signatures
export {
  isValidPrivateKey,
  privateKeyToAddress,
  publicKeyToAddress,
  sign,
  recoverAddress,
  parityFromV,
  signatureToHex,
} from './signature.js';

// Key material
export { SecureKey, withSecureKey } from './secure-key.js';

// Caching
export { LRUCache } from './cache.js';
export type { LRUCacheOptions } from './cache.js';

// Logging
export { noopLogger, consoleLogger, createPrefixedLogger, createLevelLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';

// Result type
export { ok, err, isOk, isErr, unwrap, unwrapOr, map, mapErr, fromThrowable, fromPromise } from './result.js';
export type { Result, Ok, Err } from './result.js';

// Errors
export {
  EthBindError,
  ValidationError,
  InvalidAbiError,
  BindingError,
  ArgumentMismatchError,
  MalformedEncodingError,
  ContractRevertError,
  GasEstimationFailedError,
  TransactionDroppedError,
  TransactionTimeoutError,
  TransactionRevertedError,
  NodeUnavailableError,
  LinkerError,
} from './errors.js';
export type { ErrorDetails, RevertInfo, LinkerErrorKind } from './errors.js';
