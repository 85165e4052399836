/**
 * Protocol layer
 * Node access, signing, the transaction pipeline and contract instances
 */

// Node access
export {
  RPCClient,
  RPCRequestError,
  isTransientRPCError,
  isTransientNodeFailure,
  isExecutionRevert,
  revertDataOf,
  toBlockParam,
} from './rpc.js';
export type { RPCOptions, NodeClient, CallRequest, LogFilter } from './rpc.js';

// Accounts
export { LocalAccount } from './account.js';
export type { Account } from './account.js';

// Transactions
export {
  TransactionRequest,
  signingHash,
  serializeTransaction,
  signTransaction,
  parseSignedTransaction,
  recoverTransactionSender,
} from './transaction.js';
export type { TransactionFields } from './transaction.js';

// Gas and nonces
export { NodeGasEstimator } from './gas.js';
export type { GasEstimator, GasEstimatorConfig, FeeFields } from './gas.js';
export { PendingNonceSource, NonceSequencer } from './nonce.js';
export type { NonceSource } from './nonce.js';

// Pipeline
export {
  TransactionPipeline,
  ConfirmationTracker,
  DEFAULT_PIPELINE_CONFIG,
  resolvePipelineConfig,
  isTerminal,
} from './pipeline.js';
export type {
  PipelineConfig,
  PipelineOptions,
  SendOptions,
  TransactionState,
  ConfirmationState,
  TransactionOutcome,
  PendingTransaction,
} from './pipeline.js';

// Contracts
export { ContractInstance, decodeFunctionResult } from './contract.js';
export type { ContractInstanceConfig, CallOptions, CallResult } from './contract.js';
export { bindContract } from './typed-contract.js';
export type {
  TypedContract,
  BindContractConfig,
  TypedReadMethods,
  TypedWriteMethods,
  TypedPrepareMethods,
  TypedEncodeMethods,
  TypedEvents,
  TypedEventMethods,
  TypedEventFilter,
  TypedEventSubscription,
  TypedDecodedEvent,
} from './typed-contract.js';

// Events
export { queryEvents, subscribeEvents, EventSubscription, resolveEvent, DEFAULT_CHUNK_SIZE } from './events.js';
export type { EventSelection, EventQueryOptions, SubscriptionOptions } from './events.js';

// Deployment
export {
  deployContract,
  deployArtifact,
  deployedContract,
  encodeDeployData,
  predictDeploymentAddress,
  readArtifact,
} from './deploy.js';
export type {
  DeployConfig,
  DeploymentResult,
  LibrarySource,
  ContractArtifact,
  ArtifactNetwork,
  DeployedContractOptions,
} from './deploy.js';
