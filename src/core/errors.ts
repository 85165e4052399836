/**
 * Error taxonomy
 * Structured errors carrying a stable code, details and a recovery suggestion
 */

export interface ErrorDetails {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  retryable?: boolean;
  retryAfter?: number;
}

/**
 * Base error class for every failure raised by this package
 */
export class EthBindError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  readonly suggestion: string;
  readonly retryable: boolean;
  readonly retryAfter?: number;

  constructor(config: ErrorDetails) {
    super(config.message);
    this.name = 'EthBindError';
    this.code = config.code;
    this.details = config.details ?? {};
    this.suggestion = config.suggestion ?? 'Check the error details and try again';
    this.retryable = config.retryable ?? false;
    if (config.retryAfter !== undefined) {
      this.retryAfter = config.retryAfter;
    }
  }

  toJSON(): ErrorDetails {
    const result: ErrorDetails = {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      retryable: this.retryable,
    };
    if (this.retryAfter !== undefined) {
      result.retryAfter = this.retryAfter;
    }
    return result;
  }

  override toString(): string {
    return `${this.code}: ${this.message}. ${this.suggestion}`;
  }
}

// ============ Input Errors ============

/**
 * A malformed primitive input (hex string, address, private key)
 */
export class ValidationError extends EthBindError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'VALIDATION_ERROR',
      message,
      details,
      suggestion: 'Check the input format',
      retryable: false,
    });
    this.name = 'ValidationError';
  }
}

/**
 * The contract descriptor JSON is malformed or internally inconsistent
 */
export class InvalidAbiError extends EthBindError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'INVALID_ABI',
      message: `Invalid ABI: ${message}`,
      details,
      suggestion: 'Regenerate the ABI from the compiler output',
      retryable: false,
    });
    this.name = 'InvalidAbiError';
  }
}

/**
 * Bindings cannot be generated: name collisions or unresolved overloads
 */
export class BindingError extends EthBindError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'BINDING_ERROR',
      message,
      details,
      suggestion: 'Provide an alias for the conflicting signature',
      retryable: false,
    });
    this.name = 'BindingError';
  }
}

/**
 * Argument count or shape does not match the function inputs
 */
export class ArgumentMismatchError extends EthBindError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ARGUMENT_MISMATCH',
      message,
      details,
      suggestion: 'Pass arguments matching the function signature',
      retryable: false,
    });
    this.name = 'ArgumentMismatchError';
  }
}

/**
 * Bytes received from the node or a log do not decode against the expected types
 */
export class MalformedEncodingError extends EthBindError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'MALFORMED_ENCODING',
      message: `Malformed encoding: ${message}`,
      details,
      suggestion: 'Check that the ABI matches the deployed contract',
      retryable: false,
    });
    this.name = 'MalformedEncodingError';
  }
}

// ============ Execution Errors ============

export interface RevertInfo {
  /** Human-readable reason */
  reason: string;
  /** Raw revert data returned by the node */
  data?: string;
  /** Custom error or builtin (Error, Panic) name */
  errorName?: string;
  /** Decoded custom error arguments */
  args?: ReadonlyArray<unknown>;
  /** Panic code for Panic(uint256) */
  panicCode?: bigint;
}

/**
 * Node-side execution failed during a call
 */
export class ContractRevertError extends EthBindError {
  readonly reason: string;
  readonly data?: string;
  readonly errorName?: string;
  readonly args?: ReadonlyArray<unknown>;
  readonly panicCode?: bigint;

  constructor(info: RevertInfo) {
    super({
      code: 'CONTRACT_REVERT',
      message: `Execution reverted: ${info.reason}`,
      details: {
        reason: info.reason,
        data: info.data,
        errorName: info.errorName,
        panicCode: info.panicCode?.toString(),
      },
      suggestion: 'Check contract requirements and input parameters',
      retryable: false,
    });
    this.name = 'ContractRevertError';
    this.reason = info.reason;
    if (info.data !== undefined) this.data = info.data;
    if (info.errorName !== undefined) this.errorName = info.errorName;
    if (info.args !== undefined) this.args = info.args;
    if (info.panicCode !== undefined) this.panicCode = info.panicCode;
  }
}

/**
 * The node rejected gas estimation. Carries the revert when the node reported one.
 */
export class GasEstimationFailedError extends EthBindError {
  readonly reason: string;
  readonly revert?: ContractRevertError;

  constructor(reason: string, revert?: ContractRevertError) {
    super({
      code: 'GAS_ESTIMATION_FAILED',
      message: `Failed to estimate gas: ${reason}`,
      details: { reason, errorName: revert?.errorName },
      suggestion: 'The transaction would revert. Check the contract state and parameters',
      retryable: false,
    });
    this.name = 'GasEstimationFailedError';
    this.reason = reason;
    if (revert !== undefined) this.revert = revert;
  }
}

/**
 * The submitted transaction disappeared from the node without a receipt
 */
export class TransactionDroppedError extends EthBindError {
  readonly hash: string;

  constructor(hash: string) {
    super({
      code: 'TX_DROPPED',
      message: `Transaction ${hash} was dropped by the node`,
      details: { hash },
      suggestion: 'Resubmit with a fresh nonce or a higher fee',
      retryable: false,
    });
    this.name = 'TransactionDroppedError';
    this.hash = hash;
  }
}

/**
 * Confirmation did not arrive within the configured wait.
 * The transaction may still be mined later.
 */
export class TransactionTimeoutError extends EthBindError {
  readonly hash: string;
  readonly timeout: number;

  constructor(hash: string, timeout: number) {
    super({
      code: 'TX_TIMED_OUT',
      message: `Transaction ${hash} not confirmed within ${timeout}ms`,
      details: { hash, timeout },
      suggestion: 'Keep polling the receipt; the transaction may still be mined',
      retryable: false,
    });
    this.name = 'TransactionTimeoutError';
    this.hash = hash;
    this.timeout = timeout;
  }
}

/**
 * The transaction was mined with a failed status
 */
export class TransactionRevertedError extends EthBindError {
  readonly hash: string;
  readonly blockNumber: number;

  constructor(hash: string, blockNumber: number) {
    super({
      code: 'TX_REVERTED',
      message: `Transaction ${hash} reverted in block ${blockNumber}`,
      details: { hash, blockNumber },
      suggestion: 'Replay the call against the block to obtain the revert reason',
      retryable: false,
    });
    this.name = 'TransactionRevertedError';
    this.hash = hash;
    this.blockNumber = blockNumber;
  }
}

/**
 * Transport failure or node not responding
 */
export class NodeUnavailableError extends EthBindError {
  readonly method: string;

  constructor(method: string, cause?: string) {
    super({
      code: 'NODE_UNAVAILABLE',
      message: `Node unavailable during ${method}${cause ? `: ${cause}` : ''}`,
      details: { method, cause },
      suggestion: 'Check the node URL and network connection',
      retryable: true,
      retryAfter: 1000,
    });
    this.name = 'NodeUnavailableError';
    this.method = method;
  }
}

// ============ Linking Errors ============

export type LinkerErrorKind =
  | 'empty-bytecode'
  | 'missing-dependency'
  | 'unused-dependency'
  | 'nested-dependencies'
  | 'invalid-bytecode';

/**
 * Library placeholders in bytecode cannot be resolved
 */
export class LinkerError extends EthBindError {
  readonly kind: LinkerErrorKind;
  readonly library?: string;

  constructor(kind: LinkerErrorKind, message: string, library?: string) {
    super({
      code: 'LINKER_ERROR',
      message,
      details: { kind, library },
      suggestion: 'Provide an address or bytecode for every linked library exactly once',
      retryable: false,
    });
    this.name = 'LinkerError';
    this.kind = kind;
    if (library !== undefined) this.library = library;
  }
}
