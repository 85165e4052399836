import { describe, it, expect } from 'vitest';
import {
  EthBindError,
  InvalidAbiError,
  MalformedEncodingError,
  ContractRevertError,
  GasEstimationFailedError,
  TransactionTimeoutError,
  NodeUnavailableError,
  LinkerError,
} from '../../src/core/errors.js';

describe('errors', () => {
  it('carries code, suggestion and retryability', () => {
    const error = new EthBindError({ code: 'CUSTOM', message: 'went wrong' });
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('CUSTOM');
    expect(error.suggestion).toBe('Check the error details and try again');
    expect(error.retryable).toBe(false);
    expect(error.details).toEqual({});
    expect(error.toString()).toBe('CUSTOM: went wrong. Check the error details and try again');
  });

  it('serializes to JSON', () => {
    const error = new NodeUnavailableError('eth_call', 'ECONNREFUSED');
    expect(error.toJSON()).toEqual({
      code: 'NODE_UNAVAILABLE',
      message: 'Node unavailable during eth_call: ECONNREFUSED',
      details: { method: 'eth_call', cause: 'ECONNREFUSED' },
      suggestion: 'Check the node URL and network connection',
      retryable: true,
      retryAfter: 1000,
    });
  });

  it('prefixes descriptor and encoding messages', () => {
    expect(new InvalidAbiError('entry 2 has no type').message).toBe('Invalid ABI: entry 2 has no type');
    expect(new MalformedEncodingError('offset out of range').message).toBe('Malformed encoding: offset out of range');
  });

  it('keeps revert details', () => {
    const revert = new ContractRevertError({ reason: 'Insufficient balance', errorName: 'Error', data: '0x08c379a0' });
    expect(revert.message).toBe('Execution reverted: Insufficient balance');
    expect(revert.errorName).toBe('Error');
    const failed = new GasEstimationFailedError(revert.reason, revert);
    expect(failed.revert).toBe(revert);
    expect(failed.code).toBe('GAS_ESTIMATION_FAILED');
  });

  it('names the library a linker error concerns', () => {
    const error = new LinkerError('missing-dependency', 'no address for Math', 'Math');
    expect(error.kind).toBe('missing-dependency');
    expect(error.library).toBe('Math');
    expect(error.name).toBe('LinkerError');
  });

  it('reports the timeout that elapsed', () => {
    const error = new TransactionTimeoutError('0xabc', 500);
    expect(error.message).toBe('Transaction 0xabc not confirmed within 500ms');
    expect(error.timeout).toBe(500);
  });
});
