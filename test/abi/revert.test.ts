import { describe, it, expect } from 'vitest';
import { decodeRevertData, describePanic } from '../../src/abi/revert.js';
import { parseContractDescriptor } from '../../src/abi/descriptor.js';
import { encodeParameters } from '../../src/abi/codec.js';
import { stringType, uintType } from '../../src/abi/types.js';
import { concatHex } from '../../src/core/hex.js';
import { erc20Abi } from '../fixtures/erc20.js';

describe('revert decoding', () => {
  it('decodes Error(string)', () => {
    const data = concatHex('0x08c379a0', encodeParameters([stringType], ['Insufficient balance']));
    expect(decodeRevertData(data)).toEqual({
      reason: 'Insufficient balance',
      data,
      errorName: 'Error',
      args: ['Insufficient balance'],
    });
  });

  it('decodes Panic(uint256)', () => {
    const data = concatHex('0x4e487b71', encodeParameters([uintType()], [0x11n]));
    const info = decodeRevertData(data);
    expect(info.reason).toBe('panic 0x11: arithmetic overflow or underflow');
    expect(info.panicCode).toBe(0x11n);
    expect(describePanic(0x99n)).toBe('panic 0x99');
  });

  it('decodes custom errors declared in the descriptor', () => {
    const descriptor = parseContractDescriptor(erc20Abi);
    const error = descriptor.errors[0];
    if (!error) throw new Error('fixture has no custom error');
    const data = concatHex(error.selector, encodeParameters([uintType(), uintType()], [1n, 5n]));
    const info = decodeRevertData(data, descriptor);
    expect(info.reason).toBe('InsufficientBalance(1, 5)');
    expect(info.errorName).toBe('InsufficientBalance');
    expect(info.args).toEqual([1n, 5n]);
  });

  it('keeps raw data it cannot decode', () => {
    expect(decodeRevertData(undefined)).toEqual({ reason: 'execution reverted without data' });
    expect(decodeRevertData('0x')).toEqual({ reason: 'execution reverted without data' });
    expect(decodeRevertData('0x1234')).toEqual({ reason: 'execution reverted with malformed data', data: '0x1234' });
    expect(decodeRevertData('0xdeadbeef').reason).toBe('execution reverted with unknown error 0xdeadbeef');
    expect(decodeRevertData('0x08c379a000').reason).toBe(
      'execution reverted with undecodable data for selector 0x08c379a0'
    );
  });
});
