import { describe, it, expect } from 'vitest';
import {
  TransactionRequest,
  parseSignedTransaction,
  recoverTransactionSender,
  signTransaction,
  signingHash,
} from '../../src/protocol/transaction.js';
import { LocalAccount } from '../../src/protocol/account.js';
import { MalformedEncodingError, ValidationError } from '../../src/core/errors.js';
import type { EIP1559Transaction, LegacyTransaction } from '../../src/core/types.js';
import { BOB, TOKEN } from '../fixtures/erc20.js';

const GWEI = 1_000_000_000n;

describe('TransactionRequest', () => {
  it('merges fields and ignores undefined values', () => {
    const request = new TransactionRequest({ to: TOKEN, value: 1n });
    request.set({ value: undefined, nonce: 3 });
    expect(request.value).toBe(1n);
    expect(request.nonce).toBe(3);
    expect(request.isContractCreation).toBe(false);
    expect(new TransactionRequest().isContractCreation).toBe(true);
  });

  it('infers the transaction type from its fee fields', () => {
    expect(new TransactionRequest().transactionType).toBe('legacy');
    expect(new TransactionRequest({ maxFeePerGas: GWEI }).transactionType).toBe('eip1559');
    expect(new TransactionRequest({ type: 'legacy', maxFeePerGas: GWEI }).transactionType).toBe('legacy');
  });

  it('knows when fees are complete', () => {
    expect(new TransactionRequest({ gasPrice: GWEI }).hasFees()).toBe(true);
    expect(new TransactionRequest({ maxFeePerGas: GWEI }).hasFees()).toBe(false);
    expect(new TransactionRequest({ maxFeePerGas: GWEI, maxPriorityFeePerGas: 1n }).hasFees()).toBe(true);
  });

  it('lists missing fields', () => {
    expect(new TransactionRequest().missing()).toEqual(['nonce', 'gasLimit', 'gasPrice']);
    expect(new TransactionRequest({ type: 'eip1559', nonce: 0 }).missing()).toEqual([
      'gasLimit',
      'maxFeePerGas',
      'maxPriorityFeePerGas',
      'chainId',
    ]);
  });

  it('refuses to finalize an incomplete request', () => {
    expect(() => new TransactionRequest({ nonce: 1 }).finalize()).toThrow(ValidationError);
    expect(() => new TransactionRequest({ nonce: 1 }).finalize()).toThrow(
      'Transaction request is missing gasLimit, gasPrice'
    );
  });

  it('finalizes into a frozen transaction with defaults', () => {
    const tx = new TransactionRequest({
      to: TOKEN,
      nonce: 2,
      chainId: 1,
      gasLimit: 21_000n,
      maxFeePerGas: 3n * GWEI,
      maxPriorityFeePerGas: GWEI,
    }).finalize();

    expect(tx).toEqual({
      to: TOKEN,
      value: 0n,
      data: '0x',
      nonce: 2,
      chainId: 1,
      gasLimit: 21_000n,
      type: 'eip1559',
      maxFeePerGas: 3n * GWEI,
      maxPriorityFeePerGas: GWEI,
    });
    expect(Object.isFrozen(tx)).toBe(true);
  });

  it('builds call requests without fee fields', () => {
    const request = new TransactionRequest({ from: BOB, to: TOKEN, data: '0x1234', gasPrice: GWEI, nonce: 1 });
    expect(request.toCallRequest()).toEqual({ from: BOB, to: TOKEN, data: '0x1234' });
  });
});

describe('signing', () => {
  const account = LocalAccount.fromPrivateKey('0x' + '11'.repeat(32));

  const eip1559: EIP1559Transaction = {
    type: 'eip1559',
    chainId: 1337,
    nonce: 7,
    to: TOKEN,
    value: 5n,
    data: '0xa9059cbb',
    gasLimit: 60_000n,
    maxFeePerGas: 3n * GWEI,
    maxPriorityFeePerGas: GWEI,
  };

  it('round-trips an EIP-1559 transaction', async () => {
    const signed = await signTransaction(eip1559, account);
    expect(signed.raw.startsWith('0x02')).toBe(true);
    expect(signed.signature.v).toBe(signed.signature.yParity);

    const parsed = parseSignedTransaction(signed.raw);
    expect(parsed.hash).toBe(signed.hash);
    expect(parsed.transaction).toEqual(eip1559);
    expect(parsed.signature).toEqual(signed.signature);
    expect(recoverTransactionSender(parsed)).toBe(account.address);
  });

  it('applies EIP-155 to legacy transactions with a chain id', async () => {
    const tx: LegacyTransaction = { type: 'legacy', chainId: 5, nonce: 0, to: BOB, value: 1n, data: '0x', gasLimit: 21_000n, gasPrice: GWEI };
    const signed = await signTransaction(tx, account);

    expect(signed.signature.v).toBe(5 * 2 + 35 + signed.signature.yParity);
    const parsed = parseSignedTransaction(signed.raw);
    expect(parsed.transaction).toEqual(tx);
    expect(recoverTransactionSender(parsed)).toBe(account.address);
  });

  it('signs legacy transactions without replay protection', async () => {
    const tx: LegacyTransaction = { type: 'legacy', nonce: 0, value: 0n, data: '0x6080', gasLimit: 100_000n, gasPrice: GWEI };
    const signed = await signTransaction(tx, account);

    expect(signed.signature.v).toBe(27 + signed.signature.yParity);
    const parsed = parseSignedTransaction(signed.raw);
    expect(parsed.transaction.chainId).toBeUndefined();
    expect(parsed.transaction.to).toBeUndefined();
    expect(recoverTransactionSender(parsed)).toBe(account.address);
  });

  it('hashes differently with and without a chain id', () => {
    const tx: LegacyTransaction = { type: 'legacy', nonce: 0, gasLimit: 21_000n, gasPrice: GWEI };
    expect(signingHash(tx)).not.toBe(signingHash({ ...tx, chainId: 1 }));
  });

  it('rejects malformed raw transactions', () => {
    expect(() => parseSignedTransaction('0xc0')).toThrow(MalformedEncodingError);
    expect(() => parseSignedTransaction('0x02c0')).toThrow('Malformed encoding: invalid EIP-1559 transaction');
  });
});
