import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TransactionPipeline, ConfirmationTracker, resolvePipelineConfig, isTerminal } from '../../src/protocol/pipeline.js';
import type { TransactionState } from '../../src/protocol/pipeline.js';
import { LocalAccount } from '../../src/protocol/account.js';
import { TransactionRequest, parseSignedTransaction } from '../../src/protocol/transaction.js';
import { NonceSequencer } from '../../src/protocol/nonce.js';
import { RPCRequestError } from '../../src/protocol/rpc.js';
import {
  GasEstimationFailedError,
  NodeUnavailableError,
  TransactionDroppedError,
  TransactionRevertedError,
  TransactionTimeoutError,
  ValidationError,
} from '../../src/core/errors.js';
import { keccak256 } from '../../src/core/hash.js';
import { concatHex } from '../../src/core/hex.js';
import { encodeParameters } from '../../src/abi/codec.js';
import { stringType } from '../../src/abi/types.js';
import { FakeNode } from '../helpers/fake-node.js';
import { BOB, TOKEN } from '../fixtures/erc20.js';

const GWEI = 1_000_000_000n;
const fast = { pollInterval: 5, timeout: 2000 };

describe('TransactionPipeline', () => {
  let node: FakeNode;
  let account: LocalAccount;
  let pipeline: TransactionPipeline;

  beforeEach(() => {
    node = new FakeNode();
    account = LocalAccount.fromPrivateKey('0x' + '11'.repeat(32));
    pipeline = new TransactionPipeline({ client: node, account, defaults: fast });
  });

  const transfer = () => new TransactionRequest({ to: TOKEN, data: '0xa9059cbb' });
  const sentHash = () => keccak256(node.sent[0] ?? '0x');

  describe('submission', () => {
    beforeEach(() => {
      node.autoMine = true;
    });

    it('fills gas, fees, nonce and chain id from the node', async () => {
      node.setNonce(account.address, 7);

      const tracker = await pipeline.submit(transfer());
      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');

      expect(transaction.type).toBe('eip1559');
      expect(transaction.nonce).toBe(7);
      expect(transaction.chainId).toBe(1337);
      // 50_000 * 1.2
      expect(transaction.gasLimit).toBe(60_000n);
      expect(transaction.type === 'eip1559' && transaction.maxFeePerGas).toBe(3n * GWEI);
      expect(transaction.type === 'eip1559' && transaction.maxPriorityFeePerGas).toBe(GWEI);
      expect(tracker.hash).toBe(sentHash());
    });

    it('uses legacy pricing on chains without a base fee', async () => {
      node.baseFee = undefined;
      node.gasPrice = 2n * GWEI;
      await pipeline.submit(transfer());

      const { transaction, signature } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction.type).toBe('legacy');
      expect(transaction.type === 'legacy' && transaction.gasPrice).toBe(2n * GWEI);
      expect(signature.v - 1337 * 2 - 35).toBe(signature.yParity);
    });

    it('keeps caller-supplied fields', async () => {
      await pipeline.submit(transfer(), { gasLimit: 100_000n, gasPrice: 5n * GWEI, nonce: 3, value: 9n });

      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction).toMatchObject({ type: 'legacy', gasLimit: 100_000n, gasPrice: 5n * GWEI, nonce: 3, value: 9n });
      expect(node.count('estimateGas')).toBe(0);
      expect(node.count('getTransactionCount')).toBe(0);
    });

    it('keeps a caller fee cap and fills only the missing tip', async () => {
      await pipeline.submit(transfer(), { maxFeePerGas: 100n * GWEI });

      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction).toMatchObject({ type: 'eip1559', maxFeePerGas: 100n * GWEI, maxPriorityFeePerGas: GWEI });
    });

    it('keeps a caller tip and fills only the missing cap', async () => {
      await pipeline.submit(transfer(), { maxPriorityFeePerGas: 2n * GWEI });

      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction).toMatchObject({ type: 'eip1559', maxFeePerGas: 3n * GWEI, maxPriorityFeePerGas: 2n * GWEI });
    });

    it('never lets the filled tip exceed the caller cap', async () => {
      await pipeline.submit(transfer(), { maxFeePerGas: GWEI / 2n });

      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction).toMatchObject({ maxFeePerGas: GWEI / 2n, maxPriorityFeePerGas: GWEI / 2n });
    });

    it('keeps a partial fee-market request on a chain without a base fee', async () => {
      node.baseFee = undefined;
      await pipeline.submit(transfer(), { maxFeePerGas: 5n * GWEI });

      const { transaction } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction).toMatchObject({ type: 'eip1559', maxFeePerGas: 5n * GWEI, maxPriorityFeePerGas: GWEI });
      expect(node.count('getGasPrice')).toBe(0);
    });

    it('signs without a chain id when replay protection is off', async () => {
      await pipeline.submit(transfer(), { type: 'legacy', replayProtection: false });

      const { transaction, signature } = parseSignedTransaction(node.sent[0] ?? '0x');
      expect(transaction.chainId).toBeUndefined();
      expect([27, 28]).toContain(signature.v);
    });

    it('rejects replay protection off for fee-market transactions', async () => {
      await expect(pipeline.submit(transfer(), { replayProtection: false, maxFeePerGas: GWEI, maxPriorityFeePerGas: GWEI })).rejects.toThrow(
        'Only legacy transactions can be signed without replay protection'
      );
    });

    it('rejects a request from another sender', async () => {
      const request = new TransactionRequest({ to: TOKEN, from: BOB });
      await expect(pipeline.submit(request)).rejects.toThrow(ValidationError);
      expect(node.sent).toHaveLength(0);
    });

    it('takes nonces from a shared sequencer', async () => {
      node.setNonce(account.address, 4);
      const nonces = new NonceSequencer(node);
      await Promise.all([pipeline.submit(transfer(), { nonces }), pipeline.submit(transfer(), { nonces })]);

      const used = node.sent.map((raw) => parseSignedTransaction(raw).transaction.nonce).sort();
      expect(used).toEqual([4, 5]);
    });

    it('reports estimation reverts as GasEstimationFailed without sending', async () => {
      const reason = concatHex('0x08c379a0', encodeParameters([stringType], ['not allowed']));
      node.estimateHandler = () => {
        throw new RPCRequestError(3, 'execution reverted: not allowed', reason);
      };

      const error = await pipeline.submit(transfer()).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(GasEstimationFailedError);
      expect(error instanceof GasEstimationFailedError && error.reason).toBe('not allowed');
      expect(node.count('sendRawTransaction')).toBe(0);
    });

    it('never retries sendRawTransaction', async () => {
      node.fail('sendRawTransaction', new NodeUnavailableError('eth_sendRawTransaction', 'socket hang up'));
      await expect(pipeline.submit(transfer())).rejects.toThrow(NodeUnavailableError);
      expect(node.count('sendRawTransaction')).toBe(1);
    });

    it('reports every state in order', async () => {
      const states: TransactionState[] = [];
      const tracker = await pipeline.submit(transfer(), { onStateChange: (s) => states.push(s) });
      await tracker.wait();
      expect(states).toEqual(['building', 'estimating', 'signing', 'submitted', 'pending', 'confirmed']);
    });
  });

  describe('confirmation', () => {
    it('confirms a mined transaction', async () => {
      node.autoMine = true;
      const tracker = await pipeline.submit(transfer());

      const outcome = await tracker.outcome();
      expect(outcome.state).toBe('confirmed');
      expect(outcome.state === 'confirmed' && outcome.confirmations).toBe(1);
      const receipt = await tracker.wait();
      expect(receipt.blockNumber).toBe(101);
      expect(tracker.state).toBe('confirmed');
      expect(tracker.isTerminal).toBe(true);
    });

    it('waits for the requested depth', async () => {
      node.autoMine = true;
      const head = node.getBlockNumber.bind(node);
      vi.spyOn(node, 'getBlockNumber').mockImplementation(() => {
        node.advance();
        return head();
      });

      const tracker = await pipeline.submit(transfer(), { confirmations: 3 });
      const outcome = await tracker.outcome();

      expect(outcome).toMatchObject({ state: 'confirmed', confirmations: 3 });
      expect(outcome.state === 'confirmed' && outcome.receipt.blockNumber).toBe(101);
    });

    it('times out without resubmitting when no receipt appears', async () => {
      const states: TransactionState[] = [];
      const tracker = await pipeline.submit(transfer(), { timeout: 40, onStateChange: (s) => states.push(s) });

      const outcome = await tracker.outcome();
      expect(outcome).toEqual({ state: 'timed-out', hash: tracker.hash });
      expect(tracker.state).toBe('timed-out');
      expect(states.at(-1)).toBe('timed-out');
      expect(node.count('sendRawTransaction')).toBe(1);
      expect(node.count('getTransactionReceipt')).toBeGreaterThan(1);
      await expect(tracker.wait()).rejects.toThrow(TransactionTimeoutError);
      await expect(tracker.wait()).rejects.toThrow(`Transaction ${tracker.hash} not confirmed within 40ms`);
    });

    it('reports a transaction the node forgot as dropped', async () => {
      const tracker = await pipeline.submit(transfer());
      node.drop(tracker.hash);

      expect(await tracker.outcome()).toEqual({ state: 'dropped', hash: tracker.hash });
      await expect(tracker.wait()).rejects.toThrow(TransactionDroppedError);
      expect(node.count('sendRawTransaction')).toBe(1);
    });

    it('confirms a reverted transaction and fails wait()', async () => {
      const tracker = await pipeline.submit(transfer());
      node.mine(tracker.hash, { status: 'reverted' });

      const outcome = await tracker.outcome();
      expect(outcome.state).toBe('confirmed');
      expect(outcome.state === 'confirmed' && outcome.receipt.status).toBe('reverted');
      await expect(tracker.wait()).rejects.toThrow(TransactionRevertedError);
    });

    it('absorbs transient node failures while polling', async () => {
      node.autoMine = true;
      node.fail('getTransactionReceipt', new NodeUnavailableError('eth_getTransactionReceipt', 'ECONNRESET'), 2);

      const tracker = await pipeline.submit(transfer());
      expect((await tracker.outcome()).state).toBe('confirmed');
      expect(node.count('getTransactionReceipt')).toBe(3);
      expect(node.count('sendRawTransaction')).toBe(1);
    });

    it('surfaces permanent node failures while polling', async () => {
      node.fail('getTransactionReceipt', new RPCRequestError(-32602, 'invalid params'));
      const tracker = await pipeline.submit(transfer());
      await expect(tracker.outcome()).rejects.toThrow('invalid params');
    });

    it('follows a receipt that disappears and comes back', async () => {
      node.autoMine = true;
      const states: TransactionState[] = [];
      let reorged = false;
      const onStateChange = (state: TransactionState) => {
        states.push(state);
        if (state === 'pending' && !reorged) {
          reorged = true;
          node.unmine(sentHash());
        } else if (state === 'submitted' && reorged) {
          node.mine(sentHash());
          node.advance();
        }
      };

      const tracker = await pipeline.submit(transfer(), { confirmations: 2, onStateChange });
      const receipt = await tracker.wait();

      expect(receipt.blockNumber).toBe(102);
      expect(states.slice(3)).toEqual(['submitted', 'pending', 'submitted', 'pending', 'confirmed']);
    });
  });
});

describe('ConfirmationTracker', () => {
  it('tracks an already signed transaction', async () => {
    const node = new FakeNode();
    const account = LocalAccount.fromPrivateKey('0x' + '22'.repeat(32));
    const pipeline = new TransactionPipeline({ client: node, account, defaults: fast });
    const first = await pipeline.submit(new TransactionRequest({ to: TOKEN }));
    node.mine(first.hash);

    const tracker = new ConfirmationTracker({ client: node, signed: first.signed, config: fast });
    expect(tracker.state).toBe('submitted');
    await expect(tracker.wait()).resolves.toMatchObject({ transactionHash: first.hash, status: 'success' });
  });
});

describe('pipeline configuration', () => {
  it('applies overrides in order', () => {
    expect(resolvePipelineConfig({ timeout: 10 }, { confirmations: 2 }, undefined)).toEqual({
      pollInterval: 1000,
      timeout: 10,
      confirmations: 2,
    });
  });

  it('rejects invalid values', () => {
    expect(() => resolvePipelineConfig({ pollInterval: 0 })).toThrow('pollInterval must be positive, got 0');
    expect(() => resolvePipelineConfig({ confirmations: 1.5 })).toThrow(ValidationError);
  });

  it('knows the terminal states', () => {
    const terminal: TransactionState[] = ['confirmed', 'dropped', 'timed-out'];
    expect(terminal.every(isTerminal)).toBe(true);
    expect(isTerminal('pending')).toBe(false);
  });
});
