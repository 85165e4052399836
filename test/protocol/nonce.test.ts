import { describe, it, expect, beforeEach } from 'vitest';
import { NonceSequencer, PendingNonceSource } from '../../src/protocol/nonce.js';
import { FakeNode } from '../helpers/fake-node.js';
import { ALICE, BOB } from '../fixtures/erc20.js';

describe('nonces', () => {
  let node: FakeNode;

  beforeEach(() => {
    node = new FakeNode();
    node.setNonce(ALICE, 4);
  });

  describe('PendingNonceSource', () => {
    it('asks the node every time', async () => {
      const source = new PendingNonceSource(node);
      await expect(source.next(ALICE)).resolves.toBe(4);
      await expect(source.next(ALICE)).resolves.toBe(4);
      expect(node.count('getTransactionCount')).toBe(2);
    });
  });

  describe('NonceSequencer', () => {
    it('hands out distinct nonces to concurrent callers', async () => {
      const sequencer = new NonceSequencer(node);
      const nonces = await Promise.all([sequencer.next(ALICE), sequencer.next(ALICE), sequencer.next(ALICE)]);
      expect(nonces).toEqual([4, 5, 6]);
      expect(node.count('getTransactionCount')).toBe(1);
    });

    it('keeps a counter per account regardless of case', async () => {
      const sequencer = new NonceSequencer(node);
      await sequencer.next(ALICE);
      await expect(sequencer.next(BOB)).resolves.toBe(0);
      await expect(sequencer.next(ALICE.toLowerCase() as typeof ALICE)).resolves.toBe(5);
    });

    it('re-reads the node after a reset', async () => {
      const sequencer = new NonceSequencer(node);
      await sequencer.next(ALICE);
      await sequencer.next(BOB);

      node.setNonce(ALICE, 9);
      await sequencer.reset(ALICE);
      await expect(sequencer.next(ALICE)).resolves.toBe(9);
      await expect(sequencer.next(BOB)).resolves.toBe(1);

      node.setNonce(BOB, 3);
      await sequencer.reset();
      await expect(sequencer.next(BOB)).resolves.toBe(3);
    });
  });
});
