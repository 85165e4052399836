import { describe, it, expect, expectTypeOf, beforeEach } from 'vitest';
import { bindContract } from '../../src/protocol/typed-contract.js';
import { LocalAccount } from '../../src/protocol/account.js';
import type { PendingTransaction } from '../../src/protocol/pipeline.js';
import { DescriptorCache } from '../../src/abi/descriptor-cache.js';
import { encodeParameters } from '../../src/abi/codec.js';
import { stringType, uintType } from '../../src/abi/types.js';
import { selectorOf, topicOf } from '../../src/core/hash.js';
import type { Address, Hex } from '../../src/core/types.js';
import { FakeNode } from '../helpers/fake-node.js';
import { ALICE, BOB, TOKEN, erc20Abi, overloadedTokenAbi } from '../fixtures/erc20.js';

const TRANSFER = topicOf('Transfer(address,address,uint256)');
const pad = (address: string): Hex => `0x${address.slice(2).toLowerCase().padStart(64, '0')}`;
const word = (value: bigint): Hex => encodeParameters([uintType()], [value]);

describe('bindContract', () => {
  const account = LocalAccount.fromPrivateKey('0x' + '11'.repeat(32));
  let node: FakeNode;

  beforeEach(() => {
    node = new FakeNode();
  });

  describe('read', () => {
    it('calls view functions and decodes their results', async () => {
      const token = bindContract({ abi: erc20Abi, address: TOKEN, client: node });
      node.callHandler = (request) => {
        if (request.data?.startsWith(selectorOf('balanceOf(address)'))) return word(1000n);
        if (request.data === selectorOf('decimals()')) return word(18n);
        return encodeParameters([stringType], ['Test Token']);
      };

      const balance = await token.read.balanceOf([ALICE]);
      expectTypeOf(balance).toEqualTypeOf<bigint>();
      expect(balance).toBe(1000n);

      const decimals = await token.read.decimals();
      expectTypeOf(decimals).toEqualTypeOf<number>();
      expect(decimals).toBe(18);
      await expect(token.read.name()).resolves.toBe('Test Token');
    });

    it('exposes only view functions', () => {
      const token = bindContract({ abi: erc20Abi, address: TOKEN, client: node });
      expect('balanceOf' in token.read).toBe(true);
      expect('transfer' in token.read).toBe(false);
      expect('transfer' in token.write).toBe(true);
      expect('balanceOf' in token.encode).toBe(true);
    });
  });

  describe('write', () => {
    it('submits transactions through the account', async () => {
      node.autoMine = true;
      const token = bindContract({ abi: erc20Abi, address: TOKEN, client: node, account, defaults: { pollInterval: 5 } });

      const pending = await token.write.transfer([BOB, 5n]);
      expectTypeOf(pending).toEqualTypeOf<PendingTransaction>();
      await expect(pending.wait()).resolves.toMatchObject({ status: 'success', to: TOKEN });
      expect(node.sent).toHaveLength(1);
    });

    it('prepares the same request it would send', () => {
      const token = bindContract({ abi: erc20Abi, address: TOKEN, client: node, account });
      const request = token.prepare.approve([BOB, 10n], { gasLimit: 70_000n });
      expect(request.data).toBe(token.encode.approve([BOB, 10n]));
      expect(request.from).toBe(account.address);
      expect(request.gasLimit).toBe(70_000n);
    });
  });

  describe('events', () => {
    const token = () => bindContract({ abi: erc20Abi, address: TOKEN, client: node });

    it('builds topic filters from named arguments', () => {
      expect(token().events.Transfer.topics({ from: ALICE })).toEqual([TRANSFER, pad(ALICE)]);
    });

    it('decodes logs into typed records', () => {
      const args = token().events.Transfer.decode({ topics: [TRANSFER, pad(ALICE), pad(BOB)], data: word(3n) });
      expectTypeOf(args).toEqualTypeOf<{ from: Address; to: Address; value: bigint }>();
      expect(args).toEqual({ from: ALICE, to: BOB, value: 3n });
    });

    it('queries history for one event', async () => {
      node.emit({ address: TOKEN, topics: [TRANSFER, pad(ALICE), pad(BOB)], data: word(1n), blockNumber: 10 });
      node.emit({ address: TOKEN, topics: [topicOf('Approval(address,address,uint256)'), pad(ALICE), pad(BOB)], data: word(2n), blockNumber: 11 });

      const values: bigint[] = [];
      for await (const { args } of token().events.Transfer.query({ fromBlock: 0 })) {
        values.push(args.value);
      }
      expect(values).toEqual([1n]);
      expect(node.logQueries[0]?.address).toBe(TOKEN);
    });
  });

  describe('overloads and aliases', () => {
    it('keys overloads by generated name', () => {
      const token = bindContract({ abi: overloadedTokenAbi, address: TOKEN, client: node });
      expect(token.encode.transfer_address_uint256_bytes([BOB, 1n, '0xbeef']).slice(0, 10)).toBe(
        selectorOf('transfer(address,uint256,bytes)')
      );
      expect('transfer' in token.write).toBe(false);
      expect('transfer_address_uint256' in token.write).toBe(true);
    });

    it('uses aliases keyed by signature', () => {
      const token = bindContract({
        abi: overloadedTokenAbi,
        address: TOKEN,
        client: node,
        aliases: { 'transfer(address,uint256,bytes)': 'transferAndCall' },
      });
      expect(token.encode.transferAndCall([BOB, 1n, '0x'])).toBe(
        token.instance.encode('transfer(address,uint256,bytes)', [BOB, 1n, '0x'])
      );
    });
  });

  it('shares descriptors through a cache', () => {
    const cache = new DescriptorCache();
    const a = bindContract({ abi: erc20Abi, address: TOKEN, client: node, cache });
    const b = bindContract({ abi: erc20Abi, address: ALICE, client: node, cache });
    expect(a.instance.descriptor).toBe(b.instance.descriptor);
    expect(cache.size).toBe(1);
  });
});
