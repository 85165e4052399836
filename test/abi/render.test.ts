import { describe, it, expect } from 'vitest';
import { renderBindings } from '../../src/abi/render.js';
import { generateBindings } from '../../src/abi/binding.js';
import { parseContractDescriptor } from '../../src/abi/descriptor.js';
import { erc20Abi, overloadedTokenAbi } from '../fixtures/erc20.js';

describe('renderBindings', () => {
  const source = renderBindings(generateBindings(parseContractDescriptor(erc20Abi)), { name: 'Token' });
  const lines = source.split('\n');

  it('imports only the support types it uses', () => {
    expect(lines[0]).toBe("import type { Address, CallOptions, PendingTransaction, SendOptions } from 'ethbind';");
  });

  it('emits read methods with decoded return types', () => {
    expect(lines).toContain('export interface TokenRead {');
    expect(lines).toContain('  /** balanceOf(address) 0x70a08231 */');
    expect(lines).toContain('  balanceOf(account: Address, options?: CallOptions): Promise<bigint>;');
    expect(lines).toContain('  decimals(options?: CallOptions): Promise<number>;');
  });

  it('emits write methods returning pending transactions', () => {
    expect(lines).toContain(
      '  transfer(to: Address, amount: number | bigint, options?: SendOptions): Promise<PendingTransaction>;'
    );
  });

  it('emits event records', () => {
    expect(lines).toContain('  Transfer: { from: Address; to: Address; value: bigint };');
  });

  it('uses generated names for overloads', () => {
    const overloaded = renderBindings(generateBindings(parseContractDescriptor(overloadedTokenAbi)), {
      name: 'Payable',
      importFrom: './support.js',
    });
    expect(overloaded).toContain(
      '  transfer_address_uint256_bytes(to: Address, amount: number | bigint, data: Hex | Uint8Array, options?: SendOptions): Promise<PendingTransaction>;'
    );
    expect(overloaded.split('\n')[0]).toBe(
      "import type { Address, CallOptions, Hex, PendingTransaction, SendOptions } from './support.js';"
    );
  });

  it('rejects prefixes that are not identifiers', () => {
    expect(() => renderBindings(generateBindings(parseContractDescriptor(erc20Abi)), { name: 'My Token' })).toThrow(
      TypeError
    );
  });
});
