import { describe, it, expect } from 'vitest';
import {
  isAddress,
  assertAddress,
  toChecksumAddress,
  isChecksumValid,
  addressFromBytes,
  addressEquals,
  computeContractAddress,
  ZERO_ADDRESS,
} from '../../src/core/address.js';
import { ValidationError } from '../../src/core/errors.js';
import type { Address } from '../../src/core/types.js';

const CHECKSUMMED = [
  '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed',
  '0xfB6916095ca1df60bB79Ce92cE3Ea74c37c5d359',
  '0xdbF03B407c01E7cD3CBea99509d93f8DDDC8C6FB',
  '0xD1220A0cf47c7B9Be7A2E6BA89F429762e7b9aDb',
];

describe('address', () => {
  describe('isAddress', () => {
    it('accepts 20-byte hex in any case', () => {
      expect(isAddress(ZERO_ADDRESS)).toBe(true);
      expect(isAddress('0x5AAEB6053F3E94C9B9A09F33669435E7EF1BEAED')).toBe(true);
    });

    it('rejects wrong lengths and non-strings', () => {
      expect(isAddress('0x1234')).toBe(false);
      expect(isAddress('5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed00')).toBe(false);
      expect(isAddress(123)).toBe(false);
    });

    it('assertAddress names the field', () => {
      expect(() => assertAddress('0x12', 'recipient')).toThrow(ValidationError);
      expect(() => assertAddress('0x12', 'recipient')).toThrow('recipient must be 0x followed by 40 hex characters');
    });
  });

  describe('EIP-55 checksums', () => {
    it.each(CHECKSUMMED)('checksums %s', (address) => {
      expect(toChecksumAddress(address.toLowerCase())).toBe(address);
      expect(isChecksumValid(address)).toBe(true);
    });

    it('accepts single-case addresses without a checksum', () => {
      expect(isChecksumValid('0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed')).toBe(true);
    });

    it('rejects a wrong mixed-case checksum', () => {
      expect(isChecksumValid('0x5AAeb6053F3E94C9b9A09f33669435E7Ef1BeAed')).toBe(false);
    });
  });

  it('builds addresses from 20 bytes', () => {
    expect(addressFromBytes(new Uint8Array(20))).toBe(ZERO_ADDRESS);
    expect(() => addressFromBytes(new Uint8Array(19))).toThrow(ValidationError);
  });

  it('compares ignoring case', () => {
    expect(addressEquals('0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed', '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed')).toBe(true);
    expect(addressEquals('0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed', ZERO_ADDRESS)).toBe(false);
  });

  describe('computeContractAddress', () => {
    const sender = '0x6ac7ea33f8831ea9dcc53393aaa88b25a785dbf0' as Address;

    it('derives CREATE addresses from sender and nonce', () => {
      expect(computeContractAddress(sender, 0).toLowerCase()).toBe('0xcd234a471b72ba2f1ccf0a70fcaba648a5eecd8d');
      expect(computeContractAddress(sender, 1).toLowerCase()).toBe('0x343c43a37d37dff08ae8c4a11544c718abb4fcf8');
    });

    it('returns checksummed addresses', () => {
      const address = computeContractAddress(sender, 0);
      expect(isChecksumValid(address)).toBe(true);
      expect(address).toBe(toChecksumAddress(address));
    });
  });
});
