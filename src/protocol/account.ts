/**
 * Signing accounts
 */

import * as secp256k1 from '@noble/secp256k1';
import type { Address, Hash, Signature } from '../core/types.js';
import { isValidPrivateKey, privateKeyToAddress, sign } from '../core/signature.js';
import { SecureKey } from '../core/secure-key.js';
import { ValidationError } from '../core/errors.js';

/**
 * Signing boundary used by the transaction pipeline
 */
export interface Account {
  readonly address: Address;
  sign(hash: Hash): Signature | Promise<Signature>;
}

/**
 * Account backed by a private key held in a SecureKey. Every signature uses
 * a scoped copy of the key that is zeroed before `sign` returns.
 */
export class LocalAccount implements Account {
  readonly address: Address;
  private readonly key: SecureKey;

  private constructor(key: SecureKey) {
    const address = key.use((bytes) => {
      if (!isValidPrivateKey(bytes)) {
        throw new ValidationError('Invalid private key');
      }
      return privateKeyToAddress(bytes);
    });
    this.key = key;
    this.address = address;
  }

  static fromPrivateKey(privateKey: string): LocalAccount {
    return new LocalAccount(SecureKey.fromHex(privateKey));
  }

  static fromSecureKey(key: SecureKey): LocalAccount {
    return new LocalAccount(key);
  }

  /**
   * Generate a new random account
   */
  static generate(): LocalAccount {
    const bytes = secp256k1.utils.randomPrivateKey();
    try {
      return new LocalAccount(SecureKey.fromBytes(bytes));
    } finally {
      bytes.fill(0);
    }
  }

  sign(hash: Hash): Signature {
    return this.key.use((bytes) => sign(hash, bytes));
  }

  get isDisposed(): boolean {
    return this.key.isDisposed;
  }

  /**
   * Zero the key. The account cannot sign afterwards.
   */
  dispose(): void {
    this.key.dispose();
  }
}
