/**
 * Secure Key Management
 * Key material lives in an owned Uint8Array and is only exposed through scoped callbacks
 */

import type { Hex } from './types.js';
import { hexToBytes } from './hex.js';
import { ValidationError } from './errors.js';

/**
 * SecureKey wraps a private key with scoped access and explicit disposal.
 *
 * ```typescript
 * const key = SecureKey.fromHex(privateKeyHex);
 * const signature = key.use((bytes) => sign(hash, bytes));
 * key.dispose();
 * ```
 */
export class SecureKey {
  private readonly bytes: Uint8Array;
  private disposed = false;

  private constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes);
  }

  static fromHex(hex: string): SecureKey {
    const bytes = hexToBytes(hex.startsWith('0x') ? hex : `0x${hex}`);
    try {
      return new SecureKey(bytes);
    } finally {
      bytes.fill(0);
    }
  }

  static fromBytes(bytes: Uint8Array): SecureKey {
    return new SecureKey(bytes);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Run `fn` with a temporary copy of the key. The copy is zeroed on every exit
   * path, including a throwing callback.
   */
  use<T>(fn: (keyBytes: Uint8Array) => T): T {
    if (this.disposed) {
      throw new ValidationError('SecureKey has been disposed and cannot be used');
    }
    const copy = new Uint8Array(this.bytes);
    try {
      return fn(copy);
    } finally {
      copy.fill(0);
    }
  }

  /**
   * Zero the key material. Further use throws.
   */
  dispose(): void {
    if (this.disposed) return;
    this.bytes.fill(0);
    this.disposed = true;
  }
}

/**
 * Build a key from `hex`, run `fn`, and dispose the key afterwards
 */
export function withSecureKey<T>(hex: Hex, fn: (key: SecureKey) => T): T {
  const key = SecureKey.fromHex(hex);
  try {
    return fn(key);
  } finally {
    key.dispose();
  }
}
