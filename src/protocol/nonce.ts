/**
 * Nonce sequencing
 *
 * The pipeline fetches a fresh nonce per transaction; callers sending
 * several transactions concurrently from one account can hand them a
 * NonceSequencer instead so each gets a distinct, increasing nonce.
 */

import type { Address } from '../core/types.js';
import type { NodeClient } from './rpc.js';

/**
 * Simple mutex for async operations
 */
class AsyncMutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next !== undefined) {
      next();
    } else {
      this.locked = false;
    }
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Source of nonces for the signing stage
 */
export interface NonceSource {
  next(address: Address): Promise<number>;
}

/**
 * Node-backed source: `eth_getTransactionCount(address, 'pending')` every time
 */
export class PendingNonceSource implements NonceSource {
  constructor(private readonly client: NodeClient) {}

  next(address: Address): Promise<number> {
    return this.client.getTransactionCount(address, 'pending');
  }
}

/**
 * Serialised local counter per account, seeded from the node on first use
 *
 * ```typescript
 * const nonces = new NonceSequencer(client);
 * await Promise.all([a.transact('mint', [1], { nonces }), a.transact('mint', [2], { nonces })]);
 * ```
 */
export class NonceSequencer implements NonceSource {
  private readonly mutex = new AsyncMutex();
  private readonly counters = new Map<string, number>();

  constructor(private readonly client: NodeClient) {}

  /**
   * Next nonce for `address`; consecutive calls never return the same value
   */
  async next(address: Address): Promise<number> {
    const key = address.toLowerCase();
    return this.mutex.withLock(async () => {
      const nonce = this.counters.get(key) ?? (await this.client.getTransactionCount(address, 'pending'));
      this.counters.set(key, nonce + 1);
      return nonce;
    });
  }

  /**
   * Forget the local counter so the next call re-reads the node,
   * e.g. after a transaction using an allocated nonce was never sent
   */
  async reset(address?: Address): Promise<void> {
    await this.mutex.withLock(async () => {
      if (address === undefined) {
        this.counters.clear();
      } else {
        this.counters.delete(address.toLowerCase());
      }
    });
  }
}
