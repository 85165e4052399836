/**
 * Descriptor cache
 *
 * Parsing an ABI is pure, so descriptors can be shared between every
 * instance built from the same document. The cache is an ordinary object
 * passed to whoever needs it; there is no process-wide instance.
 */

import { keccak256 } from '../core/hash.js';
import { LRUCache } from '../core/cache.js';
import type { Logger } from '../core/logger.js';
import { noopLogger } from '../core/logger.js';
import type { Hash } from '../core/types.js';
import { ContractDescriptor, readAbiJson } from './descriptor.js';

export interface DescriptorCacheOptions {
  /** Maximum number of descriptors kept (default: 256) */
  maxSize?: number;
  logger?: Logger;
}

export class DescriptorCache {
  private readonly entries: LRUCache<Hash, ContractDescriptor>;
  private readonly logger: Logger;

  constructor(options: DescriptorCacheOptions = {}) {
    this.entries = new LRUCache({ maxSize: options.maxSize ?? 256 });
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Descriptor for `abi` (anything `parseContractDescriptor` accepts).
   * Equivalent documents share one descriptor. Throws InvalidAbiError.
   */
  get(abi: unknown): ContractDescriptor {
    const items = readAbiJson(abi);
    const key = keccak256(JSON.stringify(items));
    const cached = this.entries.get(key);
    if (cached) {
      this.logger.debug('Descriptor cache hit', { key });
      return cached;
    }
    const descriptor = new ContractDescriptor(items);
    this.entries.set(key, descriptor);
    this.logger.debug('Descriptor cached', { key, functions: descriptor.functions.length });
    return descriptor;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
