/**
 * Event streams over a node: historical queries and live subscriptions
 */

import type { Address, BlockTag, Hex, Log } from '../core/types.js';
import { ArgumentMismatchError, ValidationError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { createPrefixedLogger, noopLogger } from '../core/logger.js';
import type { ContractDescriptor, EventDescriptor } from '../abi/descriptor.js';
import type { DecodedEvent, EventFilterArgs, TopicFilter } from '../abi/events.js';
import { decodeEventLog, encodeEventTopics, eventArgsToRecord, scanLogs } from '../abi/events.js';
import { isSignature, normalizeSignature } from '../abi/signature.js';
import type { LogFilter, NodeClient } from './rpc.js';
import { isTransientNodeFailure } from './rpc.js';

export const DEFAULT_CHUNK_SIZE = 5000;

/**
 * Which logs to read. Without `event`, every event of the descriptor is
 * decoded and logs with an unknown topic[0] are skipped.
 */
export interface EventSelection {
  address?: Address | Address[];
  /** Event name or signature */
  event?: string;
  /** Indexed parameter filter, positional or by name; requires `event` */
  args?: EventFilterArgs;
}

export interface EventQueryOptions extends EventSelection {
  fromBlock?: BlockTag;
  toBlock?: BlockTag;
  /** Blocks per eth_getLogs request (default: 5000) */
  chunkSize?: number;
  logger?: Logger;
}

export interface SubscriptionOptions extends EventSelection {
  /** Delay between polls in ms (default: 1000) */
  pollInterval?: number;
  /** First block to deliver; defaults to the block after the current head */
  fromBlock?: number;
  /** Install a node filter; false forces block-range polling (default: true) */
  useFilter?: boolean;
  logger?: Logger;
}

/**
 * Find an event by name or signature. A bare name must be unique.
 */
export function resolveEvent(descriptor: ContractDescriptor, nameOrSignature: string): EventDescriptor {
  if (isSignature(nameOrSignature)) {
    const signature = normalizeSignature(nameOrSignature);
    const event = descriptor.events.find((e) => e.signature === signature);
    if (!event) throw new ArgumentMismatchError(`no event with signature ${signature}`);
    return event;
  }
  const matches = descriptor.eventsByName(nameOrSignature);
  const [only, ...rest] = matches;
  if (only === undefined) {
    throw new ArgumentMismatchError(`no event named "${nameOrSignature}"`);
  }
  if (rest.length > 0) {
    throw new ArgumentMismatchError(`event "${nameOrSignature}" is overloaded; pass its signature`, {
      candidates: matches.map((e) => e.signature),
    });
  }
  return only;
}

interface CompiledSelection {
  readonly address: Address | Address[] | undefined;
  readonly topics: TopicFilter | undefined;
  decode(logs: ReadonlyArray<Log>): Iterable<DecodedEvent>;
}

function compileSelection(descriptor: ContractDescriptor, selection: EventSelection): CompiledSelection {
  const { address } = selection;
  if (selection.event === undefined) {
    if (selection.args !== undefined) {
      throw new ValidationError('Event arguments can only be filtered together with an event');
    }
    return {
      address,
      topics: undefined,
      decode: (logs) => scanLogs(descriptor, logs.filter((log) => !log.removed)),
    };
  }

  const event = resolveEvent(descriptor, selection.event);
  return {
    address,
    topics: encodeEventTopics(event, selection.args),
    *decode(logs) {
      for (const log of logs) {
        if (log.removed) continue;
        yield { event, args: eventArgsToRecord(event, decodeEventLog(event, log)), log };
      }
    },
  };
}

function logFilter(selection: CompiledSelection, fromBlock: number, toBlock: number): LogFilter {
  const filter: LogFilter = { fromBlock, toBlock };
  if (selection.address !== undefined) filter.address = selection.address;
  if (selection.topics !== undefined) filter.topics = selection.topics;
  return filter;
}

async function resolveBlock(block: BlockTag, head: () => Promise<number>): Promise<number> {
  if (typeof block === 'number') return block;
  if (block === 'earliest') return 0;
  return head();
}

/**
 * Historical events over a block range, fetched lazily in chunks. Nothing
 * is requested until iteration starts and each chunk is fetched only when
 * the previous one has been consumed.
 *
 * ```typescript
 * for await (const { args, log } of queryEvents(client, descriptor, { event: 'Transfer', fromBlock: 0 })) {
 *   console.log(log.blockNumber, args.from, args.to, args.value);
 * }
 * ```
 */
export async function* queryEvents(
  client: NodeClient,
  descriptor: ContractDescriptor,
  options: EventQueryOptions = {}
): AsyncGenerator<DecodedEvent> {
  const selection = compileSelection(descriptor, options);
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  const logger = createPrefixedLogger(options.logger ?? noopLogger, 'events');

  let cachedHead: number | undefined;
  const head = async (): Promise<number> => {
    cachedHead ??= await client.getBlockNumber();
    return cachedHead;
  };
  const from = await resolveBlock(options.fromBlock ?? 'earliest', head);
  const to = await resolveBlock(options.toBlock ?? 'latest', head);

  for (let start = from; start <= to; start += chunkSize) {
    const end = Math.min(start + chunkSize - 1, to);
    const logs = await client.getLogs(logFilter(selection, start, end));
    logger.debug('Fetched logs', { fromBlock: start, toBlock: end, count: logs.length });
    yield* selection.decode(logs);
  }
}

/**
 * Live event stream. Polls a node filter, or block ranges where the node
 * offers no filters, until cancelled. Iterate it once.
 */
export class EventSubscription implements AsyncIterable<DecodedEvent> {
  private readonly client: NodeClient;
  private readonly selection: CompiledSelection;
  private readonly pollInterval: number;
  private readonly logger: Logger;
  private readonly iterator: AsyncGenerator<DecodedEvent>;

  private useFilter: boolean;
  private filterId: Hex | undefined;
  private nextBlock: number | undefined;
  private cancelled = false;
  private wake: (() => void) | undefined;

  constructor(client: NodeClient, descriptor: ContractDescriptor, options: SubscriptionOptions = {}) {
    this.client = client;
    this.selection = compileSelection(descriptor, options);
    this.pollInterval = options.pollInterval ?? 1000;
    if (!(this.pollInterval > 0)) {
      throw new ValidationError(`pollInterval must be positive, got ${this.pollInterval}`);
    }
    this.useFilter = options.useFilter ?? true;
    this.nextBlock = options.fromBlock;
    this.logger = createPrefixedLogger(options.logger ?? noopLogger, 'subscription');
    this.iterator = this.run();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Id of the installed node filter, if any */
  get filter(): Hex | undefined {
    return this.filterId;
  }

  [Symbol.asyncIterator](): AsyncGenerator<DecodedEvent> {
    return this.iterator;
  }

  /**
   * Stop polling and uninstall the node filter. Safe to call repeatedly.
   */
  async cancel(): Promise<void> {
    if (!this.cancelled) {
      this.cancelled = true;
      this.logger.debug('Subscription cancelled', { filterId: this.filterId });
      this.wake?.();
    }
    await this.release();
  }

  private async *run(): AsyncGenerator<DecodedEvent> {
    try {
      while (!this.cancelled) {
        const logs = await this.poll();
        for (const decoded of this.selection.decode(logs)) {
          if (this.cancelled) return;
          yield decoded;
        }
        await this.pause();
      }
    } finally {
      await this.release();
    }
  }

  private async poll(): Promise<Log[]> {
    try {
      if (this.useFilter) {
        return await this.pollFilter();
      }
      return await this.pollBlocks();
    } catch (error) {
      if (!isTransientNodeFailure(error)) throw error;
      this.logger.warn('Node unavailable while polling events, retrying', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private async pollFilter(): Promise<Log[]> {
    if (this.filterId === undefined) {
      const filter = this.initialFilter();
      try {
        this.filterId = await this.client.newFilter(filter);
      } catch (error) {
        if (isTransientNodeFailure(error)) throw error;
        this.logger.warn('Node filters unavailable, polling block ranges', {
          error: error instanceof Error ? error.message : String(error),
        });
        this.useFilter = false;
        return this.pollBlocks();
      }
      this.logger.debug('Filter installed', { filterId: this.filterId });
      if (this.cancelled) return [];
      // Logs already in the requested range are not reported as changes
      if (filter.fromBlock !== undefined) {
        return this.client.getLogs({ ...filter, toBlock: await this.client.getBlockNumber() });
      }
    }
    return this.client.getFilterChanges(this.filterId);
  }

  private initialFilter(): LogFilter {
    const filter: LogFilter = { toBlock: 'latest' };
    if (this.selection.address !== undefined) filter.address = this.selection.address;
    if (this.selection.topics !== undefined) filter.topics = this.selection.topics;
    if (this.nextBlock !== undefined) {
      filter.fromBlock = this.nextBlock;
    }
    return filter;
  }

  private async pollBlocks(): Promise<Log[]> {
    const head = await this.client.getBlockNumber();
    if (this.nextBlock === undefined) {
      this.nextBlock = head + 1;
      return [];
    }
    if (head < this.nextBlock) return [];
    const logs = await this.client.getLogs(logFilter(this.selection, this.nextBlock, head));
    this.nextBlock = head + 1;
    return logs;
  }

  private pause(): Promise<void> {
    if (this.cancelled) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, this.pollInterval);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }

  private async release(): Promise<void> {
    const id = this.filterId;
    if (id === undefined) return;
    this.filterId = undefined;
    try {
      await this.client.uninstallFilter(id);
      this.logger.debug('Filter uninstalled', { filterId: id });
    } catch (error) {
      this.logger.warn('Failed to uninstall filter', {
        filterId: id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Subscribe to events. The stream ends when `cancel()` is called or the
 * consumer stops iterating; either way the node filter is uninstalled.
 */
export function subscribeEvents(
  client: NodeClient,
  descriptor: ContractDescriptor,
  options: SubscriptionOptions = {}
): EventSubscription {
  return new EventSubscription(client, descriptor, options);
}
