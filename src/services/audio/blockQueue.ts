/**
 * BlockQueue – bounded single-producer/single-consumer channel of AudioBlocks.
 *
 * The producer side never waits: when the queue is full the oldest pending
 * block is discarded to make room (freshness over completeness). The consumer
 * awaits `next()`, which resolves in arrival order and with null once closed.
 */

import { ConfigurationError } from '../../errors';
import type { AudioBlock } from '../../types';

export class BlockQueue {
  readonly capacity: number;
  private readonly pending: AudioBlock[] = [];
  private waiter: ((block: AudioBlock | null) => void) | null = null;
  private dropped = 0;
  private isClosed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError('queueCapacity', `must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Blocks waiting for the consumer */
  get size(): number {
    return this.pending.length;
  }

  /** Total blocks discarded because the queue was full */
  get droppedCount(): number {
    return this.dropped;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueues a block without waiting.
   *
   * @returns The block dropped to make room, or null when nothing was dropped.
   *   Pushing to a closed queue discards `block` itself and returns null.
   */
  push(block: AudioBlock): AudioBlock | null {
    if (this.isClosed) return null;

    // Consumer already waiting: hand over directly
    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(block);
      return null;
    }

    let evicted: AudioBlock | null = null;
    if (this.pending.length >= this.capacity) {
      evicted = this.pending.shift() ?? null;
      this.dropped++;
    }
    this.pending.push(block);
    return evicted;
  }

  /**
   * Resolves with the oldest pending block, waiting for one if the queue is
   * empty. Resolves with null once the queue is closed.
   */
  next(): Promise<AudioBlock | null> {
    const block = this.pending.shift();
    if (block !== undefined) return Promise.resolve(block);
    if (this.isClosed) return Promise.resolve(null);
    if (this.waiter !== null) {
      return Promise.reject(new Error('BlockQueue supports a single consumer'));
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  /** Discards pending blocks and wakes a waiting consumer with null. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.pending.length = 0;
    if (this.waiter !== null) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}
