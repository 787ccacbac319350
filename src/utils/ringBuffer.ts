/**
 * Fixed-capacity circular store of recent samples for the waveform display.
 *
 * Oldest samples are overwritten first. Reads always return ordered copies, so
 * a reader never sees a half-written block.
 */

import { ConfigurationError } from '../errors';

export class RingBuffer {
  private readonly data: Float32Array;
  private writeIndex = 0;
  private filled = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ConfigurationError('capacity', `must be a positive integer, got ${capacity}`);
    }
    this.data = new Float32Array(capacity);
  }

  get capacity(): number {
    return this.data.length;
  }

  /** Number of valid samples, never more than capacity. */
  get length(): number {
    return this.filled;
  }

  /**
   * Appends `samples`. When the input is longer than the buffer only its
   * trailing `capacity` samples are kept.
   */
  push(samples: ArrayLike<number>): void {
    const capacity = this.data.length;
    const n = samples.length;
    if (n === 0) return;

    const skip = Math.max(0, n - capacity);
    const count = n - skip;

    // Split the write at the wrap point
    const firstPart = Math.min(count, capacity - this.writeIndex);
    for (let i = 0; i < firstPart; i++) {
      this.data[this.writeIndex + i] = samples[skip + i];
    }
    for (let i = firstPart; i < count; i++) {
      this.data[i - firstPart] = samples[skip + i];
    }

    this.writeIndex = (this.writeIndex + count) % capacity;
    this.filled = Math.min(capacity, this.filled + count);
  }

  /** Ordered copy of the whole buffer content, oldest first. */
  snapshot(): Float32Array {
    return this.latest(this.filled);
  }

  /** Ordered copy of the most recent `count` samples (fewer if not yet filled). */
  latest(count: number): Float32Array {
    const n = Math.max(0, Math.min(Math.floor(count), this.filled));
    const out = new Float32Array(n);
    const start = this.writeIndex - n;

    if (start >= 0) {
      out.set(this.data.subarray(start, this.writeIndex));
    } else {
      // Wrap
      const head = this.data.subarray(this.data.length + start);
      out.set(head);
      out.set(this.data.subarray(0, this.writeIndex), head.length);
    }
    return out;
  }

  clear(): void {
    this.data.fill(0);
    this.writeIndex = 0;
    this.filled = 0;
  }
}
