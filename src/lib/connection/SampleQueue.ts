/**
 * SampleQueue - Bounded single-producer/single-consumer FIFO of samples.
 *
 * The transport side pushes, the tick loop drains. Slots are pre-allocated;
 * on overflow the oldest sample is discarded and counted, the same policy
 * the byte ring buffers use for stream reassembly.
 */

import type { SensorSample } from "./SensorSample";

const DEFAULT_QUEUE_CAPACITY = 256;

export interface QueueStats {
  length: number;
  capacity: number;
  /** Samples discarded to make room, since the last drain of stats */
  overflowed: number;
}

export class SampleQueue {
  private slots: (SensorSample | undefined)[];
  private capacity: number;
  private head = 0; // write position
  private tail = 0; // read position
  private _size = 0;
  private overflowCount = 0;

  constructor(capacity: number = DEFAULT_QUEUE_CAPACITY) {
    this.capacity = capacity;
    this.slots = new Array<SensorSample | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this._size;
  }

  /** Enqueue; drops the oldest entry when full. Returns false on overflow. */
  push(sample: SensorSample): boolean {
    let kept = true;
    if (this._size === this.capacity) {
      this.slots[this.tail] = undefined;
      this.tail = (this.tail + 1) % this.capacity;
      this._size--;
      this.overflowCount++;
      kept = false;
    }

    this.slots[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;
    this._size++;
    return kept;
  }

  /** Dequeue the oldest sample, or undefined when empty */
  shift(): SensorSample | undefined {
    if (this._size === 0) return undefined;
    const sample = this.slots[this.tail];
    this.slots[this.tail] = undefined;
    this.tail = (this.tail + 1) % this.capacity;
    this._size--;
    return sample;
  }

  /** Oldest sample without removing it */
  peek(): SensorSample | undefined {
    return this._size === 0 ? undefined : this.slots[this.tail];
  }

  /** Reset to empty */
  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this._size = 0;
  }

  getStats(): QueueStats {
    return {
      length: this._size,
      capacity: this.capacity,
      overflowed: this.overflowCount,
    };
  }

  /** Return and reset the overflow counter */
  drainOverflowStats(): { events: number } {
    const stats = { events: this.overflowCount };
    this.overflowCount = 0;
    return stats;
  }
}
