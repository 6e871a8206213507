import type { Receiver, Sample } from "@scrape-supervisor/shared";

const DEFAULT_MAX_ENTRIES = 10_000;

/** Keeps the most recent samples in memory (ring buffer) */
export class MemoryReceiver implements Receiver {
  private samples: Sample[] = [];
  private maxEntries: number;

  constructor(maxEntries = DEFAULT_MAX_ENTRIES) {
    this.maxEntries = maxEntries;
  }

  async append(samples: Sample[]): Promise<void> {
    // Only the tail of an oversized batch can survive the trim
    const start = Math.max(0, samples.length - this.maxEntries);
    for (let i = start; i < samples.length; i++) {
      this.samples.push(samples[i]);
    }
    if (this.samples.length > this.maxEntries) {
      this.samples.splice(0, this.samples.length - this.maxEntries);
    }
  }

  /** The newest `limit` samples, oldest first */
  latest(limit = this.maxEntries): Sample[] {
    return limit > 0 ? this.samples.slice(-limit) : [];
  }

  get size(): number {
    return this.samples.length;
  }
}
