/**
 * Bounded in-memory request log.
 *
 * Fixed-capacity ring: once full, each new entry overwrites the oldest.
 * A capacity of 0 disables logging.
 */

import type { UsageLogEntry } from '../types/auth.js';

export interface KeyUsageSummary {
  requests: number;
  uniqueEndpoints: number;
  firstRequestAt?: number;
  lastRequestAt?: number;
}

export class UsageLog {
  private readonly capacity: number;
  private readonly buffer: Array<UsageLogEntry | undefined>;
  private head = 0;
  private count = 0;
  private total = 0;

  constructor(capacity: number) {
    this.capacity = Math.max(0, Math.floor(capacity));
    this.buffer = new Array<UsageLogEntry | undefined>(this.capacity);
  }

  record(entry: UsageLogEntry): void {
    this.total += 1;
    if (this.capacity === 0) {
      return;
    }
    this.buffer[this.head] = entry;
    this.head = (this.head + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /**
   * Entries oldest first, optionally restricted to one key.
   */
  entries(keyPrefix?: string): UsageLogEntry[] {
    const result: UsageLogEntry[] = [];
    const start = (this.head - this.count + this.capacity) % Math.max(this.capacity, 1);
    for (let i = 0; i < this.count; i++) {
      const entry = this.buffer[(start + i) % this.capacity];
      if (entry && (keyPrefix === undefined || entry.keyPrefix === keyPrefix)) {
        result.push(entry);
      }
    }
    return result;
  }

  summarize(keyPrefix: string): KeyUsageSummary {
    const entries = this.entries(keyPrefix);
    const endpoints = new Set(entries.map((entry) => entry.endpoint));
    return {
      requests: entries.length,
      uniqueEndpoints: endpoints.size,
      firstRequestAt: entries[0]?.timestamp,
      lastRequestAt: entries[entries.length - 1]?.timestamp,
    };
  }

  get size(): number {
    return this.count;
  }

  /** Entries ever recorded, including overwritten ones */
  get totalRecorded(): number {
    return this.total;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}
