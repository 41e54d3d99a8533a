import type { HistoryEntry } from "../types/context.js";

/**
 * Fixed-capacity cycle history. Entries must arrive in increasing cycle order;
 * once full, the oldest entry is evicted for each new one.
 */
export class CycleHistory {
  private readonly buffer: Array<HistoryEntry | undefined>;
  private start = 0;
  private size = 0;
  private lastCycle = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.buffer = new Array<HistoryEntry | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  /** Returns the evicted entry, if any. */
  push(entry: HistoryEntry): HistoryEntry | undefined {
    if (entry.cycle <= this.lastCycle) {
      throw new RangeError(`History entry for cycle ${entry.cycle} arrived after cycle ${this.lastCycle}`);
    }
    this.lastCycle = entry.cycle;

    if (this.size < this.capacity) {
      this.buffer[(this.start + this.size) % this.capacity] = entry;
      this.size += 1;
      return undefined;
    }

    const evicted = this.buffer[this.start];
    this.buffer[this.start] = entry;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /** Oldest first. */
  entries(): HistoryEntry[] {
    const out: HistoryEntry[] = [];
    for (let i = 0; i < this.size; i += 1) {
      const entry = this.buffer[(this.start + i) % this.capacity];
      if (entry) out.push(entry);
    }
    return out;
  }

  recent(count: number): HistoryEntry[] {
    if (count <= 0) return [];
    const all = this.entries();
    return all.slice(Math.max(0, all.length - count));
  }

  last(): HistoryEntry | undefined {
    return this.size === 0 ? undefined : this.buffer[(this.start + this.size - 1) % this.capacity];
  }
}
