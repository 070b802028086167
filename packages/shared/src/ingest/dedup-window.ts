import type { DedupTitle } from "../types.js";

export interface DedupWindowOptions {
  /** Maximum number of titles kept */
  capacity: number;
  /** Maximum age of an entry in milliseconds */
  maxAgeMs: number;
}

/**
 * Bounded, time-ordered set of recently seen normalized titles.
 *
 * Entries live in a Map, whose iteration order is insertion order, so the
 * oldest entry is always first. Re-adding a title moves it to the end.
 * An entry leaves the window when it is older than `maxAgeMs` or when
 * `capacity` newer entries have arrived, whichever happens first.
 */
export class DedupWindow {
  private readonly entries = new Map<string, DedupTitle>();

  constructor(private readonly options: DedupWindowOptions) {
    if (options.capacity < 1) {
      throw new RangeError("DedupWindow capacity must be at least 1");
    }
  }

  /** Builds a window from persisted rows, in any order */
  static fromEntries(
    rows: DedupTitle[],
    options: DedupWindowOptions,
    now: Date,
  ): DedupWindow {
    const window = new DedupWindow(options);
    const sorted = [...rows].sort((a, b) => a.seenAt.localeCompare(b.seenAt));
    for (const row of sorted) window.insert(row);
    window.evictExpired(now);
    return window;
  }

  get size(): number {
    return this.entries.size;
  }

  has(titleNorm: string, now: Date): boolean {
    this.evictExpired(now);
    return this.entries.has(titleNorm);
  }

  add(titleNorm: string, source: string, now: Date): void {
    this.insert({ titleNorm, source, seenAt: now.toISOString() });
    this.evictExpired(now);
  }

  /** Entries oldest first */
  snapshot(): DedupTitle[] {
    return [...this.entries.values()];
  }

  private insert(entry: DedupTitle): void {
    this.entries.delete(entry.titleNorm);
    this.entries.set(entry.titleNorm, entry);
    while (this.entries.size > this.options.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  private evictExpired(now: Date): void {
    const cutoff = now.getTime() - this.options.maxAgeMs;
    for (const [key, entry] of this.entries) {
      if (Date.parse(entry.seenAt) >= cutoff) break;
      this.entries.delete(key);
    }
  }
}
