import type { Snapshot } from '@inputtally/types';
import { categorize } from './classifier';
import { freezeSnapshot } from './snapshot';

/**
 * In-memory counters for the current delivery window: three category totals
 * plus a count per identifier. Only ever incremented, or zeroed wholesale.
 *
 * Every method is synchronous, so callers on the event loop never observe a
 * half-applied update.
 */
export class Aggregator {
  private counts = new Map<string, number>();
  private totalKeys = 0;
  private totalClicks = 0;
  private totalWheels = 0;

  /** Add `delta` occurrences of an identifier. */
  record(identifier: string, delta = 1): void {
    if (!Number.isSafeInteger(delta) || delta < 0) {
      throw new RangeError(`delta must be a non-negative integer, got ${delta}`);
    }
    if (delta === 0) return;

    this.counts.set(identifier, (this.counts.get(identifier) ?? 0) + delta);
    switch (categorize(identifier)) {
      case 'KEY': this.totalKeys += delta; break;
      case 'CLICK': this.totalClicks += delta; break;
      case 'WHEEL': this.totalWheels += delta; break;
    }
  }

  /**
   * Add a previously taken snapshot back in. Totals are re-derived from the
   * identifiers rather than copied.
   */
  restore(snapshot: Snapshot): void {
    for (const [identifier, delta] of Object.entries(snapshot.events)) {
      this.record(identifier, delta);
    }
  }

  /** Immutable copy of the current state. */
  snapshot(): Snapshot {
    return freezeSnapshot({
      total_keys: this.totalKeys,
      total_clicks: this.totalClicks,
      total_wheels: this.totalWheels,
      events: Object.fromEntries(this.counts),
    });
  }

  reset(): void {
    this.counts = new Map();
    this.totalKeys = 0;
    this.totalClicks = 0;
    this.totalWheels = 0;
  }

  /** Snapshot and reset in one step. */
  drain(): Snapshot {
    const snapshot = this.snapshot();
    this.reset();
    return snapshot;
  }

  get isEmpty(): boolean {
    return this.counts.size === 0;
  }

  /** Returns the number of distinct identifiers. */
  get identifierCount(): number {
    return this.counts.size;
  }
}
