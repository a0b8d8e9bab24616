import { categorize } from '@inputtally/core';
import type { CounterRow, IStatsStore, SyncMetadata } from '@inputtally/types';

/**
 * In-process IStatsStore for tests. `failNextMerge` makes the next merge
 * reject without touching any state.
 */
export class InMemoryStatsStore implements IStatsStore {
  readonly counters = new Map<string, number>();
  sync: SyncMetadata = { firstSync: null, lastSync: null };
  mergeCalls = 0;
  private failure: Error | null = null;

  failNextMerge(err: Error = new Error('store unavailable')): void {
    this.failure = err;
  }

  async merge(events: Map<string, number>, syncedAt: Date): Promise<void> {
    this.mergeCalls++;
    if (this.failure) {
      const err = this.failure;
      this.failure = null;
      throw err;
    }
    for (const [name, delta] of events) {
      this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
    }
    const at = syncedAt.toISOString();
    this.sync = { firstSync: this.sync.firstSync ?? at, lastSync: at };
  }

  async list(): Promise<CounterRow[]> {
    return [...this.counters.entries()]
      .map(([eventName, count]) => ({ eventName, eventType: categorize(eventName), count }))
      .sort((a, b) => b.count - a.count || (a.eventName < b.eventName ? -1 : 1));
  }

  async getSyncMetadata(): Promise<SyncMetadata> {
    return { ...this.sync };
  }
}
