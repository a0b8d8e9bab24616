import type { EventCategory, Snapshot } from './core';

/**
 * One persisted counter, as read back from the store.
 */
export interface CounterRow {
  eventName: string;
  eventType: EventCategory;
  count: number;
}

/**
 * Sync timestamps kept alongside the counters. ISO-8601 strings, or null
 * before the first accepted ingest.
 */
export interface SyncMetadata {
  firstSync: string | null;
  lastSync: string | null;
}

/**
 * Core abstraction for the server-side aggregation store.
 * All database-specific implementations must conform to this interface.
 */
export interface IStatsStore {
  /**
   * Add a batch of per-identifier deltas to the running totals.
   *
   * Must be atomic: either every identifier is merged and the sync
   * metadata updated, or nothing is written and the promise rejects.
   *
   * @param events - identifier to delta
   * @param syncedAt - time recorded as last_sync (and first_sync if unset)
   * @example
   * await store.merge(new Map([
   *   ['KEY_A', 3],
   *   ['CLICK_LEFT', 2]
   * ]), new Date())
   */
  merge(events: Map<string, number>, syncedAt: Date): Promise<void>;

  /**
   * All counters, ordered by count descending.
   */
  list(): Promise<CounterRow[]>;

  /**
   * Read first_sync / last_sync. Absent values are null, not errors.
   */
  getSyncMetadata(): Promise<SyncMetadata>;

  /**
   * Optional: Initialize store resources (indexes, etc.)
   */
  initialize?(): Promise<void>;

  /**
   * Optional: Clean up resources on shutdown
   */
  close?(): Promise<void>;
}

/**
 * Delivery channel used by the agent. Resolves once the remote side has
 * accepted the snapshot; any rejection counts as a failed delivery.
 */
export interface ISnapshotTransport {
  push(snapshot: Snapshot): Promise<unknown>;
}
