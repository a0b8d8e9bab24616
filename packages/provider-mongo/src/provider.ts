import mongoose, { Model } from 'mongoose';
import type { CounterRow, IStatsStore, SyncMetadata } from '@inputtally/types';
import { categorize } from '@inputtally/core';
import {
  IEventDocument,
  IMetadataDocument,
  getEventModel,
  getMetadataModel,
} from './schema';

export interface MongoStatsStoreConfig {
  /** Existing Mongoose connection. If omitted, uses the default connection. */
  connection?: mongoose.Connection;
  /** Collection for counter rows. Default: "events". */
  eventsCollection?: string;
  /** Collection for sync timestamps. Default: "metadata". */
  metadataCollection?: string;
}

export const FIRST_SYNC = 'first_sync';
export const LAST_SYNC = 'last_sync';

/**
 * MongoDB aggregation store.
 *
 * A merge is one multi-document transaction: a `bulkWrite` of `$inc`
 * upserts for every identifier, then the two sync timestamps. Any failure
 * aborts the transaction, so a snapshot lands completely or not at all.
 * Transactions need a replica set (a single-node one is enough).
 */
export class MongoStatsStore implements IStatsStore {
  private connection: mongoose.Connection;
  private events: Model<IEventDocument>;
  private metadata: Model<IMetadataDocument>;

  constructor(config: MongoStatsStoreConfig = {}) {
    this.connection = config.connection ?? mongoose.connection;
    this.events = getEventModel(this.connection, config.eventsCollection);
    this.metadata = getMetadataModel(this.connection, config.metadataCollection);
  }

  async merge(batch: Map<string, number>, syncedAt: Date): Promise<void> {
    const ops = Array.from(batch.entries()).map(([eventName, delta]) => ({
      updateOne: {
        filter: { event_name: eventName },
        update: {
          $inc: { count: delta },
          $setOnInsert: { event_name: eventName, event_type: categorize(eventName) },
        },
        upsert: true,
      },
    }));

    const value = syncedAt.toISOString();
    const syncOps = [
      {
        updateOne: {
          filter: { key: LAST_SYNC },
          update: { $set: { value } },
          upsert: true,
        },
      },
      {
        updateOne: {
          filter: { key: FIRST_SYNC },
          update: { $setOnInsert: { key: FIRST_SYNC, value, updated_at: syncedAt } },
          upsert: true,
          // Left untouched once written
          timestamps: false,
        },
      },
    ];

    const session = await this.connection.startSession();
    try {
      await session.withTransaction(async () => {
        if (ops.length > 0) {
          await this.events.bulkWrite(ops, { session, ordered: true });
        }
        await this.metadata.bulkWrite(syncOps, { session, ordered: true });
      });
    } finally {
      await session.endSession();
    }
  }

  /** All counter rows, highest count first. */
  async list(): Promise<CounterRow[]> {
    const docs = await this.events
      .find({})
      .sort({ count: -1, event_name: 1 })
      .select('event_name event_type count')
      .lean();

    return docs.map((doc) => ({
      eventName: doc.event_name,
      eventType: doc.event_type,
      count: doc.count,
    }));
  }

  async getSyncMetadata(): Promise<SyncMetadata> {
    const docs = await this.metadata
      .find({ key: { $in: [FIRST_SYNC, LAST_SYNC] } })
      .select('key value')
      .lean();

    const byKey = new Map(docs.map((doc) => [doc.key, doc.value]));
    return {
      firstSync: byKey.get(FIRST_SYNC) ?? null,
      lastSync: byKey.get(LAST_SYNC) ?? null,
    };
  }

  async initialize(): Promise<void> {
    await this.events.ensureIndexes();
    await this.metadata.ensureIndexes();
  }

  async close(): Promise<void> {
    // The connection belongs to the caller
  }
}
