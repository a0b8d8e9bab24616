import mongoose, { Schema, Model } from 'mongoose';
import type { EventCategory } from '@inputtally/types';

export const EVENT_CATEGORIES: readonly EventCategory[] = ['KEY', 'CLICK', 'WHEEL', 'OTHER'];

export interface IEventDocument {
  event_name: string;
  event_type: EventCategory;
  count: number;
  created_at: Date;
  updated_at: Date;
}

export interface IMetadataDocument {
  key: string;
  value: string;
  updated_at: Date;
}

const eventSchema = new Schema<IEventDocument>(
  {
    event_name: { type: String, required: true, unique: true },
    event_type: { type: String, required: true, enum: EVENT_CATEGORIES },
    count: { type: Number, required: true, default: 0, min: 0 },
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
    collection: 'events',
  }
);

eventSchema.index({ event_type: 1 });
eventSchema.index({ count: -1 });

const metadataSchema = new Schema<IMetadataDocument>(
  {
    key: { type: String, required: true, unique: true },
    value: { type: String, required: true },
  },
  {
    timestamps: { createdAt: false, updatedAt: 'updated_at' },
    collection: 'metadata',
  }
);

function getModel<T>(
  kind: string,
  schema: Schema<T>,
  connection: mongoose.Connection,
  collectionName: string
): Model<T> {
  const modelName = `${kind}_${collectionName}`;
  try {
    return connection.model<T>(modelName);
  } catch {
    const cloned = schema.clone();
    cloned.set('collection', collectionName);
    return connection.model<T>(modelName, cloned);
  }
}

export function getEventModel(
  connection: mongoose.Connection = mongoose.connection,
  collectionName = 'events'
): Model<IEventDocument> {
  return getModel('InputEvent', eventSchema, connection, collectionName);
}

export function getMetadataModel(
  connection: mongoose.Connection = mongoose.connection,
  collectionName = 'metadata'
): Model<IMetadataDocument> {
  return getModel('SyncMetadata', metadataSchema, connection, collectionName);
}
