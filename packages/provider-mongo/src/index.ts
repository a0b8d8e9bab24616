export { MongoStatsStore, FIRST_SYNC, LAST_SYNC } from './provider';
export type { MongoStatsStoreConfig } from './provider';
export { getEventModel, getMetadataModel, EVENT_CATEGORIES } from './schema';
export type { IEventDocument, IMetadataDocument } from './schema';
