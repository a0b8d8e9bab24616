export { StatsClient, DeliveryError } from './client';
export type { StatsClientConfig } from './client';
