import type { EventCategory } from './core';

/** Body of a successful POST /api/stats */
export interface IngestResponse {
  success: true;
  message: string;
  events_processed: number;
}

/** One entry of GET /api/stats */
export interface StatsEntry {
  name: string;
  type: EventCategory;
  count: number;
}

/** Body of a successful GET /api/stats */
export interface StatsResponse {
  total_keys: number;
  total_clicks: number;
  total_wheels: number;
  last_sync: string | null;
  first_sync: string | null;
  events: StatsEntry[];
}

/** Body of GET /health */
export interface HealthResponse {
  status: 'ok';
  service: string;
}

/** Body of every error response */
export interface ErrorResponse {
  error: string;
  details?: unknown;
}
