import type { IncomingMessage, ServerResponse } from 'http';
import { snapshotSchema, describeError } from '@inputtally/core';
import type { Logger } from '@inputtally/core';
import type {
  ErrorResponse,
  HealthResponse,
  IngestResponse,
  IStatsStore,
  StatsResponse,
} from '@inputtally/types';
import { HttpError, hasValidSecret, readJsonBody, sendJson } from './http';

export interface RouteContext {
  store: IStatsStore;
  apiSecret: string;
  serviceName: string;
  maxBodyBytes: number;
  logger: Logger;
  /** Injected for tests. Default: () => new Date() */
  now?: () => Date;
}

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  ctx: RouteContext,
) => Promise<void>;

const UNAUTHORIZED: ErrorResponse = { error: 'Unauthorized - Invalid or missing API secret' };

/**
 * POST /api/stats: authenticate, validate, merge in one transaction.
 * Nothing is read or written unless the secret matches.
 */
export const ingestStats: RouteHandler = async (req, res, ctx) => {
  if (!hasValidSecret(req, ctx.apiSecret)) {
    ctx.logger.warn('Rejected ingest with bad secret');
    sendJson(res, 401, UNAUTHORIZED);
    return;
  }

  const body = await readJsonBody(req, ctx.maxBodyBytes);
  const parsed = snapshotSchema.safeParse(body);
  if (!parsed.success) {
    throw new HttpError(400, { error: 'Invalid request body', details: parsed.error.issues });
  }

  const snapshot = parsed.data;
  const events = new Map(Object.entries(snapshot.events));

  try {
    await ctx.store.merge(events, (ctx.now ?? (() => new Date()))());
  } catch (err) {
    ctx.logger.error('Merge failed, transaction rolled back', describeError(err));
    sendJson(res, 500, { error: 'Failed to update stats' });
    return;
  }

  // Client totals are informational; stored totals come from the rows
  ctx.logger.info('Stats updated', {
    totalKeys: snapshot.total_keys,
    totalClicks: snapshot.total_clicks,
    totalWheels: snapshot.total_wheels,
    events: events.size,
  });

  const response: IngestResponse = {
    success: true,
    message: 'Stats updated successfully',
    events_processed: events.size,
  };
  sendJson(res, 200, response);
};

/**
 * GET /api/stats: every counter, highest first, with totals recomputed
 * from the rows.
 */
export const queryStats: RouteHandler = async (req, res, ctx) => {
  if (!hasValidSecret(req, ctx.apiSecret)) {
    sendJson(res, 401, UNAUTHORIZED);
    return;
  }

  let response: StatsResponse;
  try {
    const [rows, sync] = await Promise.all([ctx.store.list(), ctx.store.getSyncMetadata()]);
    response = {
      total_keys: 0,
      total_clicks: 0,
      total_wheels: 0,
      last_sync: sync.lastSync,
      first_sync: sync.firstSync,
      events: [],
    };
    for (const row of rows) {
      switch (row.eventType) {
        case 'KEY': response.total_keys += row.count; break;
        case 'CLICK': response.total_clicks += row.count; break;
        case 'WHEEL': response.total_wheels += row.count; break;
      }
      response.events.push({ name: row.eventName, type: row.eventType, count: row.count });
    }
  } catch (err) {
    ctx.logger.error('Failed to read stats', describeError(err));
    sendJson(res, 500, { error: 'Failed to read stats' });
    return;
  }

  sendJson(res, 200, response);
};

/** GET /health: liveness, no authentication. */
export const health: RouteHandler = async (_req, res, ctx) => {
  const response: HealthResponse = { status: 'ok', service: ctx.serviceName };
  sendJson(res, 200, response);
};

/** Path to method to handler. */
export const ROUTES: Record<string, Partial<Record<string, RouteHandler>>> = {
  '/api/stats': { POST: ingestStats, GET: queryStats },
  '/health': { GET: health },
};
