import http from 'http';
import { describeError } from '@inputtally/core';
import type { Logger } from '@inputtally/core';
import type { IStatsStore } from '@inputtally/types';
import { HttpError, sendJson } from './http';
import { ROUTES } from './routes';
import type { RouteContext } from './routes';

export interface ApiServerConfig {
  store: IStatsStore;
  apiSecret: string;
  serviceName: string;
  logger: Logger;
  /** Value of Access-Control-Allow-Origin. Default: '*' */
  corsAllowOrigin?: string;
  /** Default: 1 MiB */
  maxBodyBytes?: number;
  /** Clock used for sync timestamps. Default: () => new Date() */
  now?: () => Date;
}

const CORS_METHODS = 'GET, POST, OPTIONS';
const CORS_HEADERS = 'Content-Type, X-API-Secret';
const CORS_MAX_AGE = '3600';

/**
 * Ingest/query HTTP server. Returned unbound; the caller decides where to
 * listen.
 */
export function createApiServer(config: ApiServerConfig): http.Server {
  const logger = config.logger.child({ component: 'http' });
  const ctx: RouteContext = {
    store: config.store,
    apiSecret: config.apiSecret,
    serviceName: config.serviceName,
    maxBodyBytes: config.maxBodyBytes ?? 1024 * 1024,
    logger,
    now: config.now,
  };

  return http.createServer((req, res) => {
    const startedAt = Date.now();
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    res.on('finish', () => {
      logger.info('Request', {
        method,
        path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });

    res.setHeader('Access-Control-Allow-Origin', config.corsAllowOrigin ?? '*');
    res.setHeader('Access-Control-Allow-Methods', CORS_METHODS);
    res.setHeader('Access-Control-Allow-Headers', CORS_HEADERS);
    res.setHeader('Access-Control-Max-Age', CORS_MAX_AGE);

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const route = ROUTES[path];
    if (!route) {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    const handler = route[method];
    if (!handler) {
      res.setHeader('Allow', [...Object.keys(route), 'OPTIONS'].join(', '));
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    handler(req, res, ctx).catch((err: unknown) => {
      if (res.headersSent) {
        logger.error('Handler failed after responding', describeError(err));
        res.end();
        return;
      }
      if (err instanceof HttpError) {
        if (err.options.closeConnection) {
          res.setHeader('Connection', 'close');
          res.on('finish', () => req.destroy());
        }
        sendJson(res, err.status, err.body);
        return;
      }
      logger.error('Unhandled request error', describeError(err));
      sendJson(res, 500, { error: 'Internal server error' });
    });
  });
}

/** Resolves once the server is bound. */
export function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
