import http from 'http';
import type { AgentStats } from '@inputtally/types';

/** `backlog` while an undelivered batch sits in the spool. */
export type DeliveryState = 'ok' | 'backlog';

export interface AgentHealthReport {
  status: DeliveryState;
  service: string;
  uptimeSeconds: number;
  eventsCaptured: number;
  deliveries: number;
  failedDeliveries: number;
  lastDeliveryAt: string | null;
  pendingIdentifiers: number;
  spooled: boolean;
}

export interface HealthServerConfig {
  port: number;
  agent: { getStats(): Readonly<AgentStats> };
  /** Default: 'inputtally-agent' */
  service?: string;
  /** Default: '0.0.0.0' */
  host?: string;
}

export function healthReport(
  stats: Readonly<AgentStats>,
  uptimeSeconds: number,
  service: string,
): AgentHealthReport {
  return {
    status: stats.spooled ? 'backlog' : 'ok',
    service,
    uptimeSeconds,
    eventsCaptured: stats.eventsCaptured,
    deliveries: stats.deliveries,
    failedDeliveries: stats.failedDeliveries,
    lastDeliveryAt: stats.lastDeliveryAt?.toISOString() ?? null,
    pendingIdentifiers: stats.pendingIdentifiers,
    spooled: stats.spooled,
  };
}

/**
 * GET /health on the agent. Always 200 while the process is up; `status`
 * says whether delivery is keeping up.
 */
export function createHealthServer(config: HealthServerConfig): http.Server {
  const startedAt = Date.now();
  const service = config.service ?? 'inputtally-agent';

  const server = http.createServer((req, res) => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (path !== '/health' || req.method !== 'GET') {
      res.writeHead(404);
      res.end();
      return;
    }

    const uptimeSeconds = Math.floor((Date.now() - startedAt) / 1000);
    const body = JSON.stringify(healthReport(config.agent.getStats(), uptimeSeconds, service));
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(body);
  });

  server.listen(config.port, config.host ?? '0.0.0.0');
  return server;
}
