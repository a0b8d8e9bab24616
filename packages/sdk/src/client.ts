import type {
  HealthResponse,
  IngestResponse,
  ISnapshotTransport,
  Snapshot,
  StatsResponse,
} from '@inputtally/types';
import type { ZodType, ZodTypeDef } from 'zod';
import { healthResponseSchema, ingestResponseSchema, statsResponseSchema } from './schemas';

const DEFAULT_TIMEOUT_MS = 10_000;
const SECRET_HEADER = 'X-API-Secret';

export interface StatsClientConfig {
  /** Service base URL, e.g. "http://localhost:3000". */
  baseUrl: string;
  /** Shared secret sent as X-API-Secret. */
  secret: string;
  /** Per-request timeout. Default: 10000. */
  timeoutMs?: number;
  /** Injected for tests. Default: global fetch. */
  fetch?: typeof fetch;
}

/**
 * Raised when the service answers with a non-success status.
 */
export class DeliveryError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Stats service responded ${status}${body ? `: ${body}` : ''}`);
    this.name = 'DeliveryError';
  }
}

/**
 * HTTP client for the stats service.
 *
 * Usage:
 * ```ts
 * const client = new StatsClient({ baseUrl: 'http://localhost:3000', secret: 'test-secret' });
 * await client.push({ total_keys: 1, total_clicks: 0, total_wheels: 0, events: { KEY_A: 1 } });
 * const stats = await client.fetchStats();
 * ```
 */
export class StatsClient implements ISnapshotTransport {
  private baseUrl: string;
  private secret: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(config: StatsClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.secret = config.secret;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  /** Deliver a snapshot. Rejects on transport errors, timeouts and non-2xx answers. */
  async push(snapshot: Snapshot): Promise<IngestResponse> {
    return this.request('POST', '/api/stats', ingestResponseSchema, JSON.stringify(snapshot));
  }

  /** Read the aggregate totals. */
  async fetchStats(): Promise<StatsResponse> {
    return this.request('GET', '/api/stats', statsResponseSchema);
  }

  async health(): Promise<HealthResponse> {
    return this.request('GET', '/health', healthResponseSchema, undefined, false);
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: string,
    authenticated = true,
  ): Promise<T> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (authenticated) headers[SECRET_HEADER] = this.secret;

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new DeliveryError(res.status, await res.text());
    }
    return schema.parse(await res.json());
  }
}
