import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DeliveryError, StatsClient } from './client';

const SNAPSHOT = {
  total_keys: 3,
  total_clicks: 2,
  total_wheels: 0,
  events: { KEY_A: 3, CLICK_LEFT: 2 },
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createMockFetch() {
  return vi.fn<typeof fetch>().mockResolvedValue(
    jsonResponse(200, { success: true, message: 'Stats updated successfully', events_processed: 2 }),
  );
}

describe('StatsClient', () => {
  let fetchMock: ReturnType<typeof createMockFetch>;
  let client: StatsClient;

  beforeEach(() => {
    fetchMock = createMockFetch();
    client = new StatsClient({ baseUrl: 'http://stats.test/', secret: 'test-secret', fetch: fetchMock });
  });

  describe('push', () => {
    it('should POST the snapshot as JSON with the secret header', async () => {
      await client.push(SNAPSHOT);

      expect(fetchMock).toHaveBeenCalledOnce();
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://stats.test/api/stats');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'X-API-Secret': 'test-secret',
      });
      expect(JSON.parse(String(init?.body))).toEqual(SNAPSHOT);
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should return the parsed ingest response', async () => {
      const res = await client.push(SNAPSHOT);
      expect(res).toEqual({ success: true, message: 'Stats updated successfully', events_processed: 2 });
    });

    it('should throw DeliveryError on a non-success status', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(401, { error: 'Unauthorized - Invalid or missing API secret' }),
      );

      const err = await client.push(SNAPSHOT).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(DeliveryError);
      expect(err).toMatchObject({
        status: 401,
        body: '{"error":"Unauthorized - Invalid or missing API secret"}',
      });
    });

    it('should reject a response that is not an ingest acknowledgement', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { ok: 1 }));
      await expect(client.push(SNAPSHOT)).rejects.toThrow();
    });

    it('should propagate transport errors', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      await expect(client.push(SNAPSHOT)).rejects.toThrow('fetch failed');
    });
  });

  describe('fetchStats', () => {
    it('should GET the aggregate with the secret header and no body', async () => {
      const stats = {
        total_keys: 3,
        total_clicks: 0,
        total_wheels: 0,
        last_sync: '2026-01-01T00:00:00.000Z',
        first_sync: '2026-01-01T00:00:00.000Z',
        events: [{ name: 'KEY_A', type: 'KEY', count: 3 }],
      };
      fetchMock.mockResolvedValueOnce(jsonResponse(200, stats));

      await expect(client.fetchStats()).resolves.toEqual(stats);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://stats.test/api/stats');
      expect(init?.method).toBe('GET');
      expect(init?.headers).toEqual({ 'X-API-Secret': 'test-secret' });
      expect(init?.body).toBeUndefined();
    });
  });

  describe('health', () => {
    it('should not send the secret', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { status: 'ok', service: 'inputtally-server' }));

      await expect(client.health()).resolves.toEqual({ status: 'ok', service: 'inputtally-server' });
      expect(fetchMock.mock.calls[0][1]?.headers).toEqual({});
    });
  });
});
