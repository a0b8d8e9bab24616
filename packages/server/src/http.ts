import type { IncomingMessage, ServerResponse } from 'http';
import { timingSafeEqual } from 'crypto';

export const SECRET_HEADER = 'x-api-secret';

/**
 * Error carrying the HTTP status and body the caller should see.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: Record<string, unknown>,
    /** Drop the connection after responding; the request body was left unread. */
    readonly options: { closeConnection?: boolean } = {},
  ) {
    super(typeof body.error === 'string' ? body.error : `HTTP ${status}`);
    this.name = 'HttpError';
  }
}

export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

/** Exact, constant-time comparison of the X-API-Secret header. */
export function hasValidSecret(req: IncomingMessage, secret: string): boolean {
  const header = req.headers[SECRET_HEADER];
  if (typeof header !== 'string') return false;

  const given = Buffer.from(header, 'utf-8');
  const expected = Buffer.from(secret, 'utf-8');
  return given.length === expected.length && timingSafeEqual(given, expected);
}

/**
 * Read and JSON-parse the request body. Anything over `maxBytes` is refused
 * as soon as the limit is passed, without reading the rest.
 */
export function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const tooLarge = (): HttpError =>
    new HttpError(413, { error: 'Request body too large' }, { closeConnection: true });

  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return Promise.reject(tooLarge());
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > maxBytes) {
        detach();
        req.pause();
        reject(tooLarge());
        return;
      }
      chunks.push(chunk);
    };
    const onEnd = (): void => {
      detach();
      try {
        resolve(JSON.parse(Buffer.concat(chunks).toString('utf-8')));
      } catch {
        reject(new HttpError(400, { error: 'Invalid request body', details: 'Malformed JSON' }));
      }
    };
    const onError = (err: Error): void => {
      detach();
      reject(err);
    };
    const detach = (): void => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
    };

    req.on('data', onData);
    req.on('end', onEnd);
    req.on('error', onError);
  });
}
