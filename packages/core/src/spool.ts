import fs from 'fs/promises';
import path from 'path';
import type { LoggerLike, Snapshot } from '@inputtally/types';
import { parseSnapshot } from './snapshot';

export const DEFAULT_SPOOL_PATH = 'stats_backup.json';

export interface SpoolOptions {
  /** File holding the undelivered snapshot. Default: "stats_backup.json". */
  path?: string;
  logger?: LoggerLike;
}

/**
 * Single-file durable store for an undelivered snapshot. The file's presence
 * is the only signal that a batch is waiting; at most one exists at a time.
 */
export class FileSpool {
  readonly path: string;
  private logger?: LoggerLike;

  constructor(options: SpoolOptions = {}) {
    this.path = options.path ?? DEFAULT_SPOOL_PATH;
    this.logger = options.logger;
  }

  /** Replace the spooled snapshot. Written to a temp file and renamed into place. */
  async save(snapshot: Snapshot): Promise<void> {
    const tmp = `${this.path}.tmp`;
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(snapshot), 'utf-8');
    await fs.rename(tmp, this.path);
    this.logger?.info('Snapshot spooled', {
      path: this.path,
      identifiers: Object.keys(snapshot.events).length,
    });
  }

  /**
   * Read the spooled snapshot. A missing file means a clean state; an
   * unreadable or invalid one is logged and treated the same way.
   */
  async load(): Promise<Snapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      this.logger?.warn('Failed to read spool file', { path: this.path, error: String(err) });
      return null;
    }

    try {
      return parseSnapshot(JSON.parse(content));
    } catch (err) {
      this.logger?.warn('Discarding unreadable spool file', { path: this.path, error: String(err) });
      return null;
    }
  }

  /** Remove the spooled snapshot, if any. */
  async clear(): Promise<void> {
    await fs.rm(this.path, { force: true });
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.path);
      return true;
    } catch {
      return false;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
