import type { LoggerLike } from '@inputtally/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(line: string): unknown;
}

/**
 * JSON-lines logger. Each entry is one line carrying `timestamp`, `level`,
 * `msg`, the logger's bindings and the call's data.
 */
export class Logger implements LoggerLike {
  private level: number;

  constructor(
    level: LogLevel = 'info',
    private readonly bindings: Record<string, unknown> = {},
    private readonly sink: LogSink = process.stdout,
  ) {
    this.level = LEVELS[level] ?? LEVELS.info;
  }

  /** Logger that stamps every entry with `bindings`, e.g. `{ component: 'spool' }`. */
  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger('info', { ...this.bindings, ...bindings }, this.sink);
    child.level = this.level;
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVELS[level] < this.level) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bindings,
      ...data,
    };
    this.sink.write(JSON.stringify(entry) + '\n');
  }
}

/** Flatten an unknown thrown value for a log entry. */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
