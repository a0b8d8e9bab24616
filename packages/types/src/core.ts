import type { ISnapshotTransport } from './provider';

/**
 * Semantic category of a counted identifier, derived from its prefix.
 */
export type EventCategory = 'KEY' | 'CLICK' | 'WHEEL' | 'OTHER';

/**
 * Accumulated-but-unsent counter state. This is both the ingest request
 * body and the on-disk spool format, so field names follow the wire.
 */
export interface Snapshot {
  readonly total_keys: number;
  readonly total_clicks: number;
  readonly total_wheels: number;
  readonly events: Readonly<Record<string, number>>;
}

/**
 * Raw device event as delivered by an input backend, before classification.
 */
export type RawInputEvent =
  | { kind: 'key'; code: number; state: KeyState }
  | { kind: 'button'; code: number; state: KeyState }
  | { kind: 'scroll'; vertical?: number; horizontal?: number };

export type KeyState = 'pressed' | 'released';

/**
 * One counted occurrence produced by the classifier.
 */
export interface ClassifiedEvent {
  /** Stable identifier, e.g. 'KEY_A', 'CLICK_LEFT', 'WHEEL_VERTICAL' */
  identifier: string;

  /** 1 for discrete events, the notch count for scroll events */
  delta: number;
}

/**
 * Abstract device capability: a lazy, unbounded, non-restartable sequence
 * of raw events.
 */
export interface InputSource {
  /** Acquire the underlying devices. Rejects if none can be opened. */
  open?(): Promise<void>;

  /** The event sequence. Iteration ends once the source is closed. */
  events(): AsyncIterable<RawInputEvent>;

  /** Release the underlying devices. */
  close?(): Promise<void>;
}

/**
 * Minimal structural logger accepted by library components.
 */
export interface LoggerLike {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Configuration for the agent engine
 */
export interface AgentConfig {
  /** Device event source */
  source: InputSource;

  /** Delivery channel for snapshots */
  transport: ISnapshotTransport;

  /** Spool file path. Default: "stats_backup.json" */
  spoolPath?: string;

  /** Time (ms) between delivery attempts. Default: 10000 */
  flushIntervalMs?: number;

  /** Logger handed to the spool for load/save diagnostics */
  logger?: LoggerLike;
}

/**
 * Agent statistics for monitoring
 */
export interface AgentStats {
  /** Raw events taken from the source */
  eventsCaptured: number;

  /** Successful deliveries */
  deliveries: number;

  /** Failed delivery attempts */
  failedDeliveries: number;

  /** Last successful delivery */
  lastDeliveryAt?: Date;

  /** Distinct identifiers waiting for delivery */
  pendingIdentifiers: number;

  /** Whether an undelivered batch sits in the spool */
  spooled: boolean;
}
