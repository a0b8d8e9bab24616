import { EventEmitter } from 'events';
import type {
  AgentConfig,
  AgentStats,
  InputSource,
  ISnapshotTransport,
  Snapshot,
} from '@inputtally/types';
import { Aggregator } from './aggregator';
import { classify } from './classifier';
import { FileSpool } from './spool';

const DEFAULTS = {
  FLUSH_INTERVAL_MS: 10_000,
};

/**
 * Agent-side engine.
 *
 * Pulls raw events from an input source, folds them into an in-memory
 * aggregator and pushes a snapshot to the transport on a fixed interval.
 *
 * Guarantees at-least-once delivery: counters are only dropped after the
 * transport confirms a push. A failed push leaves them in place and writes
 * them to the spool, which is reloaded on the next start.
 */
export class TallyAgent extends EventEmitter {
  private source: InputSource;
  private transport: ISnapshotTransport;
  private spool: FileSpool;
  private aggregator: Aggregator;
  private running = false;
  private capturing: Promise<void> | null = null;
  private flushing: Promise<void> | null = null;
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private spooled = false;

  private readonly flushIntervalMs: number;

  private stats: Omit<AgentStats, 'pendingIdentifiers' | 'spooled'> = {
    eventsCaptured: 0,
    deliveries: 0,
    failedDeliveries: 0,
    lastDeliveryAt: undefined,
  };

  constructor(config: AgentConfig) {
    super();
    this.source = config.source;
    this.transport = config.transport;
    this.spool = new FileSpool({ path: config.spoolPath, logger: config.logger });
    this.aggregator = new Aggregator();
    this.flushIntervalMs = config.flushIntervalMs ?? DEFAULTS.FLUSH_INTERVAL_MS;
  }

  /** Restore the spool, open the source and begin capturing. */
  async start(): Promise<void> {
    if (this.running) return;

    // Resume from an undelivered batch before any new event is counted
    const backup = await this.spool.load();
    if (backup) {
      this.aggregator.restore(backup);
      this.spooled = true;
      this.emit('restored', backup);
    }

    if (this.source.open) {
      await this.source.open();
    }

    this.running = true;
    this.emit('started');

    this.capturing = this.captureLoop();
    this.scheduleFlush();
  }

  /** Stop capturing, then make one last delivery attempt. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }

    if (this.source.close) {
      await this.source.close();
    }
    if (this.capturing) {
      await this.capturing;
      this.capturing = null;
    }

    // Let an in-flight push settle first, so whatever was captured during it
    // gets its own final attempt
    if (this.flushing) {
      await this.flushing;
    }

    // Final flush; spools on failure
    await this.flush();

    this.emit('stopped');
  }

  /** Get current agent statistics. */
  getStats(): Readonly<AgentStats> {
    return {
      ...this.stats,
      pendingIdentifiers: this.aggregator.identifierCount,
      spooled: this.spooled,
    };
  }

  /** Current undelivered counters. */
  pending(): Snapshot {
    return this.aggregator.snapshot();
  }

  /**
   * Attempt one delivery now. Concurrent callers share the attempt already
   * in flight.
   */
  async flush(): Promise<void> {
    if (this.flushing) {
      await this.flushing;
      return;
    }

    if (this.aggregator.isEmpty) return;

    this.flushing = this.doFlush();
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  // ─── Internal ────────────────────────────────────────────────────────────

  private async captureLoop(): Promise<void> {
    try {
      for await (const event of this.source.events()) {
        this.stats.eventsCaptured++;
        for (const { identifier, delta } of classify(event)) {
          this.aggregator.record(identifier, delta);
        }
        if (!this.running) break;
      }
    } catch (err) {
      this.emit('error', err);
    }

    if (this.running) {
      // Source ended or failed while the agent was meant to be running
      this.emit('captureEnded');
    }
  }

  private scheduleFlush(): void {
    if (!this.running) return;

    this.flushTimer = setTimeout(() => {
      void this.flush().then(
        () => this.scheduleFlush(),
        (err: unknown) => {
          this.scheduleFlush();
          this.emit('error', err);
        },
      );
    }, this.flushIntervalMs);
  }

  private async doFlush(): Promise<void> {
    // Take the window out of the aggregator so events captured during the
    // push land in a fresh window instead of being wiped by a reset.
    const batch = this.aggregator.drain();

    try {
      await this.transport.push(batch);
    } catch (err) {
      this.stats.failedDeliveries++;
      this.aggregator.restore(batch);
      await this.spoolPending();
      this.emit('error', err);
      return;
    }

    this.stats.deliveries++;
    this.stats.lastDeliveryAt = new Date();
    this.emit('flush', {
      identifiers: Object.keys(batch.events).length,
      totalKeys: batch.total_keys,
      totalClicks: batch.total_clicks,
      totalWheels: batch.total_wheels,
    });

    try {
      await this.spool.clear();
      this.spooled = false;
    } catch (err) {
      this.emit('warn', { message: 'Failed to remove spool file', error: String(err) });
    }
  }

  private async spoolPending(): Promise<void> {
    try {
      await this.spool.save(this.aggregator.snapshot());
      this.spooled = true;
    } catch (err) {
      this.emit('warn', { message: 'Failed to write spool file', error: String(err) });
    }
  }
}
