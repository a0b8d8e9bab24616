import fs from 'fs';
import { once } from 'events';
import { NOTCH_SIZE } from '@inputtally/core';
import type { InputSource, RawInputEvent } from '@inputtally/types';

/** sizeof(struct input_event) on 64-bit Linux: timeval (16) + type + code + value. */
export const INPUT_EVENT_SIZE = 24;

const EV_KEY = 0x01;
const EV_REL = 0x02;
const REL_HWHEEL = 0x06;
const REL_WHEEL = 0x08;

// BTN_MOUSE..BTN_TASK
const BTN_FIRST = 0x110;
const BTN_LAST = 0x117;

/**
 * Decode one `input_event` record. Returns null for anything that is not a
 * counted event: sync reports, autorepeat, relative motion other than the
 * wheels.
 */
export function parseInputEvent(buf: Buffer, offset = 0): RawInputEvent | null {
  const type = buf.readUInt16LE(offset + 16);
  const code = buf.readUInt16LE(offset + 18);
  const value = buf.readInt32LE(offset + 20);

  if (type === EV_KEY) {
    // 2 is autorepeat
    if (value !== 0 && value !== 1) return null;
    const state = value === 1 ? 'pressed' : 'released';
    return code >= BTN_FIRST && code <= BTN_LAST
      ? { kind: 'button', code, state }
      : { kind: 'key', code, state };
  }

  if (type === EV_REL) {
    if (code === REL_WHEEL) return { kind: 'scroll', vertical: value * NOTCH_SIZE };
    if (code === REL_HWHEEL) return { kind: 'scroll', horizontal: value * NOTCH_SIZE };
  }

  return null;
}

interface Waiter {
  resolve: (result: IteratorResult<RawInputEvent>) => void;
  reject: (err: Error) => void;
}

/**
 * Input source over one or more Linux evdev nodes (`/dev/input/event*`).
 * Events from every device are interleaved in arrival order. Reading the
 * nodes usually needs root or membership of the `input` group.
 */
export class EvdevInputSource implements InputSource {
  private streams: fs.ReadStream[] = [];
  private queue: RawInputEvent[] = [];
  private waiter: Waiter | null = null;
  private failure: Error | null = null;
  private attached = false;
  private ended = 0;
  private closed = false;

  constructor(private readonly devicePaths: string[]) {}

  /** Open every device. Rejects, releasing what was opened, if any one fails. */
  async open(): Promise<void> {
    for (const devicePath of this.devicePaths) {
      const stream = fs.createReadStream(devicePath, { highWaterMark: INPUT_EVENT_SIZE * 64 });
      stream.on('error', (err) => this.fail(err));
      this.streams.push(stream);
      try {
        await once(stream, 'open');
      } catch (err) {
        await this.close();
        throw err;
      }
    }
  }

  events(): AsyncIterable<RawInputEvent> {
    this.attach();
    return {
      [Symbol.asyncIterator]: () => ({
        next: () => this.next(),
      }),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const stream of this.streams) {
      stream.destroy();
    }
    this.settle();
  }

  private attach(): void {
    if (this.attached) return;
    this.attached = true;

    for (const stream of this.streams) {
      let pending = Buffer.alloc(0);
      stream.on('data', (chunk: Buffer | string) => {
        const data = Buffer.concat([pending, Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)]);
        let offset = 0;
        for (; offset + INPUT_EVENT_SIZE <= data.length; offset += INPUT_EVENT_SIZE) {
          const event = parseInputEvent(data, offset);
          if (event) this.push(event);
        }
        pending = data.subarray(offset);
      });
      stream.on('end', () => {
        this.ended++;
        this.settle();
      });
    }
  }

  private next(): Promise<IteratorResult<RawInputEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.failure) return Promise.reject(this.failure);
    if (this.exhausted) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private push(event: RawInputEvent): void {
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
    } else {
      this.queue.push(event);
    }
  }

  private fail(err: Error): void {
    // Destroying a stream on close is not a device failure
    if (this.closed) return;
    this.failure = err;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(err);
    }
  }

  /** Wake a parked reader once nothing more can arrive. */
  private settle(): void {
    if (!this.exhausted || !this.waiter) return;
    const { resolve } = this.waiter;
    this.waiter = null;
    resolve({ value: undefined, done: true });
  }

  private get exhausted(): boolean {
    return this.closed || (this.streams.length > 0 && this.ended === this.streams.length);
  }
}
