import { describe, it, expect } from 'vitest';
import { Aggregator } from './aggregator';
import { categorize } from './classifier';

describe('Aggregator', () => {
  it('should accumulate deltas for a single identifier', () => {
    const agg = new Aggregator();
    agg.record('KEY_A');
    agg.record('KEY_A');
    agg.record('KEY_A');

    const snapshot = agg.snapshot();
    expect(snapshot.events).toEqual({ KEY_A: 3 });
    expect(snapshot.total_keys).toBe(3);
  });

  it('should route each identifier to its category total', () => {
    const agg = new Aggregator();
    agg.record('KEY_A', 2);
    agg.record('CLICK_LEFT');
    agg.record('WHEEL_VERTICAL', 4);
    agg.record('WHEEL_HORIZONTAL', 1);
    agg.record('TOUCH_TAP', 7);

    expect(agg.snapshot()).toEqual({
      total_keys: 2,
      total_clicks: 1,
      total_wheels: 5,
      events: {
        KEY_A: 2,
        CLICK_LEFT: 1,
        WHEEL_VERTICAL: 4,
        WHEEL_HORIZONTAL: 1,
        TOUCH_TAP: 7,
      },
    });
  });

  it('should keep category totals equal to the per-identifier sums', () => {
    const agg = new Aggregator();
    const ids = ['KEY_A', 'KEY_B', 'CLICK_LEFT', 'CLICK_OTHER', 'WHEEL_VERTICAL', 'MISC'];
    for (let i = 0; i < 500; i++) {
      agg.record(ids[i % ids.length], (i % 3) + 1);
    }

    const snapshot = agg.snapshot();
    const sum = (category: string) =>
      Object.entries(snapshot.events)
        .filter(([id]) => categorize(id) === category)
        .reduce((acc, [, n]) => acc + n, 0);

    expect(snapshot.total_keys).toBe(sum('KEY'));
    expect(snapshot.total_clicks).toBe(sum('CLICK'));
    expect(snapshot.total_wheels).toBe(sum('WHEEL'));
  });

  it('should treat a zero delta as a no-op', () => {
    const agg = new Aggregator();
    agg.record('WHEEL_VERTICAL', 0);
    expect(agg.isEmpty).toBe(true);
    expect(agg.snapshot().events).toEqual({});
  });

  it('should reject negative and fractional deltas', () => {
    const agg = new Aggregator();
    expect(() => agg.record('KEY_A', -1)).toThrow(RangeError);
    expect(() => agg.record('KEY_A', 1.5)).toThrow(RangeError);
    expect(agg.isEmpty).toBe(true);
  });

  it('should return a frozen snapshot unaffected by later records', () => {
    const agg = new Aggregator();
    agg.record('KEY_A');
    const snapshot = agg.snapshot();

    agg.record('KEY_A');
    expect(snapshot.events.KEY_A).toBe(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.events)).toBe(true);
  });

  it('should zero all state on reset', () => {
    const agg = new Aggregator();
    agg.record('KEY_A', 5);
    agg.record('CLICK_LEFT');
    agg.reset();

    expect(agg.isEmpty).toBe(true);
    expect(agg.identifierCount).toBe(0);
    expect(agg.snapshot()).toEqual({ total_keys: 0, total_clicks: 0, total_wheels: 0, events: {} });
  });

  it('should drain into a snapshot and start a fresh window', () => {
    const agg = new Aggregator();
    agg.record('KEY_X', 5);

    const first = agg.drain();
    expect(first.events).toEqual({ KEY_X: 5 });
    expect(agg.isEmpty).toBe(true);

    agg.record('KEY_X', 2);
    expect(agg.drain().events).toEqual({ KEY_X: 2 });
  });

  it('should add a restored snapshot on top of current counts', () => {
    const agg = new Aggregator();
    agg.record('KEY_A', 1);
    agg.restore({ total_keys: 3, total_clicks: 2, total_wheels: 0, events: { KEY_A: 3, CLICK_LEFT: 2 } });

    expect(agg.snapshot()).toEqual({
      total_keys: 4,
      total_clicks: 2,
      total_wheels: 0,
      events: { KEY_A: 4, CLICK_LEFT: 2 },
    });
  });

  it('should re-derive totals on restore instead of trusting the snapshot', () => {
    const agg = new Aggregator();
    agg.restore({ total_keys: 99, total_clicks: 99, total_wheels: 99, events: { KEY_A: 1 } });

    const snapshot = agg.snapshot();
    expect(snapshot.total_keys).toBe(1);
    expect(snapshot.total_clicks).toBe(0);
    expect(snapshot.total_wheels).toBe(0);
  });

  it('should count distinct identifiers', () => {
    const agg = new Aggregator();
    for (let i = 0; i < 10_000; i++) {
      agg.record(`KEY_${i % 100}`);
    }

    expect(agg.identifierCount).toBe(100);
    const snapshot = agg.drain();
    expect(snapshot.total_keys).toBe(10_000);
    expect(snapshot.events.KEY_42).toBe(100);
  });
});
