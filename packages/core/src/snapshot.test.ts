import { describe, it, expect } from 'vitest';
import { parseSnapshot, snapshotSchema } from './snapshot';

describe('parseSnapshot', () => {
  it('should accept the wire shape and freeze it', () => {
    const snapshot = parseSnapshot({
      total_keys: 3,
      total_clicks: 2,
      total_wheels: 0,
      events: { KEY_A: 3, CLICK_LEFT: 2 },
    });

    expect(snapshot.events).toEqual({ KEY_A: 3, CLICK_LEFT: 2 });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.events)).toBe(true);
  });

  it('should reject negative and fractional counts', () => {
    const base = { total_keys: 0, total_clicks: 0, total_wheels: 0 };
    expect(snapshotSchema.safeParse({ ...base, events: { KEY_A: -1 } }).success).toBe(false);
    expect(snapshotSchema.safeParse({ ...base, events: { KEY_A: 0.5 } }).success).toBe(false);
    expect(snapshotSchema.safeParse({ ...base, total_keys: -2, events: {} }).success).toBe(false);
  });

  it('should reject missing totals and empty identifiers', () => {
    expect(() => parseSnapshot({ events: { KEY_A: 1 } })).toThrow();
    expect(() =>
      parseSnapshot({ total_keys: 1, total_clicks: 0, total_wheels: 0, events: { '': 1 } }),
    ).toThrow();
  });

  it('should reject a __proto__ identifier rather than dropping it', () => {
    const input: unknown = JSON.parse(
      '{"total_keys":1,"total_clicks":0,"total_wheels":0,"events":{"__proto__":1,"KEY_A":1}}',
    );

    const result = snapshotSchema.safeParse(input);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]).toMatchObject({
      path: ['events', '__proto__'],
      message: 'Reserved identifier',
    });
  });

  it('should accept zero counts', () => {
    const snapshot = parseSnapshot({ total_keys: 0, total_clicks: 0, total_wheels: 0, events: {} });
    expect(snapshot.total_keys).toBe(0);
  });
});
