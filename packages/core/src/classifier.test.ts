import { describe, it, expect } from 'vitest';
import { buttonName, categorize, classify, keyName, scrollNotches } from './classifier';

describe('categorize', () => {
  it.each([
    ['KEY_A', 'KEY'],
    ['UNKNOWN_999', 'OTHER'],
    ['CLICK_LEFT', 'CLICK'],
    ['CLICK_OTHER', 'CLICK'],
    ['WHEEL_VERTICAL', 'WHEEL'],
    ['WHEEL_HORIZONTAL', 'WHEEL'],
    ['BTN_TOUCH', 'OTHER'],
    ['key_a', 'OTHER'],
    ['KEY', 'OTHER'],
    ['', 'OTHER'],
  ])('%s -> %s', (identifier, expected) => {
    expect(categorize(identifier)).toBe(expected);
  });
});

describe('scrollNotches', () => {
  it('should divide by the notch size and round', () => {
    expect(scrollNotches(15)).toBe(1);
    expect(scrollNotches(30)).toBe(2);
    expect(scrollNotches(22)).toBe(1);
    expect(scrollNotches(23)).toBe(2);
  });

  it('should count both directions as positive notches', () => {
    expect(scrollNotches(-45)).toBe(3);
  });

  it('should round sub-notch movement to zero', () => {
    expect(scrollNotches(7)).toBe(0);
    expect(scrollNotches(0)).toBe(0);
  });
});

describe('keyName', () => {
  it('should map known Linux key codes', () => {
    expect(keyName(1)).toBe('KEY_ESC');
    expect(keyName(30)).toBe('KEY_A');
    expect(keyName(57)).toBe('KEY_SPACE');
    expect(keyName(125)).toBe('KEY_LEFTMETA');
  });

  it('should fall back to an opaque non-key name for unknown codes', () => {
    expect(keyName(999)).toBe('UNKNOWN_999');
    expect(categorize(keyName(999))).toBe('OTHER');
  });

  it('should name touch, stylus and gamepad buttons outside the key category', () => {
    expect(keyName(0x14a)).toBe('BTN_TOUCH');
    expect(keyName(0x145)).toBe('BTN_TOOL_FINGER');
    expect(keyName(0x130)).toBe('BTN_SOUTH');
    expect(categorize(keyName(0x14a))).toBe('OTHER');
  });
});

describe('buttonName', () => {
  it('should map the three main buttons and collapse the rest', () => {
    expect(buttonName(0x110)).toBe('CLICK_LEFT');
    expect(buttonName(0x111)).toBe('CLICK_RIGHT');
    expect(buttonName(0x112)).toBe('CLICK_MIDDLE');
    expect(buttonName(0x113)).toBe('CLICK_OTHER');
    expect(buttonName(0)).toBe('CLICK_OTHER');
  });
});

describe('classify', () => {
  it('should count key presses and ignore releases', () => {
    expect(classify({ kind: 'key', code: 30, state: 'pressed' })).toEqual([
      { identifier: 'KEY_A', delta: 1 },
    ]);
    expect(classify({ kind: 'key', code: 30, state: 'released' })).toEqual([]);
  });

  it('should count button presses', () => {
    expect(classify({ kind: 'button', code: 0x111, state: 'pressed' })).toEqual([
      { identifier: 'CLICK_RIGHT', delta: 1 },
    ]);
    expect(classify({ kind: 'button', code: 0x111, state: 'released' })).toEqual([]);
  });

  it('should track scroll axes separately', () => {
    expect(classify({ kind: 'scroll', vertical: -30, horizontal: 15 })).toEqual([
      { identifier: 'WHEEL_VERTICAL', delta: 2 },
      { identifier: 'WHEEL_HORIZONTAL', delta: 1 },
    ]);
  });

  it('should drop scroll axes that round to zero notches', () => {
    expect(classify({ kind: 'scroll', vertical: 5 })).toEqual([]);
    expect(classify({ kind: 'scroll' })).toEqual([]);
  });
});
