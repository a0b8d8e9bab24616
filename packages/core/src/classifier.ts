import type { ClassifiedEvent, EventCategory, RawInputEvent } from '@inputtally/types';
import keyNames from './data/key-names.json';

/** Scroll delta that makes up one wheel notch (libinput reports 15° per detent). */
export const NOTCH_SIZE = 15;

const KEY_NAMES: Readonly<Record<string, string>> = keyNames;

const BUTTON_NAMES: Readonly<Record<number, string>> = {
  0x110: 'CLICK_LEFT',
  0x111: 'CLICK_RIGHT',
  0x112: 'CLICK_MIDDLE',
};

/**
 * Category of an identifier, by prefix. Shared by agent and server so the
 * server re-derives exactly what the agent counted.
 */
export function categorize(identifier: string): EventCategory {
  if (identifier.startsWith('KEY_')) return 'KEY';
  if (identifier.startsWith('CLICK_')) return 'CLICK';
  if (identifier.startsWith('WHEEL_')) return 'WHEEL';
  return 'OTHER';
}

/** Convert a continuous scroll delta into whole notches. */
export function scrollNotches(delta: number): number {
  return Math.round(Math.abs(delta / NOTCH_SIZE));
}

/**
 * Linux key code to its canonical name. Codes missing from the table get an
 * opaque UNKNOWN_<code> (category OTHER), as do the BTN_* names for touch,
 * stylus and gamepad buttons.
 */
export function keyName(code: number): string {
  return KEY_NAMES[String(code)] ?? `UNKNOWN_${code}`;
}

export function buttonName(code: number): string {
  return BUTTON_NAMES[code] ?? 'CLICK_OTHER';
}

/**
 * Map one raw device event to the counters it contributes to.
 *
 * Keys and buttons count on press only. A scroll event may carry both axes,
 * each tracked under its own identifier; sub-notch movement counts nothing.
 */
export function classify(event: RawInputEvent): ClassifiedEvent[] {
  switch (event.kind) {
    case 'key':
      return event.state === 'pressed' ? [{ identifier: keyName(event.code), delta: 1 }] : [];
    case 'button':
      return event.state === 'pressed' ? [{ identifier: buttonName(event.code), delta: 1 }] : [];
    case 'scroll': {
      const out: ClassifiedEvent[] = [];
      if (event.vertical !== undefined) {
        const notches = scrollNotches(event.vertical);
        if (notches > 0) out.push({ identifier: 'WHEEL_VERTICAL', delta: notches });
      }
      if (event.horizontal !== undefined) {
        const notches = scrollNotches(event.horizontal);
        if (notches > 0) out.push({ identifier: 'WHEEL_HORIZONTAL', delta: notches });
      }
      return out;
    }
  }
}
