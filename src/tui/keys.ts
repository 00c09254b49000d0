/**
 * Keystroke Model
 *
 * Every input event the screen layer sees is a `Keystroke` string:
 * - Printable characters are themselves ('a', 'Y', '/', '~')
 * - Named keys use lowercase names ('enter', 'tab', 'left', 'pageup')
 * - Control chords are 'C-<key>' ('C-g', 'C-a'), meta chords 'M-<key>'
 *
 * Keeping keystrokes as plain strings lets views, config files and tests
 * spell bindings the same way.
 */

import type { Key } from 'node:readline';

export type Keystroke = string;

/**
 * Named keystrokes used by the core loops.
 */
export const KEY = {
  ENTER: 'enter',
  TAB: 'tab',
  BACKSPACE: 'backspace',
  DELETE: 'delete',
  ESCAPE: 'escape',
  SPACE: ' ',
  LEFT: 'left',
  RIGHT: 'right',
  UP: 'up',
  DOWN: 'down',
  HOME: 'home',
  END: 'end',
  PAGE_UP: 'pageup',
  PAGE_DOWN: 'pagedown',
  /** Default cancel keystroke for modal loops and prompts */
  CANCEL: 'C-g',
} as const;

/** readline key names passed through unchanged. */
const NAMED_KEYS = new Set([
  'tab',
  'backspace',
  'delete',
  'escape',
  'left',
  'right',
  'up',
  'down',
  'home',
  'end',
  'pageup',
  'pagedown',
  'insert',
]);

/**
 * Translate a readline 'keypress' event into a keystroke.
 * Returns null for events that carry nothing usable (e.g. bare modifier
 * reports or multi-character pastes).
 */
export function keystrokeFromKeypress(str: string | undefined, key: Key | undefined): Keystroke | null {
  const name = key?.name;

  if (name === 'return' || name === 'enter') {
    return KEY.ENTER;
  }

  if (name && key?.ctrl) {
    return `C-${name}`;
  }

  if (name && key?.meta && !NAMED_KEYS.has(name)) {
    return `M-${name}`;
  }

  if (name && NAMED_KEYS.has(name)) {
    return name;
  }

  if (name === 'space') {
    return KEY.SPACE;
  }

  if (str !== undefined && str.length === 1) {
    return str;
  }

  return null;
}

/**
 * Whether a keystroke inserts a character (as opposed to a command).
 */
export function isPrintable(key: Keystroke): boolean {
  return key.length === 1 && key >= ' ' && key !== '\x7f';
}

/**
 * Parse an accepted-keystroke list.
 *
 * A plain string ("ynYN") accepts each of its characters; an array lists
 * keystrokes verbatim so named keys can be accepted too.
 */
export function parseAcceptSet(accept: string | readonly Keystroke[]): Set<Keystroke> {
  return typeof accept === 'string' ? new Set(accept.split('')) : new Set(accept);
}

/**
 * Whether a string names a keystroke this module can produce: a printable
 * character, a named key, or a C-/M- chord over either.
 *
 * @example
 * ```typescript
 * isKeystroke('C-g');    // true
 * isKeystroke('escape'); // true
 * isKeystroke('ctrl+g'); // false
 * ```
 */
export function isKeystroke(value: string): boolean {
  const chord = /^[CM]-(.+)$/.exec(value);
  const base = chord?.[1] ?? value;
  if (base === KEY.ENTER || NAMED_KEYS.has(base)) return true;
  if (chord && base === 'space') return true;
  return isPrintable(base);
}
