/**
 * DOM keyboard events → KeyId.
 *
 * Matches on `KeyboardEvent.code` so the bindings follow physical key
 * positions, with `key` as a fallback for synthetic events that carry no code.
 */

import type { KeyId } from '../types';

const CODE_BINDINGS: Readonly<Record<string, KeyId>> = {
  KeyW: 'w',
  KeyA: 'a',
  KeyS: 's',
  KeyD: 'd',
  KeyQ: 'q',
  KeyE: 'e',
  Space: 'space',
  ShiftLeft: 'shift',
  ShiftRight: 'shift',
  ControlLeft: 'ctrl',
  ControlRight: 'ctrl',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  ArrowUp: 'up',
  ArrowDown: 'down',
};

const KEY_BINDINGS: Readonly<Record<string, KeyId>> = {
  w: 'w',
  a: 'a',
  s: 's',
  d: 'd',
  q: 'q',
  e: 'e',
  ' ': 'space',
  Shift: 'shift',
  Control: 'ctrl',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  ArrowUp: 'up',
  ArrowDown: 'down',
};

/** Keys whose browser default (page scrolling) must be suppressed. */
const SCROLL_KEYS: ReadonlySet<KeyId> = new Set<KeyId>(['left', 'right', 'up', 'down', 'space']);

export function keyIdFromEvent(event: Pick<KeyboardEvent, 'code' | 'key'>): KeyId | null {
  const byCode = CODE_BINDINGS[event.code];
  if (byCode) return byCode;
  return KEY_BINDINGS[event.key] ?? KEY_BINDINGS[event.key.toLowerCase()] ?? null;
}

export function isScrollKey(key: KeyId): boolean {
  return SCROLL_KEYS.has(key);
}
