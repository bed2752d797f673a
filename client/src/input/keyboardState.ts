/**
 * KeyboardState: the set of keys currently held down.
 *
 * keydown adds, keyup removes, losing window focus clears everything
 * (keyup never arrives for keys released while the page is in the background).
 * Typing into form fields is not camera input.
 */

import { createLogger } from '../core/logger';
import type { HeldKeys, KeyId } from '../types';
import { isScrollKey, keyIdFromEvent } from './keyBindings';

const log = createLogger('Keyboard');

export class KeyboardState {
  private readonly held = new Set<KeyId>();
  private readonly target: EventTarget;
  private readonly focusTarget: EventTarget;

  private readonly boundKeyDown: (e: Event) => void;
  private readonly boundKeyUp: (e: Event) => void;
  private readonly boundBlur: () => void;

  constructor(target: EventTarget = window, focusTarget: EventTarget = window) {
    this.target = target;
    this.focusTarget = focusTarget;

    this.boundKeyDown = this.onKeyDown.bind(this);
    this.boundKeyUp = this.onKeyUp.bind(this);
    this.boundBlur = this.clear.bind(this);

    this.target.addEventListener('keydown', this.boundKeyDown);
    this.target.addEventListener('keyup', this.boundKeyUp);
    this.focusTarget.addEventListener('blur', this.boundBlur);
  }

  /** Copy of the held set; later key events do not change it. */
  snapshot(): HeldKeys {
    return new Set(this.held);
  }

  isHeld(key: KeyId): boolean {
    return this.held.has(key);
  }

  get size(): number {
    return this.held.size;
  }

  clear(): void {
    if (this.held.size > 0) {
      log.debug('Clearing held keys', [...this.held]);
    }
    this.held.clear();
  }

  dispose(): void {
    this.target.removeEventListener('keydown', this.boundKeyDown);
    this.target.removeEventListener('keyup', this.boundKeyUp);
    this.focusTarget.removeEventListener('blur', this.boundBlur);
    this.held.clear();
  }

  // ── Event Handlers ────────────────────────────────────────────────

  private onKeyDown(event: Event): void {
    if (!(event instanceof KeyboardEvent) || isFormField(event.target)) {
      return;
    }

    const key = keyIdFromEvent(event);
    if (!key) return;

    if (isScrollKey(key)) {
      event.preventDefault();
    }
    this.held.add(key);
  }

  private onKeyUp(event: Event): void {
    if (!(event instanceof KeyboardEvent)) {
      return;
    }

    const key = keyIdFromEvent(event);
    if (key) this.held.delete(key);
  }
}

function isFormField(target: EventTarget | null): boolean {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement ||
    target instanceof HTMLButtonElement
  );
}
