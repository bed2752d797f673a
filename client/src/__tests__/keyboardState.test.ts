import { afterEach, describe, expect, it } from 'vitest';
import { isScrollKey, keyIdFromEvent } from '../input/keyBindings';
import { KeyboardState } from '../input/keyboardState';

describe('keyIdFromEvent', () => {
  it('maps physical key codes', () => {
    expect(keyIdFromEvent({ code: 'KeyW', key: 'w' })).toBe('w');
    expect(keyIdFromEvent({ code: 'ShiftRight', key: 'Shift' })).toBe('shift');
    expect(keyIdFromEvent({ code: 'ControlLeft', key: 'Control' })).toBe('ctrl');
    expect(keyIdFromEvent({ code: 'ArrowDown', key: 'ArrowDown' })).toBe('down');
    expect(keyIdFromEvent({ code: 'Space', key: ' ' })).toBe('space');
  });

  it('uses the code even when the layout prints another letter', () => {
    expect(keyIdFromEvent({ code: 'KeyW', key: 'z' })).toBe('w');
  });

  it('falls back to key when there is no code', () => {
    expect(keyIdFromEvent({ code: '', key: ' ' })).toBe('space');
    expect(keyIdFromEvent({ code: '', key: 'E' })).toBe('e');
    expect(keyIdFromEvent({ code: '', key: 'ArrowLeft' })).toBe('left');
  });

  it('returns null for unbound keys', () => {
    expect(keyIdFromEvent({ code: 'KeyZ', key: 'z' })).toBeNull();
    expect(keyIdFromEvent({ code: 'Enter', key: 'Enter' })).toBeNull();
  });
});

describe('isScrollKey', () => {
  it('flags arrows and space only', () => {
    expect(isScrollKey('up')).toBe(true);
    expect(isScrollKey('space')).toBe(true);
    expect(isScrollKey('w')).toBe(false);
    expect(isScrollKey('ctrl')).toBe(false);
  });
});

describe('KeyboardState', () => {
  let state: KeyboardState | null = null;

  afterEach(() => {
    state?.dispose();
    state = null;
  });

  function keydown(target: EventTarget, code: string): KeyboardEvent {
    const event = new KeyboardEvent('keydown', { code, bubbles: true, cancelable: true });
    target.dispatchEvent(event);
    return event;
  }

  it('tracks keys between keydown and keyup', () => {
    state = new KeyboardState(window, window);
    keydown(window, 'KeyW');
    keydown(window, 'ArrowLeft');
    expect(state.isHeld('w')).toBe(true);
    expect(state.isHeld('left')).toBe(true);
    expect(state.size).toBe(2);

    window.dispatchEvent(new KeyboardEvent('keyup', { code: 'KeyW' }));
    expect(state.isHeld('w')).toBe(false);
    expect(state.size).toBe(1);
  });

  it('ignores unbound keys', () => {
    state = new KeyboardState(window, window);
    keydown(window, 'KeyZ');
    expect(state.size).toBe(0);
  });

  it('returns snapshots that later events do not change', () => {
    state = new KeyboardState(window, window);
    keydown(window, 'KeyQ');
    const snap = state.snapshot();
    window.dispatchEvent(new KeyboardEvent('keyup', { code: 'KeyQ' }));
    expect(snap.has('q')).toBe(true);
    expect(state.isHeld('q')).toBe(false);
  });

  it('clears every key when the window loses focus', () => {
    state = new KeyboardState(window, window);
    keydown(window, 'KeyA');
    keydown(window, 'ShiftLeft');
    window.dispatchEvent(new Event('blur'));
    expect(state.size).toBe(0);
  });

  it('suppresses page scrolling for arrows and space', () => {
    state = new KeyboardState(window, window);
    expect(keydown(window, 'ArrowUp').defaultPrevented).toBe(true);
    expect(keydown(window, 'Space').defaultPrevented).toBe(true);
    expect(keydown(window, 'KeyW').defaultPrevented).toBe(false);
  });

  it('ignores typing in form fields', () => {
    state = new KeyboardState(document, window);
    const input = document.createElement('input');
    document.body.append(input);

    const event = keydown(input, 'Space');

    expect(state.size).toBe(0);
    expect(event.defaultPrevented).toBe(false);
    input.remove();
  });

  it('leaves Space to a focused button so it still activates', () => {
    state = new KeyboardState(document, window);
    const button = document.createElement('button');
    document.body.append(button);

    const event = keydown(button, 'Space');

    expect(state.size).toBe(0);
    expect(event.defaultPrevented).toBe(false);
    button.remove();
  });

  it('stops listening after dispose', () => {
    state = new KeyboardState(window, window);
    state.dispose();
    keydown(window, 'KeyW');
    expect(state.size).toBe(0);
  });
});
