/**
 * Core type definitions for the robot canvas.
 */

import type * as THREE from 'three';

// ── Keyboard ────────────────────────────────────────────────────

export type KeyId =
  | 'w' | 'a' | 's' | 'd'
  | 'space' | 'shift'
  | 'left' | 'right' | 'up' | 'down'
  | 'q' | 'e'
  | 'ctrl';

/** Keys held down at the moment of a tick. Unordered, re-queried every tick. */
export type HeldKeys = ReadonlySet<KeyId>;

// ── Camera ──────────────────────────────────────────────────────

/**
 * Camera pose in world space.
 *
 * `axis` points from the camera to the focus point and its length is the
 * camera-to-focus distance, so `focus = position + axis`.
 */
export interface CameraPose {
  position: THREE.Vector3;
  axis: THREE.Vector3;
  up: THREE.Vector3;
}

/** Camera-relative basis. `side` points to the camera's left. */
export interface CameraBasis {
  forward: THREE.Vector3;
  side: THREE.Vector3;
  up: THREE.Vector3;
}

export interface CameraStepConfig {
  /** Fraction of each basis vector added per tick while a pan key is held. */
  panFactor: number;
  /** Roll and orbit increment per tick, in radians. */
  rotationStep: number;
}

export interface PoseSnapshot {
  position: { x: number; y: number; z: number };
  focus: { x: number; y: number; z: number };
}

// ── Errors ──────────────────────────────────────────────────────

export class CanvasConfigError extends Error {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid canvas options: ${errors.join('; ')}`);
    this.name = 'CanvasConfigError';
    this.errors = errors;
  }
}
