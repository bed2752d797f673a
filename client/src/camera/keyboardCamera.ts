/**
 * Keyboard camera math: pan, roll and orbit from a held-key snapshot.
 *
 * Pure functions over CameraPose. Nothing here touches three.js scene
 * objects or the DOM, so any loop (render loop, test harness) can drive it.
 *
 *   W / S          pan forward / back
 *   A / D          pan left / right
 *   SPACE / SHIFT  pan up / down
 *   ARROWS         orbit around the focus point
 *   Q / E          roll left / right
 *   CTRL           native free spin owns the camera, keys are ignored
 *
 * Pan steps are a fraction of the basis vectors, which carry the
 * camera-to-focus distance: the closer the focus, the finer the pan.
 */

import * as THREE from 'three';
import { PAN_FACTOR, ROTATION_STEP_DEG } from '../config';
import type { CameraBasis, CameraPose, CameraStepConfig, HeldKeys, KeyId } from '../types';

const EPSILON = 1e-12;

export const DEFAULT_STEP_CONFIG: Readonly<CameraStepConfig> = {
  panFactor: PAN_FACTOR,
  rotationStep: THREE.MathUtils.degToRad(ROTATION_STEP_DEG),
};

export function clonePose(pose: CameraPose): CameraPose {
  return {
    position: pose.position.clone(),
    axis: pose.axis.clone(),
    up: pose.up.clone(),
  };
}

/**
 * Camera-relative basis for the current pose.
 * `up` is rescaled to the length of `forward` so roll behaves the same
 * regardless of how far earlier rolls moved the scene up vector.
 */
export function cameraBasis(pose: CameraPose): CameraBasis {
  const forward = pose.axis.clone();
  const upDir = pose.up.clone().normalize();
  const side = new THREE.Vector3().crossVectors(upDir, forward);
  const up = new THREE.Vector3().crossVectors(forward, side).setLength(forward.length());
  return { forward, side, up };
}

/** Chord between two points `angle` apart on a circle of radius `distance` (SAS cosine rule). */
export function orbitChordLength(distance: number, angle: number): number {
  const d2 = distance * distance;
  return Math.sqrt(Math.max(0, d2 + d2 - 2 * d2 * Math.cos(angle)));
}

/** +1 when only `positive` is held, -1 when only `negative` is held, else 0. */
function exclusiveDirection(keys: HeldKeys, positive: KeyId, negative: KeyId): number {
  const pos = keys.has(positive);
  const neg = keys.has(negative);
  if (pos === neg) return 0;
  return pos ? 1 : -1;
}

/** Net count of held keys in a pair. Both held cancel out. */
function panDirection(keys: HeldKeys, positive: KeyId, negative: KeyId): number {
  return (keys.has(positive) ? 1 : 0) - (keys.has(negative) ? 1 : 0);
}

/**
 * Apply one tick of held keys to a pose and return the new pose.
 *
 * Pan is committed first and carries the focus with it; roll and orbit
 * then work from the panned position, never from a half-applied state.
 */
export function handleKeyboardInput(
  pose: CameraPose,
  keys: HeldKeys,
  steps: Readonly<CameraStepConfig> = DEFAULT_STEP_CONFIG,
): CameraPose {
  if (keys.has('ctrl')) {
    return clonePose(pose);
  }

  const { forward, side, up } = cameraBasis(pose);

  // ── Pan ───────────────────────────────────────────────────────
  const pan = new THREE.Vector3()
    .addScaledVector(forward, panDirection(keys, 'w', 's') * steps.panFactor)
    .addScaledVector(side, panDirection(keys, 'a', 'd') * steps.panFactor)
    .addScaledVector(up, panDirection(keys, 'space', 'shift') * steps.panFactor);

  const position = pose.position.clone().add(pan);
  const focus = new THREE.Vector3().addVectors(pose.position, pose.axis).add(pan);

  // ── Roll ──────────────────────────────────────────────────────
  let nextUp = pose.up.clone();
  // Vertical orbit follows the rolled up vector within the same tick.
  let orbitUp = up;
  const roll = exclusiveDirection(keys, 'e', 'q');
  if (roll !== 0 && up.lengthSq() > EPSILON) {
    nextUp = up
      .clone()
      .applyAxisAngle(forward.clone().normalize(), roll * steps.rotationStep)
      .setLength(forward.length());
    orbitUp = nextUp;
  }

  // ── Orbit ─────────────────────────────────────────────────────
  const horizontal = exclusiveDirection(keys, 'left', 'right');
  const vertical = exclusiveDirection(keys, 'up', 'down');
  if (horizontal === 0 && vertical === 0) {
    return { position, axis: pose.axis.clone(), up: nextUp };
  }

  // Each step is a straight move of one chord along the unit side / up
  // vector; the camera then re-aims at the focus. The distance to the
  // focus grows slightly per step.
  const chord = orbitChordLength(forward.length(), steps.rotationStep);
  if (horizontal !== 0) {
    position.addScaledVector(side.clone().normalize(), horizontal * chord);
  }
  if (vertical !== 0) {
    position.addScaledVector(orbitUp.clone().normalize(), vertical * chord);
  }

  return {
    position,
    axis: new THREE.Vector3().subVectors(focus, position),
    up: nextUp,
  };
}

/** Whether two poses differ by more than `tolerance` in any component. */
export function poseChanged(a: CameraPose, b: CameraPose, tolerance = 1e-9): boolean {
  return (
    a.position.distanceToSquared(b.position) > tolerance ||
    a.axis.distanceToSquared(b.axis) > tolerance ||
    a.up.distanceToSquared(b.up) > tolerance
  );
}
