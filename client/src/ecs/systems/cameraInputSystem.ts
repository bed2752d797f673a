/**
 * System #1: CameraInputSystem
 *
 * Mirrors the orbit target into the ECS camera entity so the grid can
 * follow the focus without a three.js reference. The CameraController
 * stays the authority for actual camera manipulation.
 *
 * Frequency: every frame
 */

import type { World } from 'bitecs';
import { query } from 'bitecs';
import type * as THREE from 'three';
import { Focus, IsCamera } from '../components';

/** Set during canvas init. */
let focusRef: THREE.Vector3 | null = null;

export function setFocusRef(target: THREE.Vector3): void {
  focusRef = target;
}

export function clearFocusRef(): void {
  focusRef = null;
}

export function cameraInputSystem(world: World, _delta: number): void {
  if (!focusRef) return;

  for (const eid of query(world, [IsCamera])) {
    Focus.x[eid] = focusRef.x;
    Focus.y[eid] = focusRef.y;
    Focus.z[eid] = focusRef.z;
  }
}
