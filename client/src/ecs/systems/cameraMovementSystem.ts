/**
 * System #2: CameraMovementSystem
 *
 * Delegates to CameraController.update(), which runs the rate-clamped
 * keyboard tick and OrbitControls (zoom, ctrl + drag spin).
 *
 * Runs after cameraInputSystem, so systems reading the ECS camera entity
 * see the pose from the start of this frame.
 *
 * Frequency: every frame
 */

import type { World } from 'bitecs';
import type { CameraController } from '../../camera/cameraController';

let controllerRef: CameraController | null = null;

export function setControllerRef(controller: CameraController | null): void {
  controllerRef = controller;
}

export function cameraMovementSystem(_world: World, delta: number): void {
  if (!controllerRef) return;
  controllerRef.update(delta);
}
