/**
 * CameraController: keyboard-driven camera for inspecting robot scenes.
 *
 * Features:
 * - Keyboard pan / orbit / roll (see keyboardCamera.ts), ticked at a fixed rate
 * - OrbitControls kept for wheel zoom and ctrl + drag free spin only;
 *   mouse panning is disabled so the keys are the only pan path
 * - Reset to the default +Z-up pose
 * - camera_moved / camera_reset events on the viewer event bus
 */

import * as THREE from 'three';
import { OrbitControls } from 'three/addons/controls/OrbitControls.js';
import { INPUT_TICK_SECONDS } from '../config';
import { viewerEvents } from '../core/eventBus';
import { createLogger } from '../core/logger';
import type { KeyboardState } from '../input/keyboardState';
import type { CameraPose, CameraStepConfig } from '../types';
import { readPose, resetCameraPose, snapshotPose, writePose } from './cameraPose';
import { DEFAULT_STEP_CONFIG, handleKeyboardInput, poseChanged } from './keyboardCamera';

const log = createLogger('Camera');

export interface CameraControllerOptions {
  /** Seconds between keyboard ticks. */
  tickSeconds?: number;
  steps?: Readonly<CameraStepConfig>;
}

// ── CameraController Class ──────────────────────────────────────────

export class CameraController {
  private readonly camera: THREE.PerspectiveCamera;
  private readonly controls: OrbitControls;
  private readonly keyboard: KeyboardState;

  private readonly tickSeconds: number;
  private readonly steps: Readonly<CameraStepConfig>;
  private accumulator = 0;

  constructor(
    camera: THREE.PerspectiveCamera,
    domElement: HTMLElement,
    keyboard: KeyboardState,
    options: CameraControllerOptions = {},
  ) {
    this.camera = camera;
    this.keyboard = keyboard;
    this.tickSeconds = options.tickSeconds ?? INPUT_TICK_SECONDS;
    this.steps = options.steps ?? DEFAULT_STEP_CONFIG;

    // OrbitControls caches the up direction when constructed: camera.up must
    // already be +Z at this point.
    this.controls = new OrbitControls(camera, domElement);
    this.controls.enableDamping = false;
    this.controls.enablePan = false; // keys pan
    this.controls.enableZoom = true;
    this.controls.enableRotate = true;
    // With panning disabled, a LEFT = PAN binding turns plain left-drag into
    // a no-op and ctrl + left-drag into rotate.
    this.controls.mouseButtons = {
      LEFT: THREE.MOUSE.PAN,
      MIDDLE: THREE.MOUSE.DOLLY,
      RIGHT: THREE.MOUSE.ROTATE,
    };
  }

  /** Access underlying OrbitControls. */
  get orbitControls(): OrbitControls {
    return this.controls;
  }

  /** Current pose read back from the camera. */
  get pose(): CameraPose {
    return readPose(this.camera, this.controls.target);
  }

  /** Point the camera looks at and orbits around. */
  get focus(): THREE.Vector3 {
    return this.controls.target.clone();
  }

  // ── Public API ────────────────────────────────────────────────────

  /** Replace the pose (camera, up vector and orbit target together). */
  setPose(pose: CameraPose): void {
    writePose(this.camera, this.controls.target, pose);
    this.controls.update();
  }

  update(deltaTime: number): void {
    this.accumulator += deltaTime;
    if (this.accumulator >= this.tickSeconds) {
      // At most one tick per frame; a slow frame does not queue a burst.
      this.accumulator = Math.min(this.accumulator - this.tickSeconds, this.tickSeconds);
      this.tick();
    }

    this.controls.update();
  }

  /** Run one keyboard tick immediately. Returns true when the pose changed. */
  tick(): boolean {
    const keys = this.keyboard.snapshot();
    if (keys.size === 0) return false;

    const current = this.pose;
    const next = handleKeyboardInput(current, keys, this.steps);
    if (!poseChanged(current, next)) return false;

    writePose(this.camera, this.controls.target, next);
    viewerEvents.emit('camera_moved', snapshotPose(next));
    return true;
  }

  resetCamera(): void {
    const pose = resetCameraPose(this.camera, this.controls.target);
    this.controls.update();
    this.accumulator = 0;
    log.debug('Camera reset');
    viewerEvents.emit('camera_reset', snapshotPose(pose));
  }

  dispose(): void {
    this.controls.dispose();
  }
}
