import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as THREE from 'three';
import { CameraController } from '../camera/cameraController';
import { viewerEvents } from '../core/eventBus';
import { KeyboardState } from '../input/keyboardState';
import type { PoseSnapshot } from '../types';

function press(code: string): void {
  window.dispatchEvent(new KeyboardEvent('keydown', { code }));
}

function release(code: string): void {
  window.dispatchEvent(new KeyboardEvent('keyup', { code }));
}

function expectPosition(camera: THREE.Camera, x: number, y: number, z: number): void {
  expect(camera.position.x).toBeCloseTo(x, 6);
  expect(camera.position.y).toBeCloseTo(y, 6);
  expect(camera.position.z).toBeCloseTo(z, 6);
}

describe('CameraController', () => {
  let camera: THREE.PerspectiveCamera;
  let keyboard: KeyboardState;
  let controller: CameraController;

  beforeEach(() => {
    camera = new THREE.PerspectiveCamera();
    camera.up.set(0, 0, 1);
    keyboard = new KeyboardState(window, window);
    controller = new CameraController(camera, document.createElement('div'), keyboard, {
      tickSeconds: 0.1,
    });
    controller.resetCamera();
  });

  afterEach(() => {
    controller.dispose();
    keyboard.dispose();
    viewerEvents.clear();
  });

  it('configures OrbitControls for zoom and ctrl-drag spin only', () => {
    const controls = controller.orbitControls;
    expect(controls.enablePan).toBe(false);
    expect(controls.enableZoom).toBe(true);
    expect(controls.enableRotate).toBe(true);
    expect(controls.enableDamping).toBe(false);
    expect(controls.mouseButtons.LEFT).toBe(THREE.MOUSE.PAN);
    expect(controls.mouseButtons.RIGHT).toBe(THREE.MOUSE.ROTATE);
  });

  it('starts at the default pose with the focus at the origin', () => {
    expectPosition(camera, 10, 10, 10);
    expect(controller.focus.toArray()).toEqual([0, 0, 0]);
    expect(controller.pose.up.toArray()).toEqual([0, 0, 1]);
  });

  it('applies held keys once per tick interval', () => {
    press('KeyW');

    controller.update(0.06);
    expect(camera.position.x).toBeCloseTo(10, 6);

    controller.update(0.06);
    expectPosition(camera, 9.8, 9.8, 9.8);
    expect(controller.focus.x).toBeCloseTo(-0.2, 6);
  });

  it('runs at most one tick for a long frame', () => {
    press('KeyW');
    controller.update(1);
    expect(camera.position.x).toBeCloseTo(9.8, 6);
  });

  it('stops moving once the key is released', () => {
    press('KeyS');
    expect(controller.tick()).toBe(true);
    release('KeyS');
    expect(controller.tick()).toBe(false);
    expect(camera.position.x).toBeCloseTo(10.2, 6);
  });

  it('ignores movement keys while ctrl is held', () => {
    press('ControlLeft');
    press('KeyW');
    expect(controller.tick()).toBe(false);
    expectPosition(camera, 10, 10, 10);
  });

  it('emits camera_moved with the new pose', () => {
    const onMoved = vi.fn<(snap: PoseSnapshot) => void>();
    viewerEvents.on('camera_moved', onMoved);

    press('KeyA');
    controller.tick();

    expect(onMoved).toHaveBeenCalledTimes(1);
    const [snap] = onMoved.mock.calls[0];
    expect(snap.position.x).toBeCloseTo(10.2, 6);
    expect(snap.position.y).toBeCloseTo(9.8, 6);
    expect(snap.position.z).toBeCloseTo(10, 6);
    expect(snap.focus.x).toBeCloseTo(0.2, 6);
  });

  it('does not emit when nothing is held', () => {
    const onMoved = vi.fn();
    viewerEvents.on('camera_moved', onMoved);
    controller.update(0.2);
    expect(onMoved).not.toHaveBeenCalled();
  });

  it('orbits around the focus, drifting out slightly per step', () => {
    press('ArrowLeft');
    controller.tick();
    controller.tick();
    const distance = camera.position.length();
    expect(distance).toBeGreaterThan(10 * Math.sqrt(3));
    expect(distance).toBeLessThan(10 * Math.sqrt(3) + 0.006);
    expect(controller.focus.length()).toBeCloseTo(0, 8);
  });

  it('resetCamera restores the default pose and announces it', () => {
    const onReset = vi.fn();
    viewerEvents.on('camera_reset', onReset);

    press('KeyD');
    press('KeyE');
    controller.tick();
    release('KeyD');
    release('KeyE');
    controller.resetCamera();

    expectPosition(camera, 10, 10, 10);
    expect(camera.up.toArray()).toEqual([0, 0, 1]);
    expect(controller.focus.toArray()).toEqual([0, 0, 0]);
    expect(onReset).toHaveBeenCalledWith({
      position: { x: 10, y: 10, z: 10 },
      focus: { x: 0, y: 0, z: 0 },
    });
  });

  it('setPose moves camera and orbit target together', () => {
    controller.setPose({
      position: new THREE.Vector3(0, -5, 2),
      axis: new THREE.Vector3(0, 5, 0),
      up: new THREE.Vector3(0, 0, 1),
    });
    expect(controller.focus.x).toBeCloseTo(0, 6);
    expect(controller.focus.y).toBeCloseTo(0, 6);
    expect(controller.focus.z).toBeCloseTo(2, 6);
    expect(camera.position.y).toBeCloseTo(-5, 6);
  });
});
