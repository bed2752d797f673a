/**
 * Binding between CameraPose and a three.js camera + orbit target.
 */

import * as THREE from 'three';
import { DEFAULT_CAMERA_POSITION, WORLD_UP } from '../config';
import type { CameraPose, PoseSnapshot } from '../types';

const _xAxis = new THREE.Vector3(1, 0, 0);
const _worldUp = new THREE.Vector3(...WORLD_UP);
const _forward = new THREE.Vector3();

/** Fixed pose restored by the reset button: on the +axes, looking at the origin, +Z up. */
export function defaultCameraPose(): CameraPose {
  const position = new THREE.Vector3(...DEFAULT_CAMERA_POSITION);
  return {
    position,
    axis: position.clone().negate(),
    up: _worldUp.clone(),
  };
}

export function readPose(camera: THREE.Camera, target: THREE.Vector3): CameraPose {
  return {
    position: camera.position.clone(),
    axis: new THREE.Vector3().subVectors(target, camera.position),
    up: camera.up.clone().normalize(),
  };
}

export function writePose(camera: THREE.Camera, target: THREE.Vector3, pose: CameraPose): void {
  camera.position.copy(pose.position);
  camera.up.copy(pose.up).normalize();
  target.addVectors(pose.position, pose.axis);
  camera.lookAt(target);
}

export function resetCameraPose(camera: THREE.Camera, target: THREE.Vector3): CameraPose {
  const pose = defaultCameraPose();
  writePose(camera, target, pose);
  return pose;
}

/**
 * Make +Z the scene up direction (three.js defaults to +Y).
 *
 * A camera cannot take an up vector parallel to its view direction, so when
 * the camera currently looks along Z it is first turned to face +X.
 */
export function convertToZUp(
  camera: THREE.Camera,
  target: THREE.Vector3 = new THREE.Vector3(),
): CameraPose {
  camera.getWorldDirection(_forward);
  if (Math.abs(_forward.dot(_worldUp)) > 1 - 1e-6) {
    camera.lookAt(_forward.copy(camera.position).add(_xAxis));
  }
  return resetCameraPose(camera, target);
}

export function snapshotPose(pose: CameraPose): PoseSnapshot {
  const focus = new THREE.Vector3().addVectors(pose.position, pose.axis);
  return {
    position: { x: pose.position.x, y: pose.position.y, z: pose.position.z },
    focus: { x: focus.x, y: focus.y, z: focus.z },
  };
}
