/**
 * Rigid-body pose helpers over THREE.Matrix4 (homogeneous SE(3) transforms).
 * Each helper writes into `target` when one is given.
 */

import * as THREE from 'three';

export function posePosition(pose: THREE.Matrix4, target = new THREE.Vector3()): THREE.Vector3 {
  return target.setFromMatrixPosition(pose);
}

/** Local x axis of the pose in world space (unit length). */
export function poseXAxis(pose: THREE.Matrix4, target = new THREE.Vector3()): THREE.Vector3 {
  return target.setFromMatrixColumn(pose, 0).normalize();
}

/** Local y axis of the pose in world space (unit length). */
export function poseYAxis(pose: THREE.Matrix4, target = new THREE.Vector3()): THREE.Vector3 {
  return target.setFromMatrixColumn(pose, 1).normalize();
}

/** Local z axis of the pose in world space (unit length). */
export function poseZAxis(pose: THREE.Matrix4, target = new THREE.Vector3()): THREE.Vector3 {
  return target.setFromMatrixColumn(pose, 2).normalize();
}

export function poseQuaternion(pose: THREE.Matrix4, target = new THREE.Quaternion()): THREE.Quaternion {
  return target.setFromRotationMatrix(pose);
}

/** Build a pose from a translation and an orientation. */
export function composePose(
  position: THREE.Vector3,
  orientation: THREE.Quaternion = new THREE.Quaternion(),
): THREE.Matrix4 {
  return new THREE.Matrix4().compose(position, orientation, new THREE.Vector3(1, 1, 1));
}
