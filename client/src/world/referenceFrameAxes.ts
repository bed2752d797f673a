/**
 * Coordinate-frame gizmo: red / green / blue arrows for a pose's x / y / z.
 *
 * The arrows are built along the group's local axes and the group takes the
 * pose's origin and rotation, so moving or re-orienting the group moves the
 * whole frame as one rigid object.
 */

import * as THREE from 'three';
import { FRAME_ARROW_LENGTH, FRAME_AXIS_COLORS } from '../config';
import { posePosition, poseQuaternion } from '../core/pose';

const _origin = new THREE.Vector3();

export const FRAME_AXIS_NAMES = ['x-axis', 'y-axis', 'z-axis'] as const;

function createAxisArrow(direction: THREE.Vector3, length: number, color: number, name: string): THREE.ArrowHelper {
  const arrow = new THREE.ArrowHelper(direction, _origin, length, color, length * 0.2, length * 0.1);
  arrow.name = name;
  return arrow;
}

export function drawReferenceFrameAxes(pose: THREE.Matrix4, length = FRAME_ARROW_LENGTH): THREE.Group {
  const frame = new THREE.Group();
  frame.name = 'reference-frame';

  frame.add(createAxisArrow(new THREE.Vector3(1, 0, 0), length, FRAME_AXIS_COLORS.X, FRAME_AXIS_NAMES[0]));
  frame.add(createAxisArrow(new THREE.Vector3(0, 1, 0), length, FRAME_AXIS_COLORS.Y, FRAME_AXIS_NAMES[1]));
  frame.add(createAxisArrow(new THREE.Vector3(0, 0, 1), length, FRAME_AXIS_COLORS.Z, FRAME_AXIS_NAMES[2]));

  setReferenceFramePose(frame, pose);
  return frame;
}

export function setReferenceFramePose(frame: THREE.Object3D, pose: THREE.Matrix4): void {
  posePosition(pose, frame.position);
  poseQuaternion(pose, frame.quaternion);
}

/** Free the arrow geometries and materials. */
export function disposeReferenceFrame(frame: THREE.Object3D): void {
  frame.traverse((child) => {
    if (child instanceof THREE.ArrowHelper) {
      child.dispose();
    }
  });
  frame.removeFromParent();
}
