import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import {
  convertToZUp,
  defaultCameraPose,
  readPose,
  resetCameraPose,
  snapshotPose,
  writePose,
} from '../camera/cameraPose';

function viewDirection(camera: THREE.Camera): THREE.Vector3 {
  return camera.getWorldDirection(new THREE.Vector3());
}

describe('defaultCameraPose', () => {
  it('sits on the positive axes looking at the origin with +Z up', () => {
    const pose = defaultCameraPose();
    expect(pose.position.toArray()).toEqual([10, 10, 10]);
    expect(pose.axis.toArray()).toEqual([-10, -10, -10]);
    expect(pose.up.toArray()).toEqual([0, 0, 1]);
  });

  it('returns fresh vectors each call', () => {
    const a = defaultCameraPose();
    a.position.set(0, 0, 0);
    expect(defaultCameraPose().position.toArray()).toEqual([10, 10, 10]);
  });
});

describe('writePose / readPose', () => {
  it('places the camera and aims it at position + axis', () => {
    const camera = new THREE.PerspectiveCamera();
    const target = new THREE.Vector3();
    writePose(camera, target, {
      position: new THREE.Vector3(1, 2, 3),
      axis: new THREE.Vector3(0, 4, 0),
      up: new THREE.Vector3(0, 0, 5),
    });

    expect(camera.position.toArray()).toEqual([1, 2, 3]);
    expect(target.toArray()).toEqual([1, 6, 3]);
    expect(camera.up.toArray()).toEqual([0, 0, 1]);

    const dir = viewDirection(camera);
    expect(dir.x).toBeCloseTo(0, 6);
    expect(dir.y).toBeCloseTo(1, 6);
    expect(dir.z).toBeCloseTo(0, 6);
  });

  it('reads back the written pose with a unit up vector', () => {
    const camera = new THREE.PerspectiveCamera();
    const target = new THREE.Vector3();
    writePose(camera, target, {
      position: new THREE.Vector3(1, 2, 3),
      axis: new THREE.Vector3(0, 4, 0),
      up: new THREE.Vector3(0, 0, 5),
    });

    const pose = readPose(camera, target);
    expect(pose.position.toArray()).toEqual([1, 2, 3]);
    expect(pose.axis.toArray()).toEqual([0, 4, 0]);
    expect(pose.up.toArray()).toEqual([0, 0, 1]);
  });

  it('returns copies that do not alias the camera', () => {
    const camera = new THREE.PerspectiveCamera();
    const pose = readPose(camera, new THREE.Vector3(0, 0, -1));
    pose.position.set(9, 9, 9);
    expect(camera.position.toArray()).toEqual([0, 0, 0]);
  });
});

describe('resetCameraPose', () => {
  it('restores the default pose after the camera was moved', () => {
    const camera = new THREE.PerspectiveCamera();
    camera.up.set(0, 0, 1);
    const target = new THREE.Vector3(3, 3, 3);
    camera.position.set(-4, 2, 7);

    resetCameraPose(camera, target);

    expect(camera.position.toArray()).toEqual([10, 10, 10]);
    expect(target.toArray()).toEqual([0, 0, 0]);
    expect(camera.up.toArray()).toEqual([0, 0, 1]);
  });
});

describe('convertToZUp', () => {
  it('turns a default camera looking down -Z into the +Z-up default pose', () => {
    const camera = new THREE.PerspectiveCamera();
    const target = new THREE.Vector3();

    const pose = convertToZUp(camera, target);

    expect(pose.up.toArray()).toEqual([0, 0, 1]);
    expect(camera.up.toArray()).toEqual([0, 0, 1]);
    expect(camera.position.toArray()).toEqual([10, 10, 10]);
    expect(target.toArray()).toEqual([0, 0, 0]);

    const dir = viewDirection(camera);
    const expected = new THREE.Vector3(-1, -1, -1).normalize();
    expect(dir.x).toBeCloseTo(expected.x, 6);
    expect(dir.y).toBeCloseTo(expected.y, 6);
    expect(dir.z).toBeCloseTo(expected.z, 6);
  });

  it('works when the camera already faces sideways', () => {
    const camera = new THREE.PerspectiveCamera();
    camera.lookAt(1, 0, 0);
    const pose = convertToZUp(camera);
    expect(pose.position.toArray()).toEqual([10, 10, 10]);
    expect(camera.up.toArray()).toEqual([0, 0, 1]);
  });
});

describe('snapshotPose', () => {
  it('flattens position and focus into plain objects', () => {
    const snap = snapshotPose({
      position: new THREE.Vector3(1, 2, 3),
      axis: new THREE.Vector3(-1, -2, -3),
      up: new THREE.Vector3(0, 0, 1),
    });
    expect(snap).toEqual({ position: { x: 1, y: 2, z: 3 }, focus: { x: 0, y: 0, z: 0 } });
  });
});
