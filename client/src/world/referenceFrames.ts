/**
 * ReferenceFrames: gizmos for robot link poses, tracked as ECS entities.
 *
 * Callers hand in poses; the entity stores them in Position / Orientation /
 * Visible and referenceFrameSystem copies them onto the three.js groups each
 * frame. Removal is deferred to cleanupSystem via PendingRemoval.
 */

import * as THREE from 'three';
import type { World } from 'bitecs';
import { addComponent, hasComponent, query } from 'bitecs';
import { FRAME_ARROW_LENGTH } from '../config';
import { createLogger } from '../core/logger';
import { posePosition, poseQuaternion } from '../core/pose';
import { createReferenceFrameEntity } from '../ecs/archetypes';
import {
  FrameObject, IsReferenceFrame, Orientation, PendingRemoval, Position, Visible,
} from '../ecs/components';
import { registerObject } from '../ecs/objectRegistry';
import { drawReferenceFrameAxes } from './referenceFrameAxes';

const log = createLogger('ReferenceFrames');

const _position = new THREE.Vector3();
const _quaternion = new THREE.Quaternion();

export class ReferenceFrames {
  private readonly world: World;
  private readonly parent: THREE.Object3D;
  private readonly arrowLength: number;

  constructor(world: World, parent: THREE.Object3D, arrowLength = FRAME_ARROW_LENGTH) {
    this.world = world;
    this.parent = parent;
    this.arrowLength = arrowLength;
  }

  /** Draw a frame for `pose` and return its entity id. */
  add(pose: THREE.Matrix4): number {
    const group = drawReferenceFrameAxes(pose, this.arrowLength);
    this.parent.add(group);

    const eid = createReferenceFrameEntity(this.world);
    FrameObject.objectId[eid] = registerObject(group);
    this.setPose(eid, pose);
    return eid;
  }

  setPose(eid: number, pose: THREE.Matrix4): void {
    if (!this.isLive(eid)) {
      log.warn(`Ignoring pose for unknown reference frame ${eid}`);
      return;
    }
    posePosition(pose, _position);
    poseQuaternion(pose, _quaternion);
    Position.x[eid] = _position.x;
    Position.y[eid] = _position.y;
    Position.z[eid] = _position.z;
    Orientation.x[eid] = _quaternion.x;
    Orientation.y[eid] = _quaternion.y;
    Orientation.z[eid] = _quaternion.z;
    Orientation.w[eid] = _quaternion.w;
  }

  /** Show or hide every frame. */
  setVisible(visible: boolean): void {
    for (const eid of query(this.world, [IsReferenceFrame, Visible])) {
      Visible.value[eid] = visible ? 1 : 0;
    }
  }

  /** Mark a frame for removal at the end of the next pipeline run. */
  remove(eid: number): void {
    if (!this.isLive(eid)) return;
    addComponent(this.world, eid, PendingRemoval);
  }

  get count(): number {
    let live = 0;
    for (const eid of query(this.world, [IsReferenceFrame])) {
      if (!hasComponent(this.world, eid, PendingRemoval)) live++;
    }
    return live;
  }

  /** Mark every frame for removal. */
  dispose(): void {
    for (const eid of query(this.world, [IsReferenceFrame])) {
      addComponent(this.world, eid, PendingRemoval);
    }
  }

  private isLive(eid: number): boolean {
    return (
      hasComponent(this.world, eid, IsReferenceFrame) &&
      !hasComponent(this.world, eid, PendingRemoval)
    );
  }
}
