/**
 * Entity archetype factory functions.
 *
 * Each archetype adds the required set of components to a new entity.
 */

import type { World } from 'bitecs';
import { addEntity, addComponent } from 'bitecs';
import {
  Position, Orientation, Focus,
  FrameObject, Visible,
  IsCamera, IsReferenceFrame,
} from './components';

// ── Camera (Singleton) ───────────────────────────────────────────

export function addCameraArchetype(world: World, eid: number): void {
  addComponent(world, eid, IsCamera);
  addComponent(world, eid, Focus);
}

export function createCameraEntity(world: World): number {
  const eid = addEntity(world);
  addCameraArchetype(world, eid);
  return eid;
}

// ── Reference Frame ──────────────────────────────────────────────

export function addReferenceFrameArchetype(world: World, eid: number): void {
  addComponent(world, eid, IsReferenceFrame);
  addComponent(world, eid, Position);
  addComponent(world, eid, Orientation);
  addComponent(world, eid, FrameObject);
  addComponent(world, eid, Visible);

  Position.x[eid] = 0;
  Position.y[eid] = 0;
  Position.z[eid] = 0;
  Orientation.x[eid] = 0;
  Orientation.y[eid] = 0;
  Orientation.z[eid] = 0;
  Orientation.w[eid] = 1;
  FrameObject.objectId[eid] = -1;
  Visible.value[eid] = 1;
}

export function createReferenceFrameEntity(world: World): number {
  const eid = addEntity(world);
  addReferenceFrameArchetype(world, eid);
  return eid;
}
