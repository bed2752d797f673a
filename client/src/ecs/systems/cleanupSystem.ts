/**
 * System #5: CleanupSystem
 *
 * Removes entities tagged with PendingRemoval. For each:
 *   - Disposes the gizmo and unregisters it from the ObjectRegistry
 *   - Removes the ECS entity from the world
 *
 * Must run AFTER all systems that may add PendingRemoval tags.
 *
 * Frequency: every frame
 */

import type { World } from 'bitecs';
import { query, removeEntity } from 'bitecs';
import { disposeReferenceFrame } from '../../world/referenceFrameAxes';
import { FrameObject, PendingRemoval } from '../components';
import { getObject, unregisterObject } from '../objectRegistry';

export function cleanupSystem(world: World, _delta: number): void {
  // Copy: removeEntity mutates the query result.
  const eids = [...query(world, [PendingRemoval])];
  for (const eid of eids) {
    const objectId = FrameObject.objectId[eid];
    const object = getObject(objectId);
    if (object) {
      disposeReferenceFrame(object);
      unregisterObject(objectId);
    }
    FrameObject.objectId[eid] = -1;
    removeEntity(world, eid);
  }
}
