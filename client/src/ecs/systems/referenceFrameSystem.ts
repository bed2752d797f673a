/**
 * System #4: ReferenceFrameSystem
 *
 * Copies Position / Orientation / Visible of every reference-frame entity
 * onto its gizmo group.
 *
 * Frequency: every frame
 */

import type { World } from 'bitecs';
import { query } from 'bitecs';
import { FrameObject, IsReferenceFrame, Orientation, Position, Visible } from '../components';
import { getObject } from '../objectRegistry';

export function referenceFrameSystem(world: World, _delta: number): void {
  const eids = query(world, [IsReferenceFrame, FrameObject, Position, Orientation, Visible]);
  for (const eid of eids) {
    const object = getObject(FrameObject.objectId[eid]);
    if (!object) continue;

    object.position.set(Position.x[eid], Position.y[eid], Position.z[eid]);
    object.quaternion.set(
      Orientation.x[eid],
      Orientation.y[eid],
      Orientation.z[eid],
      Orientation.w[eid],
    );
    object.visible = Visible.value[eid] === 1;
  }
}
