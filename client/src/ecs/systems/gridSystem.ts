/**
 * System #3: GridSystem
 *
 * Keeps the ground grid centred under the camera focus
 * (read from the ECS camera entity).
 *
 * Frequency: every frame (the grid only rebuilds labels when the centre cell changes)
 */

import type { World } from 'bitecs';
import { query } from 'bitecs';
import type { GraphicsGrid } from '../../world/graphicsGrid';
import { Focus, IsCamera } from '../components';

let gridRef: GraphicsGrid | null = null;

export function setGridRef(grid: GraphicsGrid | null): void {
  gridRef = grid;
}

export function gridSystem(world: World, _delta: number): void {
  if (!gridRef || !gridRef.visible) return;

  const eid = query(world, [IsCamera, Focus])[0];
  if (eid === undefined) return;
  gridRef.update(Focus.x[eid], Focus.y[eid]);
}
