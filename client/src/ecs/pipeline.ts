/**
 * ECS system pipeline.
 *
 * All systems execute in fixed order on the main thread.
 * The Engine calls `runPipeline(world, delta)` once per frame.
 *
 * The keyboard tick runs at its own fixed rate inside the CameraController
 * (an internal accumulator), not at the frame rate.
 * RenderSystem MUST be last (it produces the final frame).
 */

import type { World } from 'bitecs';

import { cameraInputSystem } from './systems/cameraInputSystem';
import { cameraMovementSystem } from './systems/cameraMovementSystem';
import { gridSystem } from './systems/gridSystem';
import { referenceFrameSystem } from './systems/referenceFrameSystem';
import { cleanupSystem } from './systems/cleanupSystem';
import { renderSystem } from './systems/renderSystem';

type ECSSystem = (world: World, delta: number) => void;

/**
 * Ordered system list. Index = execution priority.
 *
 * Systems 1-2: Camera mirror, camera movement
 * Systems 3-4: Grid follow, reference frame sync
 * System  5:   Cleanup
 * System  6:   Render (MUST BE LAST)
 */
const systems: readonly ECSSystem[] = [
  /* 1 */ cameraInputSystem,
  /* 2 */ cameraMovementSystem,
  /* 3 */ gridSystem,
  /* 4 */ referenceFrameSystem,
  /* 5 */ cleanupSystem,
  /* 6 */ renderSystem,
];

/**
 * Run all ECS systems in order.
 * Called once per frame by the Engine's render loop.
 */
export function runPipeline(world: World, delta: number): void {
  for (const system of systems) {
    system(world, delta);
  }
}
