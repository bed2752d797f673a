/**
 * System #6: RenderSystem
 *
 * MUST be the last system in the pipeline: it produces the final frame.
 *
 * Frequency: every frame
 */

import type { World } from 'bitecs';

export interface FrameRenderer {
  render(): void;
}

let rendererRef: FrameRenderer | null = null;

export function setRendererRef(renderer: FrameRenderer | null): void {
  rendererRef = renderer;
}

export function renderSystem(_world: World, _delta: number): void {
  if (!rendererRef) return;
  rendererRef.render();
}
