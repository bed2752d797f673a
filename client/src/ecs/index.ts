/**
 * ECS public API.
 *
 * Re-exports the pieces needed by the Engine and bootstrap code.
 */

export { world, MAX_ENTITIES } from './world';
export { runPipeline } from './pipeline';

// Components
export {
  Position, Orientation, Focus,
  FrameObject, Visible,
  IsCamera, IsReferenceFrame, PendingRemoval,
} from './components';

// Archetypes
export {
  createCameraEntity, createReferenceFrameEntity,
  addCameraArchetype, addReferenceFrameArchetype,
} from './archetypes';

// ObjectRegistry
export {
  registerObject, getObject, unregisterObject,
  registeredObjectCount, clearObjectRegistry,
} from './objectRegistry';

// System configuration setters (called during canvas init)
export { setFocusRef, clearFocusRef } from './systems/cameraInputSystem';
export { setControllerRef } from './systems/cameraMovementSystem';
export { setGridRef } from './systems/gridSystem';
export { setRendererRef } from './systems/renderSystem';
export type { FrameRenderer } from './systems/renderSystem';
