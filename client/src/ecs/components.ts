/**
 * ECS component definitions (bitECS v0.4.0 API).
 *
 * Components are plain objects with pre-allocated TypedArray stores,
 * indexed by entity ID (eid). No three.js objects: data only.
 *
 * Convention: Float64Array for poses (kept at the precision of the
 *             three.js math they mirror), Uint8Array for booleans,
 *             Int32Array for registry ids (-1 = none).
 */

import { MAX_ENTITIES } from './world';

const N = MAX_ENTITIES;

// ── Spatial ──────────────────────────────────────────────────────

/** World-space position. */
export const Position = {
  x: new Float64Array(N),
  y: new Float64Array(N),
  z: new Float64Array(N),
};

/** World-space orientation as a unit quaternion. */
export const Orientation = {
  x: new Float64Array(N),
  y: new Float64Array(N),
  z: new Float64Array(N),
  w: new Float64Array(N),
};

/** Point the camera looks at and orbits around. */
export const Focus = {
  x: new Float64Array(N),
  y: new Float64Array(N),
  z: new Float64Array(N),
};

// ── Scene Objects ────────────────────────────────────────────────

/** Id of the three.js object in objectRegistry, -1 = none. */
export const FrameObject = {
  objectId: new Int32Array(N),
};

/** Visibility flag. */
export const Visible = {
  value: new Uint8Array(N),
};

// ── Tags (marker components, no data) ────────────────────────────

export const IsCamera = {};
export const IsReferenceFrame = {};
export const PendingRemoval = {};
