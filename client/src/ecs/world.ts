/**
 * ECS world singleton.
 *
 * A single bitECS world holds the camera entity and every reference frame.
 * Created once at startup, before the render loop begins.
 */

import { createWorld } from 'bitecs';

/**
 * Maximum entity count. Component TypedArrays in components.ts are
 * pre-allocated to this size; a robot with a few hundred links fits easily.
 */
export const MAX_ENTITIES = 4_096;

/** The singleton ECS world. */
export const world = createWorld();
