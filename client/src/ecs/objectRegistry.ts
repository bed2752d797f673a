/**
 * ObjectRegistry: bridge between ECS integer ids and three.js objects.
 *
 * ECS components store only integers (FrameObject.objectId). Systems use
 * this registry to look up the scene object an entity drives.
 *
 * This is a singleton module: import and use directly, no class instantiation.
 */

import type * as THREE from 'three';

const objects = new Map<number, THREE.Object3D>();
let nextId = 0;

/** Register an object and return its id. */
export function registerObject(object: THREE.Object3D): number {
  const id = nextId++;
  objects.set(id, object);
  return id;
}

export function getObject(id: number): THREE.Object3D | undefined {
  return id < 0 ? undefined : objects.get(id);
}

export function unregisterObject(id: number): void {
  objects.delete(id);
}

export function registeredObjectCount(): number {
  return objects.size;
}

/** Clear the registry. Call on engine dispose. */
export function clearObjectRegistry(): void {
  objects.clear();
  nextId = 0;
}
