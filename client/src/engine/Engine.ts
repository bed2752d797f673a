/**
 * Engine: frame loop and rendering infrastructure.
 *
 * Owns the three.js renderer, scene and camera, and the frame loop.
 * The ECS pipeline (runPipeline) is the sole update path; the Engine
 * handles only:
 *   - Scene, camera, renderer setup at a fixed canvas size
 *   - Lighting for robot meshes
 *   - The frame loop (requestAnimationFrame)
 *   - Dispose callback management
 *
 * Uses WebGPURenderer, which supports both native WebGPU and WebGL2
 * (via forceWebGL fallback).
 */

import * as THREE from 'three';
// Import from three/webgpu, never a deep path: deep paths split three.js
// into separate pre-bundled chunks with duplicated node-material singletons.
import { WebGPURenderer } from 'three/webgpu';
import type { World } from 'bitecs';
import {
  APP_NAME,
  BACKGROUND_COLOR,
  CAMERA_FOV,
  FAR_CLIP,
  MAX_PIXEL_RATIO,
  NEAR_CLIP,
} from '../config';
import { createLogger } from '../core/logger';
import { runPipeline } from '../ecs';

const log = createLogger('Engine');

export interface EngineOptions {
  width: number;
  height: number;
}

// ── Engine ────────────────────────────────────────────────────────

export class Engine {
  readonly scene: THREE.Scene;
  readonly camera: THREE.PerspectiveCamera;
  readonly renderer: InstanceType<typeof WebGPURenderer>;
  readonly clock = new THREE.Clock();

  /** DOM element the renderer canvas lives in. */
  readonly container: HTMLDivElement;

  private readonly world: World;
  private running = false;
  private animationFrameId = 0;
  private disposeCallbacks: (() => void)[] = [];

  constructor(mountPoint: HTMLElement, world: World, options: EngineOptions) {
    this.world = world;

    // Canvas container
    this.container = document.createElement('div');
    this.container.className = 'canvas-container';
    this.container.style.width = `${options.width}px`;
    this.container.style.height = `${options.height}px`;
    mountPoint.appendChild(this.container);

    // Scene
    this.scene = new THREE.Scene();
    this.scene.background = new THREE.Color(BACKGROUND_COLOR);

    // Camera
    this.camera = new THREE.PerspectiveCamera(
      CAMERA_FOV,
      options.width / options.height,
      NEAR_CLIP,
      FAR_CLIP,
    );

    // Renderer: WebGPURenderer with WebGL2 fallback
    this.renderer = new WebGPURenderer({
      antialias: true,
      forceWebGL: !navigator.gpu,
    });
    this.renderer.setPixelRatio(Math.min(window.devicePixelRatio, MAX_PIXEL_RATIO));
    this.renderer.setSize(options.width, options.height);
    this.container.appendChild(this.renderer.domElement);

    // Lighting: soft ambient plus a key light from above the +X/+Y quadrant
    this.scene.add(new THREE.AmbientLight(0xffffff, 0.6));
    const key = new THREE.DirectionalLight(0xffffff, 1.0);
    key.position.set(5, 5, 10);
    this.scene.add(key);

    const backend = navigator.gpu ? 'WebGPU' : 'WebGL2';
    log.info(`${APP_NAME} engine created (${backend} backend, ${options.width}x${options.height})`);
  }

  /**
   * Initialize the renderer backend. Must be called before start().
   * WebGPURenderer requires async initialization for both backends.
   */
  async init(): Promise<void> {
    await this.renderer.init();
    log.info('Renderer initialized');
  }

  // ── Lifecycle Callbacks ─────────────────────────────────────────

  /** Register a callback to run on engine dispose. */
  onDispose(fn: () => void): void {
    this.disposeCallbacks.push(fn);
  }

  /** Draw the current scene once. Called by the render system. */
  render(): void {
    this.renderer.render(this.scene, this.camera);
  }

  setSize(width: number, height: number): void {
    this.container.style.width = `${width}px`;
    this.container.style.height = `${height}px`;
    this.camera.aspect = width / height;
    this.camera.updateProjectionMatrix();
    this.renderer.setSize(width, height);
  }

  // ── Lifecycle ─────────────────────────────────────────────────

  /** Start the render loop. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.clock.start();
    this.animate();
    log.info('Render loop started');
  }

  /** Stop the render loop and dispose everything. */
  stop(): void {
    this.running = false;
    cancelAnimationFrame(this.animationFrameId);

    for (const fn of this.disposeCallbacks) {
      fn();
    }
    this.disposeCallbacks = [];

    this.renderer.dispose();
    this.container.remove();
    log.info('Engine stopped');
  }

  // ── Render Loop ───────────────────────────────────────────────

  private animate = (): void => {
    if (!this.running) return;
    this.animationFrameId = requestAnimationFrame(this.animate);

    // ECS pipeline is the sole update path
    runPipeline(this.world, this.clock.getDelta());
  };
}
