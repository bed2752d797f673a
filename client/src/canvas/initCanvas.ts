/**
 * Canvas bootstrap: builds the scene, camera controls, widgets and ECS
 * wiring for one robot canvas, and starts the render loop.
 *
 * Layout inside `mount`:
 *   title   (omitted when empty)
 *   canvas
 *   caption (omitted when empty)
 *   widget panel + controls manual
 */

import type { World } from 'bitecs';
import { CameraController } from '../camera/cameraController';
import { convertToZUp } from '../camera/cameraPose';
import { validateCanvasOptions } from '../config';
import type { CanvasOptions } from '../config';
import { createLogger } from '../core/logger';
import {
  world as defaultWorld,
  createCameraEntity,
  setFocusRef,
  clearFocusRef,
  setControllerRef,
  setGridRef,
  setRendererRef,
  clearObjectRegistry,
  runPipeline,
} from '../ecs';
import { Engine } from '../engine/Engine';
import { KeyboardState } from '../input/keyboardState';
import { CanvasConfigError } from '../types';
import { setupUiControls } from '../ui/uiControls';
import type { UiCallbacks, UiControls } from '../ui/uiControls';
import { GraphicsGrid } from '../world/graphicsGrid';
import { ReferenceFrames } from '../world/referenceFrames';

const log = createLogger('Canvas');

export interface CanvasSession {
  /** Ground grid overlay; toggle with grid.setVisibility(). */
  grid: GraphicsGrid;
  engine: Engine;
  camera: CameraController;
  keyboard: KeyboardState;
  ui: UiControls;
  referenceFrames: ReferenceFrames;
  dispose: () => void;
}

export interface InitCanvasDeps {
  world?: World;
  /** Key events source; defaults to window. */
  keyTarget?: EventTarget;
}

function textBlock(className: string, text: string): HTMLDivElement {
  const div = document.createElement('div');
  div.className = className;
  div.textContent = text;
  return div;
}

export async function initCanvas(
  mount: HTMLElement,
  options: Partial<CanvasOptions> = {},
  callbacks: Partial<UiCallbacks> = {},
  deps: InitCanvasDeps = {},
): Promise<CanvasSession> {
  const result = validateCanvasOptions(options);
  if (!result.valid) {
    for (const error of result.errors) {
      log.error(error);
    }
    throw new CanvasConfigError(result.errors);
  }
  const config = result.config;
  const world = deps.world ?? defaultWorld;

  // ── Layout ────────────────────────────────────────────────────
  const titleEl = config.title !== '' ? textBlock('canvas-title', config.title) : null;
  if (titleEl) mount.appendChild(titleEl);

  const engine = new Engine(mount, world, { width: config.width, height: config.height });
  await engine.init();

  const captionEl = config.caption !== '' ? textBlock('canvas-caption', config.caption) : null;
  if (captionEl) mount.appendChild(captionEl);

  // ── Camera ────────────────────────────────────────────────────
  // Up must be +Z before the controller exists (OrbitControls caches it).
  convertToZUp(engine.camera);

  const keyboard = new KeyboardState(deps.keyTarget);
  const camera = new CameraController(engine.camera, engine.renderer.domElement, keyboard);
  camera.resetCamera();

  // ── Scene helpers ─────────────────────────────────────────────
  const grid = new GraphicsGrid(engine.scene);
  if (!config.grid) {
    grid.setVisibility(false);
  }
  const referenceFrames = new ReferenceFrames(world, engine.scene);

  // ── Widgets ───────────────────────────────────────────────────
  const ui = setupUiControls(mount, {
    ...callbacks,
    onResetCamera: () => {
      camera.resetCamera();
      callbacks.onResetCamera?.();
    },
  });

  // ── Wire ECS system refs ──────────────────────────────────────
  createCameraEntity(world);
  setFocusRef(camera.orbitControls.target);
  setControllerRef(camera);
  setGridRef(grid);
  setRendererRef(engine);

  engine.onDispose(() => {
    setRendererRef(null);
    setGridRef(null);
    setControllerRef(null);
    clearFocusRef();
    referenceFrames.dispose();
    // One more pass so cleanupSystem releases the gizmos.
    runPipeline(world, 0);
    clearObjectRegistry();
    ui.dispose();
    grid.dispose();
    camera.dispose();
    keyboard.dispose();
    titleEl?.remove();
    captionEl?.remove();
  });

  engine.start();
  log.info('Canvas ready');

  return {
    grid,
    engine,
    camera,
    keyboard,
    ui,
    referenceFrames,
    dispose: () => engine.stop(),
  };
}
