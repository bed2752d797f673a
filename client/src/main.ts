/**
 * Application entry point.
 *
 * Reads the log level from the query string (`?log=debug`), creates the
 * canvas, and draws the world frame plus a sample link frame so the
 * keyboard controls have something to look at.
 */

import * as THREE from 'three';
import { initCanvas } from './canvas/initCanvas';
import { createLogger, parseLogLevel, setLogLevel } from './core/logger';
import { composePose } from './core/pose';

const log = createLogger('Main');

async function init(): Promise<void> {
  const level = parseLogLevel(new URLSearchParams(window.location.search).get('log'));
  if (level) setLogLevel(level);

  const mount = document.getElementById('app');
  if (!mount) {
    throw new Error('Missing #app mount point');
  }

  const session = await initCanvas(mount, {
    title: 'Robot Canvas',
    caption: 'Keyboard camera: see the controls below.',
  });

  session.referenceFrames.add(new THREE.Matrix4());
  session.referenceFrames.add(
    composePose(
      new THREE.Vector3(1, 1, 0.5),
      new THREE.Quaternion().setFromAxisAngle(new THREE.Vector3(0, 0, 1), Math.PI / 4),
    ),
  );

  window.addEventListener('beforeunload', () => session.dispose());
}

init().catch((e: unknown) => {
  log.error('Failed to initialize:', e);
});
