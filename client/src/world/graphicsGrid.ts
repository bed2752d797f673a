/**
 * GraphicsGrid: ground grid in the XY plane (+Z up) with numbered axis labels.
 *
 * The grid re-centres on the integer cell under the camera focus so it stays
 * under whatever the camera is looking at; labels follow with the new
 * coordinates. Label text is SDF-rendered with troika-three-text.
 */

import * as THREE from 'three';
import { Text } from 'troika-three-text';
import {
  GRID_CELL_SIZE,
  GRID_CELLS,
  GRID_CENTER_COLOR,
  GRID_COLOR,
  GRID_LABEL_COLOR,
  GRID_LABEL_SIZE,
} from '../config';
import { viewerEvents } from '../core/eventBus';

/** Labels sit this far outside the grid edge, in cells. */
const LABEL_OFFSET = 0.4;

export interface GridLabel {
  readonly axis: 'x' | 'y';
  readonly text: Text;
}

export class GraphicsGrid {
  readonly root: THREE.Group;

  private readonly helper: THREE.GridHelper;
  private readonly labels: GridLabel[] = [];
  private readonly center = new THREE.Vector2(Number.NaN, Number.NaN);
  private readonly half = GRID_CELLS / 2;

  constructor(parent: THREE.Object3D) {
    this.root = new THREE.Group();
    this.root.name = 'graphics-grid';

    this.helper = new THREE.GridHelper(
      GRID_CELLS * GRID_CELL_SIZE,
      GRID_CELLS,
      GRID_CENTER_COLOR,
      GRID_COLOR,
    );
    // GridHelper lies in XZ; stand it in XY for the +Z-up convention.
    this.helper.rotation.x = Math.PI / 2;
    this.root.add(this.helper);

    for (const axis of ['x', 'y'] as const) {
      for (let i = -this.half; i <= this.half; i++) {
        const text = new Text();
        text.fontSize = GRID_LABEL_SIZE;
        text.color = GRID_LABEL_COLOR;
        text.anchorX = 'center';
        text.anchorY = 'middle';
        this.labels.push({ axis, text });
        this.root.add(text);
      }
    }

    parent.add(this.root);
    this.update(0, 0);
  }

  get visible(): boolean {
    return this.root.visible;
  }

  /** Grid centre cell in world units. */
  get centre(): { x: number; y: number } {
    return { x: this.center.x, y: this.center.y };
  }

  get labelCount(): number {
    return this.labels.length;
  }

  labelTexts(axis: 'x' | 'y'): string[] {
    return this.labels.filter((label) => label.axis === axis).map((label) => label.text.text);
  }

  setVisibility(visible: boolean): void {
    if (this.root.visible === visible) return;
    this.root.visible = visible;
    viewerEvents.emit('grid_visibility_changed', visible);
  }

  /**
   * Re-centre on the cell under (focusX, focusY).
   * Returns true when the grid moved.
   */
  update(focusX: number, focusY: number): boolean {
    const cx = Math.round(focusX / GRID_CELL_SIZE) * GRID_CELL_SIZE;
    const cy = Math.round(focusY / GRID_CELL_SIZE) * GRID_CELL_SIZE;
    if (cx === this.center.x && cy === this.center.y) return false;

    this.center.set(cx, cy);
    this.helper.position.set(cx, cy, 0);
    this.relabel();
    return true;
  }

  dispose(): void {
    this.helper.dispose();
    for (const { text } of this.labels) {
      text.dispose();
    }
    this.labels.length = 0;
    this.root.removeFromParent();
  }

  private relabel(): void {
    const edge = (this.half + LABEL_OFFSET) * GRID_CELL_SIZE;
    let xIndex = -this.half;
    let yIndex = -this.half;

    for (const { axis, text } of this.labels) {
      if (axis === 'x') {
        const x = this.center.x + xIndex * GRID_CELL_SIZE;
        text.text = formatCoordinate(x);
        text.position.set(x, this.center.y - edge, 0);
        xIndex++;
      } else {
        const y = this.center.y + yIndex * GRID_CELL_SIZE;
        text.text = formatCoordinate(y);
        text.position.set(this.center.x - edge, y, 0);
        yIndex++;
      }
      text.sync();
    }
  }
}

function formatCoordinate(value: number): string {
  // Avoid "-0"
  return String(value === 0 ? 0 : Number(value.toFixed(2)));
}
