/**
 * Global constants for the robot canvas.
 * All magic numbers live here, nowhere else.
 */

// ── Canvas ──────────────────────────────────────────────────────
export const APP_NAME = 'Robot Canvas';
export const DEFAULT_CANVAS_HEIGHT = 500;
export const DEFAULT_CANVAS_WIDTH = 1000;
export const BACKGROUND_COLOR = 0xffffff;
export const MAX_PIXEL_RATIO = 2;

// ── Camera ──────────────────────────────────────────────────────
export const CAMERA_FOV = 60;
export const NEAR_CLIP = 0.01;
export const FAR_CLIP = 1000;
/** Camera starts equidistant from the origin on all three axes. */
export const DEFAULT_CAMERA_POSITION = [10, 10, 10] as const;
export const WORLD_UP = [0, 0, 1] as const;

// ── Keyboard Control ────────────────────────────────────────────
/** Pan offset as a fraction of the camera basis vectors (which carry the focus distance). */
export const PAN_FACTOR = 0.02;
export const ROTATION_STEP_DEG = 1;
export const INPUT_RATE_HZ = 30;
export const INPUT_TICK_SECONDS = 1 / INPUT_RATE_HZ;

// ── Scene Helpers ───────────────────────────────────────────────
export const FRAME_ARROW_LENGTH = 0.25;
export const FRAME_AXIS_COLORS = {
  X: 0xff0000,
  Y: 0x00ff00,
  Z: 0x0000ff,
} as const;

export const GRID_CELLS = 10;
export const GRID_CELL_SIZE = 1;
export const GRID_COLOR = 0x888888;
export const GRID_CENTER_COLOR = 0x444444;
export const GRID_LABEL_SIZE = 0.2;
export const GRID_LABEL_COLOR = 0x000000;

// ── UI ──────────────────────────────────────────────────────────
export const ROBOT_CHOICES = ['r1', 'r2'] as const;
export const DEFAULT_OPACITY = 1;

// ── Canvas Options Loading ──────────────────────────────────────
export interface CanvasOptions {
  /** Canvas height in pixels. */
  height: number;
  /** Canvas width in pixels. */
  width: number;
  /** Shown above the canvas when non-empty. */
  title: string;
  /** Shown below the canvas when non-empty. */
  caption: string;
  /** Whether the ground grid starts visible. */
  grid: boolean;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: CanvasOptions;
  errors: string[];
}

const DEFAULT_CANVAS_OPTIONS: CanvasOptions = {
  height: DEFAULT_CANVAS_HEIGHT,
  width: DEFAULT_CANVAS_WIDTH,
  title: '',
  caption: '',
  grid: true,
};

const INTEGER_FIELDS = ['height', 'width'] as const;
const STRING_FIELDS = ['title', 'caption'] as const;

function isPositiveInt(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  if (!Number.isInteger(value)) {
    errors.push(`${field} must be an integer`);
    return false;
  }
  return true;
}

/**
 * Merge defaults with overrides and validate the resulting canvas options.
 */
export function validateCanvasOptions(
  overrides: Partial<CanvasOptions> = {},
): ConfigValidationResult {
  const config: CanvasOptions = { ...DEFAULT_CANVAS_OPTIONS, ...overrides };
  const errors: string[] = [];

  for (const field of INTEGER_FIELDS) {
    isPositiveInt(config[field], field, errors);
  }

  for (const field of STRING_FIELDS) {
    if (typeof config[field] !== 'string') {
      errors.push(`${field} must be a string`);
    }
  }

  if (typeof config.grid !== 'boolean') {
    errors.push('grid must be a boolean');
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}
