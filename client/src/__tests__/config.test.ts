import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
  INPUT_RATE_HZ,
  INPUT_TICK_SECONDS,
  PAN_FACTOR,
  validateCanvasOptions,
} from '../config';
import { CanvasConfigError } from '../types';

describe('config', () => {
  it('loads default canvas options with valid values', () => {
    const result = validateCanvasOptions();
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.config).toEqual({
      height: 500,
      width: 1000,
      title: '',
      caption: '',
      grid: true,
    });
  });

  it('accepts valid overrides', () => {
    const result = validateCanvasOptions({ height: 300, title: 'Arm', grid: false });
    expect(result.valid).toBe(true);
    expect(result.config.height).toBe(300);
    expect(result.config.width).toBe(DEFAULT_CANVAS_WIDTH);
    expect(result.config.title).toBe('Arm');
    expect(result.config.grid).toBe(false);
  });

  it('fails when sizes are invalid', () => {
    const result = validateCanvasOptions({ height: -1, width: 12.5 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['height must be greater than 0', 'width must be an integer']);
  });

  it('rejects zero, NaN and infinite sizes', () => {
    expect(validateCanvasOptions({ height: 0 }).errors).toEqual(['height must be greater than 0']);
    expect(validateCanvasOptions({ width: Number.NaN }).errors).toEqual(['width must be greater than 0']);
    expect(validateCanvasOptions({ width: Infinity }).errors).toEqual(['width must be finite']);
  });

  it('exports canvas and input constants', () => {
    expect(DEFAULT_CANVAS_HEIGHT).toBe(500);
    expect(PAN_FACTOR).toBe(0.02);
    expect(INPUT_RATE_HZ).toBe(30);
    expect(INPUT_TICK_SECONDS).toBeCloseTo(1 / 30, 12);
  });
});

describe('CanvasConfigError', () => {
  it('carries every validation error', () => {
    const error = new CanvasConfigError(['height must be greater than 0', 'width must be finite']);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CanvasConfigError');
    expect(error.errors).toHaveLength(2);
    expect(error.message).toBe(
      'Invalid canvas options: height must be greater than 0; width must be finite',
    );
  });
});
