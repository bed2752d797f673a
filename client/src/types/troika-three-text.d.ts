// troika-three-text ships no type declarations; this covers the surface the grid uses.
declare module 'troika-three-text' {
  import type { Color, Mesh } from 'three';

  export class Text extends Mesh {
    text: string;
    font: string | null;
    fontSize: number;
    color: number | string | Color | null;
    anchorX: number | 'left' | 'center' | 'right';
    anchorY: number | 'top' | 'top-baseline' | 'middle' | 'bottom-baseline' | 'bottom';
    sync(callback?: () => void): void;
    dispose(): void;
  }
}
