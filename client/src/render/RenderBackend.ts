// ═══════════════════════════════════════════════════════════════════
// RENDER BOUNDARY
// The core never touches pixels. It hands a world-to-screen transform
// and a list of draw calls to whatever backend the host provides.
//
//   RenderSurface         → overlays (flash, letterbox bars, hitboxes)
//   RenderBackend<TFrame> → adds sprite frame blits
// ═══════════════════════════════════════════════════════════════════

import type * as THREE from 'three';

/** 0xRRGGBB */
export type ColorHex = number;

export interface RenderSurface {
  /** Push a world-to-screen transform (replaces the current one until popped) */
  pushTransform(matrix: THREE.Matrix3): void;
  /** Restore the transform active before the matching push */
  popTransform(): void;
  fillRect(x: number, y: number, width: number, height: number, color: ColorHex, alpha?: number): void;
  strokeRect(x: number, y: number, width: number, height: number, color: ColorHex, alpha?: number): void;
  drawText(text: string, x: number, y: number, color: ColorHex): void;
}

export interface RenderBackend<TFrame> extends RenderSurface {
  /**
   * Blit a frame. A negative width draws the frame mirrored, spanning
   * [x + width, x] horizontally.
   */
  drawImage(frame: TFrame, x: number, y: number, width: number, height: number): void;
}

export function colorToCss(color: ColorHex): string {
  return `#${(color & 0xffffff).toString(16).padStart(6, '0')}`;
}
