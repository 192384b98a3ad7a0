// ═══════════════════════════════════════════════════════════════════
// CANVAS 2D BACKEND
// RenderBackend over a CanvasRenderingContext2D. Transforms are kept
// on the context's save/restore stack.
// ═══════════════════════════════════════════════════════════════════

import type * as THREE from 'three';
import { colorToCss, type ColorHex, type RenderBackend } from './RenderBackend.js';

/** The slice of CanvasRenderingContext2D this backend drives */
export interface Canvas2DLike<TImage = CanvasImageSource> {
  save(): void;
  restore(): void;
  setTransform(a: number, b: number, c: number, d: number, e: number, f: number): void;
  translate(x: number, y: number): void;
  scale(x: number, y: number): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
  fillText(text: string, x: number, y: number): void;
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void;
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  globalAlpha: number;
}

export class CanvasRenderBackend<TImage = CanvasImageSource> implements RenderBackend<TImage> {
  private depth = 0;

  constructor(private readonly ctx: Canvas2DLike<TImage>) {}

  pushTransform(matrix: THREE.Matrix3): void {
    const e = matrix.elements;
    this.ctx.save();
    // Matrix3 is column-major: (a, b, c, d, e, f) = (e0, e1, e3, e4, e6, e7)
    this.ctx.setTransform(e[0], e[1], e[3], e[4], e[6], e[7]);
    this.depth++;
  }

  popTransform(): void {
    if (this.depth === 0) return;
    this.ctx.restore();
    this.depth--;
  }

  fillRect(x: number, y: number, width: number, height: number, color: ColorHex, alpha = 1): void {
    this.withAlpha(alpha, () => {
      this.ctx.fillStyle = colorToCss(color);
      this.ctx.fillRect(x, y, width, height);
    });
  }

  strokeRect(x: number, y: number, width: number, height: number, color: ColorHex, alpha = 1): void {
    this.withAlpha(alpha, () => {
      this.ctx.strokeStyle = colorToCss(color);
      this.ctx.strokeRect(x, y, width, height);
    });
  }

  drawText(text: string, x: number, y: number, color: ColorHex): void {
    this.ctx.fillStyle = colorToCss(color);
    this.ctx.fillText(text, x, y);
  }

  drawImage(frame: TImage, x: number, y: number, width: number, height: number): void {
    if (width >= 0) {
      this.ctx.drawImage(frame, x, y, width, height);
      return;
    }
    // Mirrored: flip about the frame's own right edge
    this.ctx.save();
    this.ctx.translate(x, y);
    this.ctx.scale(-1, 1);
    this.ctx.drawImage(frame, 0, 0, -width, height);
    this.ctx.restore();
  }

  private withAlpha(alpha: number, draw: () => void): void {
    const previous = this.ctx.globalAlpha;
    this.ctx.globalAlpha = previous * alpha;
    draw();
    this.ctx.globalAlpha = previous;
  }
}
