// ═══════════════════════════════════════════════════════════════════
// CAMERA 2D
// Base side-view camera: a viewport-sized window whose top-left corner
// sits at `position` in world space, optionally following a target.
// Produces the world-to-screen transform for the render pass.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import type { RenderSurface } from '../render/RenderBackend.js';

/** Anything with a world position the camera can track */
export interface CameraTarget {
  readonly position: THREE.Vector2;
}

export interface Camera2DOptions {
  /** Proportional follow rate per second (higher = snappier) */
  followRate?: number;
}

export class Camera2D {
  readonly width: number;
  readonly height: number;
  /** World position of the viewport's top-left corner */
  readonly position = new THREE.Vector2();

  followRate: number;
  target: CameraTarget | null = null;

  constructor(width: number, height: number, options: Camera2DOptions = {}) {
    if (width <= 0 || height <= 0) {
      throw new Error(`[Camera2D] Viewport must be positive, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.followRate = options.followRate ?? 8;
  }

  // ── Tracking ──────────────────────────────────────────────────

  follow(target: CameraTarget | null): void {
    this.target = target;
  }

  /** Centre the viewport on a world point */
  centerOn(x: number, y: number): void {
    this.position.set(x - this.width / 2, y - this.height / 2);
  }

  update(dt: number): void {
    if (this.target) {
      this.approach(this.target.position, this.followRate * dt);
    }
  }

  /** Move the view centre toward a world point by fraction `t` (clamped to 1) */
  protected approach(point: THREE.Vector2, t: number): void {
    const alpha = THREE.MathUtils.clamp(t, 0, 1);
    this.position.x = THREE.MathUtils.lerp(this.position.x, point.x - this.width / 2, alpha);
    this.position.y = THREE.MathUtils.lerp(this.position.y, point.y - this.height / 2, alpha);
  }

  // ── Transform ─────────────────────────────────────────────────

  /** World point at the centre of the view */
  get center(): THREE.Vector2 {
    return new THREE.Vector2(this.position.x + this.width / 2, this.position.y + this.height / 2);
  }

  /** World-to-screen transform (identity scale for the base camera) */
  getTransform(): THREE.Matrix3 {
    return new THREE.Matrix3().set(
      1, 0, -this.position.x,
      0, 1, -this.position.y,
      0, 0, 1,
    );
  }

  worldToScreen(point: THREE.Vector2): THREE.Vector2 {
    return point.clone().applyMatrix3(this.getTransform());
  }

  /** Push the transform before drawing world-space content */
  apply(surface: RenderSurface): void {
    surface.pushTransform(this.getTransform());
  }

  /** Pop the transform pushed by apply() */
  reset(surface: RenderSurface): void {
    surface.popTransform();
  }
}
