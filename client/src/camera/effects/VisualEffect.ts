// ═══════════════════════════════════════════════════════════════════
// VISUAL EFFECT PRIMITIVE
// A positioned, sized, prioritised screen-space rectangle with opacity
// and an eased position tween. Base for letterbox bars and other
// camera overlays.
//
// Tweens interpolate from the position held when animateTo() was
// called and land exactly on the target when the timer expires.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { EasingKind, applyEasing } from '@emberline/shared';
import type { ColorHex, RenderSurface } from '../../render/RenderBackend.js';

interface PositionTween {
  from: THREE.Vector2;
  to: THREE.Vector2;
  duration: number;
  elapsed: number;
  easing: EasingKind;
}

export abstract class VisualEffect {
  /** Top-left corner in screen coordinates */
  readonly position: THREE.Vector2;
  width: number;
  height: number;
  /** Render order, ascending */
  priority: number;
  visible = true;

  private _opacity = 1;
  private tween: PositionTween | null = null;

  constructor(x: number, y: number, width: number, height: number, priority = 0) {
    this.position = new THREE.Vector2(x, y);
    this.width = width;
    this.height = height;
    this.priority = priority;
  }

  get opacity(): number { return this._opacity; }
  set opacity(value: number) { this._opacity = THREE.MathUtils.clamp(value, 0, 1); }

  get isAnimating(): boolean { return this.tween !== null; }

  /** Where the current tween ends, or null when idle */
  get animationTarget(): THREE.Vector2 | null {
    return this.tween ? this.tween.to.clone() : null;
  }

  update(dt: number): void {
    const tween = this.tween;
    if (!tween) return;

    tween.elapsed += dt;
    if (tween.elapsed >= tween.duration) {
      this.position.copy(tween.to);
      this.tween = null;
      return;
    }

    const eased = applyEasing(tween.easing, tween.elapsed / tween.duration);
    this.position.lerpVectors(tween.from, tween.to, eased);
  }

  /** Jump to a position, cancelling any tween */
  moveTo(x: number, y: number): void {
    this.position.set(x, y);
    this.tween = null;
  }

  /** Tween to a position over `duration` seconds (0 jumps) */
  animateTo(x: number, y: number, duration: number, easing: EasingKind = EasingKind.LINEAR): void {
    if (duration <= 0) {
      this.moveTo(x, y);
      return;
    }
    this.tween = {
      from: this.position.clone(),
      to: new THREE.Vector2(x, y),
      duration,
      elapsed: 0,
      easing,
    };
  }

  abstract render(surface: RenderSurface): void;
}

/** Solid colour bar */
export class CameraBar extends VisualEffect {
  color: ColorHex = 0x000000;

  render(surface: RenderSurface): void {
    if (!this.visible) return;
    surface.fillRect(this.position.x, this.position.y, this.width, this.height, this.color, this.opacity);
  }
}
