// ═══════════════════════════════════════════════════════════════════
// CINEMATIC CAMERA
// Camera2D plus the moment-to-moment cinematic layer:
//   • Eased anisotropic zoom with optional delayed auto-reset
//   • Focus target that overrides normal follow
//   • Frame-counted screen flash
//   • The effects manager (letterbox + overlays)
//
// Updated on unscaled time so slow motion never stretches a cinematic.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import {
  CAMERA_FOCUS_RATE,
  ZOOM_RESET_DURATION,
  easeInOutQuad,
} from '@emberline/shared';
import type { ColorHex, RenderSurface } from '../render/RenderBackend.js';
import { Camera2D, type Camera2DOptions } from './Camera2D.js';
import { CameraEffectsManager } from './effects/CameraEffectsManager.js';

export interface CinematicCameraOptions extends Camera2DOptions {
  /** Proportional approach rate toward a focus target (per second) */
  focusRate?: number;
  /** Transition used when a delayed reset returns the zoom to 1 */
  zoomResetDuration?: number;
}

interface FlashState {
  framesRemaining: number;
  color: ColorHex;
  alpha: number;
}

export class CinematicCamera extends Camera2D {
  readonly zoom = new THREE.Vector2(1, 1);
  readonly targetZoom = new THREE.Vector2(1, 1);

  private readonly focusRate: number;
  private readonly zoomResetDuration: number;
  private readonly effectsManager: CameraEffectsManager;

  // Zoom transition
  private zoomDuration = 0;
  private zoomTimer = 0;
  private zooming = false;
  private autoReset = false;
  private resetDelay = 0;
  private resetTimer = 0;
  private resetPending = false;

  private focus: THREE.Vector2 | null = null;
  private flashState: FlashState | null = null;

  constructor(width: number, height: number, options: CinematicCameraOptions = {}) {
    super(width, height, options);
    this.focusRate = options.focusRate ?? CAMERA_FOCUS_RATE;
    this.zoomResetDuration = options.zoomResetDuration ?? ZOOM_RESET_DURATION;
    this.effectsManager = new CameraEffectsManager(width, height);
  }

  // ── Getters ───────────────────────────────────────────────────

  get effects(): CameraEffectsManager { return this.effectsManager; }
  get isZooming(): boolean { return this.zooming; }
  get isZoomResetPending(): boolean { return this.resetPending; }
  get focusTarget(): THREE.Vector2 | null { return this.focus; }
  get isFlashing(): boolean { return this.flashState !== null; }
  get flashFramesRemaining(): number { return this.flashState?.framesRemaining ?? 0; }

  // ── Zoom ──────────────────────────────────────────────────────

  /**
   * Ease toward (x, y) over `duration` seconds. Interpolation runs from
   * the current zoom, so re-targeting mid-transition never snaps.
   */
  setZoom(x: number, y: number, duration: number): void {
    this.targetZoom.set(x, y);
    this.autoReset = false;
    this.resetPending = false;

    if (duration <= 0) {
      this.zoom.set(x, y);
      this.zooming = false;
      this.zoomTimer = 0;
      this.zoomDuration = 0;
      return;
    }
    this.zoomDuration = duration;
    this.zoomTimer = duration;
    this.zooming = true;
  }

  /** setZoom, then return to (1, 1) `resetDelay` seconds after arriving */
  setZoomWithReset(x: number, y: number, duration: number, resetDelay: number): void {
    this.setZoom(x, y, duration);
    this.autoReset = true;
    this.resetDelay = Math.max(0, resetDelay);
    if (!this.zooming) this.armReset();
  }

  // ── Focus ─────────────────────────────────────────────────────

  setFocusTarget(pos: THREE.Vector2, immediate = false): void {
    this.focus = pos.clone();
    if (immediate) this.centerOn(pos.x, pos.y);
  }

  clearFocus(): void {
    this.focus = null;
  }

  // ── Flash ─────────────────────────────────────────────────────

  /** Full-screen overlay for exactly `frames` update calls */
  flash(frames: number, color: ColorHex = 0xffffff, alpha = 1): void {
    if (frames <= 0) {
      this.flashState = null;
      return;
    }
    this.flashState = {
      framesRemaining: Math.floor(frames),
      color,
      alpha: THREE.MathUtils.clamp(alpha, 0, 1),
    };
  }

  // ── Composite ─────────────────────────────────────────────────

  /**
   * Ultimate-attack treatment: letterbox in and out, a short flash, and
   * a squash zoom that starts relaxing half a second before the end.
   */
  createUltimateAttackEffect(duration: number): void {
    this.effectsManager.createUltimateAttackEffect(duration);
    this.flash(3, 0xffffff, 0.5);
    this.setZoomWithReset(1.2, 0.8, 0.1, duration - 0.5);
  }

  // ── Frame ─────────────────────────────────────────────────────

  override update(dt: number): void {
    // Focus overrides follow
    if (!this.focus) super.update(dt);

    this.updateZoom(dt);
    this.updateZoomReset(dt);

    if (this.focus) {
      this.approach(this.focus, this.focusRate * dt);
    }

    if (this.flashState) {
      this.flashState.framesRemaining--;
      if (this.flashState.framesRemaining <= 0) this.flashState = null;
    }

    this.effectsManager.update(dt);
  }

  private updateZoom(dt: number): void {
    if (!this.zooming) return;

    this.zoomTimer -= dt;
    if (this.zoomTimer <= 0) {
      this.zoomTimer = 0;
      this.zoom.copy(this.targetZoom);
      this.zooming = false;
      if (this.autoReset) this.armReset();
      return;
    }

    const progress = 1 - this.zoomTimer / this.zoomDuration;
    const eased = easeInOutQuad(progress);
    this.zoom.lerp(this.targetZoom, eased);
  }

  private updateZoomReset(dt: number): void {
    if (!this.resetPending) return;

    this.resetTimer -= dt;
    if (this.resetTimer <= 0) {
      this.resetPending = false;
      this.setZoom(1, 1, this.zoomResetDuration);
    }
  }

  private armReset(): void {
    this.autoReset = false;
    this.resetPending = true;
    this.resetTimer = this.resetDelay;
  }

  // ── Render ────────────────────────────────────────────────────

  /** translate(viewport centre) · scale(zoom) · translate(-view centre) */
  override getTransform(): THREE.Matrix3 {
    const cx = this.position.x + this.width / 2;
    const cy = this.position.y + this.height / 2;
    const zx = this.zoom.x;
    const zy = this.zoom.y;
    return new THREE.Matrix3().set(
      zx, 0, this.width / 2 - cx * zx,
      0, zy, this.height / 2 - cy * zy,
      0, 0, 1,
    );
  }

  /** Screen-space overlays: flash first, then effects and letterbox */
  renderEffects(surface: RenderSurface): void {
    if (this.flashState) {
      surface.fillRect(0, 0, this.width, this.height, this.flashState.color, this.flashState.alpha);
    }
    this.effectsManager.render(surface);
  }

  getDebugInfo(): string {
    return [
      `zoom=${this.zoom.x.toFixed(2)},${this.zoom.y.toFixed(2)}`,
      `focus=${this.focus ? `${this.focus.x.toFixed(0)},${this.focus.y.toFixed(0)}` : 'none'}`,
      `flash=${this.flashFramesRemaining}`,
      this.effectsManager.getDebugInfo(),
    ].join(' ');
  }
}
