// ═══════════════════════════════════════════════════════════════════
// LETTERBOX EFFECT
// Two black bars that slide in from the top and bottom edges to frame
// cinematic moments, and slide back out of view when hidden.
// ═══════════════════════════════════════════════════════════════════

import {
  EasingKind,
  LETTERBOX_DEFAULT_SIZE,
  LETTERBOX_PRIORITY,
} from '@emberline/shared';
import type { RenderSurface } from '../../render/RenderBackend.js';
import { CameraBar } from './VisualEffect.js';

export class LetterboxEffect {
  readonly topBar: CameraBar;
  readonly bottomBar: CameraBar;

  private active = false;
  private size = LETTERBOX_DEFAULT_SIZE;

  constructor(
    screenWidth: number,
    private readonly screenHeight: number,
  ) {
    const barHeight = this.barHeight;
    this.topBar = new CameraBar(0, -barHeight, screenWidth, barHeight, LETTERBOX_PRIORITY);
    this.bottomBar = new CameraBar(0, screenHeight, screenWidth, barHeight, LETTERBOX_PRIORITY);
  }

  /** Bar height in pixels for the current size */
  get barHeight(): number {
    return Math.floor(this.screenHeight * this.size);
  }

  get letterboxSize(): number { return this.size; }

  get isActive(): boolean { return this.active; }

  get isAnimating(): boolean {
    return this.topBar.isAnimating || this.bottomBar.isAnimating;
  }

  /** Slide the bars in (no-op while shown) */
  show(duration: number): void {
    if (this.active) return;
    const barHeight = this.barHeight;
    this.topBar.animateTo(0, 0, duration, EasingKind.EASE_OUT);
    this.bottomBar.animateTo(0, this.screenHeight - barHeight, duration, EasingKind.EASE_OUT);
    this.active = true;
  }

  /** Slide the bars out (no-op while hidden) */
  hide(duration: number): void {
    if (!this.active) return;
    const barHeight = this.barHeight;
    this.topBar.animateTo(0, -barHeight, duration, EasingKind.EASE_IN);
    this.bottomBar.animateTo(0, this.screenHeight, duration, EasingKind.EASE_IN);
    this.active = false;
  }

  /**
   * Resize the bars as a fraction of the viewport height, clamped to
   * [0, 0.5]. Bars jump to their resting place for the current state.
   */
  setLetterboxSize(size: number): void {
    this.size = Math.max(0, Math.min(0.5, size));
    const barHeight = this.barHeight;
    this.topBar.height = barHeight;
    this.bottomBar.height = barHeight;

    if (this.active) {
      this.topBar.moveTo(0, 0);
      this.bottomBar.moveTo(0, this.screenHeight - barHeight);
    } else {
      this.topBar.moveTo(0, -barHeight);
      this.bottomBar.moveTo(0, this.screenHeight);
    }
  }

  update(dt: number): void {
    this.topBar.update(dt);
    this.bottomBar.update(dt);
  }

  render(surface: RenderSurface): void {
    this.topBar.render(surface);
    this.bottomBar.render(surface);
  }
}
