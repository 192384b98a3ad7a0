// ═══════════════════════════════════════════════════════════════════
// TIME SCALE CONTROLLER
// Scalar applied to the elapsed time fed into gameplay systems, used
// for slow-motion. Owned by the simulation context and passed to the
// systems that drive it; there is no global instance.
//
// A transition ramps from 1.0 toward the target with a cubic ease.
// With a return delay, once the delay elapses the scale ramps back to
// 1.0 over the same transition time and lands on exactly 1.0.
//
// USAGE:
//   timeScale.setTimeScale(0.3, 0.1, 1.0);   // 0.3x, ramp 0.1s, return after 1s
//   // each frame, with unscaled dt:
//   timeScale.update(dt);
//   const gameDt = timeScale.scaleTime(dt);
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { easeInOutCubic } from '@emberline/shared';

export class TimeScaleController {
  private _scale = 1.0;
  private _target = 1.0;
  private transitionDuration = 0;
  private transitionTimer = 0;
  private returnDelayTimer = 0;
  private returning = false;

  /** Current multiplier */
  get scale(): number { return this._scale; }

  /** Scale the current transition is heading to (1.0 while returning) */
  get target(): number { return this.returning ? 1.0 : this._target; }

  get isTransitioning(): boolean { return this.transitionTimer > 0; }

  get isReturning(): boolean { return this.returning; }

  /** Seconds until the automatic return starts (0 if none pending) */
  get returnPending(): number { return this.returnDelayTimer; }

  // ── Control ───────────────────────────────────────────────────

  /**
   * @param scale          Target multiplier (1.0 is normal)
   * @param transitionTime Ramp duration in seconds (0 snaps)
   * @param returnAfter    Delay before ramping back to 1.0 (0 keeps the target)
   */
  setTimeScale(scale: number, transitionTime: number, returnAfter: number): void {
    this._target = Math.max(0, scale);
    this.transitionDuration = Math.max(0, transitionTime);
    this.transitionTimer = this.transitionDuration;
    this.returnDelayTimer = Math.max(0, returnAfter);
    this.returning = false;

    if (this.transitionDuration === 0) {
      this._scale = this._target;
    }
  }

  /** Back to identity, dropping any transition or pending return */
  resetTimeScale(): void {
    this._scale = 1.0;
    this._target = 1.0;
    this.transitionDuration = 0;
    this.transitionTimer = 0;
    this.returnDelayTimer = 0;
    this.returning = false;
  }

  reset(): void {
    this.resetTimeScale();
  }

  // ── Update (unscaled dt) ──────────────────────────────────────

  update(dt: number): void {
    if (this.returnDelayTimer > 0) {
      this.returnDelayTimer -= dt;
      if (this.returnDelayTimer <= 0) {
        this.returnDelayTimer = 0;
        this.returning = true;
        this.transitionTimer = this.transitionDuration;
        if (this.transitionDuration === 0) {
          this.finishReturn();
          return;
        }
      }
    }

    if (this.transitionTimer <= 0) return;

    const progress = 1 - this.transitionTimer / this.transitionDuration;
    const eased = easeInOutCubic(THREE.MathUtils.clamp(progress, 0, 1));
    this._scale = this.returning
      ? THREE.MathUtils.lerp(this._target, 1.0, eased)
      : THREE.MathUtils.lerp(1.0, this._target, eased);

    this.transitionTimer -= dt;
    if (this.transitionTimer <= 0) {
      this.transitionTimer = 0;
      if (this.returning) {
        this.finishReturn();
      } else {
        this._scale = this._target;
      }
    }
  }

  /** Apply the current scale to an elapsed-time value */
  scaleTime(dt: number): number {
    return dt * this._scale;
  }

  private finishReturn(): void {
    this._scale = 1.0;
    this._target = 1.0;
    this.returning = false;
  }

  getDebugInfo(): string {
    const phase = this.returning ? 'returning' : this.isTransitioning ? 'ramping' : 'steady';
    return `time x${this._scale.toFixed(2)} → ${this.target.toFixed(2)} (${phase})`;
  }
}
