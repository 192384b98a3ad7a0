// ═══════════════════════════════════════════════════════════════════
// GAME LOOP
// One synchronous update per frame, strictly ordered:
//   clock → time scale → abilities (unscaled) → animation (scaled)
//   → camera + effects (unscaled)
// followed by a single render pass:
//   camera transform → character → reset → screen overlays
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import type { CinematicCamera } from '../camera/CinematicCamera.js';
import type { PlayerCharacter } from '../entities/PlayerCharacter.js';
import type { InputManager } from '../input/InputManager.js';
import type { RenderBackend } from '../render/RenderBackend.js';
import type { SimulationContext } from '../time/SimulationContext.js';

export interface FrameScheduler {
  request(callback: (timeMs: number) => void): number;
  cancel(handle: number): void;
}

export const browserFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

export interface GameLoopOptions {
  input?: InputManager | null;
  /** Largest step accepted, in seconds (stalls are clamped) */
  maxDt?: number;
  scheduler?: FrameScheduler;
}

export class GameLoop<TFrame> {
  private readonly input: InputManager | null;
  private readonly maxDt: number;
  private readonly scheduler: FrameScheduler;

  private handle: number | null = null;
  private lastTime: number | null = null;
  private _frame = 0;

  /** Runs after the update, before render (external physics, HUD) */
  onStep?: (dt: number) => void;

  constructor(
    readonly context: SimulationContext,
    readonly camera: CinematicCamera,
    readonly player: PlayerCharacter<TFrame>,
    options: GameLoopOptions = {},
  ) {
    this.input = options.input ?? null;
    this.maxDt = options.maxDt ?? 0.1;
    this.scheduler = options.scheduler ?? browserFrameScheduler;
    if (!camera.target) camera.follow(player.entity);
  }

  get frame(): number { return this._frame; }
  get running(): boolean { return this.handle !== null; }

  /** Advance the simulation by `realDt` unscaled seconds */
  step(realDt: number): void {
    const dt = THREE.MathUtils.clamp(realDt, 0, this.maxDt);
    const { clock, timeScale } = this.context;

    clock.advance(dt);
    timeScale.update(dt);
    this.player.updateAbilities(dt, this.input?.getCombat());
    this.player.updateAnimation(timeScale.scaleTime(dt));
    this.camera.update(dt);

    this.input?.endFrame();
    this._frame++;
    this.onStep?.(dt);
  }

  render(backend: RenderBackend<TFrame>): void {
    this.camera.apply(backend);
    this.player.render(backend);
    this.camera.reset(backend);
    this.camera.renderEffects(backend);
  }

  // ── Scheduling ────────────────────────────────────────────────

  start(backend: RenderBackend<TFrame>): void {
    if (this.handle !== null) return;
    this.lastTime = null;

    const tick = (timeMs: number): void => {
      const dt = this.lastTime === null ? 0 : (timeMs - this.lastTime) / 1000;
      this.lastTime = timeMs;
      this.step(dt);
      this.render(backend);
      if (this.handle !== null) this.handle = this.scheduler.request(tick);
    };
    this.handle = this.scheduler.request(tick);
    console.log('[GameLoop] Started');
  }

  stop(): void {
    if (this.handle === null) return;
    this.scheduler.cancel(this.handle);
    this.handle = null;
    console.log(`[GameLoop] Stopped after ${this._frame} frames`);
  }
}
