// ═══════════════════════════════════════════════════════════════════
// CAMERA EFFECTS MANAGER
// Priority-ordered screen overlays plus the letterbox singleton.
//
// Deferred work (e.g. hiding the letterbox when a cinematic ends) is
// kept as scheduled-event records on the manager's own timeline and
// fired from update(), so everything stays on the one synchronous
// update/render cycle and fires even after the requester is gone.
// ═══════════════════════════════════════════════════════════════════

import {
  LETTERBOX_TRANSITION,
  LETTERBOX_ULTIMATE_SIZE,
} from '@emberline/shared';
import type { RenderSurface } from '../../render/RenderBackend.js';
import { LetterboxEffect } from './LetterboxEffect.js';
import type { VisualEffect } from './VisualEffect.js';

// ── Scheduled events ──────────────────────────────────────────────

export type ScheduledAction =
  | { type: 'hideLetterbox'; duration: number }
  | { type: 'showLetterbox'; duration: number }
  | { type: 'removeEffect'; effect: VisualEffect };

export interface ScheduledEvent {
  readonly id: number;
  /** Manager time (seconds) at which the action fires */
  readonly at: number;
  readonly action: ScheduledAction;
}

// ═══════════════════════════════════════════════════════════════════

export class CameraEffectsManager {
  readonly letterbox: LetterboxEffect;

  private effects: VisualEffect[] = [];
  private scheduled: ScheduledEvent[] = [];
  private nextEventId = 1;
  private time = 0;

  constructor(screenWidth: number, screenHeight: number) {
    this.letterbox = new LetterboxEffect(screenWidth, screenHeight);
  }

  // ── Effects ───────────────────────────────────────────────────

  /** Add an overlay; equal priorities keep insertion order */
  addEffect(effect: VisualEffect): void {
    if (this.effects.includes(effect)) return;
    this.effects.push(effect);
    this.effects.sort((a, b) => a.priority - b.priority);
  }

  removeEffect(effect: VisualEffect): void {
    const idx = this.effects.indexOf(effect);
    if (idx >= 0) this.effects.splice(idx, 1);
  }

  /** Overlays in render order (letterbox excluded) */
  get activeEffects(): readonly VisualEffect[] {
    return this.effects;
  }

  // ── Scheduling ────────────────────────────────────────────────

  /** Queue an action `delay` seconds from now. Returns the event id. */
  schedule(delay: number, action: ScheduledAction): number {
    const event: ScheduledEvent = {
      id: this.nextEventId++,
      at: this.time + Math.max(0, delay),
      action,
    };
    this.scheduled.push(event);
    return event.id;
  }

  /** Drop a pending event by id, or every pending event of a type */
  cancelScheduled(target: number | ScheduledAction['type']): void {
    this.scheduled = this.scheduled.filter((e) =>
      typeof target === 'number' ? e.id !== target : e.action.type !== target,
    );
  }

  get pendingEvents(): readonly ScheduledEvent[] {
    return this.scheduled;
  }

  // ── Cinematics ────────────────────────────────────────────────

  /**
   * Letterbox treatment for the ultimate attack: bars at 15% of the
   * viewport slide in now and slide out `duration` seconds later.
   */
  createUltimateAttackEffect(duration: number): void {
    this.letterbox.setLetterboxSize(LETTERBOX_ULTIMATE_SIZE);
    this.letterbox.show(LETTERBOX_TRANSITION);
    this.schedule(duration, { type: 'hideLetterbox', duration: LETTERBOX_TRANSITION });
  }

  // ── Frame ─────────────────────────────────────────────────────

  update(dt: number): void {
    this.time += Math.max(0, dt);

    this.letterbox.update(dt);
    for (const effect of this.effects) {
      effect.update(dt);
    }

    // Fired after the tweens advance so a tween started here begins next frame
    this.fireDueEvents();
  }

  /** Visible overlays by ascending priority, then the letterbox on top */
  render(surface: RenderSurface): void {
    for (const effect of this.effects) {
      if (effect.visible) effect.render(surface);
    }
    this.letterbox.render(surface);
  }

  private fireDueEvents(): void {
    if (this.scheduled.length === 0) return;

    const due = this.scheduled.filter((e) => e.at <= this.time);
    if (due.length === 0) return;
    this.scheduled = this.scheduled.filter((e) => e.at > this.time);

    due.sort((a, b) => a.at - b.at || a.id - b.id);
    for (const event of due) {
      this.runAction(event.action);
    }
  }

  private runAction(action: ScheduledAction): void {
    switch (action.type) {
      case 'hideLetterbox':
        this.letterbox.hide(action.duration);
        break;
      case 'showLetterbox':
        this.letterbox.show(action.duration);
        break;
      case 'removeEffect':
        this.removeEffect(action.effect);
        break;
    }
  }

  getDebugInfo(): string {
    return `fx=${this.effects.length} letterbox=${this.letterbox.isActive ? 'on' : 'off'} pending=${this.scheduled.length}`;
  }
}
