// ═══════════════════════════════════════════════════════════════════
// SIMULATION CONTEXT
// Shared per-simulation services handed to every component at
// construction: the unscaled clock and the time scale controller.
// ═══════════════════════════════════════════════════════════════════

import { TimeScaleController } from './TimeScaleController.js';

/** Monotonic unscaled simulation time in seconds */
export class SimulationClock {
  private _now = 0;

  get now(): number { return this._now; }

  advance(dt: number): void {
    if (dt > 0) this._now += dt;
  }
}

export interface SimulationContext {
  readonly clock: SimulationClock;
  readonly timeScale: TimeScaleController;
}

export function createSimulationContext(): SimulationContext {
  return {
    clock: new SimulationClock(),
    timeScale: new TimeScaleController(),
  };
}
