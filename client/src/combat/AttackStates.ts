// ═══════════════════════════════════════════════════════════════════
// ATTACK STATES
// FSM config definitions for the ability component
//
// Two independent tracks run side by side:
//
// Attack track:
//   idle → attacking.light ⇄ attacking.combo (×3) → complete → idle
//   idle → attacking.dash → complete → idle
//
// Ultimate track:
//   ready → charging → executing → ready
//          ↘ cancel → ready
//
// Cooldown is not a state: `ready` reports onCooldown until the
// cooldown anchor is far enough behind the clock.
// ═══════════════════════════════════════════════════════════════════

import {
  COMBO_WINDOW,
  MAX_COMBO_STAGE,
  ULTIMATE_CHARGE_TIME,
  ULTIMATE_CHARGE_TIME_SCALE,
  ULTIMATE_CINEMATIC_DURATION,
  ULTIMATE_COOLDOWN,
  ULTIMATE_DASH_SPEED,
  ULTIMATE_EXECUTE_TIME_SCALE,
  ULTIMATE_EXECUTION_TIME,
  ULTIMATE_LETTERBOX_THRESHOLD,
  ULTIMATE_MANA_COST,
  ULTIMATE_RANGE,
} from '@emberline/shared';
import type { FSMConfig } from './CombatFSM.js';

// ── Tuning ────────────────────────────────────────────────────────

/** All durations in seconds of unscaled time */
export interface AbilityTuning {
  comboWindow: number;
  maxComboStage: number;
  chargeTime: number;
  executionTime: number;
  cooldown: number;
  manaCost: number;
  dashSpeed: number;
  range: number;
  chargeTimeScale: number;
  executeTimeScale: number;
  cinematicDuration: number;
  /** Charge progress at which the letterbox slides in */
  letterboxThreshold: number;
}

export const DEFAULT_ABILITY_TUNING: Readonly<AbilityTuning> = Object.freeze({
  comboWindow: COMBO_WINDOW,
  maxComboStage: MAX_COMBO_STAGE,
  chargeTime: ULTIMATE_CHARGE_TIME,
  executionTime: ULTIMATE_EXECUTION_TIME,
  cooldown: ULTIMATE_COOLDOWN,
  manaCost: ULTIMATE_MANA_COST,
  dashSpeed: ULTIMATE_DASH_SPEED,
  range: ULTIMATE_RANGE,
  chargeTimeScale: ULTIMATE_CHARGE_TIME_SCALE,
  executeTimeScale: ULTIMATE_EXECUTE_TIME_SCALE,
  cinematicDuration: ULTIMATE_CINEMATIC_DURATION,
  letterboxThreshold: ULTIMATE_LETTERBOX_THRESHOLD,
});

// ═══════════════════════════════════════════════════════════════════
// ATTACK TRACK
// ═══════════════════════════════════════════════════════════════════

export const ATTACK_STATES: FSMConfig = {
  id: 'attack',
  initial: 'idle',
  states: {
    idle: {
      on: {
        light: { target: 'attacking.light', cond: 'canStartAttack' },
        dash:  { target: 'attacking.dash', cond: 'canDashAttack' },
      },
    },

    attacking: {
      entry: 'beginAttack',
      tags: ['attacking', 'canDamage'],
      on: {
        finish: 'complete',
      },
      initial: 'light',
      states: {
        light: {
          entry: 'startLightAttack',
          on: { combo: { target: 'attacking.combo', cond: 'canCombo' } },
        },
        // Re-entered once per stage
        combo: {
          entry: 'startComboStage',
          tags: ['combo'],
          on: { combo: { target: 'attacking.combo', cond: 'canCombo' } },
        },
        dash: {
          entry: 'startDashAttack',
        },
      },
    },

    // Held for one tick so observers see the attack end
    complete: {
      entry: 'finishAttack',
      after: { 0: 'idle' },
      on: {
        light: { target: 'attacking.light', cond: 'canStartAttack' },
        dash:  { target: 'attacking.dash', cond: 'canDashAttack' },
      },
    },
  },
};

// ═══════════════════════════════════════════════════════════════════
// ULTIMATE TRACK
// ═══════════════════════════════════════════════════════════════════

export function buildUltimateStates(
  tuning: Pick<AbilityTuning, 'chargeTime' | 'executionTime'>,
): FSMConfig {
  return {
    id: 'ultimate',
    initial: 'ready',
    states: {
      ready: {
        on: {
          charge: { target: 'charging', cond: 'canCharge' },
        },
      },

      charging: {
        entry: 'beginCharge',
        tags: ['locksInput', 'casting'],
        after: { [tuning.chargeTime]: 'executing' },
        on: {
          cancel: { target: 'ready', actions: 'undoCharge' },
        },
      },

      executing: {
        entry: 'beginExecute',
        exit: 'completeExecute',
        tags: ['locksInput', 'canDamage'],
        after: { [tuning.executionTime]: 'ready' },
      },
    },
  };
}
