// ═══════════════════════════════════════════════════════════════════
// ATTACK TABLE
// Static per-attack properties: hitbox in facing-right local space
// (relative to the entity anchor), damage, and the animation lock
// the attack applies. Built once per component and frozen.
// ═══════════════════════════════════════════════════════════════════

import {
  ATTACK_KINDS,
  LIGHT_ATTACK_LOCK,
  Rect,
  ULTIMATE_DAMAGE,
  ULTIMATE_EXECUTION_TIME,
  ULTIMATE_RANGE,
} from '@emberline/shared';
import type { AttackKind } from '@emberline/shared';

export interface AttackProperties {
  readonly hitbox: Rect;
  readonly damage: number;
  /** Seconds of animation lock applied when the attack starts */
  readonly lock: number;
}

export type AttackTable = Readonly<Record<AttackKind, AttackProperties>>;

export type AttackTableOverrides = Partial<Record<AttackKind, Partial<AttackProperties>>>;

function entry(x: number, y: number, w: number, h: number, damage: number, lock: number): AttackProperties {
  return { hitbox: new Rect(x, y, w, h), damage, lock };
}

export const DEFAULT_ATTACK_TABLE: AttackTable = freezeTable({
  light_attack:   entry(50, -30, 80, 60, 10, LIGHT_ATTACK_LOCK),
  combo_attack_1: entry(60, -40, 90, 80, 8, 0.5),
  combo_attack_2: entry(70, -30, 100, 70, 12, 0.5),
  combo_attack_3: entry(80, -50, 120, 100, 20, 0.5),
  dash:           entry(30, -20, 60, 50, 5, 0.2),
  ultimate:       entry(0, -40, ULTIMATE_RANGE, 80, ULTIMATE_DAMAGE, ULTIMATE_EXECUTION_TIME),
});

/** Defaults merged with per-kind overrides; the result is deeply frozen */
export function buildAttackTable(overrides: AttackTableOverrides = {}): AttackTable {
  const merged: Record<AttackKind, AttackProperties> = { ...DEFAULT_ATTACK_TABLE };
  for (const kind of ATTACK_KINDS) {
    const patch = overrides[kind];
    if (!patch) continue;
    const base = DEFAULT_ATTACK_TABLE[kind];
    merged[kind] = {
      hitbox: (patch.hitbox ?? base.hitbox).clone(),
      damage: patch.damage ?? base.damage,
      lock: patch.lock ?? base.lock,
    };
  }
  return freezeTable(merged);
}

function freezeTable(table: Record<AttackKind, AttackProperties>): AttackTable {
  for (const kind of ATTACK_KINDS) {
    Object.freeze(table[kind].hitbox);
    Object.freeze(table[kind]);
  }
  return Object.freeze(table);
}
