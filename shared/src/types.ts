// ═══════════════════════════════════════════════════════════════════
// SHARED TYPES
// Entity state enums and the closed sets of attack / phase names used
// by the ability and animation layers.
// ═══════════════════════════════════════════════════════════════════

// --- Math ---
export interface Vec2 {
  x: number;
  y: number;
}

// --- Entity state ---

/** Exactly one is active on an entity at any time */
export enum PlayerState {
  IDLE      = 'idle',
  WALKING   = 'walking',
  RUNNING   = 'running',
  JUMPING   = 'jumping',
  FALLING   = 'falling',
  DASHING   = 'dashing',
  ATTACKING = 'attacking',
  CASTING   = 'casting',
  ULTIMATE  = 'ultimate',
  LANDING   = 'landing',
}

/** Sub-mode within a state, orthogonal to PlayerState */
export enum MovementContext {
  NORMAL        = 'normal',
  TRANSITIONING = 'transitioning',
  TURNING       = 'turning',
}

export type Facing = 'left' | 'right';

// --- Combat ---

export const ATTACK_KINDS = [
  'light_attack',
  'combo_attack_1',
  'combo_attack_2',
  'combo_attack_3',
  'dash',
  'ultimate',
] as const;

export type AttackKind = typeof ATTACK_KINDS[number];

export type ComboStage = 1 | 2 | 3;

/** Attack-track sub-state */
export type AttackPhase =
  | 'idle'
  | 'lightAttacking'
  | 'comboWindow'
  | 'dashAttacking'
  | 'complete';

/** Ultimate-track sub-state */
export type UltimatePhase = 'ready' | 'onCooldown' | 'charging' | 'executing';

export function comboAttackKind(stage: ComboStage): AttackKind {
  switch (stage) {
    case 1: return 'combo_attack_1';
    case 2: return 'combo_attack_2';
    case 3: return 'combo_attack_3';
  }
}
