// ═══════════════════════════════════════════════════════════════════
// PLAYER ENTITY
// The controlled character's body and state flags. Mutated by the
// ability and animation components; physics and movement input are
// external and write position/velocity/grounded/dashing directly.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import {
  MovementContext,
  PLAYER_HEIGHT,
  PLAYER_WIDTH,
  PlayerState,
  Rect,
} from '@emberline/shared';
import type { AttackKind, Facing, Vec2 } from '@emberline/shared';
import type { SimulationClock } from '../time/SimulationContext.js';

export interface PlayerEntityOptions {
  position?: Vec2;
  facing?: Facing;
  width?: number;
  height?: number;
  maxHealth?: number;
  maxMana?: number;
  health?: number;
  mana?: number;
}

export class PlayerEntity {
  readonly position = new THREE.Vector2();
  readonly velocity = new THREE.Vector2();
  readonly width: number;
  readonly height: number;
  readonly maxHealth: number;
  readonly maxMana: number;

  facing: Facing;
  movementContext = MovementContext.NORMAL;
  /** Reversing direction while running */
  turning = false;
  /** Set by the movement layer while a dash is in progress */
  dashing = false;
  grounded = true;
  affectedByGravity = true;
  attacking = false;
  casting = false;
  inputEnabled = true;
  visible = true;
  /** Which attack sprite the animation layer should show while attacking */
  attackAnimation: AttackKind | null = null;

  private _state = PlayerState.IDLE;
  private _stateChangedAt: number;
  private _attackSerial = 0;
  private _locked = false;
  private _lockExpiresAt = 0;
  private _health: number;
  private _mana: number;

  constructor(private readonly clock: SimulationClock, options: PlayerEntityOptions = {}) {
    this.position.set(options.position?.x ?? 0, options.position?.y ?? 0);
    this.facing = options.facing ?? 'right';
    this.width = options.width ?? PLAYER_WIDTH;
    this.height = options.height ?? PLAYER_HEIGHT;
    this.maxHealth = options.maxHealth ?? 100;
    this.maxMana = options.maxMana ?? 100;
    this._health = THREE.MathUtils.clamp(options.health ?? this.maxHealth, 0, this.maxHealth);
    this._mana = THREE.MathUtils.clamp(options.mana ?? this.maxMana, 0, this.maxMana);
    this._stateChangedAt = clock.now;
  }

  // ── State ─────────────────────────────────────────────────────

  get state(): PlayerState { return this._state; }

  /** Clock time of the last state change */
  get stateChangedAt(): number { return this._stateChangedAt; }

  /** Seconds in the current state */
  get timeInState(): number { return this.clock.now - this._stateChangedAt; }

  setState(state: PlayerState): void {
    if (state === this._state) return;
    this._state = state;
    this._stateChangedAt = this.clock.now;
  }

  /** Idle when grounded, otherwise Jumping or Falling by vertical velocity */
  settleState(): void {
    if (this.grounded) this.setState(PlayerState.IDLE);
    else this.setState(this.velocity.y < 0 ? PlayerState.JUMPING : PlayerState.FALLING);
  }

  get facingRight(): boolean { return this.facing === 'right'; }

  /** Collision box centred on the position */
  bounds(): Rect {
    return Rect.fromCenter(this.position.x, this.position.y, this.width, this.height);
  }

  /**
   * Bumped every time an attack stage starts, so the animation layer
   * restarts the attack sprite even when the stage reuses it.
   */
  get attackSerial(): number { return this._attackSerial; }

  markAttackStarted(kind: AttackKind): void {
    this.attackAnimation = kind;
    this._attackSerial++;
  }

  // ── Animation lock ────────────────────────────────────────────

  lockAnimation(duration: number): void {
    this._locked = true;
    this._lockExpiresAt = this.clock.now + Math.max(0, duration);
  }

  unlockAnimation(): void {
    this._locked = false;
    this._lockExpiresAt = 0;
  }

  isAnimationLocked(): boolean {
    return this._locked && this.clock.now < this._lockExpiresAt;
  }

  get lockExpiresAt(): number | null {
    return this._locked ? this._lockExpiresAt : null;
  }

  // ── Resources ─────────────────────────────────────────────────

  get health(): number { return this._health; }
  get mana(): number { return this._mana; }

  setHealth(value: number): void {
    this._health = THREE.MathUtils.clamp(value, 0, this.maxHealth);
  }

  setMana(value: number): void {
    this._mana = THREE.MathUtils.clamp(value, 0, this.maxMana);
  }

  /** Deduct mana if there is enough of it */
  spendMana(amount: number): boolean {
    if (this._mana < amount) return false;
    this.setMana(this._mana - amount);
    return true;
  }

  getDebugInfo(): string {
    const flags = [
      this.grounded && 'GROUND',
      this.dashing && 'DASH',
      this.attacking && 'ATTACK',
      this.casting && 'CAST',
      !this.inputEnabled && 'NOINPUT',
      this.isAnimationLocked() && 'LOCK',
    ].filter(Boolean).join(' ');
    return `${this._state}/${this.movementContext} hp=${this._health} mp=${this._mana} ${flags}`;
  }
}
