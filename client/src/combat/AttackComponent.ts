// ═══════════════════════════════════════════════════════════════════
// ATTACK COMPONENT
// Ability state machine for the controlled character: light attacks,
// the three-stage combo, dash attacks and the charge → execute →
// cooldown ultimate. Owns hitbox placement and drives the time scale
// and cinematic camera during the ultimate.
//
// Two CombatFSM tracks tick side by side on unscaled time:
//   attack track    idle / attacking.{light,combo,dash} / complete
//   ultimate track  ready / charging / executing
//
// Requests that arrive while locked, on cooldown, short on mana or in
// a conflicting state are dropped without touching any state.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import {
  LETTERBOX_TRANSITION,
  MAX_COMBO_STAGE,
  PlayerState,
  Rect,
  comboAttackKind,
} from '@emberline/shared';
import type { AttackKind, AttackPhase, ComboStage, UltimatePhase } from '@emberline/shared';
import { AUDIO_CUES, silentAudio, type AudioSink } from '../audio/AudioSink.js';
import type { CinematicCamera } from '../camera/CinematicCamera.js';
import type { PlayerEntity } from '../entities/PlayerEntity.js';
import type { CombatInput } from '../input/InputManager.js';
import type { RenderSurface } from '../render/RenderBackend.js';
import type { SpritePlayback } from '../sprites/Sprite.js';
import type { SimulationClock, SimulationContext } from '../time/SimulationContext.js';
import type { TimeScaleController } from '../time/TimeScaleController.js';
import { ATTACK_STATES, DEFAULT_ABILITY_TUNING, buildUltimateStates, type AbilityTuning } from './AttackStates.js';
import { buildAttackTable, type AttackTable, type AttackTableOverrides } from './AttackTable.js';
import { CombatFSM } from './CombatFSM.js';

/** Zoom-out applied while charging, and how fast it eases in or back */
const CHARGE_ZOOM = 0.9;
const CHARGE_ZOOM_TIME = 0.3;
const CHARGE_SCALE_TRANSITION = 0.3;
const EXECUTE_SCALE_TRANSITION = 0.1;
const EXECUTE_SCALE_RETURN = 1.0;

/** Whatever currently shows the entity's sprite */
export interface ActiveSpriteSource {
  readonly currentSprite: SpritePlayback | null;
}

export interface AttackComponentOptions {
  context: SimulationContext;
  camera?: CinematicCamera | null;
  audio?: AudioSink;
  sprites?: ActiveSpriteSource | null;
  tuning?: Partial<AbilityTuning>;
  attacks?: AttackTableOverrides;
}

export interface ActiveHitbox {
  kind: AttackKind;
  rect: Rect;
  damage: number;
}

function toComboStage(count: number): ComboStage {
  if (count <= 1) return 1;
  return count === 2 ? 2 : 3;
}

// ═══════════════════════════════════════════════════════════════════

export class AttackComponent {
  readonly tuning: Readonly<AbilityTuning>;
  readonly table: AttackTable;

  private readonly clock: SimulationClock;
  private readonly timeScale: TimeScaleController;
  private readonly camera: CinematicCamera | null;
  private readonly audio: AudioSink;
  private readonly attackFsm: CombatFSM;
  private readonly ultimateFsm: CombatFSM;
  private readonly maxCombo: number;

  sprites: ActiveSpriteSource | null;

  // Attack track
  private _comboCount = 0;
  private _comboAttacking = false;
  private lastAttackTime = Number.NEGATIVE_INFINITY;
  private activeKind: AttackKind | null = null;
  /** The sprite on screen still belongs to the previous stage */
  private stageStarted = false;

  // Ultimate track
  private cooldownAnchor: number | null = null;
  private chargeLetterboxShown = false;

  constructor(private readonly entity: PlayerEntity, options: AttackComponentOptions) {
    this.tuning = Object.freeze({ ...DEFAULT_ABILITY_TUNING, ...options.tuning });
    this.table = buildAttackTable(options.attacks);
    this.clock = options.context.clock;
    this.timeScale = options.context.timeScale;
    this.camera = options.camera ?? null;
    this.audio = options.audio ?? silentAudio;
    this.sprites = options.sprites ?? null;
    this.maxCombo = Math.min(this.tuning.maxComboStage, MAX_COMBO_STAGE);

    this.attackFsm = new CombatFSM(ATTACK_STATES, {
      beginAttack:      () => { this.entity.attacking = true; },
      startLightAttack: () => this.startStage('light_attack'),
      startComboStage:  () => this.startComboStage(),
      startDashAttack:  () => this.startStage('dash'),
      finishAttack:     () => this.finishAttack(),
    }, {
      canStartAttack: () => this.canStartAttack(),
      canDashAttack:  () => this.canStartAttack() && this.entity.dashing,
      canCombo:       () => this.canCombo(),
    });

    this.ultimateFsm = new CombatFSM(buildUltimateStates(this.tuning), {
      beginCharge:     () => this.beginCharge(),
      undoCharge:      () => this.undoCharge(),
      beginExecute:    () => this.beginExecute(),
      completeExecute: () => this.completeExecute(),
    }, {
      canCharge: () => this.canCharge(),
    });
  }

  // ── Requests ──────────────────────────────────────────────────

  /** Opening light attack, or the next combo stage while attacking */
  requestLightAttack(): boolean {
    if (this.ultimateBusy) return false;
    if (this.attackFsm.matches('attacking')) return this.attackFsm.send('combo');
    return this.attackFsm.send('light');
  }

  /** Valid only while the movement layer reports a dash in progress */
  requestDashAttack(): boolean {
    if (this.ultimateBusy) return false;
    return this.attackFsm.send('dash');
  }

  requestUltimateCharge(): boolean {
    return this.ultimateFsm.send('charge');
  }

  /** Undo every partial charge effect; a no-op unless charging */
  cancelUltimateCharge(): boolean {
    return this.ultimateFsm.send('cancel');
  }

  /**
   * Map one frame of edge-triggered input to requests. Releasing the
   * ultimate key before the charge completes cancels it.
   */
  handleInput(input: CombatInput): void {
    if (this.entity.inputEnabled) {
      if (input.ultimatePressed) this.requestUltimateCharge();
      if (input.attackPressed) {
        if (this.entity.dashing) this.requestDashAttack();
        else this.requestLightAttack();
      }
    }
    if (this.isCharging() && !input.ultimateHeld) {
      this.cancelUltimateCharge();
    }
  }

  // ── Tick ──────────────────────────────────────────────────────

  /** Advance both tracks by unscaled seconds */
  tick(dt: number): void {
    // Attack track: `complete` lasts one tick, then returns to idle
    this.attackFsm.update(dt);
    if (this.attackFsm.matches('attacking')) {
      if (this.stageStarted) this.stageStarted = false;
      else if (this.attackFinished()) this.attackFsm.send('finish');
    }

    if (this._comboCount > 0 && this.clock.now - this.lastAttackTime > this.tuning.comboWindow) {
      this.resetCombo();
    }

    // Ultimate track: charging → executing → ready happen inside update()
    this.ultimateFsm.update(dt);
    if (this.ultimateFsm.matches('charging')) this.applyChargeThresholds();
  }

  // ── Queries ───────────────────────────────────────────────────

  isUltimateReady(): boolean {
    return this.ultimateFsm.matches('ready')
      && this.cooldownElapsed()
      && this.entity.mana >= this.tuning.manaCost;
  }

  /** 0 right after use, 1 once the ultimate may be used again */
  ultimateCooldownProgress(): number {
    if (this.cooldownAnchor === null) return 1;
    return THREE.MathUtils.clamp((this.clock.now - this.cooldownAnchor) / this.tuning.cooldown, 0, 1);
  }

  /** 0 when charging starts, 1 once released; 0 outside the ultimate */
  ultimateChargeProgress(): number {
    if (this.ultimateFsm.matches('executing')) return 1;
    if (!this.ultimateFsm.matches('charging')) return 0;
    return Math.min(1, this.ultimateFsm.timeInState / this.tuning.chargeTime);
  }

  isCharging(): boolean { return this.ultimateFsm.matches('charging'); }
  isExecuting(): boolean { return this.ultimateFsm.matches('executing'); }
  comboCount(): number { return this._comboCount; }
  isComboAttacking(): boolean { return this._comboAttacking; }

  attackPhase(): AttackPhase {
    if (this.attackFsm.matches('complete')) return 'complete';
    if (!this.attackFsm.matches('attacking')) return 'idle';
    switch (this.attackFsm.child) {
      case 'combo': return 'comboWindow';
      case 'dash':  return 'dashAttacking';
      default:      return 'lightAttacking';
    }
  }

  ultimatePhase(): UltimatePhase {
    if (this.isCharging()) return 'charging';
    if (this.isExecuting()) return 'executing';
    return this.cooldownElapsed() ? 'ready' : 'onCooldown';
  }

  /** Attack whose hitbox is live, if any */
  currentAttackKind(): AttackKind | null {
    if (this.isExecuting()) return 'ultimate';
    return this.attackFsm.matches('attacking') ? this.activeKind : null;
  }

  // ── Hitboxes ──────────────────────────────────────────────────

  /** World-space hitbox for the entity's current position and facing */
  hitboxFor(kind: AttackKind): Rect {
    const { position } = this.entity;
    return Rect.place(this.table[kind].hitbox, position.x, position.y, this.entity.facingRight);
  }

  damageFor(kind: AttackKind): number {
    return this.table[kind].damage;
  }

  activeHitbox(): ActiveHitbox | null {
    const kind = this.currentAttackKind();
    if (!kind) return null;
    return { kind, rect: this.hitboxFor(kind), damage: this.damageFor(kind) };
  }

  /** Live hitbox if it overlaps the target; touching edges miss */
  hitTest(target: Rect): ActiveHitbox | null {
    const hit = this.activeHitbox();
    return hit && hit.rect.overlaps(target) ? hit : null;
  }

  // ── Attack track actions ──────────────────────────────────────

  private get ultimateBusy(): boolean {
    return this.isCharging() || this.isExecuting();
  }

  private canStartAttack(): boolean {
    return !this.entity.isAnimationLocked()
      && !this.entity.attacking
      && !this.entity.casting
      && !this.ultimateBusy;
  }

  private canCombo(): boolean {
    return this._comboCount < this.maxCombo
      && this.clock.now - this.lastAttackTime < this.tuning.comboWindow;
  }

  private startStage(kind: AttackKind): void {
    const entity = this.entity;
    this.activeKind = kind;
    this.lastAttackTime = this.clock.now;
    this.stageStarted = true;

    entity.attacking = true;
    if (kind !== 'dash') entity.setState(PlayerState.ATTACKING);
    entity.markAttackStarted(kind);
    entity.lockAnimation(this.table[kind].lock);

    this.audio.play(kind === 'dash' ? AUDIO_CUES.dashAttack : AUDIO_CUES.lightAttack);
  }

  private startComboStage(): void {
    this._comboCount++;
    this._comboAttacking = true;
    const stage = toComboStage(this._comboCount);
    this.startStage(comboAttackKind(stage));
    this.audio.play(AUDIO_CUES.comboAttack, 0.6 + 0.2 * (stage - 1));
    console.log(`[AttackComponent] Combo stage ${stage}`);
  }

  /**
   * Dual completion check. The animation layer may already have ended
   * the attack; otherwise one-shot sprites end on completion, looping
   * sprites on their last frame, and a missing sprite on lock expiry.
   */
  private attackFinished(): boolean {
    if (!this.entity.attacking) return true;

    const sprite = this.sprites?.currentSprite ?? null;
    if (sprite) {
      if (!sprite.isLooping) return sprite.hasCompleted;
      return sprite.frameIndex === sprite.frameCount - 1;
    }
    return !this.entity.isAnimationLocked();
  }

  private finishAttack(): void {
    const entity = this.entity;
    this.activeKind = null;
    this.stageStarted = false;
    entity.attacking = false;
    entity.attackAnimation = null;
    if (entity.state === PlayerState.ATTACKING) entity.settleState();
    entity.unlockAnimation();
  }

  private resetCombo(): void {
    this._comboCount = 0;
    this._comboAttacking = false;
  }

  // ── Ultimate track actions ────────────────────────────────────

  private cooldownElapsed(): boolean {
    return this.cooldownAnchor === null
      || this.clock.now - this.cooldownAnchor >= this.tuning.cooldown;
  }

  private canCharge(): boolean {
    return this.cooldownElapsed()
      && this.entity.mana >= this.tuning.manaCost
      && !this.entity.attacking
      && !this.attackFsm.matches('attacking')
      && !this.entity.isAnimationLocked();
  }

  private beginCharge(): void {
    const entity = this.entity;
    this.chargeLetterboxShown = false;

    entity.setState(PlayerState.CASTING);
    entity.casting = true;
    entity.inputEnabled = false;
    entity.lockAnimation(this.tuning.chargeTime);

    this.timeScale.setTimeScale(this.tuning.chargeTimeScale, CHARGE_SCALE_TRANSITION, 0);
    this.camera?.setZoom(CHARGE_ZOOM, CHARGE_ZOOM, CHARGE_ZOOM_TIME);
    this.audio.play(AUDIO_CUES.ultimateCharge);
  }

  private applyChargeThresholds(): void {
    if (this.chargeLetterboxShown || !this.camera) return;
    if (this.ultimateChargeProgress() >= this.tuning.letterboxThreshold) {
      this.camera.effects.letterbox.show(LETTERBOX_TRANSITION);
      this.chargeLetterboxShown = true;
    }
  }

  private undoCharge(): void {
    const entity = this.entity;
    entity.inputEnabled = true;
    entity.casting = false;
    entity.unlockAnimation();
    entity.settleState();

    this.timeScale.resetTimeScale();
    this.camera?.setZoom(1, 1, CHARGE_ZOOM_TIME);
    if (this.chargeLetterboxShown) {
      this.camera?.effects.letterbox.hide(LETTERBOX_TRANSITION);
      this.chargeLetterboxShown = false;
    }
    console.log('[AttackComponent] Ultimate charge cancelled');
  }

  private beginExecute(): void {
    const entity = this.entity;
    const { manaCost, dashSpeed, range, executionTime } = this.tuning;
    const dir = entity.facingRight ? 1 : -1;

    entity.spendMana(manaCost);
    entity.velocity.set(dir * dashSpeed, 0);
    entity.affectedByGravity = false;
    entity.setState(PlayerState.ULTIMATE);
    entity.lockAnimation(executionTime);

    if (this.camera) {
      const focus = new THREE.Vector2(entity.position.x + (dir * range) / 2, entity.position.y);
      this.camera.setFocusTarget(focus, false);
      this.camera.setZoom(1.2, 0.8, 0.1);
      this.camera.createUltimateAttackEffect(this.tuning.cinematicDuration);
    }
    this.timeScale.setTimeScale(this.tuning.executeTimeScale, EXECUTE_SCALE_TRANSITION, EXECUTE_SCALE_RETURN);

    this.audio.play(AUDIO_CUES.ultimateExecute);
    console.log(`[AttackComponent] Ultimate released (${this.hitboxFor('ultimate').toString()})`);
  }

  private completeExecute(): void {
    const entity = this.entity;
    entity.affectedByGravity = true;
    entity.casting = false;
    entity.inputEnabled = true;
    entity.unlockAnimation();
    entity.setState(entity.grounded ? PlayerState.IDLE : PlayerState.FALLING);

    if (this.camera) {
      this.camera.flash(1, 0xffffff, 0.9);
      this.camera.setZoomWithReset(1, 1, 0.5, 0);
      this.camera.clearFocus();
    }
    this.timeScale.resetTimeScale();

    this.cooldownAnchor = this.clock.now;
    this.chargeLetterboxShown = false;
    this.audio.play(AUDIO_CUES.ultimateComplete);
  }

  // ── Debug ─────────────────────────────────────────────────────

  /** World-space overlay: live hitbox and the charge bar */
  renderDebug(surface: RenderSurface): void {
    const kind = this.currentAttackKind();
    if (kind) {
      const rect = this.hitboxFor(kind);
      const color = kind === 'ultimate' ? 0xffff00 : 0xff0000;
      surface.fillRect(rect.x, rect.y, rect.width, rect.height, color, 0.5);
      surface.strokeRect(rect.x, rect.y, rect.width, rect.height, color);
    }

    if (this.isCharging()) {
      const barWidth = 100;
      const barHeight = 10;
      const barX = this.entity.position.x - barWidth / 2;
      const barY = this.entity.position.y - this.entity.height / 2 - 20;
      surface.fillRect(barX, barY, barWidth, barHeight, 0x404040);
      surface.fillRect(barX, barY, barWidth * this.ultimateChargeProgress(), barHeight, 0xffff00);
      surface.drawText('ULTIMATE', barX, barY - 5, 0xffffff);
    }
  }

  getDebugInfo(): string {
    return [
      `attack=${this.attackFsm.value}`,
      `combo=${this._comboCount}`,
      `ult=${this.ultimatePhase()}`,
      `charge=${this.ultimateChargeProgress().toFixed(2)}`,
      `cd=${this.ultimateCooldownProgress().toFixed(2)}`,
    ].join(' ');
  }
}
