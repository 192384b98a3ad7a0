// ═══════════════════════════════════════════════════════════════════
// ANIMATION COMPONENT
// Maps entity state + movement context + transient flags to the
// active sprite, advances it on scaled time and reacts to one-shot
// completion.
//
// PATTERN: Bindings are resolved once at construction. Every update
// re-resolves the wanted sprite by priority; a change (or a new attack
// stage) resets the chosen sprite to frame 0. A binding with no sprite
// keeps the previous sprite on screen and warns once.
// ═══════════════════════════════════════════════════════════════════

import {
  MovementContext,
  PlayerState,
  RUN_START_MAX_SPEED,
  RUN_START_WINDOW,
} from '@emberline/shared';
import type { FrameSize, Sprite } from '../sprites/Sprite.js';
import type { SpriteProvider } from '../sprites/SpriteLibrary.js';
import type { RenderBackend, RenderSurface } from '../render/RenderBackend.js';
import type { PlayerEntity } from './PlayerEntity.js';

// ── Bindings ──────────────────────────────────────────────────────

/** Logical animation name per state */
export const STATE_ANIMATIONS: Readonly<Record<PlayerState, string>> = {
  [PlayerState.IDLE]:      'idle',
  [PlayerState.WALKING]:   'walk',
  [PlayerState.RUNNING]:   'run',
  [PlayerState.JUMPING]:   'jump',
  [PlayerState.FALLING]:   'fall',
  [PlayerState.DASHING]:   'dash',
  [PlayerState.ATTACKING]: 'light_attack',
  [PlayerState.CASTING]:   'ultimate_charge',
  [PlayerState.ULTIMATE]:  'ultimate',
  [PlayerState.LANDING]:   'land',
};

/** Situational overrides looked up by key */
export const CONTEXTUAL_ANIMATIONS = [
  'turn_left',
  'turn_right',
  'run_start',
  'light_attack',
  'combo_attack_1',
  'combo_attack_2',
  'combo_attack_3',
  'dash',
  'land',
  'ultimate',
] as const;

export interface AnimationComponentOptions {
  debugRender?: boolean;
  /** Replace individual state → animation name bindings */
  stateAnimations?: Partial<Record<PlayerState, string>>;
  runStartWindow?: number;
  runStartMaxSpeed?: number;
}

interface Resolution<TFrame> {
  /** Binding that was asked for, used for missing-sprite warnings */
  key: string;
  sprite: Sprite<TFrame> | null;
}

// ═══════════════════════════════════════════════════════════════════

export class AnimationComponent<TFrame> {
  debugRender: boolean;

  private readonly stateSprites = new Map<PlayerState, Sprite<TFrame> | null>();
  private readonly contextualSprites = new Map<string, Sprite<TFrame> | null>();
  private readonly runStartWindow: number;
  private readonly runStartMaxSpeed: number;

  private _currentSprite: Sprite<TFrame> | null;
  private _currentKey: string;
  private lastAttackSerial: number;
  private warnedMissing = new Set<string>();

  /** Fired when a one-shot sprite finishes, before the state reacts */
  onComplete?: (sprite: Sprite<TFrame>, state: PlayerState) => void;

  constructor(
    private readonly entity: PlayerEntity,
    provider: SpriteProvider<TFrame>,
    options: AnimationComponentOptions = {},
  ) {
    this.debugRender = options.debugRender ?? false;
    this.runStartWindow = options.runStartWindow ?? RUN_START_WINDOW;
    this.runStartMaxSpeed = options.runStartMaxSpeed ?? RUN_START_MAX_SPEED;

    const bindings = { ...STATE_ANIMATIONS, ...options.stateAnimations };
    for (const state of Object.values(PlayerState)) {
      this.stateSprites.set(state, provider.getAnimation(bindings[state]));
    }
    for (const key of CONTEXTUAL_ANIMATIONS) {
      this.contextualSprites.set(key, provider.getAnimation(key));
    }

    this._currentSprite = this.stateSprites.get(PlayerState.IDLE) ?? null;
    this._currentKey = PlayerState.IDLE;
    this.lastAttackSerial = entity.attackSerial;
  }

  // ── Queries ───────────────────────────────────────────────────

  get currentSprite(): Sprite<TFrame> | null { return this._currentSprite; }

  /** Binding key of the sprite on screen */
  get currentKey(): string { return this._currentKey; }

  get renderX(): number {
    return this._currentSprite?.renderX(this.entity.position.x) ?? this.entity.position.x;
  }

  get renderY(): number {
    return this._currentSprite?.renderY(this.entity.position.y, this.entity.height) ?? this.entity.position.y;
  }

  get renderSize(): FrameSize {
    return this._currentSprite?.size ?? { width: 0, height: 0 };
  }

  toggleDebugRender(): void {
    this.debugRender = !this.debugRender;
  }

  // ── Update ────────────────────────────────────────────────────

  /** Advance on scaled time */
  update(dt: number): void {
    this.updateSpriteForState();

    const sprite = this._currentSprite;
    if (!sprite) return;
    sprite.update(dt);
    if (!sprite.isLooping && sprite.hasCompleted) {
      this.handleAnimationComplete(sprite);
    }
  }

  /** Re-resolve the wanted sprite and swap to it if it changed */
  updateSpriteForState(): void {
    const { key, sprite } = this.resolve();
    const serial = this.entity.attackSerial;
    // Dash attacks keep the dash state, so the serial alone marks a new stage
    const newStage = serial !== this.lastAttackSerial;
    this.lastAttackSerial = serial;

    if (!sprite) {
      if (!this.warnedMissing.has(key)) {
        this.warnedMissing.add(key);
        console.warn(`[AnimationComponent] No sprite bound for "${key}", keeping "${this._currentKey}"`);
      }
      return;
    }

    if (sprite !== this._currentSprite || newStage) {
      this._currentSprite = sprite;
      this._currentKey = key;
      sprite.reset();
    }
  }

  private resolve(): Resolution<TFrame> {
    const entity = this.entity;
    const state = entity.state;

    switch (state) {
      case PlayerState.ATTACKING: {
        const key = entity.attackAnimation ?? 'light_attack';
        return {
          key,
          sprite: this.contextual(key)
            ?? this.contextual('light_attack')
            ?? this.stateSprite(state),
        };
      }

      case PlayerState.RUNNING: {
        if (entity.turning) {
          const key = entity.facingRight ? 'turn_right' : 'turn_left';
          return { key, sprite: this.contextual(key) };
        }
        const speed = Math.abs(entity.velocity.x);
        if (entity.timeInState < this.runStartWindow && speed < this.runStartMaxSpeed) {
          return { key: 'run_start', sprite: this.contextual('run_start') };
        }
        return { key: state, sprite: this.stateSprite(state) };
      }

      case PlayerState.DASHING:
        return { key: 'dash', sprite: this.contextual('dash') ?? this.stateSprite(state) };

      case PlayerState.LANDING:
        return { key: 'land', sprite: this.contextual('land') ?? this.stateSprite(state) };

      case PlayerState.ULTIMATE:
        return { key: 'ultimate', sprite: this.contextual('ultimate') ?? this.stateSprite(state) };

      default:
        return { key: state, sprite: this.stateSprite(state) };
    }
  }

  private contextual(key: string): Sprite<TFrame> | null {
    return this.contextualSprites.get(key) ?? null;
  }

  private stateSprite(state: PlayerState): Sprite<TFrame> | null {
    return this.stateSprites.get(state) ?? null;
  }

  // ── Completion ────────────────────────────────────────────────

  private handleAnimationComplete(sprite: Sprite<TFrame>): void {
    const entity = this.entity;
    const state = entity.state;
    this.onComplete?.(sprite, state);

    if (state === PlayerState.LANDING) {
      entity.setState(PlayerState.IDLE);
      entity.movementContext = MovementContext.NORMAL;
      this.updateSpriteForState();
    } else if (state === PlayerState.ATTACKING) {
      entity.attacking = false;
      entity.settleState();
      this.updateSpriteForState();
    }
  }

  // ── Render ────────────────────────────────────────────────────

  /** Draw the current frame in world space, mirrored when facing left */
  render(backend: RenderBackend<TFrame>): void {
    const sprite = this._currentSprite;
    if (!this.entity.visible || !sprite) return;

    const x = this.renderX;
    const y = this.renderY;
    const { width, height } = sprite.size;

    if (this.entity.facingRight) {
      backend.drawImage(sprite.frame, x, y, width, height);
    } else {
      backend.drawImage(sprite.frame, x + width, y, -width, height);
    }

    if (this.debugRender) this.renderDebugInfo(backend);
  }

  private renderDebugInfo(surface: RenderSurface): void {
    const { position } = this.entity;
    const body = this.entity.bounds();
    surface.strokeRect(body.x, body.y, body.width, body.height, 0xff0000, 0.5);
    surface.fillRect(position.x - 2, position.y - 2, 4, 4, 0xffff00);

    const sprite = this._currentSprite;
    const spriteInfo = sprite
      ? `Sprite: ${sprite.name} [${sprite.size.width}x${sprite.size.height}] scale(${sprite.scaleX.toFixed(1)},${sprite.scaleY.toFixed(1)})`
      : 'Sprite: none';
    surface.drawText(spriteInfo, position.x - 150, position.y - 100, 0xffffff);
    surface.drawText(`State: ${this.entity.state}, Context: ${this.entity.movementContext}`, position.x - 80, position.y - 80, 0xffffff);
    surface.drawText(this.entity.getDebugInfo(), position.x - 80, position.y - 60, 0xffffff);
  }
}
