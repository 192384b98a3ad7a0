// ═══════════════════════════════════════════════════════════════════
// PLAYER CHARACTER
// Static composition of the controlled character: the entity body
// plus its ability and animation components, wired at construction
// and reached through explicit handles.
// ═══════════════════════════════════════════════════════════════════

import type { AudioSink } from '../audio/AudioSink.js';
import type { CinematicCamera } from '../camera/CinematicCamera.js';
import { AttackComponent } from '../combat/AttackComponent.js';
import type { AbilityTuning } from '../combat/AttackStates.js';
import type { AttackTableOverrides } from '../combat/AttackTable.js';
import type { CombatInput } from '../input/InputManager.js';
import type { RenderBackend } from '../render/RenderBackend.js';
import type { SpriteProvider } from '../sprites/SpriteLibrary.js';
import type { SimulationContext } from '../time/SimulationContext.js';
import { AnimationComponent, type AnimationComponentOptions } from './AnimationComponent.js';
import { PlayerEntity, type PlayerEntityOptions } from './PlayerEntity.js';

export interface PlayerCharacterOptions<TFrame> {
  context: SimulationContext;
  sprites: SpriteProvider<TFrame>;
  camera?: CinematicCamera | null;
  audio?: AudioSink;
  entity?: PlayerEntityOptions;
  tuning?: Partial<AbilityTuning>;
  attacks?: AttackTableOverrides;
  animation?: AnimationComponentOptions;
}

export class PlayerCharacter<TFrame> {
  readonly entity: PlayerEntity;
  readonly attack: AttackComponent;
  readonly animation: AnimationComponent<TFrame>;

  constructor(options: PlayerCharacterOptions<TFrame>) {
    this.entity = new PlayerEntity(options.context.clock, options.entity);
    this.animation = new AnimationComponent(this.entity, options.sprites, options.animation);
    this.attack = new AttackComponent(this.entity, {
      context: options.context,
      camera: options.camera,
      audio: options.audio,
      sprites: this.animation,
      tuning: options.tuning,
      attacks: options.attacks,
    });
  }

  /** Input mapping and ability timers, on unscaled time */
  updateAbilities(dt: number, input?: CombatInput): void {
    if (input) this.attack.handleInput(input);
    this.attack.tick(dt);
  }

  /** Sprite playback, on scaled time */
  updateAnimation(scaledDt: number): void {
    this.animation.update(scaledDt);
  }

  /** World-space pass: sprite, then hitbox overlay in debug mode */
  render(backend: RenderBackend<TFrame>): void {
    this.animation.render(backend);
    if (this.animation.debugRender) this.attack.renderDebug(backend);
  }

  getDebugInfo(): string {
    return `${this.entity.getDebugInfo()} | ${this.attack.getDebugInfo()}`;
  }
}
