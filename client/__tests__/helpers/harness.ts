import type { AudioSink } from "../../src/audio/AudioSink.js";
import { CinematicCamera } from "../../src/camera/CinematicCamera.js";
import { AttackComponent, type ActiveSpriteSource } from "../../src/combat/AttackComponent.js";
import type { AbilityTuning } from "../../src/combat/AttackStates.js";
import { PlayerEntity, type PlayerEntityOptions } from "../../src/entities/PlayerEntity.js";
import type { SpritePlayback } from "../../src/sprites/Sprite.js";
import { createSimulationContext, type SimulationContext } from "../../src/time/SimulationContext.js";

/** 1/8 s: every multiple used in the tests is exact in binary */
export const TICK = 0.125;

export interface PlayedCue {
  readonly id: string;
  readonly volume: number | undefined;
}

export class RecordingAudio implements AudioSink {
  readonly played: PlayedCue[] = [];

  play(id: string, volume?: number): void {
    this.played.push({ id, volume });
  }

  ids(): string[] {
    return this.played.map((cue) => cue.id);
  }
}

/** Hand-driven sprite state for the ability's completion checks */
export class FakeSpriteSource implements ActiveSpriteSource {
  currentSprite: SpritePlayback | null = null;

  show(playback: Partial<SpritePlayback> = {}): void {
    this.currentSprite = {
      isLooping: false,
      hasCompleted: false,
      frameIndex: 0,
      frameCount: 4,
      ...playback,
    };
  }
}

export interface AttackHarness {
  readonly context: SimulationContext;
  readonly camera: CinematicCamera;
  readonly entity: PlayerEntity;
  readonly attack: AttackComponent;
  readonly audio: RecordingAudio;
  readonly sprites: FakeSpriteSource;
  /** Advance clock, time scale, ability and camera by unscaled dt */
  step(dt?: number): void;
  /** Repeat step() n times */
  run(ticks: number, dt?: number): void;
}

export interface AttackHarnessOptions {
  entity?: PlayerEntityOptions;
  tuning?: Partial<AbilityTuning>;
  withSprites?: boolean;
  withCamera?: boolean;
}

export const createAttackHarness = (options: AttackHarnessOptions = {}): AttackHarness => {
  const context = createSimulationContext();
  const camera = new CinematicCamera(800, 600);
  const entity = new PlayerEntity(context.clock, { position: { x: 100, y: 200 }, ...options.entity });
  const audio = new RecordingAudio();
  const sprites = new FakeSpriteSource();
  const attack = new AttackComponent(entity, {
    context,
    camera: options.withCamera === false ? null : camera,
    audio,
    sprites: options.withSprites ? sprites : null,
    tuning: options.tuning,
  });

  const step = (dt: number = TICK): void => {
    context.clock.advance(dt);
    context.timeScale.update(dt);
    attack.tick(dt);
    camera.update(dt);
  };

  return {
    context,
    camera,
    entity,
    attack,
    audio,
    sprites,
    step,
    run: (ticks, dt = TICK) => {
      for (let i = 0; i < ticks; i++) step(dt);
    },
  };
};
