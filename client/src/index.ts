// Public surface of the combat-feel runtime.

export { TimeScaleController } from './time/TimeScaleController.js';
export { SimulationClock, createSimulationContext } from './time/SimulationContext.js';
export type { SimulationContext } from './time/SimulationContext.js';

export { colorToCss } from './render/RenderBackend.js';
export type { ColorHex, RenderBackend, RenderSurface } from './render/RenderBackend.js';
export { CanvasRenderBackend } from './render/CanvasRenderBackend.js';
export type { Canvas2DLike } from './render/CanvasRenderBackend.js';

export { VisualEffect, CameraBar } from './camera/effects/VisualEffect.js';
export { LetterboxEffect } from './camera/effects/LetterboxEffect.js';
export { CameraEffectsManager } from './camera/effects/CameraEffectsManager.js';
export type { ScheduledAction, ScheduledEvent } from './camera/effects/CameraEffectsManager.js';
export { Camera2D } from './camera/Camera2D.js';
export type { Camera2DOptions, CameraTarget } from './camera/Camera2D.js';
export { CinematicCamera } from './camera/CinematicCamera.js';
export type { CinematicCameraOptions } from './camera/CinematicCamera.js';

export { CombatFSM } from './combat/CombatFSM.js';
export type { ActionMap, FSMConfig, FSMPayload, GuardMap, StateNode, TransitionDef } from './combat/CombatFSM.js';
export { ATTACK_STATES, DEFAULT_ABILITY_TUNING, buildUltimateStates } from './combat/AttackStates.js';
export type { AbilityTuning } from './combat/AttackStates.js';
export { DEFAULT_ATTACK_TABLE, buildAttackTable } from './combat/AttackTable.js';
export type { AttackProperties, AttackTable, AttackTableOverrides } from './combat/AttackTable.js';
export { AttackComponent } from './combat/AttackComponent.js';
export type { ActiveHitbox, ActiveSpriteSource, AttackComponentOptions } from './combat/AttackComponent.js';

export { Sprite, LoopPolicy } from './sprites/Sprite.js';
export type { FrameSize, SpriteConfig, SpritePlayback } from './sprites/Sprite.js';
export { SpriteLibrary } from './sprites/SpriteLibrary.js';
export type { FrameLoader, SpriteClip, SpriteProvider } from './sprites/SpriteLibrary.js';
export { CHARACTER_ALIASES, CHARACTER_CLIPS } from './sprites/characterClips.js';

export { PlayerEntity } from './entities/PlayerEntity.js';
export type { PlayerEntityOptions } from './entities/PlayerEntity.js';
export { AnimationComponent, CONTEXTUAL_ANIMATIONS, STATE_ANIMATIONS } from './entities/AnimationComponent.js';
export type { AnimationComponentOptions } from './entities/AnimationComponent.js';
export { PlayerCharacter } from './entities/PlayerCharacter.js';
export type { PlayerCharacterOptions } from './entities/PlayerCharacter.js';

export { AUDIO_CUES, silentAudio } from './audio/AudioSink.js';
export type { AudioCue, AudioSink } from './audio/AudioSink.js';
export { DEFAULT_BINDINGS, InputManager, inputManager } from './input/InputManager.js';
export type { CombatInput, InputAction, KeyBindings, MovementInput } from './input/InputManager.js';

export { GameLoop, browserFrameScheduler } from './engine/GameLoop.js';
export type { FrameScheduler, GameLoopOptions } from './engine/GameLoop.js';
