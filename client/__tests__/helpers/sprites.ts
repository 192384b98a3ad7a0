import { LoopPolicy, Sprite } from "../../src/sprites/Sprite.js";
import type { SpriteClip } from "../../src/sprites/SpriteLibrary.js";
import { SpriteLibrary } from "../../src/sprites/SpriteLibrary.js";

/** Frames named "<name>#<index>" */
export const makeSprite = (
  name: string,
  frameCount: number,
  duration: number,
  loop: LoopPolicy = LoopPolicy.none,
): Sprite<string> =>
  new Sprite<string>({
    name,
    frames: Array.from({ length: frameCount }, (_, i) => `${name}#${i}`),
    frameWidth: 32,
    frameHeight: 32,
    duration,
    loop,
  });

const clip = (frameCount: number, duration: number, loop: LoopPolicy = LoopPolicy.none): SpriteClip => ({
  frameWidth: 32,
  frameHeight: 32,
  frameCount,
  duration,
  loop,
});

/**
 * Small clip set with durations that are exact in binary: 4-frame
 * one-shots of 0.5 s step one frame per 0.125 s tick.
 */
export const TEST_CLIPS: Readonly<Record<string, SpriteClip>> = {
  idle: clip(2, 0.5, LoopPolicy.infinite),
  walk: clip(2, 0.5, LoopPolicy.infinite),
  run: clip(2, 0.5, LoopPolicy.infinite),
  to_run: clip(2, 0.25),
  break_run: clip(2, 0.25),
  jump: clip(2, 0.25),
  fall: clip(2, 0.25, LoopPolicy.infinite),
  land: clip(2, 0.25),
  dash: clip(2, 0.25),
  light_attack: clip(4, 0.5),
  combo_attack: clip(4, 0.5),
  ultimate_charge: clip(2, 0.5, LoopPolicy.infinite),
  ultimate: clip(4, 0.5),
};

export const TEST_ALIASES: Readonly<Record<string, string>> = {
  turn_left: "break_run",
  turn_right: "break_run",
  run_start: "to_run",
  combo_attack_1: "combo_attack",
  combo_attack_2: "combo_attack",
  combo_attack_3: "combo_attack",
};

export const makeLibrary = (
  clips: Readonly<Record<string, SpriteClip>> = TEST_CLIPS,
  aliases: Readonly<Record<string, string>> = TEST_ALIASES,
): SpriteLibrary<string> => new SpriteLibrary<string>(clips, (name, _clip, index) => `${name}#${index}`, aliases);
