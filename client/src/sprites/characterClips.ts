// Clip table for the playable character. Sheets are 64×64 cells drawn
// at 3× unless noted; durations are seconds per full pass.

import { LoopPolicy } from './Sprite.js';
import type { SpriteClip } from './SpriteLibrary.js';

const CELL = { frameWidth: 64, frameHeight: 64, scaleX: 3, scaleY: 3 };

export const CHARACTER_CLIPS: Readonly<Record<string, SpriteClip>> = {
  idle:            { ...CELL, source: 'character/Idle',       frameCount: 6,  duration: 1.0, loop: LoopPolicy.infinite, offsetY: 30 },
  walk:            { ...CELL, source: 'character/Walking',    frameCount: 8,  duration: 0.8, loop: LoopPolicy.infinite, offsetY: 30 },
  run:             { ...CELL, source: 'character/Running',    frameCount: 8,  duration: 0.8, loop: LoopPolicy.infinite, offsetY: 35 },
  to_run:          { ...CELL, source: 'character/ToRun',      frameCount: 3,  duration: 0.3, offsetY: 30 },
  break_run:       { ...CELL, source: 'character/BreakRun',   frameCount: 7,  duration: 0.4, offsetY: 30 },
  jump:            { ...CELL, source: 'character/Jump',       frameCount: 4,  duration: 0.4, offsetY: 30 },
  fall:            { ...CELL, source: 'character/Fall',       frameCount: 3,  duration: 0.3, loop: LoopPolicy.infinite, offsetY: 30 },
  land:            { ...CELL, source: 'character/Land',       frameCount: 5,  duration: 0.3, scaleX: 2.8, offsetY: 15 },
  dash:            { ...CELL, source: 'character/Dashing',    frameCount: 3,  duration: 0.2, scaleX: 3.3, scaleY: 2.8, offsetX: 15, offsetY: 30 },
  light_attack:    { ...CELL, source: 'character/LightAtk',   frameCount: 12, duration: 0.5, scaleX: 4, offsetX: 30, offsetY: 30 },
  combo_attack:    { ...CELL, source: 'character/ComboAtk',   frameCount: 10, duration: 0.5, scaleX: 4, offsetX: 30, offsetY: 30 },
  ultimate_charge: { ...CELL, source: 'character/UltCharge',  frameCount: 6,  duration: 0.6, loop: LoopPolicy.infinite, offsetY: 30 },
  ultimate:        { ...CELL, source: 'character/Ultimate',   frameCount: 8,  duration: 0.5, scaleX: 4, offsetX: 40, offsetY: 30 },
};

/** Logical names the animation layer asks for that share a clip */
export const CHARACTER_ALIASES: Readonly<Record<string, string>> = {
  turn_left: 'break_run',
  turn_right: 'break_run',
  run_start: 'to_run',
  combo_attack_1: 'combo_attack',
  combo_attack_2: 'combo_attack',
  combo_attack_3: 'combo_attack',
};
