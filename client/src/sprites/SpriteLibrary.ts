// ═══════════════════════════════════════════════════════════════════
// SPRITE LIBRARY
// Sprite provider: builds one Sprite per clip definition and resolves
// logical animation names (including aliases such as turn_left →
// break_run) to those instances. Frame images come from a loader
// callback so asset I/O stays outside the core.
// ═══════════════════════════════════════════════════════════════════

import { Sprite, type SpriteConfig } from './Sprite.js';

/** Clip definition: everything a sprite needs except its frame images */
export type SpriteClip = Omit<SpriteConfig<unknown>, 'name' | 'frames'> & {
  frameCount: number;
  /** Path or sheet id handed to the frame loader */
  source?: string;
};

export type FrameLoader<TFrame> = (clipName: string, clip: SpriteClip, index: number) => TFrame;

export interface SpriteProvider<TFrame> {
  /** Sprite for a logical animation name, or null when there is none */
  getAnimation(name: string): Sprite<TFrame> | null;
}

export class SpriteLibrary<TFrame> implements SpriteProvider<TFrame> {
  private sprites = new Map<string, Sprite<TFrame>>();
  private aliases = new Map<string, string>();
  private warned = new Set<string>();

  constructor(
    clips: Readonly<Record<string, SpriteClip>>,
    loadFrame: FrameLoader<TFrame>,
    aliases: Readonly<Record<string, string>> = {},
  ) {
    for (const [name, clip] of Object.entries(clips)) {
      const frames = Array.from({ length: clip.frameCount }, (_, i) => loadFrame(name, clip, i));
      this.sprites.set(name, new Sprite<TFrame>({
        name,
        frames,
        frameWidth: clip.frameWidth,
        frameHeight: clip.frameHeight,
        duration: clip.duration,
        loop: clip.loop,
        scaleX: clip.scaleX,
        scaleY: clip.scaleY,
        offsetX: clip.offsetX,
        offsetY: clip.offsetY,
        frameSizes: clip.frameSizes,
        frameOffsets: clip.frameOffsets,
      }));
    }
    for (const [alias, target] of Object.entries(aliases)) {
      this.alias(alias, target);
    }
    console.log(`[SpriteLibrary] Built ${this.sprites.size} sprites, ${this.aliases.size} aliases`);
  }

  /** Point a logical name at an existing clip */
  alias(name: string, target: string): void {
    if (!this.sprites.has(target)) {
      console.warn(`[SpriteLibrary] Alias "${name}" targets unknown clip "${target}"`);
      return;
    }
    this.aliases.set(name, target);
  }

  has(name: string): boolean {
    return this.sprites.has(this.aliases.get(name) ?? name);
  }

  get names(): string[] {
    return [...this.sprites.keys()];
  }

  getAnimation(name: string): Sprite<TFrame> | null {
    const sprite = this.sprites.get(this.aliases.get(name) ?? name);
    if (sprite) return sprite;
    if (!this.warned.has(name)) {
      this.warned.add(name);
      console.warn(`[SpriteLibrary] Unknown animation "${name}"`);
    }
    return null;
  }
}
