// ═══════════════════════════════════════════════════════════════════
// SPRITE
// One frame-sequence type covering every variant: optional per-frame
// size and offset tables, and a loop policy instead of subclasses.
//
//   none      play once, hold the last frame, then report completion
//   finite    play `count` passes, then hold and report completion
//   infinite  cycle forever, never completes
// ═══════════════════════════════════════════════════════════════════

import type { Vec2 } from '@emberline/shared';

export type LoopPolicy =
  | { kind: 'none' }
  | { kind: 'finite'; count: number }
  | { kind: 'infinite' };

export const LoopPolicy: {
  readonly none: LoopPolicy;
  readonly infinite: LoopPolicy;
  finite(count: number): LoopPolicy;
} = {
  none: { kind: 'none' },
  infinite: { kind: 'infinite' },
  finite: (count) => ({ kind: 'finite', count }),
};

export interface FrameSize {
  width: number;
  height: number;
}

export interface SpriteConfig<TFrame> {
  name: string;
  frames: readonly TFrame[];
  /** Unscaled frame size used when there is no per-frame table */
  frameWidth: number;
  frameHeight: number;
  /** Seconds for one pass through every frame */
  duration: number;
  loop?: LoopPolicy;
  scaleX?: number;
  scaleY?: number;
  offsetX?: number;
  offsetY?: number;
  frameSizes?: readonly FrameSize[];
  frameOffsets?: readonly Vec2[];
}

/** The slice of a sprite the ability layer reads for completion */
export interface SpritePlayback {
  readonly isLooping: boolean;
  readonly hasCompleted: boolean;
  readonly frameIndex: number;
  readonly frameCount: number;
}

export class Sprite<TFrame> implements SpritePlayback {
  readonly name: string;
  readonly loop: LoopPolicy;

  private readonly frames: readonly TFrame[];
  private readonly frameWidth: number;
  private readonly frameHeight: number;
  private readonly frameDuration: number;
  private readonly frameSizes: readonly FrameSize[] | null;
  private readonly frameOffsets: readonly Vec2[] | null;

  private _scaleX: number;
  private _scaleY: number;
  private _offsetX: number;
  private _offsetY: number;

  private _frameIndex = 0;
  private frameTimer = 0;
  private loopsDone = 0;
  private completed = false;

  constructor(config: SpriteConfig<TFrame>) {
    const count = config.frames.length;
    if (count === 0) {
      throw new Error(`[Sprite] "${config.name}" has no frames`);
    }
    if (!(config.duration > 0)) {
      throw new Error(`[Sprite] "${config.name}" needs a positive duration, got ${config.duration}`);
    }
    const loop = config.loop ?? LoopPolicy.none;
    if (loop.kind === 'finite' && loop.count < 1) {
      throw new Error(`[Sprite] "${config.name}" finite loop count must be >= 1, got ${loop.count}`);
    }
    if (config.frameSizes && config.frameSizes.length !== count) {
      throw new Error(`[Sprite] "${config.name}" has ${config.frameSizes.length} frame sizes for ${count} frames`);
    }
    if (config.frameOffsets && config.frameOffsets.length !== count) {
      throw new Error(`[Sprite] "${config.name}" has ${config.frameOffsets.length} frame offsets for ${count} frames`);
    }

    this.name = config.name;
    this.loop = loop;
    this.frames = config.frames;
    this.frameWidth = config.frameWidth;
    this.frameHeight = config.frameHeight;
    this.frameDuration = config.duration / count;
    this.frameSizes = config.frameSizes ?? null;
    this.frameOffsets = config.frameOffsets ?? null;
    this._scaleX = config.scaleX ?? 1;
    this._scaleY = config.scaleY ?? this._scaleX;
    this._offsetX = config.offsetX ?? 0;
    this._offsetY = config.offsetY ?? 0;
  }

  // ── Playback ──────────────────────────────────────────────────

  update(dt: number): void {
    if (this.completed || dt <= 0) return;

    this.frameTimer += dt;
    while (this.frameTimer >= this.frameDuration) {
      this.frameTimer -= this.frameDuration;
      if (!this.advance()) {
        this.frameTimer = 0;
        break;
      }
    }
  }

  /** Step one frame; false once playback has finished */
  private advance(): boolean {
    if (this._frameIndex < this.frames.length - 1) {
      this._frameIndex++;
      return true;
    }

    switch (this.loop.kind) {
      case 'infinite':
        this.loopsDone++;
        this._frameIndex = 0;
        return true;
      case 'finite':
        this.loopsDone++;
        if (this.loopsDone >= this.loop.count) {
          this.completed = true;
          return false;
        }
        this._frameIndex = 0;
        return true;
      case 'none':
        this.completed = true;
        return false;
    }
  }

  reset(): void {
    this._frameIndex = 0;
    this.frameTimer = 0;
    this.loopsDone = 0;
    this.completed = false;
  }

  get frame(): TFrame { return this.frames[this._frameIndex]; }
  get frameIndex(): number { return this._frameIndex; }
  get frameCount(): number { return this.frames.length; }
  get loopCount(): number { return this.loopsDone; }

  /** Loops forever and therefore never reports completion */
  get isLooping(): boolean { return this.loop.kind === 'infinite'; }
  get hasCompleted(): boolean { return this.completed; }

  // ── Geometry ──────────────────────────────────────────────────

  get scaleX(): number { return this._scaleX; }
  get scaleY(): number { return this._scaleY; }

  setScale(x: number, y: number = x): void {
    this._scaleX = x;
    this._scaleY = y;
  }

  /** Global offset, used for frames without a per-frame entry */
  setOffset(x: number, y: number): void {
    this._offsetX = x;
    this._offsetY = y;
  }

  /** Scaled size of the current frame */
  get size(): FrameSize {
    const base = this.frameSizes?.[this._frameIndex];
    return {
      width: Math.round((base?.width ?? this.frameWidth) * this._scaleX),
      height: Math.round((base?.height ?? this.frameHeight) * this._scaleY),
    };
  }

  get currentOffset(): Vec2 {
    const offset = this.frameOffsets?.[this._frameIndex];
    return offset ? { x: offset.x, y: offset.y } : { x: this._offsetX, y: this._offsetY };
  }

  /** Left edge when centred on entityX */
  renderX(entityX: number): number {
    return Math.trunc(entityX - this.size.width / 2) + this.currentOffset.x;
  }

  /** Top edge with the sprite's bottom on the collision box bottom */
  renderY(entityY: number, collisionHeight: number): number {
    const bottom = Math.trunc(entityY + collisionHeight / 2);
    return bottom - this.size.height + this.currentOffset.y;
  }
}
