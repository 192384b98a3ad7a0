import { describe, expect, test, vi } from "vitest";

import { CHARACTER_ALIASES, CHARACTER_CLIPS } from "../src/sprites/characterClips.js";
import { LoopPolicy, Sprite } from "../src/sprites/Sprite.js";
import { SpriteLibrary } from "../src/sprites/SpriteLibrary.js";
import { TICK } from "./helpers/harness.js";
import { makeLibrary, makeSprite } from "./helpers/sprites.js";

const play = (sprite: Sprite<string>, ticks: number, dt = TICK): number[] => {
  const indices: number[] = [];
  for (let i = 0; i < ticks; i++) {
    sprite.update(dt);
    indices.push(sprite.frameIndex);
  }
  return indices;
};

describe("Sprite validation", () => {
  test("rejects empty frame lists", () => {
    expect(() => makeSprite("empty", 0, 1)).toThrow('[Sprite] "empty" has no frames');
  });

  test("rejects non-positive durations", () => {
    expect(() => makeSprite("still", 2, 0)).toThrow('[Sprite] "still" needs a positive duration, got 0');
    expect(() => makeSprite("back", 2, -1)).toThrow("[Sprite]");
  });

  test("rejects a finite loop count below one", () => {
    expect(() => makeSprite("never", 2, 1, LoopPolicy.finite(0))).toThrow(
      '[Sprite] "never" finite loop count must be >= 1, got 0',
    );
  });

  test("rejects frame tables that do not match the frame count", () => {
    expect(
      () =>
        new Sprite<string>({
          name: "sized",
          frames: ["a", "b"],
          frameWidth: 8,
          frameHeight: 8,
          duration: 1,
          frameSizes: [{ width: 8, height: 8 }],
        }),
    ).toThrow('[Sprite] "sized" has 1 frame sizes for 2 frames');
  });
});

describe("Sprite playback", () => {
  test("a one-shot holds its last frame and then completes", () => {
    const sprite = makeSprite("swing", 4, 0.5);

    expect(play(sprite, 3)).toEqual([1, 2, 3]);
    expect(sprite.hasCompleted).toBe(false);

    sprite.update(TICK);
    expect(sprite.hasCompleted).toBe(true);
    expect(sprite.frameIndex).toBe(3);
    expect(play(sprite, 2)).toEqual([3, 3]);
    expect(sprite.frame).toBe("swing#3");
    expect(sprite.isLooping).toBe(false);
  });

  test("a large step crosses several frames", () => {
    const sprite = makeSprite("swing", 4, 0.5);
    sprite.update(0.3);
    expect(sprite.frameIndex).toBe(2);
  });

  test("an infinite loop wraps and never completes", () => {
    const sprite = makeSprite("idle", 2, 0.25, LoopPolicy.infinite);

    expect(play(sprite, 5)).toEqual([1, 0, 1, 0, 1]);
    expect(sprite.loopCount).toBe(2);
    expect(sprite.hasCompleted).toBe(false);
    expect(sprite.isLooping).toBe(true);
  });

  test("a finite loop completes after its passes", () => {
    const sprite = makeSprite("flicker", 2, 0.25, LoopPolicy.finite(2));

    expect(play(sprite, 3)).toEqual([1, 0, 1]);
    expect(sprite.hasCompleted).toBe(false);

    sprite.update(TICK);
    expect(sprite.hasCompleted).toBe(true);
    expect(sprite.frameIndex).toBe(1);
    expect(sprite.isLooping).toBe(false);
  });

  test("reset rewinds a completed sprite", () => {
    const sprite = makeSprite("swing", 4, 0.5);
    sprite.update(1);
    sprite.reset();

    expect(sprite.frameIndex).toBe(0);
    expect(sprite.hasCompleted).toBe(false);
    expect(play(sprite, 1)).toEqual([1]);
  });

  test("zero and negative steps are ignored", () => {
    const sprite = makeSprite("swing", 4, 0.5);
    sprite.update(0);
    sprite.update(-1);
    expect(sprite.frameIndex).toBe(0);
  });
});

describe("Sprite geometry", () => {
  const tabled = (): Sprite<string> =>
    new Sprite<string>({
      name: "tabled",
      frames: ["a", "b"],
      frameWidth: 8,
      frameHeight: 8,
      duration: 0.5,
      scaleX: 2,
      frameSizes: [
        { width: 20, height: 10 },
        { width: 30, height: 16 },
      ],
      frameOffsets: [
        { x: 1, y: 2 },
        { x: 3, y: 4 },
      ],
    });

  test("per-frame sizes and offsets follow the current frame", () => {
    const sprite = tabled();

    expect(sprite.scaleY).toBe(2);
    expect(sprite.size).toEqual({ width: 40, height: 20 });
    expect(sprite.renderX(100)).toBe(81);
    expect(sprite.renderY(200, 140)).toBe(252);

    sprite.update(0.25);
    expect(sprite.size).toEqual({ width: 60, height: 32 });
    expect(sprite.currentOffset).toEqual({ x: 3, y: 4 });
    expect(sprite.renderX(100)).toBe(73);
  });

  test("sizes round after scaling and positions truncate toward zero", () => {
    const sprite = makeSprite("plain", 1, 1);
    sprite.setScale(1.5);
    expect(sprite.size).toEqual({ width: 48, height: 48 });

    sprite.setScale(1, 1);
    expect(sprite.renderX(100.7)).toBe(84);
    expect(sprite.renderX(-10.5)).toBe(-26);
  });

  test("the global offset applies without a per-frame table", () => {
    const sprite = makeSprite("plain", 1, 1);
    sprite.setOffset(5, -3);

    expect(sprite.currentOffset).toEqual({ x: 5, y: -3 });
    expect(sprite.renderY(0, 100)).toBe(50 - 32 - 3);
  });
});

describe("SpriteLibrary", () => {
  test("builds sprites through the frame loader", () => {
    const library = makeLibrary();
    const idle = library.getAnimation("idle");

    expect(idle?.frame).toBe("idle#0");
    expect(idle?.frameCount).toBe(2);
    expect(library.names).toContain("ultimate_charge");
  });

  test("aliases resolve to the shared instance", () => {
    const library = makeLibrary();
    const breakRun = library.getAnimation("break_run");

    expect(library.getAnimation("turn_left")).toBe(breakRun);
    expect(library.getAnimation("turn_right")).toBe(breakRun);
    expect(library.has("combo_attack_2")).toBe(true);
  });

  test("unknown names warn once and return null", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const library = makeLibrary();

    expect(library.getAnimation("moonwalk")).toBeNull();
    expect(library.getAnimation("moonwalk")).toBeNull();

    expect(warn.mock.calls).toEqual([['[SpriteLibrary] Unknown animation "moonwalk"']]);
    warn.mockRestore();
  });

  test("aliases to missing clips are dropped with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const library = makeLibrary(undefined, { ghost: "nowhere" });

    expect(library.has("ghost")).toBe(false);
    expect(warn).toHaveBeenCalledWith('[SpriteLibrary] Alias "ghost" targets unknown clip "nowhere"');
    warn.mockRestore();
  });

  test("the character clip set builds with every alias resolved", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const library = new SpriteLibrary<number>(CHARACTER_CLIPS, (_name, _clip, index) => index, CHARACTER_ALIASES);

    expect(warn).not.toHaveBeenCalled();
    for (const alias of Object.keys(CHARACTER_ALIASES)) {
      expect(library.has(alias)).toBe(true);
    }
    warn.mockRestore();
  });
});
