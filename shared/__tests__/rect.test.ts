import { describe, expect, test } from "vitest";

import { Rect } from "../src/index.js";

describe("Rect", () => {
  test("derives bounds and centre", () => {
    const rect = new Rect(10, 20, 30, 40);
    expect([rect.minX, rect.minY, rect.maxX, rect.maxY]).toEqual([10, 20, 40, 60]);
    expect([rect.centerX, rect.centerY]).toEqual([25, 40]);
  });

  test("builds from a centre point", () => {
    expect(Rect.fromCenter(0, 0, 40, 140).equals(new Rect(-20, -70, 40, 140))).toBe(true);
  });

  test("treats touching edges as not overlapping", () => {
    const a = new Rect(0, 0, 10, 10);
    expect(a.overlaps(new Rect(10, 0, 10, 10))).toBe(false);
    expect(a.overlaps(new Rect(9, 9, 10, 10))).toBe(true);
  });

  test("clone does not alias", () => {
    const rect = new Rect(1, 2, 3, 4);
    const copy = rect.clone();
    rect.x = 11;
    expect(rect.toString()).toBe("Rect(11, 2, 3x4)");
    expect(copy.toString()).toBe("Rect(1, 2, 3x4)");
  });

  test("mirrors horizontally about an anchor and keeps the vertical extent", () => {
    const mirrored = new Rect(150, 170, 80, 60).mirrorAbout(100);
    expect(mirrored.equals(new Rect(-30, 170, 80, 60))).toBe(true);
  });

  test("places local rectangles for either facing", () => {
    const local = new Rect(50, -30, 80, 60);
    expect(Rect.place(local, 100, 200, true).equals(new Rect(150, 170, 80, 60))).toBe(true);
    expect(Rect.place(local, 100, 200, false).equals(new Rect(-30, 170, 80, 60))).toBe(true);
  });
});
