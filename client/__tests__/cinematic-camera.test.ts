import * as THREE from "three";
import { describe, expect, test } from "vitest";

import { Camera2D } from "../src/camera/Camera2D.js";
import { CinematicCamera } from "../src/camera/CinematicCamera.js";
import { TICK } from "./helpers/harness.js";
import { RecordingBackend } from "./helpers/recording-backend.js";

const run = (camera: Camera2D, ticks: number, dt = TICK): void => {
  for (let i = 0; i < ticks; i++) camera.update(dt);
};

describe("Camera2D", () => {
  test("rejects an empty viewport", () => {
    expect(() => new Camera2D(0, 600)).toThrow("[Camera2D] Viewport must be positive, got 0x600");
    expect(() => new CinematicCamera(800, -1)).toThrow("[Camera2D]");
  });

  test("follows its target at the follow rate", () => {
    const camera = new Camera2D(800, 600, { followRate: 4 });
    camera.follow({ position: new THREE.Vector2(600, 300) });

    camera.update(TICK);
    expect(camera.position.toArray()).toEqual([100, 0]);

    camera.update(TICK);
    expect(camera.position.toArray()).toEqual([150, 0]);
  });

  test("the base transform translates by the view origin", () => {
    const camera = new Camera2D(800, 600);
    camera.centerOn(500, 400);

    expect(camera.position.toArray()).toEqual([100, 100]);
    expect(camera.worldToScreen(new THREE.Vector2(500, 400)).toArray()).toEqual([400, 300]);
  });

  test("apply and reset bracket the world pass", () => {
    const camera = new Camera2D(800, 600);
    const backend = new RecordingBackend();
    camera.apply(backend);
    camera.reset(backend);

    expect(backend.calls).toEqual([
      { op: "push", elements: [1, 0, 0, 0, 1, 0, -0, -0, 1] },
      { op: "pop" },
    ]);
  });
});

describe("CinematicCamera zoom", () => {
  test("eases from the current zoom and lands exactly on the target", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoom(2, 2, 0.5);
    expect(camera.zoom.toArray()).toEqual([1, 1]);

    camera.update(TICK);
    expect(camera.zoom.x).toBe(1.125);

    run(camera, 3);
    expect(camera.zoom.toArray()).toEqual([2, 2]);
    expect(camera.isZooming).toBe(false);
  });

  test("re-targeting mid-transition continues from the current value", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoom(2, 2, 0.5);
    run(camera, 2);
    expect(camera.zoom.x).toBe(1.5625);

    camera.setZoom(1, 1, 0.5);
    expect(camera.zoom.x).toBe(1.5625);

    camera.update(TICK);
    expect(camera.zoom.x).toBe(1.4921875);
  });

  test("a zero duration snaps", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoom(0.5, 0.8, 0);
    expect(camera.zoom.toArray()).toEqual([0.5, 0.8]);
    expect(camera.isZooming).toBe(false);
  });

  test("resets to 1 after the delay that follows arrival", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoomWithReset(1.2, 0.8, 0.25, 0.25);

    run(camera, 2);
    expect(camera.zoom.toArray()).toEqual([1.2, 0.8]);
    expect(camera.isZoomResetPending).toBe(true);

    camera.update(TICK);
    expect(camera.isZooming).toBe(true);
    expect(camera.targetZoom.toArray()).toEqual([1, 1]);

    run(camera, 4);
    expect(camera.zoom.toArray()).toEqual([1, 1]);
    expect(camera.isZooming).toBe(false);
  });

  test("a zero reset delay still fires", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoomWithReset(2, 2, 0, 0);
    expect(camera.isZoomResetPending).toBe(true);

    camera.update(TICK);
    expect(camera.isZoomResetPending).toBe(false);
    expect(camera.isZooming).toBe(true);

    run(camera, 4);
    expect(camera.zoom.toArray()).toEqual([1, 1]);
  });

  test("a plain setZoom cancels a pending reset", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoomWithReset(2, 2, 0, 0.25);
    camera.setZoom(1.5, 1.5, 0);
    run(camera, 8);

    expect(camera.zoom.toArray()).toEqual([1.5, 1.5]);
  });

  test("the transform scales about the view centre", () => {
    const camera = new CinematicCamera(800, 600);
    camera.setZoom(2, 2, 0);

    expect(camera.getTransform().elements).toEqual([2, 0, 0, 0, 2, 0, -400, -300, 1]);
    expect(camera.worldToScreen(new THREE.Vector2(400, 300)).toArray()).toEqual([400, 300]);
    expect(camera.worldToScreen(new THREE.Vector2(500, 300)).toArray()).toEqual([600, 300]);
  });
});

describe("CinematicCamera focus", () => {
  test("approaches the focus point and ignores the follow target", () => {
    const camera = new CinematicCamera(800, 600);
    camera.follow({ position: new THREE.Vector2(-5000, 0) });
    camera.setFocusTarget(new THREE.Vector2(1400, 300));

    camera.update(TICK);
    expect(camera.position.toArray()).toEqual([625, 0]);
  });

  test("immediate focus centres at once and stores a copy", () => {
    const camera = new CinematicCamera(800, 600);
    const point = new THREE.Vector2(1000, 300);
    camera.setFocusTarget(point, true);
    point.set(0, 0);

    expect(camera.position.toArray()).toEqual([600, 0]);
    expect(camera.focusTarget?.toArray()).toEqual([1000, 300]);

    camera.clearFocus();
    expect(camera.focusTarget).toBeNull();
  });
});

describe("CinematicCamera flash", () => {
  test("lasts a fixed number of updates whatever the step size", () => {
    const camera = new CinematicCamera(800, 600);
    camera.flash(3);

    camera.update(0.5);
    expect(camera.flashFramesRemaining).toBe(2);
    camera.update(0.001);
    expect(camera.isFlashing).toBe(true);
    camera.update(10);
    expect(camera.isFlashing).toBe(false);
  });

  test("renders the flash before the letterbox bars", () => {
    const camera = new CinematicCamera(800, 600);
    camera.flash(2, 0xff0000, 0.4);
    const backend = new RecordingBackend();
    camera.renderEffects(backend);

    const fills = backend.fills();
    expect(fills).toHaveLength(3);
    expect(fills[0]).toEqual({ op: "fill", x: 0, y: 0, width: 800, height: 600, color: 0xff0000, alpha: 0.4 });
  });
});

describe("CinematicCamera ultimate effect", () => {
  test("letterbox, flash and squash zoom run on one timeline", () => {
    const camera = new CinematicCamera(800, 600);
    camera.createUltimateAttackEffect(2);

    expect(camera.effects.letterbox.isActive).toBe(true);
    expect(camera.flashFramesRemaining).toBe(3);
    expect(camera.targetZoom.toArray()).toEqual([1.2, 0.8]);

    run(camera, 3);
    expect(camera.isFlashing).toBe(false);
    expect(camera.zoom.toArray()).toEqual([1.2, 0.8]);

    run(camera, 8);
    expect(camera.isZoomResetPending).toBe(true);

    camera.update(TICK);
    expect(camera.isZooming).toBe(true);
    expect(camera.effects.letterbox.isActive).toBe(true);

    run(camera, 4);
    expect(camera.zoom.toArray()).toEqual([1, 1]);
    expect(camera.effects.letterbox.isActive).toBe(false);
  });
});
