import { describe, expect, test } from "vitest";

import { InputManager } from "../src/input/InputManager.js";

const key = (type: "keydown" | "keyup", code: string): Event => Object.assign(new Event(type), { code });

describe("InputManager", () => {
  test("presses are edges, holds persist until release", () => {
    const input = new InputManager();
    input.press("KeyJ");

    expect(input.wasPressed("attack")).toBe(true);
    expect(input.isHeld("attack")).toBe(true);

    input.endFrame();
    expect(input.wasPressed("attack")).toBe(false);
    expect(input.isHeld("attack")).toBe(true);

    input.release("KeyJ");
    expect(input.wasReleased("attack")).toBe(true);
    input.endFrame();
    expect(input.wasReleased("attack")).toBe(false);
  });

  test("auto-repeat does not produce a second press", () => {
    const input = new InputManager();
    input.press("KeyK");
    input.endFrame();
    input.press("KeyK");
    expect(input.wasPressed("ultimate")).toBe(false);
  });

  test("a release only counts when no other bound key still holds the action", () => {
    const input = new InputManager();
    input.press("KeyK");
    input.press("KeyR");
    input.release("KeyK");
    expect(input.wasReleased("ultimate")).toBe(false);

    input.release("KeyR");
    expect(input.wasReleased("ultimate")).toBe(true);
  });

  test("combat input reports the ultimate key's full cycle", () => {
    const input = new InputManager();
    input.press("KeyK");
    expect(input.getCombat()).toEqual({
      attackPressed: false,
      ultimatePressed: true,
      ultimateHeld: true,
      ultimateReleased: false,
    });

    input.endFrame();
    input.release("KeyK");
    expect(input.getCombat()).toEqual({
      attackPressed: false,
      ultimatePressed: false,
      ultimateHeld: false,
      ultimateReleased: true,
    });
  });

  test("movement reads the axis and triggers", () => {
    const input = new InputManager();
    input.press("ArrowLeft");
    input.press("Space");
    expect(input.getMovement()).toEqual({ axis: -1, jumpPressed: true, dashPressed: false });

    input.press("KeyD");
    expect(input.getMovement().axis).toBe(0);
  });

  test("a blocking UI silences gameplay input", () => {
    const input = new InputManager();
    input.press("KeyJ");
    input.press("KeyD");
    input.uiBlocked = true;

    expect(input.getCombat().attackPressed).toBe(false);
    expect(input.getMovement().axis).toBe(0);
    expect(input.held("KeyJ")).toBe(true);
  });

  test("custom bindings replace the defaults", () => {
    const input = new InputManager({
      left: ["KeyQ"],
      right: ["KeyE"],
      jump: ["KeyZ"],
      dash: ["KeyX"],
      attack: ["KeyC"],
      ultimate: ["KeyV"],
    });
    input.press("KeyJ");
    input.press("KeyC");

    expect(input.getCombat().attackPressed).toBe(true);
    input.endFrame();
    input.release("KeyC");
    input.press("KeyJ");
    expect(input.wasPressed("attack")).toBe(false);
  });

  test("listens to keyboard events on an attached target until detached", () => {
    const input = new InputManager();
    const target = new EventTarget();
    input.attach(target);

    target.dispatchEvent(key("keydown", "KeyF"));
    expect(input.wasPressed("attack")).toBe(true);
    target.dispatchEvent(key("keyup", "KeyF"));
    expect(input.isHeld("attack")).toBe(false);

    input.detach();
    input.endFrame();
    target.dispatchEvent(key("keydown", "KeyF"));
    expect(input.isHeld("attack")).toBe(false);
  });

  test("events without a key code are ignored", () => {
    const input = new InputManager();
    const target = new EventTarget();
    input.attach(target);
    target.dispatchEvent(new Event("keydown"));

    expect(input.getCombat().attackPressed).toBe(false);
  });
});
