import { describe, it, expect } from "@jest/globals";

import { emptySample } from "../../src/device/adapter";
import {
  bindingVector,
  computeEdges,
  fourWayVector,
  isBindingDown,
} from "../../src/device/edge-computation";
import {
  fourWay,
  key,
  mouse,
  pad,
  padAxis,
  stick,
  type GamepadButton,
  type MouseButton,
} from "../../src/device/keys";

import type { GamepadSample, RawFrameSample, Vec2 } from "../../src/device/types";

function withKeys(...codes: Array<string>): RawFrameSample {
  const base = emptySample();
  return { ...base, keyboard: { current: new Set(codes), previous: new Set<string>() } };
}

function withPad(overrides: Partial<GamepadSample>): RawFrameSample {
  const base = emptySample();
  return { ...base, gamepad: { ...base.gamepad, connected: true, ...overrides } };
}

describe("computeEdges", () => {
  it("reports pressed only on the rising frame", () => {
    expect(computeEdges(false, true)).toEqual({ down: true, pressed: true, released: false });
    expect(computeEdges(true, true)).toEqual({ down: true, pressed: false, released: false });
  });

  it("reports released only on the falling frame", () => {
    expect(computeEdges(true, false)).toEqual({ down: false, pressed: false, released: true });
    expect(computeEdges(false, false)).toEqual({ down: false, pressed: false, released: false });
  });

  it("matches the aggregated boolean over an arbitrary sequence", () => {
    const raw = [false, true, true, false, true, false, false];
    let prev = false;
    const pressedFrames: Array<number> = [];
    const releasedFrames: Array<number> = [];
    raw.forEach((down, i) => {
      const e = computeEdges(prev, down);
      expect(e.down).toBe(down);
      if (e.pressed) pressedFrames.push(i);
      if (e.released) releasedFrames.push(i);
      prev = down;
    });
    expect(pressedFrames).toEqual([1, 4]);
    expect(releasedFrames).toEqual([3, 5]);
  });
});

describe("isBindingDown", () => {
  it("reads keys from the current keyboard set", () => {
    expect(isBindingDown(key("KeyZ"), withKeys("KeyZ"), 0.5)).toBe(true);
    expect(isBindingDown(key("KeyX"), withKeys("KeyZ"), 0.5)).toBe(false);
  });

  it("reads mouse buttons", () => {
    const base = emptySample();
    const sample: RawFrameSample = {
      ...base,
      mouse: { ...base.mouse, buttons: new Set<MouseButton>(["middle"]) },
    };
    expect(isBindingDown(mouse("middle"), sample, 0.5)).toBe(true);
    expect(isBindingDown(mouse("left"), sample, 0.5)).toBe(false);
  });

  it("ignores gamepad buttons while the pad is disconnected", () => {
    const held = withPad({ buttons: new Set<GamepadButton>(["A"]) });
    expect(isBindingDown(pad("A"), held, 0.5)).toBe(true);
    const unplugged: RawFrameSample = { ...held, gamepad: { ...held.gamepad, connected: false } };
    expect(isBindingDown(pad("A"), unplugged, 0.5)).toBe(false);
  });

  it("treats an axis past the threshold in its direction as down", () => {
    const left = withPad({ leftStick: { x: -0.7, y: 0 } });
    expect(isBindingDown(padAxis("leftX", -1), left, 0.5)).toBe(true);
    expect(isBindingDown(padAxis("leftX", 1), left, 0.5)).toBe(false);
    expect(isBindingDown(padAxis("leftX", -1), left, 0.8)).toBe(false);

    const trigger = withPad({ rightTrigger: 0.5 });
    expect(isBindingDown(padAxis("rightTrigger", 1), trigger, 0.5)).toBe(true);
  });
});

describe("bindingVector", () => {
  it("returns the stick inside the live zone", () => {
    const v: Vec2 = { x: 0.6, y: -0.8 };
    expect(bindingVector(stick("right"), withPad({ rightStick: v }), 0.2)).toEqual(v);
  });

  it("zeroes sticks inside the circular dead zone", () => {
    const sample = withPad({ leftStick: { x: 0.15, y: 0.15 } });
    expect(bindingVector(stick("left"), sample, 0.25)).toEqual({ x: 0, y: 0 });
  });

  it("is zero while the pad is disconnected", () => {
    const base = emptySample();
    const sample: RawFrameSample = {
      ...base,
      gamepad: { ...base.gamepad, leftStick: { x: 1, y: 0 } },
    };
    expect(bindingVector(stick("left"), sample, 0)).toEqual({ x: 0, y: 0 });
  });
});

describe("fourWayVector", () => {
  const arrows = fourWay(key("ArrowUp"), key("ArrowLeft"), key("ArrowDown"), key("ArrowRight"));

  it("maps up to -y and right to +x", () => {
    expect(fourWayVector(arrows, withKeys("ArrowUp", "ArrowRight"))).toEqual({ x: 1, y: -1 });
    expect(fourWayVector(arrows, withKeys("ArrowDown", "ArrowLeft"))).toEqual({ x: -1, y: 1 });
  });

  it("cancels opposing directions", () => {
    expect(fourWayVector(arrows, withKeys("ArrowLeft", "ArrowRight"))).toEqual({ x: 0, y: 0 });
  });
});
