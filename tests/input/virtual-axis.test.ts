import { beforeEach, describe, expect, it } from "@jest/globals";

import {
  createScriptedSampleProvider,
  EMPTY_SAMPLE,
  type ScriptedSampleProvider,
} from "../../src/device/adapter";
import { fourWay, key, pad, stick } from "../../src/device/keys";
import { VirtualAxis } from "../../src/input/virtual-axis";
import { createDurationMs } from "../../src/types/brands";

const ARROWS = fourWay(key("ArrowUp"), key("ArrowLeft"), key("ArrowDown"), key("ArrowRight"));

describe("VirtualAxis", () => {
  let provider: ScriptedSampleProvider;
  let axis: VirtualAxis;

  beforeEach(() => {
    provider = createScriptedSampleProvider();
    axis = new VirtualAxis({ deadZone: 0.2, repeat: undefined });
    axis.register(stick("left"), ARROWS);
  });

  it("ticks once per direction change however long it is held", () => {
    provider.setStick("left", 1, 0);
    const ticks: Array<boolean> = [];
    for (let i = 0; i < 10; i++) {
      axis.update(provider.sample());
      ticks.push(axis.tickX);
    }
    expect(ticks).toEqual([true, false, false, false, false, false, false, false, false, false]);
    expect(axis.intValue).toEqual({ x: 1, y: 0 });
    expect(axis.tickY).toBe(false);
  });

  it("ticks again on release with a zero step", () => {
    provider.setStick("left", -1, 0);
    axis.update(provider.sample());
    expect(axis.stepX).toBe(-1);

    provider.setStick("left", 0, 0);
    axis.update(provider.sample());
    expect(axis.tickX).toBe(true);
    expect(axis.intValue.x).toBe(0);
    expect(axis.stepX).toBe(0);
  });

  it("lets digital input win over analog per component", () => {
    provider.setStick("left", 0.6, 0.8);
    provider.keyDown("ArrowLeft");
    axis.update(provider.sample());
    expect(axis.value).toEqual({ x: -1, y: 0.8 });
    expect(axis.intValue).toEqual({ x: -1, y: 1 });
  });

  it("clamps the sum of analog bindings", () => {
    axis.register(stick("right"));
    provider.setStick("left", 0.8, 0);
    provider.setStick("right", 0.8, 0);
    axis.update(provider.sample());
    expect(axis.value.x).toBe(1);
  });

  it("ignores sticks inside the dead zone", () => {
    provider.setStick("left", 0.1, 0.1);
    axis.update(provider.sample());
    expect(axis.intValue).toEqual({ x: 0, y: 0 });
    expect(axis.tickX).toBe(false);
  });

  it("reads 4-way sets built from gamepad buttons", () => {
    const dpad = new VirtualAxis();
    dpad.register(fourWay(pad("DPadUp"), pad("DPadLeft"), pad("DPadDown"), pad("DPadRight")));
    provider.gamepadDown("DPadUp");
    dpad.update(provider.sample());
    expect(dpad.intValue).toEqual({ x: 0, y: -1 });
    expect(dpad.tickY).toBe(true);
  });

  it("press() ticks against the previous value and settles on the next update", () => {
    axis.press({ x: 0, y: 1 });
    expect(axis.mocked).toBe(true);
    expect(axis.tickY).toBe(true);
    expect(axis.stepY).toBe(1);

    axis.update(EMPTY_SAMPLE);
    expect(axis.mocked).toBe(false);
    expect(axis.tickY).toBe(true);
    expect(axis.intValue.y).toBe(0);
  });

  it("resets consumption every update", () => {
    axis.update(provider.sample());
    axis.consume();
    expect(axis.consumed).toBe(true);
    axis.update(provider.sample());
    expect(axis.consumed).toBe(false);
  });

  it("describes its bindings", () => {
    expect(axis.descriptor()).toBe("Left Stick, ArrowUp/ArrowLeft/ArrowDown/ArrowRight");
  });
});

describe("VirtualAxis auto-repeat", () => {
  it("repeats a held direction after the delay, then at the interval", () => {
    const provider = createScriptedSampleProvider();
    const axis = new VirtualAxis({
      deadZone: 0,
      repeat: { delayMs: createDurationMs(200), intervalMs: createDurationMs(50) },
    });
    axis.register(ARROWS);
    provider.keyDown("ArrowRight");

    const frame = (advanceMs: number): { step: number; repeat: boolean } => {
      provider.advance(advanceMs);
      axis.update(provider.sample());
      return { repeat: axis.repeatX, step: axis.stepX };
    };

    expect(frame(0)).toEqual({ repeat: false, step: 1 });
    expect(frame(100)).toEqual({ repeat: false, step: 0 });
    expect(frame(100)).toEqual({ repeat: true, step: 1 });
    expect(frame(16)).toEqual({ repeat: false, step: 0 });
    expect(frame(34)).toEqual({ repeat: true, step: 1 });
    expect(axis.tickX).toBe(false);
    expect(axis.repeatY).toBe(false);
  });

  it("retunes the timings of a hold in progress", () => {
    const provider = createScriptedSampleProvider();
    const axis = new VirtualAxis({
      deadZone: 0,
      repeat: { delayMs: createDurationMs(200), intervalMs: createDurationMs(50) },
    });
    axis.register(ARROWS);
    provider.keyDown("ArrowRight");
    axis.update(provider.sample());
    expect(axis.stepX).toBe(1);

    axis.setRepeat({ delayMs: createDurationMs(50), intervalMs: createDurationMs(50) });
    provider.advance(60);
    axis.update(provider.sample());
    expect(axis.repeatX).toBe(true);
    expect(axis.stepX).toBe(1);
  });

  it("starts the delay at the next frame when repeats are enabled mid-hold", () => {
    const provider = createScriptedSampleProvider();
    const axis = new VirtualAxis({ deadZone: 0, repeat: undefined });
    axis.register(ARROWS);
    provider.keyDown("ArrowRight");
    axis.update(provider.sample());

    axis.setRepeat({ delayMs: createDurationMs(50), intervalMs: createDurationMs(50) });
    provider.advance(60);
    axis.update(provider.sample());
    expect(axis.repeatX).toBe(false);

    provider.advance(50);
    axis.update(provider.sample());
    expect(axis.repeatX).toBe(true);
  });

  it("stops repeating once repeats are turned off", () => {
    const provider = createScriptedSampleProvider();
    const axis = new VirtualAxis({
      deadZone: 0,
      repeat: { delayMs: createDurationMs(50), intervalMs: createDurationMs(50) },
    });
    axis.register(ARROWS);
    provider.keyDown("ArrowDown");
    axis.update(provider.sample());

    axis.setRepeat(undefined);
    provider.advance(1000);
    axis.update(provider.sample());
    expect(axis.repeatY).toBe(false);
    expect(axis.stepY).toBe(0);
  });

  it("never repeats without configuration", () => {
    const provider = createScriptedSampleProvider();
    const axis = new VirtualAxis();
    axis.register(ARROWS);
    provider.keyDown("ArrowDown");
    axis.update(provider.sample());
    for (let i = 0; i < 5; i++) {
      provider.advance(1000);
      axis.update(provider.sample());
      expect(axis.repeatY).toBe(false);
      expect(axis.stepY).toBe(0);
    }
  });
});
