import { beforeEach, describe, expect, it, jest } from "@jest/globals";

import {
  createScriptedSampleProvider,
  EMPTY_SAMPLE,
  type ScriptedSampleProvider,
} from "../../src/device/adapter";
import { key, mouse, pad, padAxis } from "../../src/device/keys";
import { VirtualButton } from "../../src/input/virtual-button";

describe("VirtualButton", () => {
  let provider: ScriptedSampleProvider;
  let button: VirtualButton;

  beforeEach(() => {
    provider = createScriptedSampleProvider();
    button = new VirtualButton();
  });

  it("ORs its bindings and reports one press while any stays held", () => {
    button.register(key("Enter"), pad("A"));

    provider.keyDown("Enter");
    button.update(provider.sample());
    expect(button.pressed).toBe(true);
    expect(button.down).toBe(true);

    provider.gamepadDown("A");
    button.update(provider.sample());
    expect(button.pressed).toBe(false);
    expect(button.down).toBe(true);

    provider.keyUp("Enter");
    button.update(provider.sample());
    expect(button.down).toBe(true);
    expect(button.released).toBe(false);

    provider.gamepadUp("A");
    button.update(provider.sample());
    expect(button.released).toBe(true);
    expect(button.down).toBe(false);
  });

  it("treats duplicate bindings as one", () => {
    button.register(key("Space"), key("Space"), { key: "Space", kind: "key" });
    expect(button.bindings).toHaveLength(1);
  });

  it("reads a gamepad axis past the threshold as a button", () => {
    const strict = new VirtualButton(0.9);
    strict.register(padAxis("rightTrigger", 1));
    provider.setTriggers(0, 0.8);
    strict.update(provider.sample());
    expect(strict.down).toBe(false);
    provider.setTriggers(0, 0.95);
    strict.update(provider.sample());
    expect(strict.pressed).toBe(true);
  });

  it("resets consumption on every update without touching edges", () => {
    button.register(mouse("left"));
    provider.mouseDown("left");
    button.update(provider.sample());
    button.consume();
    expect(button.consumed).toBe(true);
    expect(button.pressed).toBe(true);

    button.update(provider.sample());
    expect(button.consumed).toBe(false);
  });

  it("keeps edge state when bindings are cleared", () => {
    button.register(key("KeyE"));
    provider.keyDown("KeyE");
    button.update(provider.sample());
    button.clearBinds();
    expect(button.bindings).toHaveLength(0);
    expect(button.down).toBe(true);

    button.update(provider.sample());
    expect(button.released).toBe(true);
  });

  it("press() forces a one-frame press that releases on the next empty update", () => {
    button.press();
    expect(button.pressed).toBe(true);
    expect(button.down).toBe(true);
    expect(button.mocked).toBe(true);

    button.update(EMPTY_SAMPLE);
    expect(button.pressed).toBe(false);
    expect(button.released).toBe(true);
    expect(button.mocked).toBe(false);
  });

  it("notifies press listeners until unsubscribed", () => {
    const listener = jest.fn();
    const unsubscribe = button.onPress(listener);
    button.register(key("KeyF"));

    provider.keyDown("KeyF");
    const sample = provider.sample();
    button.update(sample);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(sample);

    button.press();
    expect(listener).toHaveBeenLastCalledWith(undefined);

    unsubscribe();
    provider.keyUp("KeyF");
    button.update(provider.sample());
    provider.keyDown("KeyF");
    button.update(provider.sample());
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it("detects shared bindings", () => {
    const other = new VirtualButton();
    button.register(key("Escape"), pad("B"));
    other.register(key("KeyP"), key("Escape"));
    expect(button.sharesBindingWith(other)).toBe(true);

    other.clearBinds();
    other.register(pad("Start"));
    expect(button.sharesBindingWith(other)).toBe(false);
  });

  it("describes its bindings", () => {
    button.register(key("KeyZ"), pad("A"));
    expect(button.descriptor()).toBe("Z, Pad A");
  });
});
