import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";

import { fourWay, key, mouse, pad, padAxis, stick } from "../../src/device/keys";
import { DEFAULT_INPUT_PROFILE, InputAxes, InputButtons } from "../../src/input/default-profile";
import {
  axisDefaults,
  buttonDefaults,
  EMPTY_PROFILE,
  parseInputProfile,
  readInputProfileFile,
} from "../../src/input/profile";
import { createAxisId, createButtonId } from "../../src/types/brands";

describe("input profile", () => {
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe("parseInputProfile", () => {
    it("reads button and axis entries", () => {
      const profile = parseInputProfile({
        axes: [
          {
            allowPlayerCustomization: true,
            analog: ["right"],
            digital: [["key:KeyI", "key:KeyJ", "key:KeyK", "key:KeyL"]],
            id: 4,
            name: "camera",
          },
        ],
        buttons: [
          {
            allowPlayerCustomization: true,
            gamepad: ["X"],
            gamepadAxes: ["gp:axis:leftTrigger:+"],
            id: 9,
            keyboard: ["KeyJ"],
            mouse: ["right"],
            name: "jump",
          },
        ],
      });

      expect(profile.buttons).toEqual([
        {
          allowPlayerCustomization: true,
          gamepad: ["X"],
          gamepadAxes: [padAxis("leftTrigger", 1)],
          id: 9,
          keyboard: ["KeyJ"],
          mouse: ["right"],
          name: "jump",
        },
      ]);
      const [axis] = profile.axes;
      expect(axis?.horizontal).toBe(true);
      expect(axis?.vertical).toBe(true);
      expect(axis?.analog).toEqual(["right"]);
      expect(axis?.digital).toEqual([[key("KeyI"), key("KeyJ"), key("KeyK"), key("KeyL")]]);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("skips malformed bindings and keeps the rest", () => {
      const profile = parseInputProfile({
        buttons: [
          {
            gamepad: ["A", "Turbo"],
            id: 0,
            keyboard: ["Enter", 13],
          },
        ],
      });
      const [button] = profile.buttons;
      expect(button?.gamepad).toEqual(["A"]);
      expect(button?.keyboard).toEqual(["Enter"]);
      expect(button?.allowPlayerCustomization).toBe(false);
      expect(warnSpy).toHaveBeenCalledWith('[profile] button 0: cannot map "Turbo" to a binding, skipped');
      expect(warnSpy).toHaveBeenCalledWith("[profile] button 0: cannot map 13 to a binding, skipped");
    });

    it("skips entries without a valid id", () => {
      const profile = parseInputProfile({
        axes: [{ analog: ["left"], id: "ui" }],
        buttons: [{ id: -1 }, { id: 2, keyboard: ["KeyP"] }],
      });
      expect(profile.buttons.map((b) => b.id)).toEqual([2]);
      expect(profile.axes).toEqual([]);
      expect(warnSpy).toHaveBeenCalledTimes(2);
    });

    it("warns and returns an empty profile for non-objects", () => {
      expect(parseInputProfile("buttons")).toBe(EMPTY_PROFILE);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("defaults", () => {
    it("expands button entries into bindings", () => {
      const profile = parseInputProfile({
        buttons: [
          {
            gamepad: ["Y"],
            gamepadAxes: ["gp:axis:rightY:-"],
            id: 1,
            keyboard: ["KeyQ"],
            mouse: ["middle"],
          },
        ],
      });
      const [entry] = profile.buttons;
      expect(entry && buttonDefaults(entry)).toEqual([
        key("KeyQ"),
        pad("Y"),
        mouse("middle"),
        padAxis("rightY", -1),
      ]);
    });

    it("registers a one-dimensional digital pair on both components", () => {
      const profile = parseInputProfile({
        axes: [
          {
            digital: [["key:PageUp", "key:PageDown"]],
            horizontal: false,
            id: 3,
          },
        ],
      });
      const [entry] = profile.axes;
      expect(entry && axisDefaults(entry)).toEqual([
        fourWay(key("PageUp"), key("PageUp"), key("PageDown"), key("PageDown")),
      ]);
    });

    it("skips digital sets that do not fit the axis shape", () => {
      const profile = parseInputProfile({
        axes: [{ analog: ["left"], digital: [["key:KeyW", "key:KeyS"]], id: 0 }],
      });
      const [entry] = profile.axes;
      expect(entry && axisDefaults(entry)).toEqual([stick("left")]);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it("ships submit, cancel, pause and debug plus the ui and movement axes", () => {
      expect(DEFAULT_INPUT_PROFILE.buttons.map((b) => b.id)).toEqual([
        InputButtons.Submit,
        InputButtons.Cancel,
        InputButtons.Pause,
        InputButtons.Debug,
      ]);
      expect(DEFAULT_INPUT_PROFILE.axes.map((a) => a.id)).toEqual([InputAxes.Ui, InputAxes.Movement]);
      expect(InputButtons.Submit).toBe(createButtonId(0));
      expect(InputAxes.Movement).toBe(createAxisId(1));
    });
  });

  describe("readInputProfileFile", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "virtual-input-profile-"));
    });

    afterEach(() => {
      rmSync(dir, { force: true, recursive: true });
    });

    it("parses a profile from disk", () => {
      const path = join(dir, "profile.json");
      writeFileSync(path, JSON.stringify({ buttons: [{ id: 5, keyboard: ["KeyR"] }] }));
      const profile = readInputProfileFile(path);
      expect(profile.buttons.map((b) => b.keyboard)).toEqual([["KeyR"]]);
    });

    it("warns and returns an empty profile when the file cannot be read", () => {
      expect(readInputProfileFile(join(dir, "nope.json"))).toBe(EMPTY_PROFILE);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });
});
