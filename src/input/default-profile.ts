import { createAxisId, createButtonId } from "../types/brands";
import { key, pad, type DigitalSource } from "../device/keys";

import type { InputProfile } from "./profile";

// Ids every game gets out of the box; game-specific ids start after these
export const InputButtons = {
  Cancel: createButtonId(1),
  Debug: createButtonId(3),
  Pause: createButtonId(2),
  Submit: createButtonId(0),
} as const;

export const InputAxes = {
  Movement: createAxisId(1),
  Ui: createAxisId(0),
} as const;

const ARROWS: ReadonlyArray<DigitalSource> = [
  key("ArrowUp"),
  key("ArrowLeft"),
  key("ArrowDown"),
  key("ArrowRight"),
];
const WASD: ReadonlyArray<DigitalSource> = [
  key("KeyW"),
  key("KeyA"),
  key("KeyS"),
  key("KeyD"),
];
const DPAD: ReadonlyArray<DigitalSource> = [
  pad("DPadUp"),
  pad("DPadLeft"),
  pad("DPadDown"),
  pad("DPadRight"),
];

export const DEFAULT_INPUT_PROFILE: InputProfile = {
  axes: [
    {
      allowPlayerCustomization: false,
      analog: ["left"],
      digital: [ARROWS, WASD, DPAD],
      horizontal: true,
      id: InputAxes.Ui,
      name: "ui",
      vertical: true,
    },
    {
      allowPlayerCustomization: true,
      analog: ["left"],
      digital: [WASD, DPAD],
      horizontal: true,
      id: InputAxes.Movement,
      name: "movement",
      vertical: true,
    },
  ],
  buttons: [
    {
      allowPlayerCustomization: true,
      gamepad: ["A"],
      gamepadAxes: [],
      id: InputButtons.Submit,
      keyboard: ["Enter", "Space"],
      mouse: [],
      name: "submit",
    },
    {
      allowPlayerCustomization: true,
      gamepad: ["B"],
      gamepadAxes: [],
      id: InputButtons.Cancel,
      keyboard: ["Escape", "Backspace"],
      mouse: [],
      name: "cancel",
    },
    {
      allowPlayerCustomization: false,
      gamepad: ["Start"],
      gamepadAxes: [],
      id: InputButtons.Pause,
      keyboard: ["Escape", "KeyP"],
      mouse: [],
      name: "pause",
    },
    {
      allowPlayerCustomization: false,
      gamepad: [],
      gamepadAxes: [],
      id: InputButtons.Debug,
      keyboard: ["F1"],
      mouse: [],
      name: "debug",
    },
  ],
};
