import { createTimestamp, type Timestamp } from "../types/brands";

import type {
  GamepadButton,
  GamepadStick,
  KeyCode,
  MouseButton,
} from "./keys";
import type {
  GamepadSample,
  MouseSample,
  RawFrameSample,
  RawSampleProvider,
  Vec2,
} from "./types";

const ZERO: Vec2 = { x: 0, y: 0 };
const NO_KEYS: ReadonlySet<KeyCode> = new Set<KeyCode>();

export const EMPTY_MOUSE: MouseSample = {
  buttons: new Set<MouseButton>(),
  wheel: 0,
  x: 0,
  y: 0,
};

export const DISCONNECTED_GAMEPAD: GamepadSample = {
  buttons: new Set<GamepadButton>(),
  connected: false,
  leftStick: ZERO,
  leftTrigger: 0,
  rightStick: ZERO,
  rightTrigger: 0,
};

/** Nothing held, gamepad disconnected. */
export function emptySample(timestampMs: Timestamp = createTimestamp(0)): RawFrameSample {
  return {
    gamepad: DISCONNECTED_GAMEPAD,
    keyboard: { current: NO_KEYS, previous: NO_KEYS },
    mouse: EMPTY_MOUSE,
    timestampMs,
  };
}

export const EMPTY_SAMPLE: RawFrameSample = emptySample();

/**
 * Copies `sample` with the keyboard and/or mouse replaced by empty state.
 * Used when another layer (a text field, a debug overlay) owns those devices.
 */
export function withoutDevices(
  sample: RawFrameSample,
  opts: { keyboard: boolean; mouse: boolean },
): RawFrameSample {
  if (!opts.keyboard && !opts.mouse) return sample;
  return {
    ...sample,
    keyboard: opts.keyboard
      ? { current: NO_KEYS, previous: NO_KEYS }
      : sample.keyboard,
    mouse: opts.mouse ? { ...EMPTY_MOUSE, wheel: sample.mouse.wheel } : sample.mouse,
  };
}

export type ScriptedSampleProvider = RawSampleProvider & {
  keyDown: (...codes: ReadonlyArray<KeyCode>) => void;
  keyUp: (...codes: ReadonlyArray<KeyCode>) => void;
  mouseDown: (button: MouseButton) => void;
  mouseUp: (button: MouseButton) => void;
  moveMouse: (x: number, y: number) => void;
  setWheel: (value: number) => void;
  connectGamepad: (connected: boolean) => void;
  gamepadDown: (button: GamepadButton) => void;
  gamepadUp: (button: GamepadButton) => void;
  setStick: (which: GamepadStick, x: number, y: number) => void;
  setTriggers: (left: number, right: number) => void;
  /** Moves the sample clock forward. */
  advance: (ms: number) => void;
  /** Releases everything; keeps the clock and the wheel counter. */
  releaseAll: () => void;
};

/**
 * In-process provider whose state is set by calls instead of hardware.
 * Each sample() reports the keyboard set of the previous sample as `previous`.
 */
export function createScriptedSampleProvider(startMs = 0): ScriptedSampleProvider {
  const keys = new Set<KeyCode>();
  const mouseButtons = new Set<MouseButton>();
  const padButtons = new Set<GamepadButton>();
  let previousKeys: ReadonlySet<KeyCode> = NO_KEYS;
  let cursor = { x: 0, y: 0 };
  let wheel = 0;
  let connected = false;
  let leftStick: Vec2 = ZERO;
  let rightStick: Vec2 = ZERO;
  let triggers = { left: 0, right: 0 };
  let nowMs = startMs;

  const clamp1 = (v: number): number => Math.max(-1, Math.min(1, v));

  return {
    advance: (ms: number): void => {
      nowMs += ms;
    },
    connectGamepad: (value: boolean): void => {
      connected = value;
    },
    gamepadDown: (button: GamepadButton): void => {
      connected = true;
      padButtons.add(button);
    },
    gamepadUp: (button: GamepadButton): void => {
      padButtons.delete(button);
    },
    keyDown: (...codes: ReadonlyArray<KeyCode>): void => {
      for (const code of codes) keys.add(code);
    },
    keyUp: (...codes: ReadonlyArray<KeyCode>): void => {
      for (const code of codes) keys.delete(code);
    },
    mouseDown: (button: MouseButton): void => {
      mouseButtons.add(button);
    },
    mouseUp: (button: MouseButton): void => {
      mouseButtons.delete(button);
    },
    moveMouse: (x: number, y: number): void => {
      cursor = { x, y };
    },
    releaseAll: (): void => {
      keys.clear();
      mouseButtons.clear();
      padButtons.clear();
      leftStick = ZERO;
      rightStick = ZERO;
      triggers = { left: 0, right: 0 };
    },
    sample: (): RawFrameSample => {
      const current: ReadonlySet<KeyCode> = new Set(keys);
      const sample: RawFrameSample = {
        gamepad: {
          buttons: new Set(padButtons),
          connected,
          leftStick,
          leftTrigger: triggers.left,
          rightStick,
          rightTrigger: triggers.right,
        },
        keyboard: { current, previous: previousKeys },
        mouse: {
          buttons: new Set(mouseButtons),
          wheel,
          x: cursor.x,
          y: cursor.y,
        },
        timestampMs: createTimestamp(nowMs),
      };
      previousKeys = current;
      return sample;
    },
    setStick: (which: GamepadStick, x: number, y: number): void => {
      connected = true;
      const v = { x: clamp1(x), y: clamp1(y) };
      if (which === "left") leftStick = v;
      else rightStick = v;
    },
    setTriggers: (left: number, right: number): void => {
      connected = true;
      triggers = {
        left: Math.max(0, Math.min(1, left)),
        right: Math.max(0, Math.min(1, right)),
      };
    },
    setWheel: (value: number): void => {
      wheel = value;
    },
  };
}
