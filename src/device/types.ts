/**
 * Raw per-frame device state. A RawSampleProvider normalizes whatever the host
 * polls (DOM events, SDL, a replay file) into one immutable RawFrameSample per
 * frame; nothing downstream reads devices directly.
 */
import type {
  GamepadButton,
  KeyCode,
  MouseButton,
} from "./keys";
import type { Timestamp } from "../types/brands";

export type Vec2 = Readonly<{ x: number; y: number }>;

export type Point = Readonly<{ x: number; y: number }>;

export type KeyboardSample = Readonly<{
  current: ReadonlySet<KeyCode>;
  previous: ReadonlySet<KeyCode>;
}>;

export type MouseSample = Readonly<{
  buttons: ReadonlySet<MouseButton>;
  x: number;
  y: number;
  // Accumulated wheel counter, not a per-frame delta
  wheel: number;
}>;

export type GamepadSample = Readonly<{
  connected: boolean;
  buttons: ReadonlySet<GamepadButton>;
  // Components in [-1, 1]; y grows downward, like the digital "down"
  leftStick: Vec2;
  rightStick: Vec2;
  // [0, 1]
  leftTrigger: number;
  rightTrigger: number;
}>;

export type RawFrameSample = Readonly<{
  timestampMs: Timestamp;
  keyboard: KeyboardSample;
  mouse: MouseSample;
  gamepad: GamepadSample;
}>;

export type RawSampleProvider = {
  /** Snapshot for the current frame. Called exactly once per update. */
  sample(): RawFrameSample;
};
