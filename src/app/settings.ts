// Engine settings: defaults, coercion from untrusted JSON, and file loading.
// Invalid fields fall back to their defaults one by one.

import { readFileSync } from "node:fs";

import { createDurationMs, type DurationMs } from "../types/brands";
import { debugLog, warn } from "../utils/debug";

export type AxisRepeatSettings = Readonly<{
  // Hold time before the first repeat
  delayMs: DurationMs;
  // Time between repeats after that
  intervalMs: DurationMs;
}>;

export type InputSettings = Readonly<{
  deadZone: number;
  axisButtonThreshold: number;
  textMaxLength: number;
  smoothScrollHalfLifeMs: DurationMs;
  axisRepeat: AxisRepeatSettings | undefined;
  maxCatchUpSteps: number;
}>;

export const DEFAULT_INPUT_SETTINGS: InputSettings = {
  axisButtonThreshold: 0.5,
  axisRepeat: undefined,
  deadZone: 0.2,
  maxCatchUpSteps: 5,
  smoothScrollHalfLifeMs: createDurationMs(100),
  textMaxLength: 32,
};

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function unitOr(v: unknown, fallback: number): number {
  return isNumber(v) && v >= 0 && v <= 1 ? v : fallback;
}

function positiveIntOr(v: unknown, fallback: number): number {
  return isNumber(v) && Number.isInteger(v) && v > 0 ? v : fallback;
}

function durationOr(v: unknown, fallback: DurationMs): DurationMs {
  return isNumber(v) && v >= 0 ? createDurationMs(v) : fallback;
}

function coerceAxisRepeat(v: unknown): AxisRepeatSettings | undefined {
  if (!isRecord(v)) return undefined;
  const delay = v["delayMs"];
  const interval = v["intervalMs"];
  if (!isNumber(delay) || delay < 0 || !isNumber(interval) || interval <= 0) {
    return undefined;
  }
  return {
    delayMs: createDurationMs(delay),
    intervalMs: createDurationMs(interval),
  };
}

export function coerceInputSettings(
  maybe: unknown,
  fallback: InputSettings = DEFAULT_INPUT_SETTINGS,
): InputSettings {
  if (!isRecord(maybe)) return fallback;
  return {
    axisButtonThreshold: unitOr(
      maybe["axisButtonThreshold"],
      fallback.axisButtonThreshold,
    ),
    axisRepeat:
      "axisRepeat" in maybe
        ? coerceAxisRepeat(maybe["axisRepeat"])
        : fallback.axisRepeat,
    deadZone: unitOr(maybe["deadZone"], fallback.deadZone),
    maxCatchUpSteps: positiveIntOr(
      maybe["maxCatchUpSteps"],
      fallback.maxCatchUpSteps,
    ),
    smoothScrollHalfLifeMs: durationOr(
      maybe["smoothScrollHalfLifeMs"],
      fallback.smoothScrollHalfLifeMs,
    ),
    textMaxLength: positiveIntOr(maybe["textMaxLength"], fallback.textMaxLength),
  };
}

/** Reads settings from a JSON file; a missing or broken file yields defaults. */
export function readInputSettingsFile(path: string): InputSettings {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch {
    debugLog("settings", `no settings file at ${path}, using defaults`);
    return DEFAULT_INPUT_SETTINGS;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return coerceInputSettings(parsed);
  } catch (error) {
    warn("settings", `could not parse ${path}, using defaults`, error);
    return DEFAULT_INPUT_SETTINGS;
  }
}
