/**
 * Input profiles: the declarative list of default bindings per logical id,
 * and whether players may rebind each one. Profiles usually come from a JSON
 * asset; anything in it that does not map to a binding is skipped with a
 * warning so one typo never drops the whole profile.
 */
import { readFileSync } from "node:fs";

import { isRecord } from "../app/settings";
import {
  fourWay,
  isGamepadButton,
  isGamepadStick,
  key,
  mouse,
  pad,
  parseBindingToken,
  stick,
  type AxisBinding,
  type ButtonBinding,
  type DigitalSource,
  type GamepadAxisButtonBinding,
  type GamepadButton,
  type GamepadStick,
  type KeyCode,
  type MouseButton,
} from "../device/keys";
import { isAxisId, isButtonId, type AxisId, type ButtonId } from "../types/brands";
import { warn } from "../utils/debug";

export type ButtonProfileEntry = Readonly<{
  id: ButtonId;
  name?: string;
  allowPlayerCustomization: boolean;
  keyboard: ReadonlyArray<KeyCode>;
  gamepad: ReadonlyArray<GamepadButton>;
  mouse: ReadonlyArray<MouseButton>;
  gamepadAxes: ReadonlyArray<GamepadAxisButtonBinding>;
}>;

// [up, left, down, right] for 2D axes, [up, down] for 1D axes
export type DigitalSet = ReadonlyArray<DigitalSource>;

export type AxisProfileEntry = Readonly<{
  id: AxisId;
  name?: string;
  allowPlayerCustomization: boolean;
  horizontal: boolean;
  vertical: boolean;
  analog: ReadonlyArray<GamepadStick>;
  digital: ReadonlyArray<DigitalSet>;
}>;

export type InputProfile = Readonly<{
  buttons: ReadonlyArray<ButtonProfileEntry>;
  axes: ReadonlyArray<AxisProfileEntry>;
}>;

export const EMPTY_PROFILE: InputProfile = { axes: [], buttons: [] };

export function buttonDefaults(entry: ButtonProfileEntry): Array<ButtonBinding> {
  return [
    ...entry.keyboard.map(key),
    ...entry.gamepad.map(pad),
    ...entry.mouse.map(mouse),
    ...entry.gamepadAxes,
  ];
}

export function axisDefaults(entry: AxisProfileEntry): Array<AxisBinding> {
  const out: Array<AxisBinding> = entry.analog.map(stick);
  const twoDimensional = entry.horizontal && entry.vertical;
  for (const set of entry.digital) {
    if (twoDimensional) {
      const [up, left, down, right] = set;
      if (set.length === 4 && up && left && down && right) {
        out.push(fourWay(up, left, down, right));
        continue;
      }
    } else {
      // One dimension: the same pair drives both components
      const [up, down] = set;
      if (set.length === 2 && up && down) {
        out.push(fourWay(up, up, down, down));
        continue;
      }
    }
    warn(
      "profile",
      `axis ${String(entry.id)}: digital set of ${String(set.length)} sources does not fit the axis shape, skipped`,
    );
  }
  return out;
}

export function findButtonEntry(
  profile: InputProfile,
  id: ButtonId,
): ButtonProfileEntry | undefined {
  return profile.buttons.find((b) => b.id === id);
}

export function findAxisEntry(
  profile: InputProfile,
  id: AxisId,
): AxisProfileEntry | undefined {
  return profile.axes.find((a) => a.id === id);
}

// --- parsing ---------------------------------------------------------------

function arrayField(entry: Record<string, unknown>, field: string, where: string): Array<unknown> {
  const v = entry[field];
  if (v === undefined) return [];
  if (Array.isArray(v)) return v;
  warn("profile", `${where}: "${field}" is not a list, ignored`);
  return [];
}

function collect<T>(
  items: ReadonlyArray<unknown>,
  parse: (item: unknown) => T | null,
  where: string,
): Array<T> {
  const out: Array<T> = [];
  for (const item of items) {
    const parsed = parse(item);
    if (parsed === null) {
      warn("profile", `${where}: cannot map ${JSON.stringify(item)} to a binding, skipped`);
      continue;
    }
    out.push(parsed);
  }
  return out;
}

const parseKeyCode = (item: unknown): KeyCode | null =>
  typeof item === "string" && item.length > 0 ? item : null;

const parseGamepadButton = (item: unknown): GamepadButton | null =>
  typeof item === "string" && isGamepadButton(item) ? item : null;

const parseMouseButton = (item: unknown): MouseButton | null => {
  if (typeof item !== "string") return null;
  const parsed = parseBindingToken(`mouse:${item}`);
  return parsed?.kind === "mouse" ? parsed.button : null;
};

const parseAxisButton = (item: unknown): GamepadAxisButtonBinding | null => {
  if (typeof item !== "string") return null;
  const parsed = parseBindingToken(item);
  return parsed?.kind === "gamepadAxisButton" ? parsed : null;
};

const parseStick = (item: unknown): GamepadStick | null =>
  typeof item === "string" && isGamepadStick(item) ? item : null;

const parseDigitalSet = (item: unknown): DigitalSet | null => {
  if (!Array.isArray(item)) return null;
  const sources: Array<DigitalSource> = [];
  for (const token of item) {
    if (typeof token !== "string") return null;
    const parsed = parseBindingToken(token);
    if (parsed === null || (parsed.kind !== "key" && parsed.kind !== "gamepad")) {
      return null;
    }
    sources.push(parsed);
  }
  return sources;
};

function optionalName(entry: Record<string, unknown>): { name?: string } {
  const name = entry["name"];
  return typeof name === "string" ? { name } : {};
}

function parseButtonEntry(raw: unknown, index: number): ButtonProfileEntry | null {
  if (!isRecord(raw) || !isButtonId(raw["id"])) {
    warn("profile", `button entry #${String(index)} has no valid id, skipped`);
    return null;
  }
  const id = raw["id"];
  const where = `button ${String(id)}`;
  return {
    allowPlayerCustomization: raw["allowPlayerCustomization"] === true,
    gamepad: collect(arrayField(raw, "gamepad", where), parseGamepadButton, where),
    gamepadAxes: collect(arrayField(raw, "gamepadAxes", where), parseAxisButton, where),
    id,
    keyboard: collect(arrayField(raw, "keyboard", where), parseKeyCode, where),
    mouse: collect(arrayField(raw, "mouse", where), parseMouseButton, where),
    ...optionalName(raw),
  };
}

function parseAxisEntry(raw: unknown, index: number): AxisProfileEntry | null {
  if (!isRecord(raw) || !isAxisId(raw["id"])) {
    warn("profile", `axis entry #${String(index)} has no valid id, skipped`);
    return null;
  }
  const id = raw["id"];
  const where = `axis ${String(id)}`;
  return {
    allowPlayerCustomization: raw["allowPlayerCustomization"] === true,
    analog: collect(arrayField(raw, "analog", where), parseStick, where),
    digital: collect(arrayField(raw, "digital", where), parseDigitalSet, where),
    horizontal: raw["horizontal"] !== false,
    id,
    vertical: raw["vertical"] !== false,
    ...optionalName(raw),
  };
}

/** Validates untrusted profile data. Never throws. */
export function parseInputProfile(raw: unknown): InputProfile {
  if (!isRecord(raw)) {
    warn("profile", "input profile is not an object, using an empty profile");
    return EMPTY_PROFILE;
  }
  const buttons: Array<ButtonProfileEntry> = [];
  arrayField(raw, "buttons", "profile").forEach((item, i) => {
    const entry = parseButtonEntry(item, i);
    if (entry) buttons.push(entry);
  });
  const axes: Array<AxisProfileEntry> = [];
  arrayField(raw, "axes", "profile").forEach((item, i) => {
    const entry = parseAxisEntry(item, i);
    if (entry) axes.push(entry);
  });
  return { axes, buttons };
}

export function readInputProfileFile(path: string): InputProfile {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
    return parseInputProfile(parsed);
  } catch (error) {
    warn("profile", `could not read input profile ${path}`, error);
    return EMPTY_PROFILE;
  }
}
