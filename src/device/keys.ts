// Physical input codes (what the user actually presses) and the bindings that
// map them onto logical buttons and axes.

// KeyboardEvent.code values: "ArrowUp", "Space", "KeyZ", ...
export type KeyCode = string;

export type MouseButton = "left" | "right" | "middle" | "x1" | "x2";

export type GamepadButton =
  | "A"
  | "B"
  | "X"
  | "Y"
  | "LeftShoulder"
  | "RightShoulder"
  | "Back"
  | "Start"
  | "LeftStick"
  | "RightStick"
  | "DPadUp"
  | "DPadDown"
  | "DPadLeft"
  | "DPadRight"
  | "BigButton";

export type GamepadStick = "left" | "right";

// Single analog channels that can be read as a digital button
export type GamepadAxisChannel =
  | "leftX"
  | "leftY"
  | "rightX"
  | "rightY"
  | "leftTrigger"
  | "rightTrigger";

export const MOUSE_BUTTONS: ReadonlyArray<MouseButton> = [
  "left",
  "right",
  "middle",
  "x1",
  "x2",
];

export const GAMEPAD_BUTTONS: ReadonlyArray<GamepadButton> = [
  "A",
  "B",
  "X",
  "Y",
  "LeftShoulder",
  "RightShoulder",
  "Back",
  "Start",
  "LeftStick",
  "RightStick",
  "DPadUp",
  "DPadDown",
  "DPadLeft",
  "DPadRight",
  "BigButton",
];

export const GAMEPAD_STICKS: ReadonlyArray<GamepadStick> = ["left", "right"];

export const GAMEPAD_AXIS_CHANNELS: ReadonlyArray<GamepadAxisChannel> = [
  "leftX",
  "leftY",
  "rightX",
  "rightY",
  "leftTrigger",
  "rightTrigger",
];

export type KeyBinding = Readonly<{ kind: "key"; key: KeyCode }>;
export type MouseBinding = Readonly<{ kind: "mouse"; button: MouseButton }>;
export type GamepadButtonBinding = Readonly<{
  kind: "gamepad";
  button: GamepadButton;
}>;
export type GamepadAxisButtonBinding = Readonly<{
  kind: "gamepadAxisButton";
  channel: GamepadAxisChannel;
  direction: -1 | 1;
}>;
export type GamepadStickBinding = Readonly<{
  kind: "gamepadStick";
  stick: GamepadStick;
}>;

// Sources a 4-way digital set can be built from
export type DigitalSource = KeyBinding | GamepadButtonBinding;

export type FourWayBinding = Readonly<{
  kind: "fourWay";
  up: DigitalSource;
  left: DigitalSource;
  down: DigitalSource;
  right: DigitalSource;
}>;

export type Binding =
  | KeyBinding
  | MouseBinding
  | GamepadButtonBinding
  | GamepadAxisButtonBinding
  | GamepadStickBinding
  | FourWayBinding;

// Bindings a VirtualButton evaluates as a boolean
export type ButtonBinding =
  | KeyBinding
  | MouseBinding
  | GamepadButtonBinding
  | GamepadAxisButtonBinding;

// Bindings a VirtualAxis evaluates as a vector
export type AxisBinding = GamepadStickBinding | FourWayBinding;

// Constructors
export const key = (code: KeyCode): KeyBinding => ({ key: code, kind: "key" });
export const mouse = (button: MouseButton): MouseBinding => ({
  button,
  kind: "mouse",
});
export const pad = (button: GamepadButton): GamepadButtonBinding => ({
  button,
  kind: "gamepad",
});
export const padAxis = (
  channel: GamepadAxisChannel,
  direction: -1 | 1,
): GamepadAxisButtonBinding => ({
  channel,
  direction,
  kind: "gamepadAxisButton",
});
export const stick = (which: GamepadStick): GamepadStickBinding => ({
  kind: "gamepadStick",
  stick: which,
});
export const fourWay = (
  up: DigitalSource,
  left: DigitalSource,
  down: DigitalSource,
  right: DigitalSource,
): FourWayBinding => ({ down, kind: "fourWay", left, right, up });

export function isButtonBinding(b: Binding): b is ButtonBinding {
  return b.kind !== "gamepadStick" && b.kind !== "fourWay";
}

export function isAxisBinding(b: Binding): b is AxisBinding {
  return b.kind === "gamepadStick" || b.kind === "fourWay";
}

/**
 * Canonical string form of a binding. Two bindings refer to the same physical
 * input iff their tokens are equal.
 */
export function bindingToken(b: Binding): string {
  switch (b.kind) {
    case "key":
      return `key:${b.key}`;
    case "mouse":
      return `mouse:${b.button}`;
    case "gamepad":
      return `gp:button:${b.button}`;
    case "gamepadAxisButton":
      return `gp:axis:${b.channel}:${b.direction > 0 ? "+" : "-"}`;
    case "gamepadStick":
      return `gp:stick:${b.stick}`;
    case "fourWay":
      return `4way(${[b.up, b.left, b.down, b.right].map(bindingToken).join("|")})`;
  }
}

function isMouseButton(s: string): s is MouseButton {
  return (MOUSE_BUTTONS as ReadonlyArray<string>).includes(s);
}

export function isGamepadButton(s: string): s is GamepadButton {
  return (GAMEPAD_BUTTONS as ReadonlyArray<string>).includes(s);
}

export function isGamepadStick(s: string): s is GamepadStick {
  return (GAMEPAD_STICKS as ReadonlyArray<string>).includes(s);
}

function isAxisChannel(s: string): s is GamepadAxisChannel {
  return (GAMEPAD_AXIS_CHANNELS as ReadonlyArray<string>).includes(s);
}

function parseDigitalSource(token: string): DigitalSource | null {
  const parsed = parseBindingToken(token);
  if (parsed === null) return null;
  if (parsed.kind === "key" || parsed.kind === "gamepad") return parsed;
  return null;
}

const FOUR_WAY_REGEX = /^4way\(([^()]*)\)$/;
const AXIS_BUTTON_REGEX = /^gp:axis:(\w+):([+-])$/;

/** Inverse of bindingToken. Returns null for anything malformed. */
export function parseBindingToken(token: string): Binding | null {
  const fourWayMatch = FOUR_WAY_REGEX.exec(token);
  if (fourWayMatch) {
    const parts = (fourWayMatch[1] ?? "").split("|").map(parseDigitalSource);
    const [up, left, down, right] = parts;
    if (parts.length !== 4 || !up || !left || !down || !right) return null;
    return fourWay(up, left, down, right);
  }

  const axisMatch = AXIS_BUTTON_REGEX.exec(token);
  if (axisMatch) {
    const channel = axisMatch[1] ?? "";
    if (!isAxisChannel(channel)) return null;
    return padAxis(channel, axisMatch[2] === "+" ? 1 : -1);
  }

  if (token.startsWith("key:")) {
    const code = token.slice("key:".length);
    return code.length > 0 && !/[|()]/.test(code) ? key(code) : null;
  }
  if (token.startsWith("mouse:")) {
    const button = token.slice("mouse:".length);
    return isMouseButton(button) ? mouse(button) : null;
  }
  if (token.startsWith("gp:button:")) {
    const button = token.slice("gp:button:".length);
    return isGamepadButton(button) ? pad(button) : null;
  }
  if (token.startsWith("gp:stick:")) {
    const which = token.slice("gp:stick:".length);
    return isGamepadStick(which) ? stick(which) : null;
  }
  return null;
}

const MOUSE_LABELS: Record<MouseButton, string> = {
  left: "Left Click",
  middle: "Middle Click",
  right: "Right Click",
  x1: "Mouse 4",
  x2: "Mouse 5",
};

// Human-readable label, e.g. for rebinding screens
export function describeBinding(b: Binding): string {
  switch (b.kind) {
    case "key":
      return b.key.startsWith("Key") ? b.key.slice(3) : b.key;
    case "mouse":
      return MOUSE_LABELS[b.button];
    case "gamepad":
      return `Pad ${b.button}`;
    case "gamepadAxisButton":
      return `Pad ${b.channel}${b.direction > 0 ? "+" : "-"}`;
    case "gamepadStick":
      return b.stick === "left" ? "Left Stick" : "Right Stick";
    case "fourWay":
      return [b.up, b.left, b.down, b.right].map(describeBinding).join("/");
  }
}
