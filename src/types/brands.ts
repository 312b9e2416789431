// Branded primitive types for type safety and domain modeling

// Logical button id - small non-negative integer chosen by the game
declare const ButtonIdBrand: unique symbol;
export type ButtonId = number & { readonly [ButtonIdBrand]: true };

// Logical axis id - separate id space from buttons
declare const AxisIdBrand: unique symbol;
export type AxisId = number & { readonly [AxisIdBrand]: true };

// Duration in milliseconds - for time intervals/deltas
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// Sample time in ms on the host's monotonic clock; zero is a valid start
declare const TimestampBrand: unique symbol;
export type Timestamp = number & { readonly [TimestampBrand]: true };

// Frame counter - incremented once per fixed step
declare const FrameBrand: unique symbol;
export type Frame = number & { readonly [FrameBrand]: true };

function isIdLike(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

// ButtonId constructors and guards
export function createButtonId(value: number): ButtonId {
  if (!isIdLike(value)) {
    throw new Error("ButtonId must be a non-negative integer");
  }
  return value as ButtonId;
}

export function isButtonId(n: unknown): n is ButtonId {
  return isIdLike(n);
}

// AxisId constructors and guards
export function createAxisId(value: number): AxisId {
  if (!isIdLike(value)) {
    throw new Error("AxisId must be a non-negative integer");
  }
  return value as AxisId;
}

export function isAxisId(n: unknown): n is AxisId {
  return isIdLike(n);
}

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}

export function createTimestamp(value: number): Timestamp {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("Timestamp must be a non-negative finite number");
  }
  return value as Timestamp;
}

// Frame constructors and guards
export function createFrame(value: number): Frame {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("Frame must be a non-negative integer");
  }
  return value as Frame;
}

export function isFrame(n: unknown): n is Frame {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

// Conversion helpers for interop at boundaries
export const buttonIdAsNumber = (id: ButtonId): number => id as number;
export const axisIdAsNumber = (id: AxisId): number => id as number;
export const durationMsAsNumber = (d: DurationMs): number => d as number;
export const frameAsNumber = (f: Frame): number => f as number;

export function incrementFrame(frame: Frame): Frame {
  return (frame + 1) as Frame;
}
