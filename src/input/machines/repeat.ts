/*
 * Held-direction auto-repeat for one axis component, built on robot3.
 *
 * A direction change is already a "tick" on the axis itself. This machine adds
 * the pulses that follow while the same direction stays held:
 *
 * idle → charging (on DIRECTION_DOWN) → either:
 *   - back to idle (on DIRECTION_UP before the delay expires)
 *   - to repeating (on TIMER_TICK once the delay has passed) = first repeat
 * repeating → repeating (on TIMER_TICK at each interval) = further repeats
 * any → charging (on DIRECTION_DOWN with a new direction)
 * any → idle (on DIRECTION_UP)
 *
 * Context is immutable: reducers return new objects, actions only report
 * pulses back to the service.
 */

import {
  action,
  createMachine,
  guard,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import type { Machine, MachineState, MachineStates, Service } from "robot3";

export type RepeatState = "idle" | "charging" | "repeating";

export type RepeatContext = {
  direction: -1 | 1 | undefined;
  holdStartMs: number | undefined;
  lastRepeatMs: number | undefined;
  delayMs: number;
  intervalMs: number;
  // Pulses produced by the transition that just ran (catch-up included)
  repeats: number;
};

export type RepeatEvent =
  | { type: "DIRECTION_DOWN"; direction: -1 | 1; timestamp: number }
  | { type: "DIRECTION_UP"; timestamp: number }
  | { type: "TIMER_TICK"; timestamp: number }
  | { type: "UPDATE_CONFIG"; delayMs: number; intervalMs: number };

// Guards

const isDirectionDown = (_ctx: RepeatContext, event: RepeatEvent): boolean =>
  event.type === "DIRECTION_DOWN";

const isDirectionUp = (_ctx: RepeatContext, event: RepeatEvent): boolean =>
  event.type === "DIRECTION_UP";

const isDelayExpired = (ctx: RepeatContext, event: RepeatEvent): boolean => {
  if (event.type !== "TIMER_TICK") return false;
  if (ctx.holdStartMs === undefined) return false;
  return event.timestamp - ctx.holdStartMs >= ctx.delayMs;
};

const isIntervalDue = (ctx: RepeatContext, event: RepeatEvent): boolean => {
  if (event.type !== "TIMER_TICK") return false;
  if (ctx.lastRepeatMs === undefined) return false;
  return event.timestamp - ctx.lastRepeatMs >= Math.max(1, ctx.intervalMs);
};

const isConfigUpdate = (_ctx: RepeatContext, event: RepeatEvent): boolean =>
  event.type === "UPDATE_CONFIG";

// Reducers

export const startHold = (ctx: RepeatContext, event: RepeatEvent): RepeatContext => {
  if (event.type !== "DIRECTION_DOWN") return ctx;
  return {
    ...ctx,
    direction: event.direction,
    holdStartMs: event.timestamp,
    lastRepeatMs: undefined,
    repeats: 0,
  };
};

export const endHold = (ctx: RepeatContext, _event: RepeatEvent): RepeatContext => ({
  ...ctx,
  direction: undefined,
  holdStartMs: undefined,
  lastRepeatMs: undefined,
  repeats: 0,
});

export const firstRepeat = (ctx: RepeatContext, event: RepeatEvent): RepeatContext => {
  if (event.type !== "TIMER_TICK" || ctx.holdStartMs === undefined) return ctx;
  return {
    ...ctx,
    lastRepeatMs: ctx.holdStartMs + ctx.delayMs,
    repeats: 1,
  };
};

export const nextRepeats = (ctx: RepeatContext, event: RepeatEvent): RepeatContext => {
  if (event.type !== "TIMER_TICK" || ctx.lastRepeatMs === undefined) return ctx;
  const interval = Math.max(1, ctx.intervalMs);
  const repeats = Math.floor((event.timestamp - ctx.lastRepeatMs) / interval);
  return {
    ...ctx,
    lastRepeatMs: ctx.lastRepeatMs + repeats * interval,
    repeats: Math.max(1, repeats),
  };
};

export const updateConfig = (ctx: RepeatContext, event: RepeatEvent): RepeatContext => {
  if (event.type !== "UPDATE_CONFIG") return ctx;
  return {
    ...ctx,
    delayMs: Math.max(0, event.delayMs),
    intervalMs: Math.max(1, event.intervalMs),
  };
};

type RepeatEventType = RepeatEvent["type"];
type RepeatStatesObject = Record<RepeatState, MachineState<RepeatEventType>>;
export type RepeatMachine = Machine<
  RepeatStatesObject,
  RepeatContext,
  RepeatState,
  RepeatEventType
>;

type RepeatEmit = (ctx: RepeatContext, event: RepeatEvent) => void;

const createIdleState = (): MachineState<RepeatEventType> =>
  state(
    transition(
      "DIRECTION_DOWN",
      "charging",
      guard(isDirectionDown),
      reduce(startHold),
    ),
    transition(
      "UPDATE_CONFIG",
      "idle",
      guard(isConfigUpdate),
      reduce(updateConfig),
    ),
  );

const createChargingState = (emit: RepeatEmit): MachineState<RepeatEventType> =>
  state(
    transition("DIRECTION_UP", "idle", guard(isDirectionUp), reduce(endHold)),
    transition(
      "DIRECTION_DOWN",
      "charging",
      guard(isDirectionDown),
      reduce(startHold),
    ),
    transition(
      "TIMER_TICK",
      "repeating",
      guard(isDelayExpired),
      reduce(firstRepeat),
      action(emit),
    ),
    transition(
      "UPDATE_CONFIG",
      "charging",
      guard(isConfigUpdate),
      reduce(updateConfig),
    ),
  );

const createRepeatingState = (emit: RepeatEmit): MachineState<RepeatEventType> =>
  state(
    transition("DIRECTION_UP", "idle", guard(isDirectionUp), reduce(endHold)),
    transition(
      "DIRECTION_DOWN",
      "charging",
      guard(isDirectionDown),
      reduce(startHold),
    ),
    transition(
      "TIMER_TICK",
      "repeating",
      guard(isIntervalDue),
      reduce(nextRepeats),
      action(emit),
    ),
    transition(
      "UPDATE_CONFIG",
      "repeating",
      guard(isConfigUpdate),
      reduce(updateConfig),
    ),
  );

export const createRepeatMachine = (
  initialContext: RepeatContext,
  onRepeat: (count: number) => void,
): RepeatMachine => {
  const emit: RepeatEmit = (ctx) => {
    if (ctx.repeats > 0) onRepeat(ctx.repeats);
  };

  const states = {
    charging: createChargingState(emit),
    idle: createIdleState(),
    repeating: createRepeatingState(emit),
  } as const;

  // robot3 widens the event type to `string`; keep the precise typing at the
  // boundary of this module.
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<RepeatStatesObject, RepeatEventType>,
    (_ctx: RepeatContext): RepeatContext => initialContext,
  ) as unknown as RepeatMachine;
};

export const createRepeatContext = (
  delayMs: number,
  intervalMs: number,
): RepeatContext => ({
  delayMs: Math.max(0, delayMs),
  direction: undefined,
  holdStartMs: undefined,
  intervalMs: Math.max(1, intervalMs),
  lastRepeatMs: undefined,
  repeats: 0,
});

type RepeatService = Service<RepeatMachine>;

/** Thin wrapper around the robot3 service; send() returns the pulse count. */
export class RepeatMachineService {
  private service: RepeatService;
  private pulses = 0;
  private currentStateName: RepeatState = "idle";

  constructor(delayMs: number, intervalMs: number) {
    const machine = createRepeatMachine(
      createRepeatContext(delayMs, intervalMs),
      (count) => {
        this.pulses += count;
      },
    );
    this.service = interpret(machine, (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  send(event: RepeatEvent): number {
    this.service.send(event);
    const count = this.pulses;
    this.pulses = 0;
    return count;
  }

  get state(): RepeatState {
    return this.currentStateName;
  }

  get context(): RepeatContext {
    return { ...this.service.context };
  }

  /** New timings take effect from the next tick; the current hold is kept. */
  configure(delayMs: number, intervalMs: number): void {
    this.send({ delayMs, intervalMs, type: "UPDATE_CONFIG" });
  }

  /**
   * Feeds one frame of a quantized axis component. A change of direction
   * (re)starts or ends the hold; an unchanged non-zero direction advances
   * the timer, or starts the hold if the machine joined mid-hold.
   */
  step(previous: -1 | 0 | 1, current: -1 | 0 | 1, timestamp: number): number {
    if (current !== previous) {
      if (current === 0) return this.send({ timestamp, type: "DIRECTION_UP" });
      return this.send({ direction: current, timestamp, type: "DIRECTION_DOWN" });
    }
    if (current === 0) return 0;
    if (this.currentStateName === "idle") {
      return this.send({ direction: current, timestamp, type: "DIRECTION_DOWN" });
    }
    return this.send({ timestamp, type: "TIMER_TICK" });
  }
}
