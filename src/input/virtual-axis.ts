import { bindingToken, describeBinding, type AxisBinding } from "../device/keys";
import { bindingVector, fourWayVector } from "../device/edge-computation";

import { RepeatMachineService } from "./machines/repeat";

import type { AxisRepeatSettings } from "../app/settings";
import type { RawFrameSample, Vec2 } from "../device/types";

export type Sign = -1 | 0 | 1;

export type IntVec2 = Readonly<{ x: Sign; y: Sign }>;

export type VirtualAxisOptions = Readonly<{
  deadZone: number;
  repeat: AxisRepeatSettings | undefined;
}>;

/** Read-only surface handed to menus and game systems. */
export type VirtualAxisView = Readonly<{
  value: Vec2;
  intValue: IntVec2;
  tickX: boolean;
  tickY: boolean;
  repeatX: boolean;
  repeatY: boolean;
  stepX: Sign;
  stepY: Sign;
  consumed: boolean;
}>;

type Repeaters = Readonly<{ x: RepeatMachineService; y: RepeatMachineService }>;

const createRepeaters = (repeat: AxisRepeatSettings | undefined): Repeaters | undefined =>
  repeat === undefined
    ? undefined
    : {
        x: new RepeatMachineService(repeat.delayMs, repeat.intervalMs),
        y: new RepeatMachineService(repeat.delayMs, repeat.intervalMs),
      };

const clamp1 = (v: number): number => Math.max(-1, Math.min(1, v));
const signOf = (v: number): Sign => (v > 0 ? 1 : v < 0 ? -1 : 0);

/**
 * A logical 2D signal. The value is rebuilt from the bindings every frame;
 * nothing is carried over except the previous quantized direction, which is
 * what tickX/tickY compare against.
 */
export class VirtualAxis implements VirtualAxisView {
  private readonly bindingMap = new Map<string, AxisBinding>();
  private repeaters: Repeaters | undefined;
  private lastTimestampMs = 0;

  value: Vec2 = { x: 0, y: 0 };
  intValue: IntVec2 = { x: 0, y: 0 };
  tickX = false;
  tickY = false;
  repeatX = false;
  repeatY = false;
  consumed = false;
  mocked = false;

  constructor(private readonly options: VirtualAxisOptions = { deadZone: 0, repeat: undefined }) {
    this.repeaters = createRepeaters(options.repeat);
  }

  get bindings(): ReadonlyArray<AxisBinding> {
    return [...this.bindingMap.values()];
  }

  /** Horizontal step this frame: a fresh direction or a held-direction repeat. */
  get stepX(): Sign {
    return (this.tickX || this.repeatX) ? this.intValue.x : 0;
  }

  get stepY(): Sign {
    return (this.tickY || this.repeatY) ? this.intValue.y : 0;
  }

  register(...bindings: ReadonlyArray<AxisBinding>): void {
    for (const binding of bindings) {
      this.bindingMap.set(bindingToken(binding), binding);
    }
  }

  clearBinds(): void {
    this.bindingMap.clear();
  }

  /**
   * Retunes auto-repeat. A held direction keeps its hold start; `undefined`
   * turns repeats off.
   */
  setRepeat(repeat: AxisRepeatSettings | undefined): void {
    if (repeat === undefined || this.repeaters === undefined) {
      this.repeaters = createRepeaters(repeat);
    } else {
      this.repeaters.x.configure(repeat.delayMs, repeat.intervalMs);
      this.repeaters.y.configure(repeat.delayMs, repeat.intervalMs);
    }
    if (this.repeaters === undefined) {
      this.repeatX = false;
      this.repeatY = false;
    }
  }

  update(sample: RawFrameSample): void {
    let ax = 0;
    let ay = 0;
    let dx = 0;
    let dy = 0;
    for (const binding of this.bindingMap.values()) {
      if (binding.kind === "gamepadStick") {
        const v = bindingVector(binding, sample, this.options.deadZone);
        ax += v.x;
        ay += v.y;
      } else {
        const v = fourWayVector(binding, sample);
        dx += v.x;
        dy += v.y;
      }
    }

    // Digital input wins over analog on any component it drives
    const digital = { x: clamp1(dx), y: clamp1(dy) };
    const x = digital.x !== 0 ? digital.x : clamp1(ax);
    const y = digital.y !== 0 ? digital.y : clamp1(ay);

    this.apply({ x, y }, sample.timestampMs);
    this.mocked = false;
  }

  /** Scripted value for this frame, with the same tick semantics as real input. */
  press(value: Vec2): void {
    this.apply({ x: clamp1(value.x), y: clamp1(value.y) }, this.lastTimestampMs);
    this.mocked = true;
  }

  consume(): void {
    this.consumed = true;
  }

  descriptor(): string {
    return this.bindings.map(describeBinding).join(", ");
  }

  private apply(value: Vec2, timestampMs: number): void {
    const previous = this.intValue;
    const next: IntVec2 = { x: signOf(value.x), y: signOf(value.y) };

    this.value = value;
    this.intValue = next;
    this.tickX = next.x !== previous.x;
    this.tickY = next.y !== previous.y;
    this.repeatX = false;
    this.repeatY = false;
    if (this.repeaters !== undefined) {
      this.repeatX = this.repeaters.x.step(previous.x, next.x, timestampMs) > 0;
      this.repeatY = this.repeaters.y.step(previous.y, next.y, timestampMs) > 0;
    }
    this.consumed = false;
    this.lastTimestampMs = timestampMs;
  }
}
