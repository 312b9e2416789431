import {
  bindingToken,
  describeBinding,
  type ButtonBinding,
} from "../device/keys";
import { computeEdges, isBindingDown } from "../device/edge-computation";

import type { RawFrameSample } from "../device/types";

export type PressListener = (sample: RawFrameSample | undefined) => void;

/**
 * A logical boolean signal. Down whenever any of its bindings is down; edges
 * are computed against the previous frame's aggregate, not per binding, so
 * two keys bound to the same button never produce a second press.
 */
export class VirtualButton {
  private readonly bindingMap = new Map<string, ButtonBinding>();
  private readonly listeners = new Set<PressListener>();
  private lastRawDown = false;

  pressed = false;
  down = false;
  released = false;
  consumed = false;
  // Set by press(); cleared by the next update
  mocked = false;

  constructor(private readonly axisButtonThreshold = 0.5) {}

  get bindings(): ReadonlyArray<ButtonBinding> {
    return [...this.bindingMap.values()];
  }

  get tokens(): ReadonlySet<string> {
    return new Set(this.bindingMap.keys());
  }

  register(...bindings: ReadonlyArray<ButtonBinding>): void {
    for (const binding of bindings) {
      this.bindingMap.set(bindingToken(binding), binding);
    }
  }

  /** Removes every binding. Edge state is left as is. */
  clearBinds(): void {
    this.bindingMap.clear();
  }

  sharesBindingWith(other: VirtualButton): boolean {
    for (const token of this.bindingMap.keys()) {
      if (other.bindingMap.has(token)) return true;
    }
    return false;
  }

  update(sample: RawFrameSample): void {
    let rawDown = false;
    for (const binding of this.bindingMap.values()) {
      if (isBindingDown(binding, sample, this.axisButtonThreshold)) {
        rawDown = true;
        break;
      }
    }

    const edges = computeEdges(this.lastRawDown, rawDown);
    this.pressed = edges.pressed;
    this.released = edges.released;
    this.down = edges.down;
    this.lastRawDown = rawDown;
    this.consumed = false;
    this.mocked = false;

    if (this.pressed) this.notify(sample);
  }

  /** Scripted press: pressed and down for this frame, as if a binding went down. */
  press(): void {
    this.pressed = true;
    this.down = true;
    this.released = false;
    this.consumed = false;
    this.lastRawDown = true;
    this.mocked = true;

    this.notify(undefined);
  }

  consume(): void {
    this.consumed = true;
  }

  onPress(listener: PressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  descriptor(): string {
    return this.bindings.map(describeBinding).join(", ");
  }

  private notify(sample: RawFrameSample | undefined): void {
    for (const listener of this.listeners) listener(sample);
  }
}
