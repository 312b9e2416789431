import {
  DEFAULT_INPUT_SETTINGS,
  type AxisRepeatSettings,
  type InputSettings,
} from "../app/settings";
import { emptySample, withoutDevices } from "../device/adapter";
import {
  GAMEPAD_BUTTONS,
  type AxisBinding,
  type ButtonBinding,
  type GamepadButton,
  type KeyCode,
} from "../device/keys";
import { createAxisId, createButtonId, type AxisId, type ButtonId } from "../types/brands";
import { debugLog, warn } from "../utils/debug";

import { DEFAULT_INPUT_PROFILE } from "./default-profile";
import {
  axisDefaults,
  buttonDefaults,
  findAxisEntry,
  findButtonEntry,
  type AxisProfileEntry,
  type ButtonProfileEntry,
  type InputProfile,
} from "./profile";
import { TextCapture, type TextInputSource } from "./text-capture";
import { VirtualAxis, type VirtualAxisView } from "./virtual-axis";
import { VirtualButton, type PressListener } from "./virtual-button";

import type { BindingPreferences } from "./preferences";
import type { Point, RawFrameSample, RawSampleProvider, Vec2 } from "../device/types";

export class UnknownAxisError extends Error {
  constructor(readonly axisId: AxisId) {
    super(`Axis ${String(axisId)} was queried before being registered`);
    this.name = "UnknownAxisError";
  }
}

export type InputAggregatorOptions = Readonly<{
  provider: RawSampleProvider;
  settings?: InputSettings;
  textInput?: TextInputSource;
}>;

/**
 * Owns every logical button and axis and is the single per-frame entry point
 * for input. Construct one per player and thread it through the host loop.
 */
export class InputAggregator {
  private readonly buttons = new Map<ButtonId, VirtualButton>();
  private readonly axes = new Map<AxisId, VirtualAxis>();
  private readonly provider: RawSampleProvider;
  private settings: InputSettings;
  private readonly textInput: TextInputSource | undefined;
  private readonly text: TextCapture;
  private readonly warnedIds = new Set<ButtonId>();
  private stopTextInput: (() => void) | undefined;

  private lastSample: RawFrameSample = emptySample();
  private locked = false;
  private previousWheel = 0;
  private scroll = 0;
  private cursor: Point = { x: 0, y: 0 };

  // While set, bindings see an empty keyboard / mouse. Raw queries still see
  // the real devices.
  keyboardConsumed = false;
  mouseConsumed = false;

  constructor(options: InputAggregatorOptions) {
    this.provider = options.provider;
    this.settings = options.settings ?? DEFAULT_INPUT_SETTINGS;
    this.textInput = options.textInput;
    this.text = new TextCapture(this.settings.textMaxLength);
  }

  // --- registration -------------------------------------------------------

  getOrCreateButton(id: ButtonId): VirtualButton {
    let button = this.buttons.get(id);
    if (button === undefined) {
      button = new VirtualButton(this.settings.axisButtonThreshold);
      this.buttons.set(id, button);
    }
    return button;
  }

  getOrCreateAxis(id: AxisId): VirtualAxis {
    let axis = this.axes.get(id);
    if (axis === undefined) {
      axis = new VirtualAxis({
        deadZone: this.settings.deadZone,
        repeat: this.settings.axisRepeat,
      });
      this.axes.set(id, axis);
    }
    return axis;
  }

  registerButton(id: ButtonId, ...bindings: ReadonlyArray<ButtonBinding>): void {
    this.getOrCreateButton(id).register(...bindings);
  }

  registerAxis(id: AxisId, ...bindings: ReadonlyArray<AxisBinding>): void {
    this.getOrCreateAxis(id).register(...bindings);
  }

  clearBinds(id: ButtonId): void {
    this.buttons.get(id)?.clearBinds();
  }

  clearAxisBinds(id: AxisId): void {
    this.axes.get(id)?.clearBinds();
  }

  /** Applies to every axis, existing and future; `undefined` turns repeats off. */
  setAxisRepeat(repeat: AxisRepeatSettings | undefined): void {
    this.settings = { ...this.settings, axisRepeat: repeat };
    for (const axis of this.axes.values()) axis.setRepeat(repeat);
  }

  get buttonIds(): ReadonlyArray<ButtonId> {
    return [...this.buttons.keys()];
  }

  get axisIds(): ReadonlyArray<AxisId> {
    return [...this.axes.keys()];
  }

  // --- frame update -------------------------------------------------------

  update(): void {
    if (this.locked) {
      this.settleMocked();
      return;
    }

    const raw = this.provider.sample();
    this.lastSample = raw;
    const filtered = withoutDevices(raw, {
      keyboard: this.keyboardConsumed,
      mouse: this.mouseConsumed,
    });

    for (const button of this.buttons.values()) button.update(filtered);
    for (const axis of this.axes.values()) axis.update(filtered);

    this.scroll = this.previousWheel - filtered.mouse.wheel;
    this.previousWheel = filtered.mouse.wheel;

    this.cursor = { x: Math.round(raw.mouse.x), y: Math.round(raw.mouse.y) };
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Engaging feeds the empty sample to every signal first, so nothing reads as
   * held for the duration of the lock. Disengaging takes effect at the next
   * update().
   */
  lockInput(lock: boolean): void {
    if (lock && !this.locked) {
      this.mockNoInput();
      this.lastSample = this.blankSample();
      debugLog("input", "input locked");
    } else if (!lock && this.locked) {
      debugLog("input", "input unlocked");
    }
    this.locked = lock;
  }

  // --- mocking ------------------------------------------------------------

  mockInput(id: ButtonId): void;
  mockInput(id: AxisId, value: Vec2): void;
  mockInput(id: ButtonId | AxisId, value?: Vec2): void {
    if (value === undefined) {
      this.getOrCreateButton(createButtonId(id)).press();
    } else {
      this.getOrCreateAxis(createAxisId(id)).press(value);
    }
  }

  /** Feeds the empty sample through every signal. */
  mockNoInput(): void {
    const blank = this.blankSample();
    for (const button of this.buttons.values()) button.update(blank);
    for (const axis of this.axes.values()) axis.update(blank);
  }

  // --- queries ------------------------------------------------------------

  pressed(id: ButtonId, raw = false): boolean {
    const button = this.lookupButton(id);
    return button !== undefined && button.pressed && (raw || !button.consumed);
  }

  down(id: ButtonId, raw = false): boolean {
    const button = this.lookupButton(id);
    return button !== undefined && button.down && (raw || !button.consumed);
  }

  released(id: ButtonId, raw = false): boolean {
    const button = this.lookupButton(id);
    return button !== undefined && button.released && (raw || !button.consumed);
  }

  pressedAndConsume(id: ButtonId): boolean {
    if (!this.pressed(id)) return false;
    this.consume(id);
    return true;
  }

  /** Strict lookup: axes must be registered before they are read. */
  axis(id: AxisId): VirtualAxisView {
    const axis = this.axes.get(id);
    if (axis === undefined) throw new UnknownAxisError(id);
    return axis;
  }

  tryAxis(id: AxisId): VirtualAxisView | undefined {
    return this.axes.get(id);
  }

  /** True only on the frame `key` goes down while every modifier is held. */
  shortcut(key: KeyCode, ...modifiers: ReadonlyArray<KeyCode>): boolean {
    return modifiers.every((m) => this.keyDown(m)) && this.keyPressed(key);
  }

  /** Raw keyboard: true on the frame `code` goes down, bindings aside. */
  keyPressed(code: KeyCode): boolean {
    const { current, previous } = this.lastSample.keyboard;
    return current.has(code) && !previous.has(code);
  }

  keyDown(code: KeyCode): boolean {
    return this.lastSample.keyboard.current.has(code);
  }

  get cursorPosition(): Point {
    return this.cursor;
  }

  /** Wheel movement since the previous frame, as previous minus current. */
  get scrollDelta(): number {
    return this.scroll;
  }

  /** First gamepad button held in the last sample, for rebinding screens. */
  anyGamepadButton(): GamepadButton | undefined {
    const pad = this.lastSample.gamepad;
    if (!pad.connected) return undefined;
    return GAMEPAD_BUTTONS.find((b) => pad.buttons.has(b));
  }

  buttonDescriptor(id: ButtonId): string {
    return this.buttons.get(id)?.descriptor() ?? "";
  }

  axisDescriptor(id: AxisId): string {
    return this.axes.get(id)?.descriptor() ?? "";
  }

  // --- consumption --------------------------------------------------------

  /** Consumes `id` and every other button sharing one of its bindings. */
  consume(id: ButtonId): void {
    const button = this.buttons.get(id);
    if (button === undefined) {
      debugLog("input", `consume(${String(id)}) on an unregistered button`);
      return;
    }
    button.consume();
    for (const other of this.buttons.values()) {
      if (other === button || other.consumed) continue;
      if (button.sharesBindingWith(other)) other.consume();
    }
  }

  consumeAxis(id: AxisId): void {
    this.axes.get(id)?.consume();
  }

  consumeAll(): void {
    for (const button of this.buttons.values()) button.consume();
    for (const axis of this.axes.values()) axis.consume();
  }

  /** Pressed-edge callback; returns the unsubscribe function. */
  bind(id: ButtonId, listener: PressListener): () => void {
    return this.getOrCreateButton(id).onPress(listener);
  }

  // --- text capture -------------------------------------------------------

  /**
   * Every call clears the buffer. Turning capture on also sets the length
   * limit; a call that does not change the state keeps the current limit.
   */
  listenToKeyboardInput(
    enable: boolean,
    maxLength: number = this.settings.textMaxLength,
  ): void {
    const listening = this.stopTextInput !== undefined;
    if (enable === listening) {
      this.text.reset();
      return;
    }

    if (!enable) {
      this.stopTextInput?.();
      this.stopTextInput = undefined;
      this.text.reset();
      return;
    }

    this.text.reset(maxLength);
    const source = this.textInput;
    if (source === undefined) {
      warn("input", "text capture requested without a text input source");
      return;
    }
    const unsubscribe = source.subscribe((chars) => {
      this.text.append(chars);
    });
    source.start();
    this.stopTextInput = (): void => {
      unsubscribe();
      source.stop();
    };
  }

  get keyboardInput(): string {
    return this.text.text;
  }

  setKeyboardInput(value: string): void {
    this.text.set(value);
  }

  clampText(size: number): void {
    this.text.clamp(size);
  }

  // --- persistence --------------------------------------------------------

  saveCurrentToPreferences(store: BindingPreferences): void {
    store.setButtonBindings(
      [...this.buttons].map(([id, button]) => ({ bindings: button.bindings, id })),
    );
    store.setAxisBindings(
      [...this.axes].map(([id, axis]) => ({ bindings: axis.bindings, id })),
    );
    debugLog("input", "bindings saved");
  }

  /**
   * Customizable ids take the stored bindings when the store has them; every
   * other id in the profile is reset to its defaults. Ids the profile does not
   * list are left alone.
   */
  loadFromPreferences(
    store: BindingPreferences,
    profile: InputProfile = DEFAULT_INPUT_PROFILE,
  ): void {
    const savedButtons = new Map<ButtonId, ReadonlyArray<ButtonBinding>>();
    for (const e of store.getButtonBindings()) savedButtons.set(e.id, e.bindings);
    const savedAxes = new Map<AxisId, ReadonlyArray<AxisBinding>>();
    for (const e of store.getAxisBindings()) savedAxes.set(e.id, e.bindings);

    for (const entry of profile.buttons) {
      const saved = entry.allowPlayerCustomization ? savedButtons.get(entry.id) : undefined;
      this.replaceButtonBindings(entry, saved ?? buttonDefaults(entry));
    }
    for (const entry of profile.axes) {
      const saved = entry.allowPlayerCustomization ? savedAxes.get(entry.id) : undefined;
      this.replaceAxisBindings(entry, saved ?? axisDefaults(entry));
    }
    debugLog("input", "bindings loaded");
  }

  restoreDefaults(id: ButtonId, profile: InputProfile = DEFAULT_INPUT_PROFILE): void {
    const entry = findButtonEntry(profile, id);
    if (entry === undefined) {
      warn("input", `no default bindings for button ${String(id)}`);
      return;
    }
    this.replaceButtonBindings(entry, buttonDefaults(entry));
  }

  restoreAxisDefaults(id: AxisId, profile: InputProfile = DEFAULT_INPUT_PROFILE): void {
    const entry = findAxisEntry(profile, id);
    if (entry === undefined) {
      warn("input", `no default bindings for axis ${String(id)}`);
      return;
    }
    this.replaceAxisBindings(entry, axisDefaults(entry));
  }

  restoreAllDefaults(profile: InputProfile = DEFAULT_INPUT_PROFILE): void {
    for (const entry of profile.buttons) {
      this.replaceButtonBindings(entry, buttonDefaults(entry));
    }
    for (const entry of profile.axes) {
      this.replaceAxisBindings(entry, axisDefaults(entry));
    }
  }

  // --- internals ----------------------------------------------------------

  private replaceButtonBindings(
    entry: ButtonProfileEntry,
    bindings: ReadonlyArray<ButtonBinding>,
  ): void {
    const button = this.getOrCreateButton(entry.id);
    button.clearBinds();
    button.register(...bindings);
  }

  private replaceAxisBindings(
    entry: AxisProfileEntry,
    bindings: ReadonlyArray<AxisBinding>,
  ): void {
    const axis = this.getOrCreateAxis(entry.id);
    axis.clearBinds();
    axis.register(...bindings);
  }

  private lookupButton(id: ButtonId): VirtualButton | undefined {
    const button = this.buttons.get(id);
    if (button === undefined && !this.warnedIds.has(id)) {
      this.warnedIds.add(id);
      warn("input", `button ${String(id)} is not registered`);
    }
    return button;
  }

  private blankSample(): RawFrameSample {
    return emptySample(this.lastSample.timestampMs);
  }

  // A mock lasts one frame; settle it even while locked so the matching
  // release and tick are observable.
  private settleMocked(): void {
    const blank = this.blankSample();
    for (const button of this.buttons.values()) {
      if (button.mocked) button.update(blank);
    }
    for (const axis of this.axes.values()) {
      if (axis.mocked) axis.update(blank);
    }
  }
}
