import { DEFAULT_INPUT_SETTINGS } from "../app/settings";
import { InputAxes, InputButtons } from "../input/default-profile";

import {
  cancelMenu,
  clampSelection,
  menuLength,
  nextAvailableOption,
  selectOption,
  type MenuSelectionState,
} from "./menu-state";
import { lerpSmooth } from "./smoothing";

import type { InputAggregator } from "../input/aggregator";
import type { Sign, VirtualAxisView } from "../input/virtual-axis";
import type { FrameTime } from "../runtime/loop";
import type { AxisId, ButtonId } from "../types/brands";

export type MenuControls = Readonly<{
  submit?: ButtonId;
  cancel?: ButtonId;
  axis?: AxisId;
  smoothHalfLifeMs?: number;
}>;

export type LinearMenuOptions = MenuControls &
  Readonly<{
    // Stop at the ends instead of wrapping around
    clamp?: boolean;
  }>;

type Orientation = "horizontal" | "vertical";

// Step along and across the menu this frame; zero while the axis is consumed
function steps(axis: VirtualAxisView, orientation: Orientation): { along: Sign; across: Sign } {
  if (axis.consumed) return { across: 0, along: 0 };
  return orientation === "vertical"
    ? { across: axis.stepX, along: axis.stepY }
    : { across: axis.stepY, along: axis.stepX };
}

/** Keeps `selection` inside the visible window. */
export function scrollToSelection(state: MenuSelectionState): void {
  if (state.selection < state.scroll) {
    state.scroll = state.selection;
  } else if (state.selection >= state.scroll + state.visibleItems) {
    state.scroll = state.selection - state.visibleItems + 1;
  }
}

function updateLinearMenu(
  input: InputAggregator,
  state: MenuSelectionState,
  time: FrameTime,
  orientation: Orientation,
  options: LinearMenuOptions,
): boolean {
  const submit = options.submit ?? InputButtons.Submit;
  const cancel = options.cancel ?? InputButtons.Cancel;
  const { across, along } = steps(input.axis(options.axis ?? InputAxes.Ui), orientation);

  state.justMoved = false;
  const pressed = input.pressed(submit);
  if (input.pressed(cancel)) cancelMenu(state);
  else state.canceled = false;

  // Movement across the menu is left for the caller (e.g. a sibling widget)
  if (orientation === "vertical") {
    state.overflowX = across;
    state.overflowY = 0;
  } else {
    state.overflowY = across;
    state.overflowX = 0;
  }

  const length = menuLength(state);
  if (state.disabled || length === 0) return false;
  clampSelection(state);

  if (pressed) {
    input.consume(submit);
    state.lastPressedMs = time.nowMs;
  }

  if (along !== 0) {
    const atEdge =
      (along < 0 && state.selection === 0) ||
      (along > 0 && state.selection === length - 1);
    if (!(options.clamp === true && atEdge)) {
      const next = nextAvailableOption(state, state.selection, along, options.clamp !== true);
      if (next !== state.selection) selectOption(state, next, time.nowMs);
    }
  }

  scrollToSelection(state);
  state.smoothScroll = lerpSmooth(
    state.smoothScroll,
    state.scroll,
    time.deltaMs,
    options.smoothHalfLifeMs ?? DEFAULT_INPUT_SETTINGS.smoothScrollHalfLifeMs,
  );
  return pressed;
}

/** One frame of a top-to-bottom menu. True on the frame submit is pressed. */
export function updateVerticalMenu(
  input: InputAggregator,
  state: MenuSelectionState,
  time: FrameTime,
  options: LinearMenuOptions = {},
): boolean {
  return updateLinearMenu(input, state, time, "vertical", options);
}

export function updateHorizontalMenu(
  input: InputAggregator,
  state: MenuSelectionState,
  time: FrameTime,
  options: LinearMenuOptions = {},
): boolean {
  return updateLinearMenu(input, state, time, "horizontal", options);
}

export type IndexMenuResult = Readonly<{ selection: number; submitted: boolean }>;

const wrapIndex = (n: number, length: number): number => ((n % length) + length) % length;

function updateIndexMenu(
  input: InputAggregator,
  selection: number,
  length: number,
  orientation: Orientation,
  controls: MenuControls,
): IndexMenuResult {
  const { along } = steps(input.axis(controls.axis ?? InputAxes.Ui), orientation);
  return {
    selection: length > 0 ? wrapIndex(selection + along, length) : 0,
    submitted: input.pressedAndConsume(controls.submit ?? InputButtons.Submit),
  };
}

/**
 * Bare index over `length` items: wraps at both ends, no disabled options,
 * no scroll state.
 */
export function updateVerticalIndex(
  input: InputAggregator,
  selection: number,
  length: number,
  controls: MenuControls = {},
): IndexMenuResult {
  return updateIndexMenu(input, selection, length, "vertical", controls);
}

export function updateHorizontalIndex(
  input: InputAggregator,
  selection: number,
  length: number,
  controls: MenuControls = {},
): IndexMenuResult {
  return updateIndexMenu(input, selection, length, "horizontal", controls);
}
