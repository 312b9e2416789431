import { DEFAULT_INPUT_SETTINGS } from "../app/settings";
import { InputAxes, InputButtons } from "../input/default-profile";
import { debugLog } from "../utils/debug";

import {
  clampSelection,
  columnHeight,
  gridGeometry,
  isOptionEnabled,
  menuLength,
  nextAvailableOptionHorizontal,
  nextAvailableOptionVertical,
  rowWidth,
  selectOption,
  type AvailableOption,
  type MenuSelectionState,
} from "./menu-state";
import { lerpSmooth } from "./smoothing";

import type { MenuControls } from "./linear";
import type { InputAggregator } from "../input/aggregator";
import type { Sign, VirtualAxisView } from "../input/virtual-axis";
import type { FrameTime } from "../runtime/loop";

export type GridMenuFlags = Readonly<{
  clampLeft?: boolean;
  clampRight?: boolean;
  clampTop?: boolean;
  clampBottom?: boolean;
  clampAll?: boolean;
  // Clamp the final index into [0, length) instead of landing past the end
  clampSize?: boolean;
  // Vertical input moves across columns and horizontal input across rows
  rotate?: boolean;
}>;

export type GridMenuOptions = MenuControls &
  Readonly<{
    width: number;
    // Defaults to the number of options
    size?: number;
    // Rows that fit on screen; defaults to the state's visibleItems
    visibleRows?: number;
    flags?: GridMenuFlags;
  }>;

type GridSteps = Readonly<{ horizontal: Sign; vertical: Sign }>;
type AxisMapping = (axis: VirtualAxisView) => GridSteps;

const NO_STEPS: GridSteps = { horizontal: 0, vertical: 0 };

const straight: AxisMapping = (axis) => ({
  horizontal: axis.stepX,
  vertical: axis.stepY,
});

const rotated: AxisMapping = (axis) => ({
  horizontal: axis.stepY,
  vertical: axis.stepX,
});

const clamp = (v: number, lo: number, hi: number): number =>
  Math.min(hi, Math.max(lo, v));

/** One frame of a grid menu. True on the frame submit is pressed. */
export function updateGridMenu(
  input: InputAggregator,
  state: MenuSelectionState,
  time: FrameTime,
  options: GridMenuOptions,
): boolean {
  const flags = options.flags ?? {};
  const submit = options.submit ?? InputButtons.Submit;
  const cancel = options.cancel ?? InputButtons.Cancel;
  const axis = input.axis(options.axis ?? InputAxes.Ui);
  const mapping = flags.rotate === true ? rotated : straight;
  const { horizontal, vertical } = axis.consumed ? NO_STEPS : mapping(axis);

  state.justMoved = false;
  state.canceled = input.pressed(cancel);

  const length = menuLength(state);
  if (state.disabled || length === 0) {
    state.overflowX = 0;
    state.overflowY = 0;
    return false;
  }
  clampSelection(state);

  const geometry = gridGeometry(options.size ?? length, options.width);
  const { width } = geometry;
  const clampAll = flags.clampAll === true;

  let x = state.selection % width;
  let y = Math.floor(state.selection / width);
  let overflowX: Sign = 0;
  let overflowY: Sign = 0;

  if (horizontal !== 0) {
    const cells = rowWidth(geometry, y);
    x += horizontal;
    if (x >= cells) {
      overflowX = 1;
      x = flags.clampRight === true || clampAll ? cells - 1 : 0;
    } else if (x < 0) {
      overflowX = -1;
      x = flags.clampLeft === true || clampAll ? 0 : cells - 1;
    }
  }

  if (vertical !== 0) {
    const cells = columnHeight(geometry, x);
    y += vertical;
    if (y >= cells) {
      overflowY = 1;
      y = flags.clampBottom === true || clampAll ? cells - 1 : 0;
    } else if (y < 0) {
      overflowY = -1;
      y = flags.clampTop === true || clampAll ? 0 : cells - 1;
    }
  }

  let target = x + y * width;
  if (flags.clampSize === true) target = clamp(target, 0, length - 1);

  if (target !== state.selection) {
    if (isOptionEnabled(state, target)) {
      selectOption(state, target, time.nowMs);
    } else {
      // Slide along the move axis to the nearest enabled cell
      let found: AvailableOption | undefined;
      if (vertical !== 0) {
        found = nextAvailableOptionVertical(state, geometry, target, vertical);
        if (found?.wrapped === true) overflowY = vertical;
      } else if (horizontal !== 0) {
        found = nextAvailableOptionHorizontal(state, geometry, target, horizontal);
        if (found?.wrapped === true) overflowX = horizontal;
      }
      if (found !== undefined && found.index !== state.selection) {
        selectOption(state, found.index, time.nowMs);
      } else {
        debugLog("menu", `no enabled cell reachable from ${String(target)}`);
      }
    }
  }

  // Scroll whole rows
  const visibleRows = Math.max(1, options.visibleRows ?? state.visibleItems);
  const row = Math.floor(state.selection / width);
  if (row < state.scroll) {
    state.scroll = row;
  } else if (row >= state.scroll + visibleRows) {
    state.scroll = row - visibleRows + 1;
  }
  state.smoothScroll = lerpSmooth(
    state.smoothScroll,
    state.scroll,
    time.deltaMs,
    options.smoothHalfLifeMs ?? DEFAULT_INPUT_SETTINGS.smoothScrollHalfLifeMs,
  );

  state.overflowX = overflowX;
  state.overflowY = overflowY;

  const pressed = input.pressedAndConsume(submit);
  if (pressed) state.lastPressedMs = time.nowMs;
  return pressed;
}
