import type { Sign } from "../input/virtual-axis";

export type MenuOption = Readonly<{
  enabled: boolean;
  label?: string;
}>;

/**
 * Selection state of one menu instance. Owned by whoever shows the menu and
 * updated in place once per frame while it is visible.
 */
export type MenuSelectionState = {
  options: ReadonlyArray<MenuOption>;
  selection: number;
  previousSelection: number;
  scroll: number;
  smoothScroll: number;
  // Rows for grids
  visibleItems: number;
  disabled: boolean;
  lastMovedMs: number;
  lastPressedMs: number;
  canceled: boolean;
  overflowX: Sign;
  overflowY: Sign;
  justMoved: boolean;
};

export type MenuStateInit = Partial<
  Pick<MenuSelectionState, "selection" | "scroll" | "visibleItems" | "disabled">
>;

export type GridGeometry = Readonly<{
  width: number;
  height: number;
  // Cells in the bottom row; equals width when the grid is rectangular
  lastRowWidth: number;
}>;

export type AvailableOption = Readonly<{ index: number; wrapped: boolean }>;

const mod = (n: number, m: number): number => ((n % m) + m) % m;

export function menuLength(state: MenuSelectionState): number {
  return state.options.length;
}

export function isOptionEnabled(state: MenuSelectionState, index: number): boolean {
  return state.options[index]?.enabled === true;
}

export function createMenuState(
  options: ReadonlyArray<MenuOption> | number,
  init: MenuStateInit = {},
): MenuSelectionState {
  const list =
    typeof options === "number"
      ? Array.from({ length: Math.max(0, options) }, (): MenuOption => ({ enabled: true }))
      : options;
  const length = list.length;
  const selection =
    length === 0 ? 0 : Math.min(Math.max(0, init.selection ?? 0), length - 1);
  const scroll = Math.max(0, init.scroll ?? 0);

  return {
    canceled: false,
    disabled: init.disabled ?? false,
    justMoved: false,
    lastMovedMs: 0,
    lastPressedMs: 0,
    options: list,
    overflowX: 0,
    overflowY: 0,
    previousSelection: selection,
    scroll,
    selection,
    smoothScroll: scroll,
    visibleItems: Math.max(1, init.visibleItems ?? Math.max(1, length)),
  };
}

export function selectOption(
  state: MenuSelectionState,
  index: number,
  nowMs: number,
): void {
  state.previousSelection = state.selection;
  state.selection = index;
  state.justMoved = index !== state.previousSelection;
  state.lastMovedMs = nowMs;
}

/**
 * Brings `selection` back into range after the options changed, then onto the
 * nearest enabled option (lower index on a tie). Leaves empty menus alone.
 */
export function clampSelection(state: MenuSelectionState): void {
  const length = menuLength(state);
  if (length === 0) return;
  const from = Math.min(Math.max(0, state.selection), length - 1);
  state.selection = from;
  if (isOptionEnabled(state, from)) return;

  for (let distance = 1; distance < length; distance++) {
    if (isOptionEnabled(state, from - distance)) {
      state.selection = from - distance;
      return;
    }
    if (isOptionEnabled(state, from + distance)) {
      state.selection = from + distance;
      return;
    }
  }
}

export function cancelMenu(state: MenuSelectionState): void {
  state.canceled = true;
}

/**
 * Next enabled option from `from` in direction `sign`. Without `wrap` the
 * search stops at the ends. Returns `from` when nothing else is enabled.
 */
export function nextAvailableOption(
  state: MenuSelectionState,
  from: number,
  sign: Sign,
  wrap: boolean,
): number {
  const length = menuLength(state);
  if (length === 0 || sign === 0) return from;

  for (let step = 1; step < length; step++) {
    let index = from + sign * step;
    if (wrap) index = mod(index, length);
    else if (index < 0 || index >= length) return from;
    if (isOptionEnabled(state, index)) return index;
  }
  return from;
}

export function gridGeometry(size: number, width: number): GridGeometry {
  const w = Math.max(1, Math.floor(width));
  const height = Math.ceil(Math.max(0, size) / w);
  return {
    height,
    lastRowWidth: w - (w * height - size),
    width: w,
  };
}

/** Cells in `row`, accounting for a short bottom row. */
export function rowWidth(geometry: GridGeometry, row: number): number {
  return row === geometry.height - 1 ? geometry.lastRowWidth : geometry.width;
}

/** Cells in `column`; columns past the bottom row's width are one shorter. */
export function columnHeight(geometry: GridGeometry, column: number): number {
  return column >= geometry.lastRowWidth ? geometry.height - 1 : geometry.height;
}

/**
 * Searches the row of `from` for an enabled cell, wrapping inside the row.
 * `wrapped` tells whether the search crossed the row's edge.
 */
export function nextAvailableOptionHorizontal(
  state: MenuSelectionState,
  geometry: GridGeometry,
  from: number,
  sign: -1 | 1,
): AvailableOption | undefined {
  const row = Math.floor(from / geometry.width);
  const column = from % geometry.width;
  const cells = rowWidth(geometry, row);

  for (let step = 1; step < cells; step++) {
    const raw = column + sign * step;
    const index = row * geometry.width + mod(raw, cells);
    if (isOptionEnabled(state, index)) {
      return { index, wrapped: raw < 0 || raw >= cells };
    }
  }
  return undefined;
}

/** Column counterpart of nextAvailableOptionHorizontal. */
export function nextAvailableOptionVertical(
  state: MenuSelectionState,
  geometry: GridGeometry,
  from: number,
  sign: -1 | 1,
): AvailableOption | undefined {
  const row = Math.floor(from / geometry.width);
  const column = from % geometry.width;
  const cells = columnHeight(geometry, column);

  for (let step = 1; step < cells; step++) {
    const raw = row + sign * step;
    const index = mod(raw, cells) * geometry.width + column;
    if (isOptionEnabled(state, index)) {
      return { index, wrapped: raw < 0 || raw >= cells };
    }
  }
  return undefined;
}
