export {
  coerceInputSettings,
  DEFAULT_INPUT_SETTINGS,
  readInputSettingsFile,
  type AxisRepeatSettings,
  type InputSettings,
} from "./app/settings";
export {
  createScriptedSampleProvider,
  emptySample,
  EMPTY_SAMPLE,
  withoutDevices,
  type ScriptedSampleProvider,
} from "./device/adapter";
export {
  bindingVector,
  computeEdges,
  fourWayVector,
  isBindingDown,
  type ButtonEdges,
} from "./device/edge-computation";
export * from "./device/keys";
export type * from "./device/types";
export { InputAggregator, UnknownAxisError, type InputAggregatorOptions } from "./input/aggregator";
export { DEFAULT_INPUT_PROFILE, InputAxes, InputButtons } from "./input/default-profile";
export {
  JsonFileBindingPreferences,
  MemoryBindingPreferences,
  type AxisBindingsEntry,
  type BindingPreferences,
  type BindingsEntry,
  type ButtonBindingsEntry,
} from "./input/preferences";
export {
  axisDefaults,
  buttonDefaults,
  EMPTY_PROFILE,
  parseInputProfile,
  readInputProfileFile,
  type AxisProfileEntry,
  type ButtonProfileEntry,
  type DigitalSet,
  type InputProfile,
} from "./input/profile";
export { RepeatMachineService, type RepeatState } from "./input/machines/repeat";
export {
  createManualTextInputSource,
  TextCapture,
  type ManualTextInputSource,
  type TextInputSource,
  type TextListener,
} from "./input/text-capture";
export {
  VirtualAxis,
  type IntVec2,
  type Sign,
  type VirtualAxisOptions,
  type VirtualAxisView,
} from "./input/virtual-axis";
export { VirtualButton, type PressListener } from "./input/virtual-button";
export { updateGridMenu, type GridMenuFlags, type GridMenuOptions } from "./menu/grid";
export {
  scrollToSelection,
  updateHorizontalIndex,
  updateHorizontalMenu,
  updateVerticalIndex,
  updateVerticalMenu,
  type IndexMenuResult,
  type LinearMenuOptions,
  type MenuControls,
} from "./menu/linear";
export * from "./menu/menu-state";
export { lerpSmooth } from "./menu/smoothing";
export {
  createFrameRunner,
  type FrameInput,
  type FrameRunner,
  type FrameRunnerOptions,
  type FrameSystem,
  type FrameTime,
} from "./runtime/loop";
export * from "./types/brands";
