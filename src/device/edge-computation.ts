import type {
  ButtonBinding,
  DigitalSource,
  FourWayBinding,
  GamepadAxisChannel,
  GamepadStickBinding,
} from "./keys";
import type { RawFrameSample, Vec2 } from "./types";

export type ButtonEdges = Readonly<{
  pressed: boolean;
  released: boolean;
  down: boolean;
}>;

/**
 * Pure edge computation for one aggregated boolean.
 * pressed/released are true only on the transition frame.
 */
export function computeEdges(prevDown: boolean, rawDown: boolean): ButtonEdges {
  return {
    down: rawDown,
    pressed: rawDown && !prevDown,
    released: !rawDown && prevDown,
  };
}

function channelValue(sample: RawFrameSample, channel: GamepadAxisChannel): number {
  const pad = sample.gamepad;
  switch (channel) {
    case "leftX":
      return pad.leftStick.x;
    case "leftY":
      return pad.leftStick.y;
    case "rightX":
      return pad.rightStick.x;
    case "rightY":
      return pad.rightStick.y;
    case "leftTrigger":
      return pad.leftTrigger;
    case "rightTrigger":
      return pad.rightTrigger;
  }
}

function isSourceDown(source: DigitalSource, sample: RawFrameSample): boolean {
  if (source.kind === "key") return sample.keyboard.current.has(source.key);
  return sample.gamepad.connected && sample.gamepad.buttons.has(source.button);
}

/** Digital evaluation of a single button binding against a sample. */
export function isBindingDown(
  binding: ButtonBinding,
  sample: RawFrameSample,
  axisButtonThreshold: number,
): boolean {
  switch (binding.kind) {
    case "key":
    case "gamepad":
      return isSourceDown(binding, sample);
    case "mouse":
      return sample.mouse.buttons.has(binding.button);
    case "gamepadAxisButton":
      return (
        sample.gamepad.connected &&
        channelValue(sample, binding.channel) * binding.direction >=
          axisButtonThreshold
      );
  }
}

const ZERO: Vec2 = { x: 0, y: 0 };

/** Analog contribution of a stick, with a circular dead zone applied. */
export function bindingVector(
  binding: GamepadStickBinding,
  sample: RawFrameSample,
  deadZone: number,
): Vec2 {
  if (!sample.gamepad.connected) return ZERO;
  const v =
    binding.stick === "left" ? sample.gamepad.leftStick : sample.gamepad.rightStick;
  if (Math.hypot(v.x, v.y) < deadZone) return ZERO;
  return v;
}

/** Digital contribution of a 4-way set. Opposing directions cancel. */
export function fourWayVector(binding: FourWayBinding, sample: RawFrameSample): Vec2 {
  const d = (source: DigitalSource): number => (isSourceDown(source, sample) ? 1 : 0);
  return {
    x: d(binding.right) - d(binding.left),
    y: d(binding.down) - d(binding.up),
  };
}
