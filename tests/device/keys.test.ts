import { describe, it, expect } from "@jest/globals";

import {
  bindingToken,
  describeBinding,
  fourWay,
  isAxisBinding,
  isButtonBinding,
  key,
  mouse,
  pad,
  padAxis,
  parseBindingToken,
  stick,
  type Binding,
} from "../../src/device/keys";

const WASD = fourWay(key("KeyW"), key("KeyA"), key("KeyS"), key("KeyD"));

describe("bindingToken", () => {
  it("produces one canonical token per binding kind", () => {
    expect(bindingToken(key("Enter"))).toBe("key:Enter");
    expect(bindingToken(mouse("left"))).toBe("mouse:left");
    expect(bindingToken(pad("A"))).toBe("gp:button:A");
    expect(bindingToken(padAxis("leftX", 1))).toBe("gp:axis:leftX:+");
    expect(bindingToken(padAxis("rightTrigger", -1))).toBe("gp:axis:rightTrigger:-");
    expect(bindingToken(stick("right"))).toBe("gp:stick:right");
    expect(bindingToken(WASD)).toBe("4way(key:KeyW|key:KeyA|key:KeyS|key:KeyD)");
  });

  it("gives equal tokens to structurally equal bindings", () => {
    expect(bindingToken(key("Space"))).toBe(bindingToken({ key: "Space", kind: "key" }));
    expect(bindingToken(pad("A"))).not.toBe(bindingToken(pad("B")));
  });
});

describe("parseBindingToken", () => {
  const samples: ReadonlyArray<Binding> = [
    key("Escape"),
    mouse("x2"),
    pad("DPadLeft"),
    padAxis("leftY", -1),
    stick("left"),
    fourWay(pad("DPadUp"), pad("DPadLeft"), pad("DPadDown"), pad("DPadRight")),
  ];

  it("inverts bindingToken", () => {
    for (const b of samples) {
      expect(parseBindingToken(bindingToken(b))).toEqual(b);
    }
  });

  it("returns null for malformed tokens", () => {
    expect(parseBindingToken("")).toBeNull();
    expect(parseBindingToken("key:")).toBeNull();
    expect(parseBindingToken("mouse:thumb")).toBeNull();
    expect(parseBindingToken("gp:button:Z")).toBeNull();
    expect(parseBindingToken("gp:axis:leftZ:+")).toBeNull();
    expect(parseBindingToken("gp:stick:middle")).toBeNull();
    expect(parseBindingToken("4way(key:KeyW|key:KeyA|key:KeyS)")).toBeNull();
    expect(parseBindingToken("4way(key:KeyW|mouse:left|key:KeyS|key:KeyD)")).toBeNull();
    expect(parseBindingToken("joystick:1")).toBeNull();
  });
});

describe("binding kinds", () => {
  it("splits bindings into button and axis bindings", () => {
    expect(isButtonBinding(key("KeyA"))).toBe(true);
    expect(isButtonBinding(padAxis("leftX", 1))).toBe(true);
    expect(isButtonBinding(stick("left"))).toBe(false);
    expect(isAxisBinding(stick("left"))).toBe(true);
    expect(isAxisBinding(WASD)).toBe(true);
    expect(isAxisBinding(mouse("left"))).toBe(false);
  });
});

describe("describeBinding", () => {
  it("labels bindings for rebinding screens", () => {
    expect(describeBinding(key("KeyW"))).toBe("W");
    expect(describeBinding(key("Enter"))).toBe("Enter");
    expect(describeBinding(mouse("right"))).toBe("Right Click");
    expect(describeBinding(pad("Start"))).toBe("Pad Start");
    expect(describeBinding(padAxis("rightTrigger", 1))).toBe("Pad rightTrigger+");
    expect(describeBinding(stick("left"))).toBe("Left Stick");
    expect(describeBinding(WASD)).toBe("W/A/S/D");
  });
});
