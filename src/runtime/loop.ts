// Deterministic fixed-step loop: input is sampled once per step, before any
// system reads it.

import { DEFAULT_INPUT_SETTINGS } from "../app/settings";
import { createFrame, incrementFrame, type Frame } from "../types/brands";
import { debugLog } from "../utils/debug";

export type FrameTime = Readonly<{
  frame: Frame;
  // Simulated clock at the end of this step
  nowMs: number;
  deltaMs: number;
}>;

export type FrameSystem = (time: FrameTime) => void;

/** Anything with a once-per-frame update; the InputAggregator in practice. */
export type FrameInput = {
  update(): void;
};

export type FrameRunnerOptions = Readonly<{
  input: FrameInput;
  stepMs?: number;
  // Steps run at most per advance(); leftover time is dropped
  maxCatchUpSteps?: number;
  startMs?: number;
}>;

export type FrameRunner = {
  readonly frame: Frame;
  readonly nowMs: number;
  addSystem(system: FrameSystem): () => void;
  /** Feeds elapsed host time; returns how many fixed steps ran. */
  advance(elapsedMs: number): number;
  /** Runs exactly one step regardless of accumulated time. */
  step(): void;
};

export function createFrameRunner(options: FrameRunnerOptions): FrameRunner {
  const stepMs = options.stepMs ?? 1000 / 60;
  if (!(stepMs > 0)) {
    throw new Error("stepMs must be a positive number");
  }
  const maxSteps = options.maxCatchUpSteps ?? DEFAULT_INPUT_SETTINGS.maxCatchUpSteps;
  const systems: Array<FrameSystem> = [];
  let accumulator = 0;
  let frame = createFrame(0);
  let nowMs = options.startMs ?? 0;

  const step = (): void => {
    nowMs += stepMs;
    frame = incrementFrame(frame);
    options.input.update();
    const time: FrameTime = { deltaMs: stepMs, frame, nowMs };
    for (const system of [...systems]) system(time);
  };

  return {
    addSystem(system: FrameSystem): () => void {
      systems.push(system);
      return () => {
        const i = systems.indexOf(system);
        if (i >= 0) systems.splice(i, 1);
      };
    },
    advance(elapsedMs: number): number {
      accumulator += Math.max(0, elapsedMs);
      let ran = 0;
      while (accumulator >= stepMs) {
        if (ran >= maxSteps) {
          debugLog("loop", `dropping ${String(accumulator)}ms after ${String(ran)} steps`);
          accumulator = 0;
          break;
        }
        step();
        accumulator -= stepMs;
        ran++;
      }
      return ran;
    },
    get frame(): Frame {
      return frame;
    },
    get nowMs(): number {
      return nowMs;
    },
    step,
  };
}
