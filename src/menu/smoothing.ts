/**
 * Exponential approach of `current` toward `target`: after `halfLifeMs` the
 * remaining distance is halved, whatever the frame rate. Pure.
 */
export function lerpSmooth(
  current: number,
  target: number,
  deltaMs: number,
  halfLifeMs: number,
): number {
  if (halfLifeMs <= 0) return target;
  const dt = Math.max(0, deltaMs);
  return target + (current - target) * Math.pow(2, -dt / halfLifeMs);
}
