export function clampInterval(value: number | undefined, fallback: number, min: number, max: number): number {
  const candidate = value === undefined || !Number.isFinite(value) ? fallback : value;
  return Math.min(max, Math.max(min, candidate));
}

/**
 * How often a waiting reader looks for a newer transcript: half the wait,
 * kept between 200 ms and 2 s.
 */
export function rescanIntervalMs(timeoutMs: number): number {
  return Math.min(2000, Math.max(200, timeoutMs / 2));
}
