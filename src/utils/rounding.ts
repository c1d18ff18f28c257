// Tolerance for binary float noise, e.g. 0.29 * 100 = 28.999999999999996.
const FLOAT_SLACK = 1e-9;

/** Rounds toward zero at `decimals` places. Never rounds up. */
export function floorTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.floor(value * factor + FLOAT_SLACK) / factor;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function approxEqual(a: number, b: number, epsilon: number): boolean {
  return Math.abs(a - b) <= epsilon;
}
