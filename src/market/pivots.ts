import type { PivotLevels } from "./types";

/** Below this magnitude a previous close is treated as zero. */
export const PREV_CLOSE_EPSILON = 1e-12;

/**
 * Classic floor-trader pivot levels from one bar's high, low and close.
 */
export function computePivots(
  high: number,
  low: number,
  close: number
): PivotLevels {
  const pivot = (high + low + close) / 3;
  const range = high - low;
  return {
    pivot,
    s1: 2 * pivot - high,
    s2: pivot - range,
    r1: 2 * pivot - low,
    r2: pivot + range,
  };
}

export function percentChange(close: number, prevClose: number): number {
  if (Math.abs(prevClose) <= PREV_CLOSE_EPSILON) return 0;
  return ((close - prevClose) / prevClose) * 100;
}

export function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  const rounded = Math.round(value * factor) / factor;
  // normalize -0
  return rounded === 0 ? 0 : rounded;
}
