export const I32_MAX = 2147483647;

/** Finite values above zero pass through; everything else (NaN, ±Infinity, negatives) is 0. */
export function clampNonNegative(v: number): number {
  return Number.isFinite(v) && v > 0 ? v : 0;
}

export function isFiniteNonNegative(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0;
}
