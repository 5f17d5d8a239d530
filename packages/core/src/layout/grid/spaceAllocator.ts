/**
 * packages/core/src/layout/grid/spaceAllocator.ts — Per-line space allocation.
 *
 * Three ordered passes over the lines of one axis:
 *   1. minimum:   every line gets its min
 *   2. preferred: min(leftover, total preferred surplus) is split by each
 *                 line's own surplus (preferred - min)
 *   3. flexible:  whatever is still left is split by flexible weight
 *
 * Lines with zero weight in a pass get nothing from it, and a zero total
 * weight skips the pass outright. When `available` is below the minimum total
 * both pools are empty: every line keeps its min and the axis overflows.
 * Overflow is left to the caller to detect (see `allocationExtent`).
 *
 * An unbounded axis (`available` not finite) is laid out at its preferred total.
 */

import type { Allocation, AxisPadding, LineMetrics } from "../types.js";
import { sumAxisLines } from "./axisSizer.js";

function splitPool(pool: number, totalWeight: number, weights: readonly number[]): number[] {
  const out = new Array<number>(weights.length).fill(0);
  if (totalWeight <= 0) return out;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i] ?? 0;
    if (w <= 0) continue;
    out[i] = (w / totalWeight) * pool;
  }
  return out;
}

export function allocateAxis(
  available: number,
  padding: AxisPadding,
  spacing: number,
  lines: readonly LineMetrics[],
): readonly Allocation[] {
  if (lines.length === 0) return Object.freeze([]);

  const totals = sumAxisLines(lines, padding.start + padding.end, spacing);

  const space = Number.isFinite(available) ? available : totals.preferred;
  let remaining = space - totals.min;
  const idealGrowth = totals.preferred - totals.min;
  // Never hand out more than is both available and wanted, or cells overlap.
  // A negative pool would take lines below their minimum.
  const reserved = Math.max(0, Math.min(remaining, idealGrowth));
  remaining = Math.max(remaining - reserved, 0);

  const surplus: number[] = [];
  const flexWeights: number[] = [];
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    surplus.push(line ? line.preferred - line.min : 0);
    flexWeights.push(line ? line.flexible : 0);
  }

  const preferredShares = splitPool(reserved, idealGrowth, surplus);
  // Flexible growth is opt-in: with no weight anywhere the leftover stays unused.
  const flexibleShares = splitPool(remaining, totals.flexible, flexWeights);

  const out: Allocation[] = [];
  let cursor = padding.start;
  for (let i = 0; i < lines.length; i++) {
    const size = (lines[i]?.min ?? 0) + (preferredShares[i] ?? 0) + (flexibleShares[i] ?? 0);
    out.push({ offset: cursor, size });
    cursor += size + spacing;
  }
  return Object.freeze(out);
}

/**
 * Far edge of the allocated lines including end padding. Compare against the
 * available extent to detect overflow.
 */
export function allocationExtent(
  allocations: readonly Allocation[],
  padding: AxisPadding,
): number {
  const last = allocations[allocations.length - 1];
  if (!last) return padding.start + padding.end;
  return last.offset + last.size + padding.end;
}
