/**
 * packages/core/src/layout/grid/axisSizer.ts — Per-line size aggregation.
 *
 * Why: A column is as wide as the widest cell in it and a row as tall as the
 * tallest, so each line takes the element-wise maximum of its cells' hints.
 * The summed totals are what the container reports to its own parent.
 *
 * Invariants:
 *   - line.min <= line.preferred for every line
 *   - spacing and padding count toward totals.min/preferred, never flexible
 */

import { GridLayoutError } from "../../errors.js";
import type { Axis, AxisTotals, GridPosition, LineMetrics, SizeHint } from "../types.js";
import { lineCount, lineIndex } from "./indexMapper.js";

export type AxisMeasurement = Readonly<{
  lines: readonly LineMetrics[];
  totals: AxisTotals;
}>;

export function measureAxisLines(
  hints: readonly SizeHint[],
  positions: readonly GridPosition[],
  axis: Axis,
  columns: number,
): readonly LineMetrics[] {
  if (hints.length !== positions.length) {
    throw new GridLayoutError(
      "GRID_LENGTH_MISMATCH",
      `measureAxisLines: ${String(hints.length)} hints for ${String(positions.length)} positions`,
    );
  }
  const cellCount = hints.length;
  if (cellCount === 0) return Object.freeze([]);

  const slotCount = lineCount(cellCount, columns, axis);
  const mins = new Array<number>(slotCount).fill(0);
  const preferreds = new Array<number>(slotCount).fill(0);
  const flexibles = new Array<number>(slotCount).fill(0);

  for (let i = 0; i < cellCount; i++) {
    const hint = hints[i];
    const position = positions[i];
    if (!hint || !position) continue;

    const slot = lineIndex(position, axis);
    if (slot < 0 || slot >= slotCount) {
      throw new GridLayoutError(
        "GRID_LENGTH_MISMATCH",
        `measureAxisLines: cell ${String(i)} maps to line ${String(slot)} of ${String(slotCount)}`,
      );
    }

    const min = Math.max(mins[slot] ?? 0, hint.min);
    mins[slot] = min;
    // Widen by the updated minimum so a min-only cell still raises the
    // preferred floor; otherwise the line would hand its minimum to siblings
    // during the preferred pass.
    preferreds[slot] = Math.max(preferreds[slot] ?? 0, min, hint.preferred);
    flexibles[slot] = Math.max(flexibles[slot] ?? 0, hint.flexible);
  }

  const lines: LineMetrics[] = [];
  for (let slot = 0; slot < slotCount; slot++) {
    lines.push({
      min: mins[slot] ?? 0,
      preferred: preferreds[slot] ?? 0,
      flexible: flexibles[slot] ?? 0,
    });
  }
  return Object.freeze(lines);
}

/**
 * Sum lines into axis totals. `padding` is the combined start + end padding.
 * An axis without lines still reserves its padding.
 */
export function sumAxisLines(
  lines: readonly LineMetrics[],
  padding: number,
  spacing: number,
): AxisTotals {
  let min = 0;
  let preferred = 0;
  let flexible = 0;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line) continue;
    min += line.min;
    preferred += line.preferred;
    flexible += line.flexible;
  }
  const totalSpacing = Math.max(0, lines.length - 1) * spacing;
  return {
    min: min + totalSpacing + padding,
    preferred: preferred + totalSpacing + padding,
    flexible,
  };
}

export function measureAxis(
  hints: readonly SizeHint[],
  positions: readonly GridPosition[],
  axis: Axis,
  columns: number,
  padding: number,
  spacing: number,
): AxisMeasurement {
  const lines = measureAxisLines(hints, positions, axis, columns);
  return { lines, totals: sumAxisLines(lines, padding, spacing) };
}
