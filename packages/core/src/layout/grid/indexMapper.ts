import { GridLayoutError } from "../../errors.js";
import type { Axis, GridPosition } from "../types.js";

function assertColumns(columns: number): void {
  if (!Number.isInteger(columns) || columns < 1) {
    throw new GridLayoutError(
      "GRID_INVALID_CONFIG",
      `grid columns must be an integer >= 1, got ${String(columns)}`,
    );
  }
}

/** Row-major coordinate of the cell at linear `index`. */
export function cellPosition(index: number, columns: number): GridPosition {
  assertColumns(columns);
  return { column: index % columns, row: Math.floor(index / columns) };
}

/** ceil(cellCount / columns), without going through floating point. */
export function gridRowCount(cellCount: number, columns: number): number {
  assertColumns(columns);
  if (cellCount <= 0) return 0;
  // Round up to account for a partially filled last row.
  return Math.floor((cellCount - 1) / columns) + 1;
}

export function mapCellIndices(cellCount: number, columns: number): readonly GridPosition[] {
  assertColumns(columns);
  const out: GridPosition[] = [];
  for (let i = 0; i < cellCount; i++) {
    out.push({ column: i % columns, row: Math.floor(i / columns) });
  }
  return Object.freeze(out);
}

export function lineIndex(position: GridPosition, axis: Axis): number {
  return axis === "horizontal" ? position.column : position.row;
}

/**
 * Lines along `axis`: every configured column on the horizontal axis (even
 * ones a short grid leaves empty), the derived rows on the vertical axis.
 * An empty grid has no lines on either axis.
 */
export function lineCount(cellCount: number, columns: number, axis: Axis): number {
  assertColumns(columns);
  if (cellCount <= 0) return 0;
  return axis === "horizontal" ? columns : gridRowCount(cellCount, columns);
}
