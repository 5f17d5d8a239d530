/**
 * packages/core/src/layout/types.ts — Grid layout data model.
 *
 * Why: Every value here except `GridConfig` is pass-scoped. A layout pass
 * creates them fresh, returns them by value and keeps nothing afterwards.
 *
 * Units are whatever the host measures in (pixels, terminal cells, points).
 */

/** Layout axis. Lines are columns on "horizontal" and rows on "vertical". */
export type Axis = "horizontal" | "vertical";

/** Row-major grid coordinate of a cell. */
export type GridPosition = Readonly<{ column: number; row: number }>;

/**
 * Size a cell declares along one axis.
 *
 * - `min`: never shrink below this.
 * - `preferred`: grow toward this once every minimum is met.
 * - `flexible`: relative weight for space left after preferred sizes.
 */
export type SizeHint = Readonly<{ min: number; preferred: number; flexible: number }>;

/** Element-wise maximum of the hints of every cell in one column or row. */
export type LineMetrics = Readonly<{ min: number; preferred: number; flexible: number }>;

/**
 * Axis sums over all lines. `min` and `preferred` include interior spacing and
 * padding; `flexible` includes neither.
 */
export type AxisTotals = Readonly<{ min: number; preferred: number; flexible: number }>;

/** Final geometry of one line. */
export type Allocation = Readonly<{ offset: number; size: number }>;

/** Padding on the two ends of one axis (left/right or top/bottom). */
export type AxisPadding = Readonly<{ start: number; end: number }>;

/** Gap between adjacent columns (`x`) and rows (`y`). */
export type GridSpacing = Readonly<{ x: number; y: number }>;

export type GridPadding = Readonly<{ left: number; right: number; top: number; bottom: number }>;

/** Container-owned configuration, read at the start of each pass. */
export type GridConfig = Readonly<{
  columns: number;
  spacing: GridSpacing;
  padding: GridPadding;
}>;

/** Space granted to the container by its parent, padding included. */
export type GridExtent = Readonly<{ width: number; height: number }>;
