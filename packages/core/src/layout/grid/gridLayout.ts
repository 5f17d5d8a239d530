/**
 * packages/core/src/layout/grid/gridLayout.ts — Full grid layout pass.
 *
 * Why: Threads each axis's measurement straight into its allocation and
 * placement within one call, so there is no cached state that placement could
 * read before sizing has written it.
 *
 * Order: horizontal completes (measure, allocate, place) before vertical starts.
 * Each axis places cells from its own allocation only.
 */

import { GridLayoutError } from "../../errors.js";
import { clampNonNegative } from "../engine/bounds.js";
import type {
  Allocation,
  Axis,
  AxisTotals,
  GridConfig,
  GridExtent,
  GridPosition,
  LineMetrics,
  SizeHint,
} from "../types.js";
import { axisPadding, axisSpacing } from "../validateConfig.js";
import { type AxisMeasurement, measureAxis } from "./axisSizer.js";
import { gridRowCount, lineIndex, mapCellIndices } from "./indexMapper.js";
import { normalizeSizeHint } from "./sizeHint.js";
import { allocateAxis } from "./spaceAllocator.js";

/** Reads a cell's hint along one axis. Called once per cell per axis per pass. */
export type SizeHintFn<C> = (cell: C, axis: Axis) => SizeHint;

/** Applies computed geometry to a cell. Must not start another pass on the same host. */
export type PlaceFn<C> = (cell: C, axis: Axis, offset: number, size: number) => void;

export type GridHost<C> = Readonly<{
  sizeHint: SizeHintFn<C>;
  place: PlaceFn<C>;
}>;

export type CellPlacement<C> = Readonly<{
  cell: C;
  /** Position of the cell in the input sequence. */
  index: number;
  /** Column (horizontal) or row (vertical) the cell occupies. */
  line: number;
  offset: number;
  size: number;
}>;

export type AxisLayout<C> = Readonly<{
  axis: Axis;
  lines: readonly LineMetrics[];
  totals: AxisTotals;
  allocations: readonly Allocation[];
  placements: readonly CellPlacement<C>[];
  /** How far the minimum total exceeds the available space; 0 when it fits. */
  overflow: number;
}>;

export type GridMeasurement = Readonly<{
  positions: readonly GridPosition[];
  rowCount: number;
  horizontal: AxisMeasurement;
  vertical: AxisMeasurement;
}>;

export type GridLayoutResult<C> = Readonly<{
  positions: readonly GridPosition[];
  rowCount: number;
  horizontal: AxisLayout<C>;
  vertical: AxisLayout<C>;
}>;

function readHints<C>(
  cells: readonly C[],
  axis: Axis,
  sizeHint: SizeHintFn<C>,
): readonly SizeHint[] {
  return cells.map((cell) => normalizeSizeHint(sizeHint(cell, axis)));
}

function measureWithPositions<C>(
  cells: readonly C[],
  positions: readonly GridPosition[],
  config: GridConfig,
  axis: Axis,
  sizeHint: SizeHintFn<C>,
): AxisMeasurement {
  const padding = axisPadding(config, axis);
  return measureAxis(
    readHints(cells, axis, sizeHint),
    positions,
    axis,
    config.columns,
    padding.start + padding.end,
    axisSpacing(config, axis),
  );
}

/**
 * Desired min/preferred/flexible extent of the grid along `axis`, for the
 * container to request from its own parent.
 */
export function requestAxisExtent<C>(
  cells: readonly C[],
  config: GridConfig,
  axis: Axis,
  sizeHint: SizeHintFn<C>,
): AxisTotals {
  const positions = mapCellIndices(cells.length, config.columns);
  return measureWithPositions(cells, positions, config, axis, sizeHint).totals;
}

export function measureGrid<C>(
  cells: readonly C[],
  config: GridConfig,
  sizeHint: SizeHintFn<C>,
): GridMeasurement {
  const positions = mapCellIndices(cells.length, config.columns);
  return {
    positions,
    rowCount: gridRowCount(cells.length, config.columns),
    horizontal: measureWithPositions(cells, positions, config, "horizontal", sizeHint),
    vertical: measureWithPositions(cells, positions, config, "vertical", sizeHint),
  };
}

function layoutAxisWithPositions<C>(
  cells: readonly C[],
  positions: readonly GridPosition[],
  config: GridConfig,
  axis: Axis,
  available: number,
  sizeHint: SizeHintFn<C>,
): AxisLayout<C> {
  const { lines, totals } = measureWithPositions(cells, positions, config, axis, sizeHint);
  const allocations = allocateAxis(
    available,
    axisPadding(config, axis),
    axisSpacing(config, axis),
    lines,
  );

  const placements: CellPlacement<C>[] = [];
  for (const [i, cell] of cells.entries()) {
    const position = positions[i];
    if (!position) continue;
    const line = lineIndex(position, axis);
    const allocation = allocations[line];
    if (!allocation) {
      throw new GridLayoutError(
        "GRID_LENGTH_MISMATCH",
        `cell ${String(i)} maps to line ${String(line)} of ${String(allocations.length)}`,
      );
    }
    placements.push({
      cell,
      index: i,
      line,
      offset: allocation.offset,
      size: allocation.size,
    });
  }

  return {
    axis,
    lines,
    totals,
    allocations,
    placements: Object.freeze(placements),
    overflow: clampNonNegative(totals.min - available),
  };
}

/**
 * Measure and allocate one axis without placing anything. `available` is the
 * space the container was granted along `axis`, padding included.
 */
export function computeGridAxis<C>(
  cells: readonly C[],
  config: GridConfig,
  axis: Axis,
  available: number,
  sizeHint: SizeHintFn<C>,
): AxisLayout<C> {
  const positions = mapCellIndices(cells.length, config.columns);
  return layoutAxisWithPositions(cells, positions, config, axis, available, sizeHint);
}

function applyPlacements<C>(layout: AxisLayout<C>, host: GridHost<C>): void {
  for (let i = 0; i < layout.placements.length; i++) {
    const p = layout.placements[i];
    if (!p) continue;
    host.place(p.cell, layout.axis, p.offset, p.size);
  }
}

const activeHosts = new WeakSet<object>();

/**
 * Run a full pass: horizontal measure/allocate/place, then vertical.
 *
 * @throws GridLayoutError GRID_REENTRANT_PASS when a host callback starts
 *   another pass on the same host. Errors thrown by host callbacks propagate.
 */
export function layoutGrid<C>(
  cells: readonly C[],
  config: GridConfig,
  host: GridHost<C>,
  extent: GridExtent,
): GridLayoutResult<C> {
  if (activeHosts.has(host)) {
    throw new GridLayoutError(
      "GRID_REENTRANT_PASS",
      "layoutGrid: a host callback started a nested pass on the same grid",
    );
  }
  activeHosts.add(host);
  const sizeHint: SizeHintFn<C> = (cell, axis) => host.sizeHint(cell, axis);
  try {
    const positions = mapCellIndices(cells.length, config.columns);
    const horizontal = layoutAxisWithPositions(
      cells,
      positions,
      config,
      "horizontal",
      extent.width,
      sizeHint,
    );
    applyPlacements(horizontal, host);

    const vertical = layoutAxisWithPositions(
      cells,
      positions,
      config,
      "vertical",
      extent.height,
      sizeHint,
    );
    applyPlacements(vertical, host);

    return {
      positions,
      rowCount: gridRowCount(cells.length, config.columns),
      horizontal,
      vertical,
    };
  } finally {
    activeHosts.delete(host);
  }
}
