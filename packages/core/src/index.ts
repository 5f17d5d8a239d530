/**
 * @flexgrid/core
 *
 * Flexible grid layout: row-major cell mapping, per-axis line sizing from
 * min/preferred/flexible hints, and three-pass space allocation.
 * Host-agnostic; cells are opaque handles reached through `GridHost` callbacks.
 */

// =============================================================================
// Errors
// =============================================================================

export { GridLayoutError, type GridLayoutErrorCode } from "./errors.js";

// =============================================================================
// Data model
// =============================================================================

export {
  type Allocation,
  type Axis,
  type AxisPadding,
  type AxisTotals,
  type GridConfig,
  type GridExtent,
  type GridPadding,
  type GridPosition,
  type GridSpacing,
  type LineMetrics,
  type SizeHint,
} from "./layout/types.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_GRID_CONFIG,
  MIN_COLUMNS,
  axisPadding,
  axisSpacing,
  resolveGridConfig,
  validateGridConfig,
  type GridConfigInput,
  type InvalidConfigFatal,
  type LayoutResult,
} from "./layout/validateConfig.js";

// =============================================================================
// Layout components
// =============================================================================

export {
  cellPosition,
  gridRowCount,
  lineCount,
  lineIndex,
  mapCellIndices,
} from "./layout/grid/indexMapper.js";
export { normalizeSizeHint } from "./layout/grid/sizeHint.js";
export {
  measureAxis,
  measureAxisLines,
  sumAxisLines,
  type AxisMeasurement,
} from "./layout/grid/axisSizer.js";
export { allocateAxis, allocationExtent } from "./layout/grid/spaceAllocator.js";

// =============================================================================
// Grid pass + host adapter
// =============================================================================

export {
  computeGridAxis,
  layoutGrid,
  measureGrid,
  requestAxisExtent,
  type AxisLayout,
  type CellPlacement,
  type GridHost,
  type GridLayoutResult,
  type GridMeasurement,
  type PlaceFn,
  type SizeHintFn,
} from "./layout/grid/gridLayout.js";
export { createGridLayoutGroup, type GridLayoutGroup } from "./layout/grid/gridLayoutGroup.js";

export { resetDevWarnings } from "./debug/warnDev.js";
