/**
 * packages/core/src/layout/grid/gridLayoutGroup.ts — Host adapter.
 *
 * Why: UI hosts expose layout containers as objects with property setters and
 * layout callbacks. The group owns the configuration and forwards each call to
 * the pure pass functions; it holds nothing computed by an earlier call.
 *
 * Usage:
 *   const group = createGridLayoutGroup(host, { columns: 3, spacing: 4 });
 *   if (group.setColumns(4)) host.markLayoutDirty();
 *   const wanted = group.measure(cells).horizontal.totals;
 *   group.layout(cells, { width: 320, height: 200 });
 */

import type { Axis, AxisTotals, GridConfig, GridExtent, GridPadding, GridSpacing } from "../types.js";
import { type GridConfigInput, resolveGridConfig } from "../validateConfig.js";
import {
  type GridHost,
  type GridLayoutResult,
  type GridMeasurement,
  layoutGrid,
  measureGrid,
  requestAxisExtent,
} from "./gridLayout.js";

export interface GridLayoutGroup<C> {
  /** Current validated configuration snapshot. */
  readonly config: GridConfig;
  /**
   * Setters return true when the stored value changed. Invalid values throw
   * GRID_INVALID_CONFIG and leave the configuration as it was.
   */
  setColumns(columns: number): boolean;
  setSpacing(spacing: number | Readonly<Partial<GridSpacing>>): boolean;
  setPadding(padding: number | Readonly<Partial<GridPadding>>): boolean;
  measure(cells: readonly C[]): GridMeasurement;
  requestAxisExtent(cells: readonly C[], axis: Axis): AxisTotals;
  layout(cells: readonly C[], extent: GridExtent): GridLayoutResult<C>;
}

function sameConfig(a: GridConfig, b: GridConfig): boolean {
  return (
    a.columns === b.columns &&
    a.spacing.x === b.spacing.x &&
    a.spacing.y === b.spacing.y &&
    a.padding.left === b.padding.left &&
    a.padding.right === b.padding.right &&
    a.padding.top === b.padding.top &&
    a.padding.bottom === b.padding.bottom
  );
}

export function createGridLayoutGroup<C>(
  host: GridHost<C>,
  initial?: GridConfigInput,
): GridLayoutGroup<C> {
  let config = resolveGridConfig(initial);

  function update(patch: GridConfigInput): boolean {
    const next = resolveGridConfig({
      columns: config.columns,
      spacing: config.spacing,
      padding: config.padding,
      ...patch,
    });
    if (sameConfig(config, next)) return false;
    config = next;
    return true;
  }

  return {
    get config() {
      return config;
    },
    setColumns(columns) {
      return update({ columns });
    },
    setSpacing(spacing) {
      if (typeof spacing === "number") return update({ spacing });
      const current = config.spacing;
      return update({ spacing: { x: spacing.x ?? current.x, y: spacing.y ?? current.y } });
    },
    setPadding(padding) {
      if (typeof padding === "number") return update({ padding });
      const current = config.padding;
      return update({
        padding: {
          left: padding.left ?? current.left,
          right: padding.right ?? current.right,
          top: padding.top ?? current.top,
          bottom: padding.bottom ?? current.bottom,
        },
      });
    },
    measure(cells) {
      return measureGrid(cells, config, (cell, axis) => host.sizeHint(cell, axis));
    },
    requestAxisExtent(cells, axis) {
      return requestAxisExtent(cells, config, axis, (cell, a) => host.sizeHint(cell, a));
    },
    layout(cells, extent) {
      return layoutGrid(cells, config, host, extent);
    },
  };
}
