/**
 * packages/core/src/layout/validateConfig.ts — Grid configuration validation.
 *
 * Why: The container hands its configuration over as loosely typed input.
 * Validation applies defaults and returns a structured fatal result instead of
 * throwing, so hosts can surface the detail next to the offending property.
 *
 * Rules:
 *   - columns: number, floored; below 1 is clamped to 1 with a dev warning
 *   - spacing: number (both axes) or { x, y }, finite and >= 0
 *   - padding: number (all sides) or { left, right, top, bottom }, finite and >= 0
 */

import { warnDev } from "../debug/warnDev.js";
import { GridLayoutError } from "../errors.js";
import { I32_MAX, isFiniteNonNegative } from "./engine/bounds.js";
import { invalid, ok } from "./engine/result.js";
import type { Axis, AxisPadding, GridConfig, GridPadding, GridSpacing } from "./types.js";

/** Fatal error type for invalid grid configuration. */
export type InvalidConfigFatal = Readonly<{ code: "GRID_INVALID_CONFIG"; detail: string }>;

/**
 * Validation result: success with value, or failure with fatal error.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidConfigFatal }>;

/** Loosely typed configuration as a host would pass it. Omitted fields take defaults. */
export type GridConfigInput = Readonly<{
  columns?: number;
  spacing?: number | Readonly<Partial<GridSpacing>>;
  padding?: number | Readonly<Partial<GridPadding>>;
}>;

/** A grid cannot place anything without at least one column. */
export const MIN_COLUMNS = 1;

export const DEFAULT_GRID_CONFIG: GridConfig = Object.freeze({
  columns: MIN_COLUMNS,
  spacing: Object.freeze({ x: 0, y: 0 }),
  padding: Object.freeze({ left: 0, right: 0, top: 0, bottom: 0 }),
});

type PropsBag = Readonly<Record<string, unknown>>;

function isPropsBag(v: unknown): v is PropsBag {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseColumns(raw: unknown): LayoutResult<number> {
  if (raw === undefined) return ok(MIN_COLUMNS);
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    return invalid("grid.columns must be a finite number");
  }
  const n = Math.floor(raw);
  if (n < MIN_COLUMNS) {
    warnDev(`[flexgrid] grid.columns=${String(raw)} is below ${MIN_COLUMNS}; using ${MIN_COLUMNS}`);
    return ok(MIN_COLUMNS);
  }
  if (n > I32_MAX) return invalid("grid.columns must be an int32");
  return ok(n);
}

function parseLength(name: string, raw: unknown, fallback: number): LayoutResult<number> {
  if (raw === undefined) return ok(fallback);
  if (!isFiniteNonNegative(raw)) return invalid(`${name} must be a finite number >= 0`);
  return ok(raw);
}

function parseSpacing(raw: unknown): LayoutResult<GridSpacing> {
  if (raw === undefined || typeof raw === "number") {
    const both = parseLength("grid.spacing", raw, 0);
    if (!both.ok) return both;
    return ok({ x: both.value, y: both.value });
  }
  if (!isPropsBag(raw)) return invalid("grid.spacing must be a number or { x, y }");

  const x = parseLength("grid.spacing.x", raw.x, 0);
  if (!x.ok) return x;
  const y = parseLength("grid.spacing.y", raw.y, 0);
  if (!y.ok) return y;
  return ok({ x: x.value, y: y.value });
}

function parsePadding(raw: unknown): LayoutResult<GridPadding> {
  if (raw === undefined || typeof raw === "number") {
    const all = parseLength("grid.padding", raw, 0);
    if (!all.ok) return all;
    const p = all.value;
    return ok({ left: p, right: p, top: p, bottom: p });
  }
  if (!isPropsBag(raw)) {
    return invalid("grid.padding must be a number or { left, right, top, bottom }");
  }

  const left = parseLength("grid.padding.left", raw.left, 0);
  if (!left.ok) return left;
  const right = parseLength("grid.padding.right", raw.right, 0);
  if (!right.ok) return right;
  const top = parseLength("grid.padding.top", raw.top, 0);
  if (!top.ok) return top;
  const bottom = parseLength("grid.padding.bottom", raw.bottom, 0);
  if (!bottom.ok) return bottom;
  return ok({ left: left.value, right: right.value, top: top.value, bottom: bottom.value });
}

export function validateGridConfig(raw: unknown): LayoutResult<GridConfig> {
  if (raw === undefined) return ok(DEFAULT_GRID_CONFIG);
  if (!isPropsBag(raw)) return invalid("grid config must be an object");

  const columnsRes = parseColumns(raw.columns);
  if (!columnsRes.ok) return columnsRes;
  const spacingRes = parseSpacing(raw.spacing);
  if (!spacingRes.ok) return spacingRes;
  const paddingRes = parsePadding(raw.padding);
  if (!paddingRes.ok) return paddingRes;

  return ok(
    Object.freeze({
      columns: columnsRes.value,
      spacing: Object.freeze(spacingRes.value),
      padding: Object.freeze(paddingRes.value),
    }),
  );
}

/** Throwing variant of {@link validateGridConfig}. */
export function resolveGridConfig(raw: unknown): GridConfig {
  const res = validateGridConfig(raw);
  if (!res.ok) throw new GridLayoutError(res.fatal.code, res.fatal.detail);
  return res.value;
}

export function axisPadding(config: GridConfig, axis: Axis): AxisPadding {
  const p = config.padding;
  return axis === "horizontal" ? { start: p.left, end: p.right } : { start: p.top, end: p.bottom };
}

export function axisSpacing(config: GridConfig, axis: Axis): number {
  return axis === "horizontal" ? config.spacing.x : config.spacing.y;
}
