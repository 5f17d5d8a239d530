import type { InvalidConfigFatal, LayoutResult } from "../validateConfig.js";

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function invalid(detail: string): LayoutResult<never> {
  const fatal: InvalidConfigFatal = { code: "GRID_INVALID_CONFIG", detail };
  return { ok: false, fatal };
}
