import { warnDevOnce } from "../../debug/warnDev.js";
import { isFiniteNonNegative } from "../engine/bounds.js";
import type { SizeHint } from "../types.js";

type HintField = keyof SizeHint;

function repair(field: HintField, v: number): number {
  if (isFiniteNonNegative(v)) return v;
  warnDevOnce(
    `sizeHint.${field}`,
    `[flexgrid] sizeHint.${field}=${String(v)} is not a finite number >= 0; treating it as 0`,
  );
  return 0;
}

/**
 * Clamp a cell-reported hint into the shape the sizer relies on.
 *
 * Negative or non-finite fields become 0 (warned once per field). `preferred`
 * is raised to `min` silently: a cell with no preference reports less than its
 * minimum routinely. Well-formed hints are returned as the same object.
 */
export function normalizeSizeHint(raw: SizeHint): SizeHint {
  const min = repair("min", raw.min);
  const preferred = Math.max(min, repair("preferred", raw.preferred));
  const flexible = repair("flexible", raw.flexible);
  if (min === raw.min && preferred === raw.preferred && flexible === raw.flexible) {
    return raw;
  }
  return Object.freeze({ min, preferred, flexible });
}
