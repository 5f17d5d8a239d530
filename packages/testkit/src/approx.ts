import { AssertionError } from "node:assert";

export type ApproxOptions = Readonly<{
  /** Absolute tolerance. Defaults to 1e-9. */
  epsilon?: number;
}>;

const DEFAULT_EPSILON = 1e-9;

function resolveEpsilon(opts: ApproxOptions | undefined): number {
  const eps = opts?.epsilon;
  if (eps === undefined) return DEFAULT_EPSILON;
  if (!Number.isFinite(eps) || eps < 0) {
    throw new Error(`approx: epsilon must be a finite number >= 0, got ${String(eps)}`);
  }
  return eps;
}

function withinEpsilon(actual: number, expected: number, eps: number): boolean {
  if (actual === expected) return true;
  if (!Number.isFinite(actual) || !Number.isFinite(expected)) return false;
  return Math.abs(actual - expected) <= eps;
}

/**
 * Compare two numbers with an absolute tolerance.
 * NaN never matches; equal infinities do.
 */
export function approxEqual(
  actual: number,
  expected: number,
  message?: string,
  opts?: ApproxOptions,
): void {
  const eps = resolveEpsilon(opts);
  if (withinEpsilon(actual, expected, eps)) return;
  throw new AssertionError({
    message:
      message ??
      `expected ${String(actual)} to be within ${String(eps)} of ${String(expected)}`,
    actual,
    expected,
    operator: "approxEqual",
  });
}

/**
 * Element-wise {@link approxEqual} over number arrays of equal length.
 */
export function approxDeepEqual(
  actual: readonly number[],
  expected: readonly number[],
  message?: string,
  opts?: ApproxOptions,
): void {
  const eps = resolveEpsilon(opts);
  if (actual.length !== expected.length) {
    throw new AssertionError({
      message:
        message ?? `expected length ${String(expected.length)}, got ${String(actual.length)}`,
      actual,
      expected,
      operator: "approxDeepEqual",
    });
  }
  for (let i = 0; i < actual.length; i++) {
    const a = actual[i] ?? Number.NaN;
    const e = expected[i] ?? Number.NaN;
    if (!withinEpsilon(a, e, eps)) {
      throw new AssertionError({
        message:
          message ??
          `index ${String(i)}: expected ${String(a)} to be within ${String(eps)} of ${String(e)}`,
        actual,
        expected,
        operator: "approxDeepEqual",
      });
    }
  }
}
