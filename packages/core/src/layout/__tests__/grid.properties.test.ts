/**
 * grid.properties.test.ts — Seeded sweeps over random grids checking the
 * mapper, sizer and allocator invariants hold for every generated case.
 */

import { type Rng, assert, describe, nextInt, test, withSeed } from "@flexgrid/testkit";
import { measureAxisLines, sumAxisLines } from "../grid/axisSizer.js";
import { gridRowCount, mapCellIndices } from "../grid/indexMapper.js";
import { allocateAxis } from "../grid/spaceAllocator.js";
import type { Allocation, AxisPadding, LineMetrics, SizeHint } from "../types.js";

const SEEDS = [1, 7, 42, 1337, 9001, 424242];
const CASES_PER_SEED = 40;
const EPS = 1e-6;

function randomHint(rng: Rng): SizeHint {
  const min = nextInt(rng, 0, 20);
  // A quarter of cells declare no preference at all.
  const preferred = rng() < 0.25 ? 0 : min + nextInt(rng, 0, 15);
  return { min, preferred, flexible: nextInt(rng, 0, 3) };
}

function randomLines(rng: Rng, count: number, flexible: boolean): LineMetrics[] {
  const out: LineMetrics[] = [];
  for (let i = 0; i < count; i++) {
    const min = nextInt(rng, 0, 30);
    out.push({
      min,
      preferred: min + nextInt(rng, 0, 20),
      flexible: flexible ? nextInt(rng, 0, 4) : 0,
    });
  }
  return out;
}

function randomPadding(rng: Rng): AxisPadding {
  return { start: nextInt(rng, 0, 6), end: nextInt(rng, 0, 6) };
}

function usedSpace(allocs: readonly Allocation[], padding: AxisPadding, spacing: number): number {
  let total = padding.start + padding.end + Math.max(0, allocs.length - 1) * spacing;
  for (const a of allocs) total += a.size;
  return total;
}

describe("grid invariants (seeded sweeps)", () => {
  test("index mapper: row-major positions and ceil row count", () => {
    for (const seed of SEEDS) {
      withSeed("index-mapper", seed, (rng) => {
        for (let k = 0; k < CASES_PER_SEED; k++) {
          const n = nextInt(rng, 0, 60);
          const c = nextInt(rng, 1, 9);
          const positions = mapCellIndices(n, c);
          assert.equal(positions.length, n);
          for (let i = 0; i < n; i++) {
            assert.deepEqual(positions[i], { column: i % c, row: Math.floor(i / c) });
          }
          assert.equal(gridRowCount(n, c), Math.ceil(n / c));
        }
      });
    }
  });

  test("axis sizer: min <= preferred on every line", () => {
    for (const seed of SEEDS) {
      withSeed("line-floor", seed, (rng) => {
        for (let k = 0; k < CASES_PER_SEED; k++) {
          const n = nextInt(rng, 1, 30);
          const c = nextInt(rng, 1, 6);
          const hints = Array.from({ length: n }, () => randomHint(rng));
          const positions = mapCellIndices(n, c);
          for (const axis of ["horizontal", "vertical"] as const) {
            for (const line of measureAxisLines(hints, positions, axis, c)) {
              assert.ok(
                line.min <= line.preferred,
                `min ${String(line.min)} > preferred ${String(line.preferred)}`,
              );
            }
          }
        }
      });
    }
  });

  test("allocator: flexible lines absorb all space above the minimum total", () => {
    for (const seed of SEEDS) {
      withSeed("fill", seed, (rng) => {
        for (let k = 0; k < CASES_PER_SEED; k++) {
          const lines = randomLines(rng, nextInt(rng, 1, 8), true);
          if (lines.every((l) => l.flexible === 0)) continue;
          const padding = randomPadding(rng);
          const spacing = nextInt(rng, 0, 5);
          const totals = sumAxisLines(lines, padding.start + padding.end, spacing);
          const available = totals.min + nextInt(rng, 0, 200);
          const allocs = allocateAxis(available, padding, spacing, lines);
          assert.approxEqual(usedSpace(allocs, padding, spacing), available, undefined, {
            epsilon: EPS,
          });
        }
      });
    }
  });

  test("allocator: without flexible weight no line grows past its preferred size", () => {
    for (const seed of SEEDS) {
      withSeed("no-flex", seed, (rng) => {
        for (let k = 0; k < CASES_PER_SEED; k++) {
          const lines = randomLines(rng, nextInt(rng, 1, 8), false);
          const totals = sumAxisLines(lines, 0, 0);
          const available = totals.min + nextInt(rng, 0, 400);
          const allocs = allocateAxis(available, { start: 0, end: 0 }, 0, lines);
          allocs.forEach((a, i) => {
            const line = lines[i];
            assert.ok(line !== undefined);
            assert.ok(a.size >= line.min - EPS, `line ${i} below min`);
            assert.ok(a.size <= line.preferred + EPS, `line ${i} above preferred`);
            if (available >= totals.preferred) {
              assert.approxEqual(a.size, line.preferred, undefined, { epsilon: EPS });
            }
          });
        }
      });
    }
  });

  test("allocator: offsets advance by size plus spacing without overlap", () => {
    for (const seed of SEEDS) {
      withSeed("offsets", seed, (rng) => {
        for (let k = 0; k < CASES_PER_SEED; k++) {
          const lines = randomLines(rng, nextInt(rng, 2, 8), rng() < 0.5);
          const padding = randomPadding(rng);
          const spacing = nextInt(rng, 0, 5);
          const allocs = allocateAxis(nextInt(rng, 0, 400), padding, spacing, lines);
          assert.equal(allocs[0]?.offset, padding.start);
          for (let i = 0; i + 1 < allocs.length; i++) {
            const cur = allocs[i];
            const next = allocs[i + 1];
            assert.ok(cur !== undefined && next !== undefined);
            assert.ok(cur.size >= (lines[i]?.min ?? 0) - EPS, `line ${i} below min`);
            assert.ok(
              next.offset >= cur.offset + cur.size + spacing - EPS,
              `line ${String(i + 1)} overlaps`,
            );
          }
        }
      });
    }
  });
});
