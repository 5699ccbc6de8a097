/**
 * Tests for back substitution over GF(2).
 */

import { describe, it, expect } from "vitest";
import { backSubstitute } from "./back-substitution";
import { eliminate } from "./gf2-elimination";
import { buildLinearSystem } from "./linear-system";
import type { BoolMatrix } from "./box-types";

const T = true;
const F = false;

function solve(grid: BoolMatrix): boolean[] | null {
  const height = grid.length;
  const width = height === 0 ? 0 : grid[0].length;
  return backSubstitute(eliminate(buildLinearSystem(height, width, grid)));
}

describe("backSubstitute", () => {
  it("toggles the only cell of a locked 1x1 box", () => {
    expect(solve([[T]])).toEqual([T]);
    expect(solve([[F]])).toEqual([F]);
  });

  it("solves the 2x2 box with one locked corner", () => {
    expect(
      solve([
        [T, F],
        [F, F],
      ])
    ).toEqual([T, T, T, F]);
  });

  it("solves the triangular system directly", () => {
    const solution = backSubstitute({
      size: 3,
      matrix: [
        [T, T, F],
        [F, T, T],
        [F, F, T],
      ],
      target: [F, T, T],
      pivotColumns: [0, 1, 2],
      rank: 3,
    });
    // x2 = 1, x1 = 1 ⊕ 1 = 0, x0 = 0 ⊕ 0 = 0
    expect(solution).toEqual([F, F, T]);
  });

  it("leaves free unknowns false on a consistent singular system", () => {
    // 1x3: every toggle flips the whole row
    expect(solve([[T, T, T]])).toEqual([T, F, F]);
    expect(solve([[F, F, F]])).toEqual([F, F, F]);
  });

  it("returns null when a zero row has a locked target", () => {
    expect(solve([[T, F]])).toBeNull();
    expect(solve([[T], [F], [F]])).toBeNull();
  });

  it("returns an empty solution for the empty system", () => {
    expect(backSubstitute({ size: 0, matrix: [], target: [], pivotColumns: [], rank: 0 })).toEqual([]);
  });
});
