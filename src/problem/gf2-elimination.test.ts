/**
 * Tests for forward elimination over GF(2) and the rank of toggle matrices.
 */

import { describe, it, expect } from "vitest";
import { eliminate, gf2Rank } from "./gf2-elimination";
import { buildLinearSystem } from "./linear-system";
import { hasInvertibleToggleMatrix } from "./parity-solver";
import { RankDeficiencyError } from "./errors";
import type { BoolMatrix } from "./box-types";

const T = true;
const F = false;

function emptyGrid(height: number, width: number): BoolMatrix {
  return Array.from({ length: height }, () => new Array<boolean>(width).fill(false));
}

describe("eliminate", () => {
  it("reduces the 2x2 system to upper-triangular form", () => {
    const echelon = eliminate(
      buildLinearSystem(2, 2, [
        [T, F],
        [F, F],
      ])
    );

    expect(echelon.matrix).toEqual([
      [T, T, T, F],
      [F, T, F, T],
      [F, F, T, T],
      [F, F, F, T],
    ]);
    expect(echelon.target).toEqual([T, T, T, F]);
    expect(echelon.pivotColumns).toEqual([0, 1, 2, 3]);
    expect(echelon.rank).toBe(4);
  });

  it("pivots column c on row c for even shapes", () => {
    const echelon = eliminate(buildLinearSystem(4, 6, emptyGrid(4, 6)));
    expect(echelon.pivotColumns).toEqual(Array.from({ length: 24 }, (_, i) => i));
    echelon.matrix.forEach((row, i) => {
      expect(row[i]).toBe(true);
      expect(row.slice(0, i).some(Boolean)).toBe(false);
    });
  });

  it("leaves the input system untouched", () => {
    const system = buildLinearSystem(2, 3, [
      [T, F, T],
      [F, F, T],
    ]);
    const matrixBefore = system.matrix.map((row) => row.slice());
    const targetBefore = system.target.slice();

    eliminate(system);

    expect(system.matrix).toEqual(matrixBefore);
    expect(system.target).toEqual(targetBefore);
  });

  it("skips columns without a pivot", () => {
    // Every toggle of a 1x2 box flips both cells
    const echelon = eliminate(buildLinearSystem(1, 2, [[T, F]]));
    expect(echelon.matrix).toEqual([
      [T, T],
      [F, F],
    ]);
    expect(echelon.target).toEqual([T, T]);
    expect(echelon.pivotColumns).toEqual([0]);
    expect(echelon.rank).toBe(1);
  });

  it("throws a rank deficiency when full rank is required", () => {
    const system = buildLinearSystem(1, 2, [[T, T]]);
    expect(() => eliminate(system, { requireFullRank: true })).toThrow(RankDeficiencyError);
    expect(() => eliminate(system, { requireFullRank: true })).toThrow(
      "Toggle matrix has rank 1, expected 2"
    );
  });

  it("accepts full-rank systems when full rank is required", () => {
    const system = buildLinearSystem(2, 4, emptyGrid(2, 4));
    expect(eliminate(system, { requireFullRank: true }).rank).toBe(8);
  });

  it("handles the empty system", () => {
    expect(eliminate({ size: 0, matrix: [], target: [] })).toEqual({
      size: 0,
      matrix: [],
      target: [],
      pivotColumns: [],
      rank: 0,
    });
  });
});

describe("toggle matrix rank", () => {
  const shapes: Array<[number, number]> = [];
  for (let height = 1; height <= 8; height++) {
    for (let width = 1; width <= 8; width++) {
      shapes.push([height, width]);
    }
  }

  it.each(shapes)("%ix%i is full rank exactly when predicted", (height, width) => {
    const rank = gf2Rank(buildLinearSystem(height, width, emptyGrid(height, width)).matrix);
    if (hasInvertibleToggleMatrix(height, width)) {
      expect(rank).toBe(height * width);
    } else {
      expect(rank).toBeLessThan(height * width);
    }
  });

  it.each([2, 3, 4, 7])("a single row of %i cells has rank 1", (width) => {
    expect(gf2Rank(buildLinearSystem(1, width, emptyGrid(1, width)).matrix)).toBe(1);
  });

  it("does not depend on the target", () => {
    const grid = emptyGrid(3, 3);
    grid[1][2] = true;
    expect(eliminate(buildLinearSystem(3, 3, grid)).rank).toBe(
      gf2Rank(buildLinearSystem(3, 3, emptyGrid(3, 3)).matrix)
    );
  });
});
