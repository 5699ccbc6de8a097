/**
 * Gaussian Elimination over GF(2)
 *
 * Addition is XOR and the only non-zero scalar is 1, so pivots never need
 * scaling: eliminating an entry is XOR-ing the pivot row into it.
 *
 * The pivot search starts at the next unused row rather than at the column
 * index, so a column without a pivot does not leave a stale row behind. For
 * a full-rank matrix both are the same and every column c pivots on row c.
 */

import type { EchelonForm, LinearSystem } from "./box-types";
import { RankDeficiencyError } from "./errors";

export interface EliminationOptions {
  /** Throw RankDeficiencyError instead of returning a rank-deficient form */
  requireFullRank?: boolean;
}

/**
 * Forward elimination on a copy of (A | b)
 */
export function eliminate(
  system: LinearSystem,
  options: EliminationOptions = {}
): EchelonForm {
  const { size } = system;
  const matrix = system.matrix.map((row) => row.slice());
  const target = system.target.slice();
  const pivotColumns: number[] = [];

  let pivotRow = 0;
  for (let col = 0; col < size && pivotRow < size; col++) {
    let pivot = pivotRow;
    while (pivot < size && !matrix[pivot][col]) {
      pivot++;
    }

    // No true entry left in this column: its unknown is free
    if (pivot === size) {
      continue;
    }

    if (pivot !== pivotRow) {
      [matrix[pivotRow], matrix[pivot]] = [matrix[pivot], matrix[pivotRow]];
      [target[pivotRow], target[pivot]] = [target[pivot], target[pivotRow]];
    }

    const pivotEquation = matrix[pivotRow];
    for (let row = pivotRow + 1; row < size; row++) {
      const equation = matrix[row];
      if (!equation[col]) continue;

      // Entries left of col are already zero in both rows
      for (let k = col; k < size; k++) {
        equation[k] = equation[k] !== pivotEquation[k];
      }
      target[row] = target[row] !== target[pivotRow];
    }

    pivotColumns.push(col);
    pivotRow++;
  }

  const rank = pivotColumns.length;
  if (options.requireFullRank && rank < size) {
    throw new RankDeficiencyError(rank, size);
  }

  return { size, matrix, target, pivotColumns, rank };
}

/**
 * Rank of a square GF(2) matrix
 */
export function gf2Rank(matrix: boolean[][]): number {
  const size = matrix.length;
  return eliminate({ size, matrix, target: new Array<boolean>(size).fill(false) }).rank;
}
