/**
 * Back Substitution over GF(2)
 *
 * Solves the echelon form from the last pivot row up:
 *   x[p] = b'[row] ⊕ (⊕ over c > p of A'[row][c] ∧ x[c])
 * Free unknowns (columns without a pivot) are left false.
 */

import type { EchelonForm } from "./box-types";

/**
 * @returns the toggle vector, or null when some equation reads 0 = 1
 */
export function backSubstitute(echelon: EchelonForm): boolean[] | null {
  const { size, matrix, target, pivotColumns, rank } = echelon;

  // Rows below the rank are all-zero; a locked target there is unreachable
  for (let row = rank; row < size; row++) {
    if (target[row]) {
      return null;
    }
  }

  const solution = new Array<boolean>(size).fill(false);

  for (let row = rank - 1; row >= 0; row--) {
    const pivotCol = pivotColumns[row];
    const equation = matrix[row];
    let sum = target[row];

    for (let col = pivotCol + 1; col < size; col++) {
      if (equation[col] && solution[col]) {
        sum = !sum;
      }
    }

    solution[pivotCol] = sum;
  }

  return solution;
}
