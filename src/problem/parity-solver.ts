/**
 * Closed-form solver from row and column parities.
 *
 * Writing the toggle operator as A = R + C + I (R sums each row, C each
 * column), GF(2) arithmetic gives A² = width·R + height·C + I. When both
 * dimensions are even that is the identity, so A is its own inverse and the
 * toggles to apply are simply x = A·b:
 *   x[r][c] = rowParity[r] ⊕ colParity[c] ⊕ b[r][c]
 * For any other shape except 1×1, A² is idempotent and A is singular.
 */

import type { BoolMatrix } from "./box-types";
import { flatIndex, shapeOf } from "./dimensions";

/**
 * Whether every grid of this shape has exactly one solution
 */
export function hasInvertibleToggleMatrix(height: number, width: number): boolean {
  if (height === 0 || width === 0) return true;
  if (height === 1 && width === 1) return true;
  return height % 2 === 0 && width % 2 === 0;
}

/**
 * Rank of the toggle matrix of a height×width box, without building it.
 *
 * The kernel is spanned by grids of the form x[r][c] = a[r] ⊕ b[c]:
 * - both odd: those with Σa ⊕ Σb = 0, dimension height + width − 2
 * - even height, odd width: b constant and Σa = 0, dimension height − 1
 * - odd height, even width: the transpose, dimension width − 1
 */
export function toggleMatrixRank(height: number, width: number): number {
  const size = height * width;
  if (size === 0) return 0;

  const evenHeight = height % 2 === 0;
  const evenWidth = width % 2 === 0;
  if (evenHeight && evenWidth) return size;
  if (evenHeight) return size - (height - 1);
  if (evenWidth) return size - (width - 1);
  return size - (height + width - 2);
}

/**
 * @returns the toggle vector in O(height·width), or null when the shape's
 * toggle matrix is not invertible
 */
export function solveByParity(snapshot: BoolMatrix): boolean[] | null {
  const { height, width } = shapeOf(snapshot);
  if (!hasInvertibleToggleMatrix(height, width)) {
    return null;
  }

  const rowParity = new Array<boolean>(height).fill(false);
  const colParity = new Array<boolean>(width).fill(false);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      if (snapshot[row][col]) {
        rowParity[row] = !rowParity[row];
        colParity[col] = !colParity[col];
      }
    }
  }

  const solution = new Array<boolean>(height * width).fill(false);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      solution[flatIndex(row, col, width)] =
        (rowParity[row] !== colParity[col]) !== snapshot[row][col];
    }
  }
  return solution;
}
