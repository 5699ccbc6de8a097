/**
 * Linear System Builder
 *
 * Turns one snapshot of the box into A·x = b over GF(2). Unknown j says
 * whether toggle j (flattened row-major) is applied; equation i says the
 * toggles touching cell i must flip it an odd number of times iff it is
 * locked.
 */

import type { BoolMatrix, LinearSystem } from "./box-types";
import { assertDimension, assertShape, flatIndex } from "./dimensions";

export function buildLinearSystem(
  height: number,
  width: number,
  snapshot: BoolMatrix
): LinearSystem {
  assertDimension("height", height);
  assertDimension("width", width);
  assertShape(snapshot, height, width);

  const size = height * width;
  const matrix: boolean[][] = Array.from({ length: size }, () =>
    new Array<boolean>(size).fill(false)
  );
  const target = new Array<boolean>(size).fill(false);

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const idx = flatIndex(row, col, width);
      const equation = matrix[idx];
      target[idx] = snapshot[row][col];

      // Set (not flipped): the cell itself lies in both its row and its column
      equation[idx] = true;
      for (let c = 0; c < width; c++) {
        equation[flatIndex(row, c, width)] = true;
      }
      for (let r = 0; r < height; r++) {
        equation[flatIndex(r, col, width)] = true;
      }
    }
  }

  return { size, matrix, target };
}
