/**
 * Toggle Box SAT Encoder
 *
 * One variable per toggle, one XOR constraint per cell: the toggles in the
 * cell's row and column must flip it an odd number of times iff it is
 * locked. Independent of the elimination path, so it doubles as a check.
 */

import { MiniSatFormulaBuilder } from "../solvers";
import type { FormulaBuilder } from "../solvers";
import type { BoolMatrix } from "./box-types";
import { shapeOf } from "./dimensions";

/**
 * Options for the SAT strategy
 */
export interface SatSolveOptions {
  /** Custom formula builder (defaults to MiniSatFormulaBuilder) */
  builder?: FormulaBuilder;
}

function toggleVarKey(row: number, col: number): string {
  return `toggle_${row},${col}`;
}

/**
 * @returns the toggle vector (row-major), or null when unsatisfiable
 */
export function solveWithSat(
  snapshot: BoolMatrix,
  options: SatSolveOptions = {}
): boolean[] | null {
  const { height, width } = shapeOf(snapshot);
  const builder = options.builder ?? new MiniSatFormulaBuilder();

  const toggleVars: number[][] = Array.from({ length: height }, (_, row) =>
    Array.from({ length: width }, (_, col) =>
      builder.createNamedVariable(toggleVarKey(row, col))
    )
  );

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const affecting = [...toggleVars[row]];
      for (let r = 0; r < height; r++) {
        if (r !== row) affecting.push(toggleVars[r][col]);
      }
      builder.addXor(affecting, snapshot[row][col]);
    }
  }

  const result = builder.solver.solve();
  if (!result.satisfiable) {
    return null;
  }

  const { assignment } = result;
  return toggleVars.flat().map((v) => assignment.get(v) ?? false);
}
