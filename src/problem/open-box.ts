/**
 * Open Box
 *
 * The solve pipeline: one snapshot → toggle vector → toggles applied → final
 * isLocked() check. The snapshot is read once, before any solving.
 */

import { applySolution } from "./apply-solution";
import { backSubstitute } from "./back-substitution";
import type { BoolMatrix, OpenBoxResult, SolveStats, SolveStrategy, ToggleBox } from "./box-types";
import { shapeOf } from "./dimensions";
import { eliminate } from "./gf2-elimination";
import type { EliminationOptions } from "./gf2-elimination";
import { RankDeficiencyError } from "./errors";
import { buildLinearSystem } from "./linear-system";
import { hasInvertibleToggleMatrix, solveByParity, toggleMatrixRank } from "./parity-solver";
import { createSecureBox } from "./secure-box";
import type { BoxOptions } from "./secure-box";
import { solveWithSat } from "./toggle-sat";
import type { SatSolveOptions } from "./toggle-sat";

/**
 * Options for opening a box
 */
export interface OpenBoxOptions extends EliminationOptions, SatSolveOptions {
  /** Defaults to "elimination" */
  strategy?: SolveStrategy;
  /** Called once the solution is known, before it is applied */
  onStats?: (stats: SolveStats) => void;
}

interface ComputedSolution {
  strategy: SolveStrategy;
  solution: boolean[] | null;
  rank: number | null;
}

function computeSolution(
  snapshot: BoolMatrix,
  strategy: SolveStrategy,
  options: OpenBoxOptions
): ComputedSolution {
  const { height, width } = shapeOf(snapshot);

  // Applies to every strategy, before any of them runs
  if (options.requireFullRank && !hasInvertibleToggleMatrix(height, width)) {
    throw new RankDeficiencyError(toggleMatrixRank(height, width), height * width);
  }

  if (strategy === "sat") {
    return { strategy, solution: solveWithSat(snapshot, options), rank: null };
  }

  if (strategy === "parity") {
    const solution = solveByParity(snapshot);
    if (solution) {
      return { strategy, solution, rank: height * width };
    }
    // Singular shape: fall back to elimination
  }

  const echelon = eliminate(buildLinearSystem(height, width, snapshot), options);
  return { strategy: "elimination", solution: backSubstitute(echelon), rank: echelon.rank };
}

/**
 * Compute and apply the toggles that open `box`
 */
export function openBox(box: ToggleBox, options: OpenBoxOptions = {}): OpenBoxResult {
  const requested = options.strategy ?? "elimination";
  const snapshot = box.getState();
  const { height, width } = shapeOf(snapshot);
  const size = height * width;

  if (size === 0) {
    options.onStats?.({ strategy: requested, size, rank: 0, toggles: 0 });
    return { locked: false, togglesApplied: 0, strategy: requested, rank: 0, solvable: true };
  }

  const { strategy, solution, rank } = computeSolution(snapshot, requested, options);
  options.onStats?.({
    strategy,
    size,
    rank,
    toggles: solution ? solution.filter(Boolean).length : 0,
  });

  if (!solution) {
    return { locked: box.isLocked(), togglesApplied: 0, strategy, rank, solvable: false };
  }

  const togglesApplied = applySolution(box, solution, width);
  return { locked: box.isLocked(), togglesApplied, strategy, rank, solvable: true };
}

/**
 * Create a shuffled box and open it
 */
export function openNewBox(
  height: number,
  width: number,
  options: BoxOptions & OpenBoxOptions = {}
): OpenBoxResult {
  return openBox(createSecureBox(height, width, options), options);
}
