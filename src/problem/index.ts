/**
 * Problem Module
 *
 * The toggle box and the solvers that open it.
 */

export type {
  BoolMatrix,
  EchelonForm,
  LinearSystem,
  OpenBoxResult,
  SolveStats,
  SolveStrategy,
  ToggleBox,
} from "./box-types";
export {
  IndexOutOfRangeError,
  InvalidDimensionError,
  RankDeficiencyError,
  ToggleBoxError,
} from "./errors";
export { createSecureBox, DEFAULT_MAX_SHUFFLE_MOVES, SecureBox, type BoxOptions } from "./secure-box";
export { createSeededRandom, type RandomSource } from "./random";
export { buildLinearSystem } from "./linear-system";
export { eliminate, gf2Rank, type EliminationOptions } from "./gf2-elimination";
export { backSubstitute } from "./back-substitution";
export { applySolution } from "./apply-solution";
export { hasInvertibleToggleMatrix, solveByParity, toggleMatrixRank } from "./parity-solver";
export { solveWithSat, type SatSolveOptions } from "./toggle-sat";
export { openBox, openNewBox, type OpenBoxOptions } from "./open-box";
