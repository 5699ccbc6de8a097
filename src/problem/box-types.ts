/**
 * Type Definitions for the Toggle Box
 *
 * Core types for the grid, the GF(2) linear system derived from it, and the
 * outcome of opening a box.
 */

/**
 * Boolean grid indexed [row][col]; true = locked cell
 */
export type BoolMatrix = boolean[][];

/**
 * The only surface the solver is allowed to use.
 * toggle flips every cell of the given row and column, each once.
 */
export interface ToggleBox {
  toggle(row: number, col: number): void;
  /** True while any cell is still locked */
  isLocked(): boolean;
  /** Independent copy of the current grid */
  getState(): BoolMatrix;
}

/**
 * A·x = b over GF(2), N = height·width unknowns, cells flattened row-major
 */
export interface LinearSystem {
  size: number;
  /** matrix[i][j]: toggle j flips cell i */
  matrix: boolean[][];
  /** Initial cell values */
  target: boolean[];
}

/**
 * Row-echelon form produced by forward elimination.
 * Row k (k < rank) has its leading entry in pivotColumns[k].
 */
export interface EchelonForm extends LinearSystem {
  pivotColumns: number[];
  rank: number;
}

/**
 * How the toggle vector is computed:
 * - elimination: dense Gaussian elimination over GF(2)
 * - parity: closed form x = A·b, valid when A is invertible
 * - sat: XOR constraints handed to a SAT backend
 */
export type SolveStrategy = "elimination" | "parity" | "sat";

/**
 * Statistics reported before the toggles are applied
 */
export interface SolveStats {
  strategy: SolveStrategy;
  /** Number of unknowns (cells) */
  size: number;
  /** Rank of A, when the strategy computes it */
  rank: number | null;
  /** Number of toggles the solution asks for (0 when unsolvable) */
  toggles: number;
}

export interface OpenBoxResult {
  /** box.isLocked() after the solution was applied */
  locked: boolean;
  togglesApplied: number;
  /** Strategy that produced the solution (parity may fall back to elimination) */
  strategy: SolveStrategy;
  rank: number | null;
  /** False when no set of toggles clears the initial grid */
  solvable: boolean;
}
