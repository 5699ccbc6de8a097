/**
 * SAT Solvers Module
 *
 * Clean abstraction for SAT solving that allows swapping backends.
 */

export type { Clause, FormulaBuilder, Literal, SATSolver, SolveResult } from "./types";
export { BaseFormulaBuilder } from "./types";
export { MiniSatFormulaBuilder, MiniSatSolver } from "./minisat-solver";
export { DPLLFormulaBuilder, DPLLSolver } from "./dpll-solver";
