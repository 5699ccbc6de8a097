/**
 * MiniSat backend through the logic-solver package (MiniSat compiled to
 * JavaScript with Emscripten).
 */

import Logic from "logic-solver";
import type { Clause, Literal, SATSolver, SolveResult } from "./types";
import { BaseFormulaBuilder } from "./types";

/** logic-solver names its variables; ours are v1, v2, ... */
function variableName(variable: number): string {
  return `v${variable}`;
}

export class MiniSatSolver implements SATSolver {
  private readonly logic = new Logic.Solver();
  private variables = 0;
  private clauses = 0;

  newVariable(): number {
    this.variables++;
    this.logic.getVarNum(variableName(this.variables));
    return this.variables;
  }

  addClause(clause: Clause): void {
    // An empty clause can never be satisfied
    const formula = clause.length === 0 ? Logic.FALSE : Logic.or(...clause.map((lit) => this.term(lit)));
    this.logic.require(formula);
    this.clauses++;
  }

  solve(): SolveResult {
    const solution = this.logic.solve();
    if (!solution) {
      return { satisfiable: false };
    }

    const trueVars = new Set(solution.getTrueVars());
    const assignment = new Map<number, boolean>();
    for (let variable = 1; variable <= this.variables; variable++) {
      assignment.set(variable, trueVars.has(variableName(variable)));
    }
    return { satisfiable: true, assignment };
  }

  getVariableCount(): number {
    return this.variables;
  }

  getClauseCount(): number {
    return this.clauses;
  }

  private term(lit: Literal): string {
    const variable = Math.abs(lit);
    if (variable === 0 || variable > this.variables) {
      throw new Error(`Unknown variable: ${variable}`);
    }
    return lit > 0 ? variableName(variable) : `-${variableName(variable)}`;
  }
}

/**
 * Formula builder backed by MiniSat unless another solver is supplied
 */
export class MiniSatFormulaBuilder extends BaseFormulaBuilder {
  constructor(solver?: SATSolver) {
    super(solver ?? new MiniSatSolver());
  }
}
