/**
 * SAT Solver Abstraction Layer
 *
 * A small interface for SAT solving so the toggle-box encoder can run on
 * either backend (MiniSat through logic-solver, or the textbook DPLL solver).
 */

/**
 * A literal is either a positive variable (variable number)
 * or a negative variable (-variable number).
 * In DIMACS format: positive = true, negative = false
 */
export type Literal = number;

/**
 * A clause is a disjunction (OR) of literals
 */
export type Clause = Literal[];

/**
 * Result of a SAT solve operation
 */
export type SolveResult =
  | { satisfiable: true; assignment: Map<number, boolean> }
  | { satisfiable: false };

/**
 * Abstract SAT solver interface
 */
export interface SATSolver {
  /**
   * Create a new variable and return its number (1-indexed)
   */
  newVariable(): number;

  /**
   * Add a clause (disjunction of literals)
   * @param clause Array of literals (positive = true, negative = false)
   */
  addClause(clause: Clause): void;

  solve(): SolveResult;

  getVariableCount(): number;

  getClauseCount(): number;
}

/**
 * Higher-level formula builder that works with any SATSolver
 */
export interface FormulaBuilder {
  solver: SATSolver;

  /**
   * Create named variables for easier debugging
   */
  createNamedVariable(name: string): number;

  getVariable(name: string): number | undefined;

  /**
   * Add constraint: the XOR of the literals equals `parity`
   */
  addXor(literals: Literal[], parity: boolean): void;

  /**
   * Force a literal to be true
   */
  addUnit(literal: Literal): void;
}

/**
 * Base implementation of FormulaBuilder that works with any SATSolver.
 * MiniSatFormulaBuilder and DPLLFormulaBuilder only pick the default solver.
 */
export class BaseFormulaBuilder implements FormulaBuilder {
  solver: SATSolver;
  private nameToVar: Map<string, number> = new Map();

  constructor(solver: SATSolver) {
    this.solver = solver;
  }

  createNamedVariable(name: string): number {
    if (this.nameToVar.has(name)) {
      throw new Error(`Variable already exists: ${name}`);
    }
    const varNum = this.solver.newVariable();
    this.nameToVar.set(name, varNum);
    return varNum;
  }

  getVariable(name: string): number | undefined {
    return this.nameToVar.get(name);
  }

  addXor(literals: number[], parity: boolean): void {
    if (literals.length === 0) {
      // XOR of nothing is false
      if (parity) this.solver.addClause([]);
      return;
    }

    // Chain auxiliary variables: acc_k ↔ acc_{k-1} ⊕ l_k
    let acc = literals[0];
    for (let i = 1; i < literals.length; i++) {
      const next = this.solver.newVariable();
      const lit = literals[i];
      // next ↔ (acc ⊕ lit)
      this.solver.addClause([-next, acc, lit]);
      this.solver.addClause([-next, -acc, -lit]);
      this.solver.addClause([next, -acc, lit]);
      this.solver.addClause([next, acc, -lit]);
      acc = next;
    }

    this.addUnit(parity ? acc : -acc);
  }

  addUnit(literal: number): void {
    this.solver.addClause([literal]);
  }
}
