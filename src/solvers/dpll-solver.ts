/**
 * DPLL-based SAT Solver Implementation
 *
 * The classic Davis-Putnam-Logemann-Loveland backtracking search with unit
 * propagation. Slow next to MiniSat, but it has no native dependencies and
 * makes a useful independent check on small toggle boxes.
 */

import type { Clause, Literal, SATSolver, SolveResult } from "./types";
import { BaseFormulaBuilder } from "./types";

type ClauseStatus = "satisfied" | "conflict" | "open" | { unit: Literal };

export class DPLLSolver implements SATSolver {
  private variableCount: number = 0;
  private clauses: Clause[] = [];

  newVariable(): number {
    this.variableCount++;
    return this.variableCount;
  }

  addClause(clause: Clause): void {
    this.clauses.push([...clause]);
  }

  solve(): SolveResult {
    const assignment = new Map<number, boolean>();

    if (!this.search(assignment)) {
      return { satisfiable: false };
    }

    // Variables that appear in no open clause can take either value
    for (let i = 1; i <= this.variableCount; i++) {
      if (!assignment.has(i)) {
        assignment.set(i, false);
      }
    }
    return { satisfiable: true, assignment };
  }

  /**
   * Propagate units, then branch on the first unassigned variable of an open
   * clause. Assignments made here are undone when the branch fails.
   */
  private search(assignment: Map<number, boolean>): boolean {
    const trail: number[] = [];

    if (!this.propagate(assignment, trail)) {
      this.undo(assignment, trail);
      return false;
    }

    const branchVar = this.chooseBranchVariable(assignment);
    if (branchVar === null) {
      return true;
    }

    for (const value of [true, false]) {
      assignment.set(branchVar, value);
      if (this.search(assignment)) {
        return true;
      }
      assignment.delete(branchVar);
    }

    this.undo(assignment, trail);
    return false;
  }

  private propagate(assignment: Map<number, boolean>, trail: number[]): boolean {
    let changed = true;

    while (changed) {
      changed = false;
      for (const clause of this.clauses) {
        const status = this.clauseStatus(clause, assignment);
        if (status === "conflict") {
          return false;
        }
        if (typeof status === "object") {
          const varNum = Math.abs(status.unit);
          assignment.set(varNum, status.unit > 0);
          trail.push(varNum);
          changed = true;
        }
      }
    }

    return true;
  }

  private clauseStatus(clause: Clause, assignment: Map<number, boolean>): ClauseStatus {
    let unassignedCount = 0;
    let lastUnassigned: Literal = 0;

    for (const lit of clause) {
      const value = assignment.get(Math.abs(lit));
      if (value === undefined) {
        unassignedCount++;
        lastUnassigned = lit;
      } else if (value === lit > 0) {
        return "satisfied";
      }
    }

    if (unassignedCount === 0) return "conflict";
    if (unassignedCount === 1) return { unit: lastUnassigned };
    return "open";
  }

  private chooseBranchVariable(assignment: Map<number, boolean>): number | null {
    for (const clause of this.clauses) {
      if (this.clauseStatus(clause, assignment) !== "open") continue;
      for (const lit of clause) {
        const varNum = Math.abs(lit);
        if (!assignment.has(varNum)) {
          return varNum;
        }
      }
    }
    return null;
  }

  private undo(assignment: Map<number, boolean>, trail: number[]): void {
    for (const varNum of trail) {
      assignment.delete(varNum);
    }
  }

  getVariableCount(): number {
    return this.variableCount;
  }

  getClauseCount(): number {
    return this.clauses.length;
  }
}

/**
 * Formula builder backed by DPLL unless another solver is supplied
 */
export class DPLLFormulaBuilder extends BaseFormulaBuilder {
  constructor(solver?: SATSolver) {
    super(solver ?? new DPLLSolver());
  }
}
