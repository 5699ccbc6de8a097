/**
 * Type declarations for the logic-solver npm package, which ships none.
 * Only the surface MiniSatSolver calls is declared.
 */

declare module "logic-solver" {
  namespace Logic {
    const FALSE: string;

    function or(...operands: Term[]): Formula;

    type Term = string | Formula;
    type Formula = object;

    class Solver {
      constructor();
      getVarNum(variableName: string): number;
      require(...args: Term[]): void;
      solve(): Solution | null;
    }

    class Solution {
      getTrueVars(): string[];
    }
  }

  export = Logic;
}
