/**
 * Tests for the SAT encoding of the toggle box.
 */

import { describe, it, expect } from "vitest";
import { solveWithSat } from "./toggle-sat";
import { DPLLFormulaBuilder, MiniSatFormulaBuilder } from "../solvers";

describe("solveWithSat", () => {
  it("solves the 2x2 box with one locked corner", () => {
    expect(
      solveWithSat([
        [true, false],
        [false, false],
      ])
    ).toEqual([true, true, true, false]);
  });

  it("creates one named variable per toggle", () => {
    const builder = new MiniSatFormulaBuilder();
    solveWithSat([[false, true, false]], { builder });
    expect(builder.getVariable("toggle_0,0")).toBe(1);
    expect(builder.getVariable("toggle_0,2")).toBe(3);
    expect(builder.getVariable("toggle_1,0")).toBeUndefined();
  });

  it("returns null when no toggle set clears the grid", () => {
    expect(solveWithSat([[true, false]])).toBeNull();
    expect(solveWithSat([[true, false]], { builder: new DPLLFormulaBuilder() })).toBeNull();
  });

  it("finds a valid toggle set for a singular shape", () => {
    const solution = solveWithSat([[true, true, true]], { builder: new DPLLFormulaBuilder() });
    expect(solution).not.toBeNull();
    // An odd number of row toggles clears the row
    expect([1, 3]).toContain(solution?.filter(Boolean).length);
  });
});
