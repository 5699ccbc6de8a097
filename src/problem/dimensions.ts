/**
 * Shape helpers shared by the box and the solvers.
 */

import type { BoolMatrix } from "./box-types";
import { InvalidDimensionError } from "./errors";

export interface BoxShape {
  height: number;
  width: number;
}

export function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidDimensionError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Check that a grid is `height` rows of `width` cells
 */
export function assertShape(grid: BoolMatrix, height: number, width: number): void {
  if (grid.length !== height) {
    throw new InvalidDimensionError(`Expected ${height} rows, got ${grid.length}`);
  }
  grid.forEach((row, index) => {
    if (row.length !== width) {
      throw new InvalidDimensionError(
        `Expected ${width} cells in row ${index}, got ${row.length}`
      );
    }
  });
}

/**
 * Read the shape of a snapshot. A grid with no rows has width 0.
 */
export function shapeOf(grid: BoolMatrix): BoxShape {
  const height = grid.length;
  const width = height === 0 ? 0 : grid[0].length;
  assertShape(grid, height, width);
  return { height, width };
}

/**
 * Row-major flattened index of a cell
 */
export function flatIndex(row: number, col: number, width: number): number {
  return row * width + col;
}

export function cellOf(index: number, width: number): { row: number; col: number } {
  return { row: Math.floor(index / width), col: index % width };
}
