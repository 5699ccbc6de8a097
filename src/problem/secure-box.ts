/**
 * Secure Box
 *
 * The grid model: owns the cells and exposes exactly toggle / isLocked /
 * getState. toggle(row, col) flips the union of the row and the column, so
 * every toggle is its own inverse and toggles commute.
 */

import type { BoolMatrix, ToggleBox } from "./box-types";
import { assertDimension, assertShape } from "./dimensions";
import { IndexOutOfRangeError } from "./errors";
import { randomIndex } from "./random";
import type { RandomSource } from "./random";

/** Upper bound (exclusive) on the number of shuffle toggles */
export const DEFAULT_MAX_SHUFFLE_MOVES = 1000;

/**
 * Options for creating a box
 */
export interface BoxOptions {
  /** Randomness for the shuffle (defaults to Math.random) */
  random?: RandomSource;
  /** Shuffle performs floor(random() * maxShuffleMoves) toggles */
  maxShuffleMoves?: number;
  /** Start from this grid instead of shuffling */
  initialState?: BoolMatrix;
}

export class SecureBox implements ToggleBox {
  readonly height: number;
  readonly width: number;
  private readonly cells: BoolMatrix;

  constructor(height: number, width: number, initialState?: BoolMatrix) {
    assertDimension("height", height);
    assertDimension("width", width);
    if (initialState) {
      assertShape(initialState, height, width);
    }

    this.height = height;
    this.width = width;
    this.cells = Array.from({ length: height }, (_, row) =>
      Array.from({ length: width }, (_, col) => initialState?.[row][col] ?? false)
    );
  }

  toggle(row: number, col: number): void {
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(col) ||
      row < 0 ||
      row >= this.height ||
      col < 0 ||
      col >= this.width
    ) {
      throw new IndexOutOfRangeError(row, col, this.height, this.width);
    }

    const cells = this.cells;
    for (let c = 0; c < this.width; c++) {
      cells[row][c] = !cells[row][c];
    }
    // (row, col) was already flipped by the row sweep
    for (let r = 0; r < this.height; r++) {
      if (r !== row) {
        cells[r][col] = !cells[r][col];
      }
    }
  }

  isLocked(): boolean {
    return this.cells.some((row) => row.some((cell) => cell));
  }

  getState(): BoolMatrix {
    return this.cells.map((row) => row.slice());
  }

  /**
   * Apply a random number of random toggles. The result is always reachable
   * from the open box, so it can always be opened again.
   * @returns the number of toggles applied
   */
  shuffle(random: RandomSource, maxMoves: number = DEFAULT_MAX_SHUFFLE_MOVES): number {
    if (this.height === 0 || this.width === 0) return 0;

    const moves = Math.floor(random() * maxMoves);
    for (let t = 0; t < moves; t++) {
      this.toggle(randomIndex(random, this.height), randomIndex(random, this.width));
    }
    return moves;
  }
}

/**
 * Create a box and lock it, either from `initialState` or by shuffling
 */
export function createSecureBox(
  height: number,
  width: number,
  options: BoxOptions = {}
): SecureBox {
  const box = new SecureBox(height, width, options.initialState);
  if (!options.initialState) {
    box.shuffle(options.random ?? Math.random, options.maxShuffleMoves);
  }
  return box;
}
