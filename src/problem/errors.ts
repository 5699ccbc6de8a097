/**
 * Errors raised by the toggle box and its solver.
 */

export class ToggleBoxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ToggleBoxError";
  }
}

/**
 * A dimension is not a non-negative integer, or a grid has the wrong shape.
 * Zero dimensions are valid: they describe an empty, already open box.
 */
export class InvalidDimensionError extends ToggleBoxError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDimensionError";
  }
}

export class IndexOutOfRangeError extends ToggleBoxError {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number, height: number, width: number) {
    super(`Cell (${row}, ${col}) is outside the ${height}x${width} box`);
    this.name = "IndexOutOfRangeError";
    this.row = row;
    this.col = col;
  }
}

/**
 * Elimination found fewer pivots than unknowns while a full-rank matrix was
 * required. This is an internal invariant violation, not a locked box.
 */
export class RankDeficiencyError extends ToggleBoxError {
  readonly rank: number;
  readonly size: number;

  constructor(rank: number, size: number) {
    super(`Toggle matrix has rank ${rank}, expected ${size}`);
    this.name = "RankDeficiencyError";
    this.rank = rank;
    this.size = size;
  }
}
