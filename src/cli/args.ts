/**
 * Command-line argument parsing for toggle-box.
 */

import { parseArgs } from "node:util";
import { hasInvertibleToggleMatrix } from "../problem";
import type { SolveStrategy } from "../problem";

/** Largest accepted dimension */
export const MAX_DIMENSION = 1000;

/**
 * Largest Y·X for the solvers that hold the dense N×N toggle matrix or its
 * clause encoding. Only parity on an invertible shape works without one.
 */
export const MAX_DENSE_CELLS = 2500;

export const USAGE =
  "usage: toggle-box <Y> <X> [--strategy elimination|parity|sat] [--seed <n>] [--strict] [--verbose]";

const STRATEGIES: readonly SolveStrategy[] = ["elimination", "parity", "sat"];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  height: number;
  width: number;
  strategy: SolveStrategy;
  /** null = shuffle with Math.random */
  seed: number | null;
  /** Fail on a rank-deficient toggle matrix */
  strict: boolean;
  verbose: boolean;
}

function isStrategy(value: string): value is SolveStrategy {
  return (STRATEGIES as readonly string[]).includes(value);
}

function parseCount(name: string, raw: string, max?: number): number {
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (max !== undefined && value > max) {
    throw new UsageError(`${name} must be at most ${max}, got ${raw}`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        strategy: { type: "string" },
        seed: { type: "string" },
        strict: { type: "boolean" },
        verbose: { type: "boolean", short: "v" },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = readArgs(argv);

  if (positionals.length !== 2) {
    throw new UsageError(`expected 2 arguments <Y> <X>, got ${positionals.length}`);
  }

  const strategy = values.strategy ?? "elimination";
  if (!isStrategy(strategy)) {
    throw new UsageError(`unknown strategy "${strategy}"`);
  }

  const height = parseCount("Y", positionals[0], MAX_DIMENSION);
  const width = parseCount("X", positionals[1], MAX_DIMENSION);
  const cells = height * width;
  const dense = strategy !== "parity" || !hasInvertibleToggleMatrix(height, width);
  if (dense && cells > MAX_DENSE_CELLS) {
    throw new UsageError(
      `Y*X must be at most ${MAX_DENSE_CELLS} unless the parity strategy runs on even dimensions, got ${cells}`
    );
  }

  return {
    height,
    width,
    strategy,
    seed: values.seed === undefined ? null : parseCount("seed", values.seed),
    strict: values.strict ?? false,
    verbose: values.verbose ?? false,
  };
}
