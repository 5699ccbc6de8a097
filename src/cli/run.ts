/**
 * toggle-box command: shuffle a Y×X box, open it, print one line.
 *
 * Exit status: 0 opened, 1 still locked, 2 bad arguments, 3 internal error.
 */

import { createSecureBox, createSeededRandom, openBox } from "../problem";
import type { SolveStats } from "../problem";
import { parseCliArgs, UsageError, USAGE } from "./args";
import type { CliOptions } from "./args";

export const EXIT_OPENED = 0;
export const EXIT_LOCKED = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERNAL = 3;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function formatStats(stats: SolveStats): string {
  const rank = stats.rank === null ? "n/a" : String(stats.rank);
  return `stats: strategy=${stats.strategy} size=${stats.size} rank=${rank} toggles=${stats.toggles}`;
}

function formatErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function openFromOptions(options: CliOptions, io: CliIO): boolean {
  const random = options.seed === null ? Math.random : createSeededRandom(options.seed);
  const box = createSecureBox(options.height, options.width, { random });

  const result = openBox(box, {
    strategy: options.strategy,
    requireFullRank: options.strict,
    onStats: options.verbose ? (stats) => io.err(formatStats(stats)) : undefined,
  });

  if (options.verbose) {
    io.err(`toggles applied: ${result.togglesApplied}`);
  }
  return result.locked;
}

export function runCli(argv: string[], io: CliIO = consoleIO): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`error: ${error.message}`);
    io.err(USAGE);
    return EXIT_USAGE;
  }

  let locked: boolean;
  try {
    locked = openFromOptions(options, io);
  } catch (error) {
    // Never reported as a locked box
    io.err(`error: ${formatErrorMessage(error)}`);
    return EXIT_INTERNAL;
  }

  io.out(locked ? "BOX: LOCKED!" : "BOX: OPENED!");
  return locked ? EXIT_LOCKED : EXIT_OPENED;
}
