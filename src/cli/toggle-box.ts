/**
 * toggle-box entry point
 *
 * Run with: npx tsx src/cli/toggle-box.ts <Y> <X> [--seed <n>]
 */

import { runCli } from "./run";

process.exitCode = runCli(process.argv.slice(2));
