/**
 * Replays a toggle vector against a box, in index order.
 * Order does not matter: toggles commute.
 */

import type { ToggleBox } from "./box-types";
import { cellOf } from "./dimensions";

/**
 * @returns the number of toggles applied
 */
export function applySolution(
  box: ToggleBox,
  solution: readonly boolean[],
  width: number
): number {
  let applied = 0;
  solution.forEach((apply, index) => {
    if (!apply) return;
    const { row, col } = cellOf(index, width);
    box.toggle(row, col);
    applied++;
  });
  return applied;
}
