import { DIGITS, digitBit } from "@nineset/core";
import { GameState } from "../grid/GameState";
import { Group } from "../grid/views";
import { IDeductionRule } from "../interfaces/IDeductionRule";

/**
 * Positions within a line whose cell still admits `bit`. A cell already
 * fixed to the digit counts too, so a line whose copy is placed never passes
 * for a fish over its remaining open spots.
 */
function positionsOf(state: GameState, line: Group, bit: number): number[] {
  const positions: number[] = [];
  line.cells.forEach((cell, i) => {
    if ((state.get(cell) & bit) !== 0) positions.push(i);
  });
  return positions;
}

function swordfishTrio(state: GameState, trio: Group[], perps: readonly Group[]): number {
  let removed = 0;
  for (const digit of DIGITS) {
    const bit = digitBit(digit);
    const positions = trio.map((line) => positionsOf(state, line, bit));
    if (positions.some((p) => p.length < 2)) continue;

    const cover = [...new Set(positions.flat())].sort((a, b) => a - b);
    if (cover.length !== 3) continue;

    // Cells are compared by index, not by candidate set
    const keep = new Set<number>();
    for (const line of trio) {
      for (const pos of cover) keep.add(line.cells[pos]);
    }
    for (const pos of cover) {
      for (const cell of perps[pos].cells) {
        if (!keep.has(cell)) removed += state.eliminate(cell, bit);
      }
    }
  }
  return removed;
}

/**
 * Swordfish, the three-line X-Wing: when a digit's spots in three rows
 * each number at least two and all fall in the same three columns, those
 * columns lose the digit outside the three rows. Likewise with rows and
 * columns swapped.
 */
export const Swordfish: IDeductionRule = {
  ruleId: "swordfish",
  name: "Swordfish",
  cost: 6,

  apply(state, views) {
    let removed = 0;
    for (const [lines, perps] of [
      [views.rows, views.columns],
      [views.columns, views.rows],
    ]) {
      for (let i1 = 0; i1 < lines.length - 2; i1++) {
        for (let i2 = i1 + 1; i2 < lines.length - 1; i2++) {
          for (let i3 = i2 + 1; i3 < lines.length; i3++) {
            removed += swordfishTrio(state, [lines[i1], lines[i2], lines[i3]], perps);
          }
        }
      }
    }
    return removed;
  },
};
