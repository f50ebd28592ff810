import { DIGITS, digitBit } from "@nineset/core";
import { GameState } from "../grid/GameState";
import { Group } from "../grid/views";
import { IDeductionRule } from "../interfaces/IDeductionRule";

/** Positions (0-8) within a line whose cell still admits `bit` */
function positionsOf(state: GameState, line: Group, bit: number): number[] {
  const positions: number[] = [];
  line.cells.forEach((cell, i) => {
    if ((state.get(cell) & bit) !== 0) positions.push(i);
  });
  return positions;
}

function xWingPair(state: GameState, line1: Group, line2: Group, perps: readonly Group[]): number {
  let removed = 0;
  for (const digit of DIGITS) {
    const bit = digitBit(digit);
    const p1 = positionsOf(state, line1, bit);
    if (p1.length !== 2) continue;
    const p2 = positionsOf(state, line2, bit);
    if (p2.length !== 2 || p1[0] !== p2[0] || p1[1] !== p2[1]) continue;

    const keep = new Set<number>([
      line1.cells[p1[0]],
      line1.cells[p1[1]],
      line2.cells[p1[0]],
      line2.cells[p1[1]],
    ]);
    for (const pos of p1) {
      for (const cell of perps[pos].cells) {
        if (!keep.has(cell)) removed += state.eliminate(cell, bit);
      }
    }
  }
  return removed;
}

/**
 * X-Wing: when a digit's only spots in two rows are the same two columns,
 * those columns lose the digit everywhere outside the two rows. Likewise
 * with rows and columns swapped.
 */
export const XWing: IDeductionRule = {
  ruleId: "xWing",
  name: "X-Wing",
  cost: 5,

  apply(state, views) {
    let removed = 0;
    for (const [lines, perps] of [
      [views.rows, views.columns],
      [views.columns, views.rows],
    ]) {
      for (let i1 = 0; i1 < lines.length - 1; i1++) {
        for (let i2 = i1 + 1; i2 < lines.length; i2++) {
          removed += xWingPair(state, lines[i1], lines[i2], perps);
        }
      }
    }
    return removed;
  },
};
