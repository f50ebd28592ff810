import { DIGITS, digitBit, isSingle } from "@nineset/core";
import { GameState } from "../grid/GameState";
import { IDeductionRule } from "../interfaces/IDeductionRule";

function unionOf(state: GameState, cells: readonly number[]): number {
  let mask = 0;
  for (const cell of cells) mask |= state.get(cell);
  return mask;
}

/**
 * Pointing and claiming. For a digit still open in a triplet: if the rest
 * of its box lacks the digit, the box's copy lies in the triplet, so the rest
 * of the line loses it; if the rest of the line lacks it, the rest of the box
 * loses it.
 */
export const LockedCandidates: IDeductionRule = {
  ruleId: "lockedCandidates",
  name: "Locked candidates",
  cost: 4,

  apply(state, views) {
    let removed = 0;
    for (const triplet of views.triplets) {
      const open = triplet.cells.filter((cell) => !isSingle(state.get(cell)));
      const inTriplet = unionOf(state, open);
      const inLine = unionOf(state, triplet.lineSisters);
      const inSquare = unionOf(state, triplet.squareSisters);

      for (const digit of DIGITS) {
        const bit = digitBit(digit);
        if ((inTriplet & bit) === 0) continue;

        if ((inLine & bit) !== 0 && (inSquare & bit) === 0) {
          for (const cell of triplet.lineSisters) removed += state.eliminate(cell, bit);
        }
        if ((inSquare & bit) !== 0 && (inLine & bit) === 0) {
          for (const cell of triplet.squareSisters) removed += state.eliminate(cell, bit);
        }
      }
    }
    return removed;
  },
};
