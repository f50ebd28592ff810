import { DIGITS, digitBit, isSingle } from "@nineset/core";
import { IDeductionRule } from "../interfaces/IDeductionRule";

/**
 * Hidden single: when only one cell of a group still admits a digit, that
 * cell holds it.
 */
export const UniqueCell: IDeductionRule = {
  ruleId: "uniqueCell",
  name: "Unique cell",
  cost: 1,

  apply(state, views) {
    let removed = 0;
    for (const group of views.groups) {
      for (const digit of DIGITS) {
        const bit = digitBit(digit);
        const holders = group.cells.filter((cell) => (state.get(cell) & bit) !== 0);
        if (holders.length === 1 && !isSingle(state.get(holders[0]))) {
          removed += state.restrict(holders[0], bit);
        }
      }
    }
    return removed;
  },
};
