import { isSingle } from "@nineset/core";
import { IDeductionRule } from "../interfaces/IDeductionRule";

/**
 * A digit fixed in one cell of a group cannot appear anywhere else in that
 * group.
 */
export const EliminateFound: IDeductionRule = {
  ruleId: "eliminateFound",
  name: "Eliminate found digits",
  cost: 1,

  apply(state, views) {
    let removed = 0;
    for (const group of views.groups) {
      for (const cell of group.cells) {
        const mask = state.get(cell);
        if (!isSingle(mask)) continue;
        for (const other of group.cells) {
          if (other !== cell) removed += state.eliminate(other, mask);
        }
      }
    }
    return removed;
  },
};
