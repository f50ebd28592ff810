import { isSubsetOf, popcount } from "@nineset/core";
import { IDeductionRule } from "../interfaces/IDeductionRule";

/**
 * Hidden tuples, the dual of naked tuples. Take a pivot cell's k digits: if
 * exactly k cells of the group contain all of them and no other cell
 * contains any of them, those k cells are confined to the pivot's digits.
 */
export const HiddenTuple: IDeductionRule = {
  ruleId: "hiddenTuple",
  name: "Hidden tuple",
  cost: 3,

  apply(state, views) {
    let removed = 0;
    for (const group of views.groups) {
      for (const pivot of group.cells) {
        const tuple = state.get(pivot);
        const size = popcount(tuple);
        if (size < 2) continue;

        const supersets: number[] = [];
        let partial = false;
        for (const cell of group.cells) {
          const mask = state.get(cell);
          if (isSubsetOf(tuple, mask)) supersets.push(cell);
          else if ((mask & tuple) !== 0) partial = true;
        }
        if (partial || supersets.length !== size) continue;

        for (const cell of supersets) {
          removed += state.restrict(cell, tuple);
        }
      }
    }
    return removed;
  },
};
