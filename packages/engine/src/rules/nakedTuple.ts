import { isSubsetOf, popcount } from "@nineset/core";
import { IDeductionRule } from "../interfaces/IDeductionRule";

/**
 * Naked pairs, triples and larger: if k cells of a group (the pivot among
 * them) only hold digits from the pivot's k-digit set, those digits are
 * locked into them and leave every other cell of the group.
 *
 * A cell counts toward k when its set is a subset of the pivot's.
 */
export const NakedTuple: IDeductionRule = {
  ruleId: "nakedTuple",
  name: "Naked tuple",
  cost: 2,

  apply(state, views) {
    let removed = 0;
    for (const group of views.groups) {
      for (const pivot of group.cells) {
        const tuple = state.get(pivot);
        const size = popcount(tuple);
        if (size < 2) continue;

        const inside = group.cells.filter((cell) => isSubsetOf(state.get(cell), tuple));
        if (inside.length !== size) continue;

        for (const cell of group.cells) {
          if (!inside.includes(cell)) removed += state.eliminate(cell, tuple);
        }
      }
    }
    return removed;
  },
};
