export { EliminateFound } from "./eliminateFound";
export { UniqueCell } from "./uniqueCell";
export { NakedTuple } from "./nakedTuple";
export { HiddenTuple } from "./hiddenTuple";
export { LockedCandidates } from "./lockedCandidates";
export { XWing } from "./xWing";
export { Swordfish } from "./swordfish";
