export * from "./types/puzzle";
export * from "./libs/Candidates";
export * from "./libs/Encoding";

// Validation
export {
  MalformedInputError,
  validatePuzzle,
  findConflicts,
  isSolvedGrid,
} from "./validation";
export type { Conflict } from "./validation";

// Rendering
export {
  renderGrid,
  renderSimpleGrid,
  renderCandidates,
  renderCounts,
} from "./libs/formatGrid";
