export { GameState } from "./grid/GameState";
export type { ReadonlyGameState } from "./grid/GameState";
export { GRID_VIEWS, cellIndex, boxIndex } from "./grid/views";
export type { Group, GroupKind, Triplet, GridViews } from "./grid/views";

export type { IDeductionRule } from "./interfaces/IDeductionRule";
export type { ISolverObserver, PropagationStatus } from "./interfaces/ISolverObserver";

export * from "./rules";
export { RuleRegistry, DEFAULT_RULES, createDefaultRuleRegistry } from "./RuleRegistry";
export { Propagator, classify } from "./Propagator";
export type { PropagatorOptions, PropagationReport } from "./Propagator";
export {
  SearchController,
  SEARCH_ORDERS,
  DEFAULT_SOLUTION_LIMIT,
  MIN_SOLUTION_LIMIT,
} from "./SearchController";
export type { SearchOrder, SearchControllerOptions, SearchOutcome } from "./SearchController";
export { solve } from "./solve";
export type { SolveOptions } from "./solve";
