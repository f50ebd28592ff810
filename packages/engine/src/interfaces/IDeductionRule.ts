import { GameState } from "../grid/GameState";
import { GridViews } from "../grid/views";

/**
 * A deduction rule. Rules are stateless: they read the candidate sets
 * through the shared views, remove what they can prove impossible and
 * report how many candidates they removed.
 *
 * A rule must never add a candidate, and must return 0 without touching the
 * state when it has nothing to remove.
 */
export interface IDeductionRule {
  /** Unique identifier (e.g. "nakedTuple") */
  readonly ruleId: string;

  /** Human-readable name */
  readonly name: string;

  /**
   * Relative cost. Rules run cheapest first; within a pass, a rule is
   * skipped once a strictly cheaper rule has made progress.
   */
  readonly cost: number;

  /** Apply the rule once over the whole grid. Returns candidates removed. */
  apply(state: GameState, views: GridViews): number;
}
