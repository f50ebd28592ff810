import { GameState } from "./grid/GameState";
import { GRID_VIEWS, GridViews } from "./grid/views";
import { ISolverObserver, PropagationStatus } from "./interfaces/ISolverObserver";
import { RuleRegistry, createDefaultRuleRegistry } from "./RuleRegistry";

export interface PropagatorOptions {
  registry?: RuleRegistry;
  /**
   * Skip a rule for the rest of a pass once a strictly cheaper rule in that
   * pass removed a candidate. Defaults to true.
   */
  shortCircuit?: boolean;
  observer?: ISolverObserver;
  views?: GridViews;
}

export interface PropagationReport {
  status: PropagationStatus;
  /** Rule passes run, including the final pass that removed nothing */
  passes: number;
  /** Candidates removed in total */
  removed: number;
}

/** Classify a state by its candidate sets. */
export function classify(state: GameState): PropagationStatus {
  if (state.hasContradiction()) return "contradiction";
  if (state.isSolved()) return "solved";
  return "in-progress";
}

/**
 * Runs deduction rules over a single game state until none of them can
 * remove a candidate, then classifies the result.
 *
 * Every pass that continues the loop removes at least one candidate, and the
 * total cannot drop below zero, so propagation always terminates.
 */
export class Propagator {
  private readonly registry: RuleRegistry;
  private readonly shortCircuit: boolean;
  private readonly observer?: ISolverObserver;
  private readonly views: GridViews;

  constructor(opts: PropagatorOptions = {}) {
    this.registry = opts.registry ?? createDefaultRuleRegistry();
    this.shortCircuit = opts.shortCircuit ?? true;
    this.observer = opts.observer;
    this.views = opts.views ?? GRID_VIEWS;
  }

  propagate(state: GameState): PropagationReport {
    const rules = this.registry.list();
    let passes = 0;
    let total = 0;

    for (;;) {
      passes++;
      this.observer?.onPassStart?.(passes, state);

      let removed = 0;
      let progressCost: number | undefined;

      for (const rule of rules) {
        if (this.shortCircuit && progressCost !== undefined && rule.cost > progressCost) break;

        const n = rule.apply(state, this.views);
        this.observer?.onRuleApplied?.(rule, n, state);

        if (n > 0) {
          removed += n;
          progressCost ??= rule.cost;
        }
        if (n > 0 && state.hasContradiction()) break;
      }

      total += removed;
      this.observer?.onPassEnd?.(passes, removed, state);

      if (removed === 0 || state.hasContradiction()) break;
    }

    return { status: classify(state), passes, removed: total };
  }
}
