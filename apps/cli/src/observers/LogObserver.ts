import bunyan from "bunyan";
import {
  GRID_SIZE,
  PuzzleGrid,
  formatPuzzleString,
  renderCandidates,
  renderCounts,
  renderSimpleGrid,
} from "@nineset/core";
import {
  IDeductionRule,
  ISolverObserver,
  PropagationStatus,
  ReadonlyGameState,
} from "@nineset/engine";
import { TraceLevel } from "../config/index.js";

/**
 * Writes solver events to a bunyan logger at debug level. What is logged
 * grows with the trace level:
 *
 * 1. each search state (with a one-character-per-cell grid), its outcome,
 *    branches, solutions and pass totals
 * 2. every rule call that removed a candidate
 * 3. the candidate grid after each pass
 * 4. every rule call, including those that removed nothing, and the
 *    candidate counts after each pass
 */
export class LogObserver implements ISolverObserver {
  private readonly log: bunyan;
  private readonly level: TraceLevel;

  constructor(log: bunyan, level: TraceLevel) {
    this.log = log.child({ component: "solver" });
    this.level = level;
  }

  onStateStart(depth: number, queued: number, state: ReadonlyGameState): void {
    if (this.level < 1) return;
    this.log.debug(
      {
        depth,
        queued,
        candidates: state.totalCandidates(),
        grid: renderSimpleGrid(state.cells),
      },
      "Exploring state",
    );
  }

  onStateResolved(status: PropagationStatus, state: ReadonlyGameState): void {
    if (this.level < 1) return;
    this.log.debug({ status, candidates: state.totalCandidates() }, "State resolved");
  }

  onBranch(
    cellIndex: number,
    digits: number[],
    queued: number,
    state: ReadonlyGameState,
  ): void {
    if (this.level < 1) return;
    this.log.debug(
      {
        row: Math.floor(cellIndex / GRID_SIZE),
        col: cellIndex % GRID_SIZE,
        digits,
        queued,
        grid: renderSimpleGrid(state.cells),
      },
      "Branching",
    );
  }

  onSolution(solution: PuzzleGrid, found: number): void {
    if (this.level < 1) return;
    this.log.debug({ found, solution: formatPuzzleString(solution) }, "Solution found");
  }

  onRuleApplied(rule: IDeductionRule, removed: number, state: ReadonlyGameState): void {
    if (this.level >= 4 || (this.level >= 2 && removed > 0)) {
      this.log.debug(
        { rule: rule.ruleId, removed, candidates: state.totalCandidates() },
        "Rule applied",
      );
    }
  }

  onPassEnd(pass: number, removed: number, state: ReadonlyGameState): void {
    if (this.level < 1) return;
    if (this.level >= 4) {
      this.log.debug(
        {
          pass,
          removed,
          grid: renderCandidates(state.cells),
          counts: renderCounts(state.cells),
        },
        "Pass complete",
      );
    } else if (this.level === 3) {
      this.log.debug(
        { pass, removed, grid: renderCandidates(state.cells) },
        "Pass complete",
      );
    } else {
      this.log.debug({ pass, removed }, "Pass complete");
    }
  }
}
