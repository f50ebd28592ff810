import { IDeductionRule } from "./interfaces/IDeductionRule";
import {
  EliminateFound,
  UniqueCell,
  NakedTuple,
  HiddenTuple,
  LockedCandidates,
  XWing,
  Swordfish,
} from "./rules";

/**
 * In-memory registry of deduction rules, listed cheapest first. Rules of
 * equal cost keep their registration order.
 */
export class RuleRegistry {
  private rules = new Map<string, IDeductionRule>();

  register(rule: IDeductionRule): void {
    this.rules.set(rule.ruleId, rule);
  }

  unregister(ruleId: string): boolean {
    return this.rules.delete(ruleId);
  }

  get(ruleId: string): IDeductionRule | undefined {
    return this.rules.get(ruleId);
  }

  list(): IDeductionRule[] {
    // Array.prototype.sort is stable, so equal costs stay in insertion order
    return Array.from(this.rules.values()).sort((a, b) => a.cost - b.cost);
  }

  has(ruleId: string): boolean {
    return this.rules.has(ruleId);
  }
}

export const DEFAULT_RULES: readonly IDeductionRule[] = [
  EliminateFound,
  UniqueCell,
  NakedTuple,
  HiddenTuple,
  LockedCandidates,
  XWing,
  Swordfish,
];

/** A registry holding the seven built-in rules. */
export function createDefaultRuleRegistry(): RuleRegistry {
  const registry = new RuleRegistry();
  for (const rule of DEFAULT_RULES) registry.register(rule);
  return registry;
}
