/**
 * Attribute/Context Resolver
 * Runs the pattern rule set once per text and hands out the matches by
 * category and attachment point.
 */

import { MatchBudget } from '../language/budget.js';
import { PatternRuleSet, RuleMatch } from '../language/rules.js';
import { RuleAttachment } from '../language/schemas.js';
import { ResolvedToken, attr } from '../tokens/grammar.js';
import { RuleMatchIndex } from './types.js';

/** Categories that only describe configuration prompts */
export const CONFIGURATION_RULE_CATEGORIES: readonly string[] = ['priority', 'rules'];

export function collectRuleMatches(text: string, rules: PatternRuleSet, budget: MatchBudget): RuleMatchIndex {
  const index = new Map<string, readonly RuleMatch[]>();
  for (const category of rules.categories()) {
    const matches = rules.apply(category, text, budget);
    if (matches.length > 0) {
      index.set(category, matches);
    }
  }
  return index;
}

export function matchesFor(index: RuleMatchIndex, category: string): readonly RuleMatch[] {
  return index.get(category) ?? [];
}

export function firstMatch(index: RuleMatchIndex, category: string): RuleMatch | undefined {
  return matchesFor(index, category)[0];
}

export function matchesAttachedTo(index: RuleMatchIndex, attach: RuleAttachment): RuleMatch[] {
  return [...index.values()].flat().filter(m => m.attach === attach);
}

/** Matches whose rule implies an action, e.g. "descending" implies RANK */
export function impliedIntentMatches(index: RuleMatchIndex): RuleMatch[] {
  return [...index.values()].flat().filter(m => m.impliesIntent !== undefined);
}

/**
 * One CTX token per key, sorted by key. Distinct values of the same key
 * are joined with `+`.
 */
export function contextTokens(
  index: RuleMatchIndex,
  exclude: readonly string[] = CONFIGURATION_RULE_CATEGORIES
): ResolvedToken[] {
  const byKey = new Map<string, string[]>();
  for (const [category, matches] of index) {
    if (exclude.includes(category)) continue;
    for (const match of matches) {
      if (match.attach !== 'CTX') continue;
      const values = byKey.get(match.key) ?? [];
      if (!values.includes(match.value)) values.push(match.value);
      byKey.set(match.key, values);
    }
  }

  return [...byKey.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, values]) => ({
      category: 'CTX' as const,
      values: [],
      attributes: [attr(key, values.join('+'))],
    }));
}
