/**
 * Pattern Rule Set
 *
 * Language-specific regex rules that turn textual patterns into attribute
 * key/value pairs. Rules are data: adding a synonym such as "descending"
 * for RANK is a new rule entry, never new code.
 */

import { MatchBudget, compileSafePattern } from './budget.js';
import { PatternRuleData, RuleAttachment } from './schemas.js';

export interface CompiledRule extends PatternRuleData {
  regex: RegExp;
}

export interface RuleMatch {
  ruleId: string;
  category: string;
  key: string;
  value: string;
  attach: RuleAttachment;
  impliesIntent?: string;
  index: number;
  text: string;
}

export type RuleCoverage = 'full' | 'partial';

function renderValue(rule: CompiledRule, match: RegExpExecArray): string {
  const raw = rule.value.replace(/\$(\d)/g, (_whole: string, group: string) => match[Number(group)] ?? '').trim();
  switch (rule.transform) {
    case 'upper':
      return raw.replace(/\s+/g, '_').toUpperCase();
    case 'lower':
      return raw.toLowerCase();
    case 'none':
      return raw;
  }
}

export class PatternRuleSet {
  private readonly byCategory = new Map<string, CompiledRule[]>();

  private constructor(
    readonly language: string,
    readonly coverage: RuleCoverage,
    readonly rules: readonly CompiledRule[]
  ) {
    for (const rule of rules) {
      const list = this.byCategory.get(rule.category) ?? [];
      list.push(rule);
      this.byCategory.set(rule.category, list);
    }
  }

  /**
   * Compile rule data. Throws InvalidPatternError for a malformed or
   * backtracking-prone pattern.
   */
  static compile(language: string, coverage: RuleCoverage, rules: readonly PatternRuleData[]): PatternRuleSet {
    const compiled = rules.map(rule => Object.freeze({
      ...rule,
      regex: compileSafePattern(rule.id, rule.pattern, rule.flags),
    }));
    return new PatternRuleSet(language, coverage, Object.freeze(compiled));
  }

  /** A new set with extra rules appended after the base ones */
  extend(extra: readonly PatternRuleData[]): PatternRuleSet {
    if (extra.length === 0) return this;
    const added = PatternRuleSet.compile(this.language, this.coverage, extra);
    return new PatternRuleSet(this.language, this.coverage, Object.freeze([...this.rules, ...added.rules]));
  }

  has(category: string): boolean {
    return this.byCategory.has(category);
  }

  categories(): string[] {
    return [...this.byCategory.keys()];
  }

  rulesFor(category: string): readonly CompiledRule[] {
    return this.byCategory.get(category) ?? [];
  }

  /**
   * Every match of every rule in a category, ordered by position in the text
   * and then by rule order
   */
  apply(category: string, text: string, budget: MatchBudget): RuleMatch[] {
    const matches: Array<RuleMatch & { order: number }> = [];
    this.rulesFor(category).forEach((rule, order) => {
      for (const match of budget.matchAll(rule.regex, text)) {
        const value = renderValue(rule, match);
        if (!value) continue;
        matches.push({
          ruleId: rule.id,
          category: rule.category,
          key: rule.key,
          value,
          attach: rule.attach,
          impliesIntent: rule.impliesIntent,
          index: match.index,
          text: match[0],
          order,
        });
      }
    });
    matches.sort((a, b) => a.index - b.index || a.order - b.order);
    return matches.map(({ order: _order, ...match }) => match);
  }

  /** First match of a category by position, if any */
  first(category: string, text: string, budget: MatchBudget): RuleMatch | undefined {
    return this.apply(category, text, budget)[0];
  }
}
