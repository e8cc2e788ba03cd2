/**
 * Pattern Match Budget
 *
 * Every encode() call gets one budget. All data-driven regex scans go
 * through it so a pathological input costs a bounded number of regex
 * iterations and a bounded scan length. The time budget only counts time
 * spent inside scans; analysis and token assembly between scans are free.
 * Running out never throws: the scan returns what it has and the result
 * is marked degraded.
 */

import { InvalidPatternError } from '../errors.js';

export interface MatchLimits {
  patternStepBudget: number;
  patternTimeBudgetMs: number;
  maxPatternInputLength: number;
}

export type BudgetExhaustion = 'STEP_BUDGET' | 'TIME_BUDGET';

export class MatchBudget {
  private steps = 0;
  private spentMs = 0;
  private scanStartedAt = 0;
  private exhaustion: BudgetExhaustion | null = null;
  private truncated = false;

  constructor(
    private readonly limits: MatchLimits,
    private readonly clock: () => number = Date.now
  ) {}

  get exhausted(): boolean {
    return this.exhaustion !== null;
  }

  get degraded(): boolean {
    return this.exhaustion !== null || this.truncated;
  }

  get stepsUsed(): number {
    return this.steps;
  }

  /** Milliseconds charged so far, counting finished scans only */
  get timeUsedMs(): number {
    return this.spentMs;
  }

  /**
   * All matches of `regex` in `text`. The regex is recompiled with the
   * global flag so callers can share compiled patterns freely.
   */
  matchAll(regex: RegExp, text: string): RegExpExecArray[] {
    const matches: RegExpExecArray[] = [];
    if (this.exhausted) return matches;

    const scanned = this.clip(text);
    const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
    const scanner = new RegExp(regex.source, flags);

    this.scanStartedAt = this.clock();
    let match: RegExpExecArray | null;
    while (this.tick() && (match = scanner.exec(scanned)) !== null) {
      matches.push(match);
      if (match[0].length === 0) {
        scanner.lastIndex++;
      }
    }
    this.spentMs += this.clock() - this.scanStartedAt;
    return matches;
  }

  first(regex: RegExp, text: string): RegExpExecArray | null {
    if (this.exhausted) return null;
    this.scanStartedAt = this.clock();
    const match = this.tick() ? new RegExp(regex.source, regex.flags.replace('g', '')).exec(this.clip(text)) : null;
    this.spentMs += this.clock() - this.scanStartedAt;
    return match;
  }

  test(regex: RegExp, text: string): boolean {
    return this.first(regex, text) !== null;
  }

  warnings(): string[] {
    const warnings: string[] = [];
    if (this.truncated) {
      warnings.push(`Pattern matching limited to the first ${this.limits.maxPatternInputLength} characters`);
    }
    if (this.exhaustion === 'STEP_BUDGET') {
      warnings.push(`Pattern step budget of ${this.limits.patternStepBudget} exhausted; result is partial`);
    }
    if (this.exhaustion === 'TIME_BUDGET') {
      warnings.push(`Pattern time budget of ${this.limits.patternTimeBudgetMs}ms exhausted; result is partial`);
    }
    return warnings;
  }

  private clip(text: string): string {
    if (text.length <= this.limits.maxPatternInputLength) return text;
    this.truncated = true;
    return text.slice(0, this.limits.maxPatternInputLength);
  }

  private tick(): boolean {
    if (this.exhaustion) return false;
    if (this.steps >= this.limits.patternStepBudget) {
      this.exhaustion = 'STEP_BUDGET';
      return false;
    }
    if (this.spentMs + this.clock() - this.scanStartedAt > this.limits.patternTimeBudgetMs) {
      this.exhaustion = 'TIME_BUDGET';
      return false;
    }
    this.steps++;
    return true;
  }
}

// ==================== Pattern Safety ====================

/**
 * Find a group that contains an unbounded quantifier and is itself repeated
 * without bound, e.g. `(a+)+` or `(?:\w*\s)*`.
 */
export function findNestedQuantifier(source: string): string | null {
  const openings: Array<{ start: number; hasQuantifier: boolean }> = [];
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }
    if (ch === '[') {
      inClass = true;
    } else if (ch === '(') {
      openings.push({ start: i, hasQuantifier: false });
    } else if (ch === '+' || ch === '*' || (ch === '{' && /^\{\d+,\}/.test(source.slice(i)))) {
      const current = openings[openings.length - 1];
      if (current) current.hasQuantifier = true;
    } else if (ch === ')') {
      const group = openings.pop();
      if (!group) continue;
      const rest = source.slice(i + 1);
      const repeated = /^(?:[+*]|\{\d+,\})/.test(rest);
      if (group.hasQuantifier && repeated) {
        return source.slice(group.start, i + 1 + (rest.match(/^(?:[+*]|\{\d+,\})/)?.[0].length ?? 0));
      }
      const parent = openings[openings.length - 1];
      if (parent && (group.hasQuantifier || repeated)) {
        parent.hasQuantifier = true;
      }
    }
  }
  return null;
}

/**
 * Compile a data-driven pattern, rejecting malformed or backtracking-prone sources
 */
export function compileSafePattern(ruleId: string, source: string, flags: string): RegExp {
  const nested = findNestedQuantifier(source);
  if (nested) {
    throw new InvalidPatternError(ruleId, `nested unbounded quantifier ${nested}`);
  }
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new InvalidPatternError(ruleId, error instanceof Error ? error.message : String(error));
  }
}
