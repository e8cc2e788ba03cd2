/**
 * Tests for the pattern match budget and pattern safety checks
 */

import { MatchBudget, compileSafePattern, findNestedQuantifier } from '../src/language/budget.js';
import { InvalidPatternError } from '../src/errors.js';

const LIMITS = { patternStepBudget: 100, patternTimeBudgetMs: 1000, maxPatternInputLength: 1000 };

describe('MatchBudget', () => {
  it('should return every match of a non-global regex', () => {
    const budget = new MatchBudget(LIMITS);
    const matches = budget.matchAll(/\d+/, 'a 1 b 22 c 333');
    expect(matches.map(m => m[0])).toEqual(['1', '22', '333']);
    expect(budget.degraded).toBe(false);
  });

  it('should count one step per iteration', () => {
    const budget = new MatchBudget(LIMITS);
    budget.matchAll(/\d/, '1 2 3');
    // three matches plus the failing final exec
    expect(budget.stepsUsed).toBe(4);
  });

  it('should stop and mark the result degraded when steps run out', () => {
    const budget = new MatchBudget({ ...LIMITS, patternStepBudget: 3 });
    const matches = budget.matchAll(/\d/, '1 2 3 4 5');

    expect(matches).toHaveLength(3);
    expect(budget.exhausted).toBe(true);
    expect(budget.degraded).toBe(true);
    expect(budget.warnings()).toEqual(['Pattern step budget of 3 exhausted; result is partial']);
    expect(budget.test(/1/, '1')).toBe(false);
  });

  it('should stop when scans use up the time budget', () => {
    let now = 0;
    const budget = new MatchBudget({ ...LIMITS, patternTimeBudgetMs: 10 }, () => (now += 4));

    expect(budget.test(/a/, 'a')).toBe(true);
    expect(budget.timeUsedMs).toBe(8);
    expect(budget.test(/a/, 'a')).toBe(false);
    expect(budget.warnings()).toEqual(['Pattern time budget of 10ms exhausted; result is partial']);
  });

  it('should not charge time spent between scans', () => {
    let now = 0;
    const budget = new MatchBudget({ ...LIMITS, patternTimeBudgetMs: 10 }, () => now);

    expect(budget.test(/a/, 'a')).toBe(true);
    now = 5000;
    expect(budget.matchAll(/a/, 'aa')).toHaveLength(2);
    expect(budget.timeUsedMs).toBe(0);
    expect(budget.degraded).toBe(false);
  });

  it('should clip long input and report it', () => {
    const budget = new MatchBudget({ ...LIMITS, maxPatternInputLength: 5 });

    expect(budget.test(/z/, 'aaaaaz')).toBe(false);
    expect(budget.degraded).toBe(true);
    expect(budget.exhausted).toBe(false);
    expect(budget.warnings()).toEqual(['Pattern matching limited to the first 5 characters']);
  });

  it('should not loop on empty matches', () => {
    const budget = new MatchBudget(LIMITS);
    const matches = budget.matchAll(/x*/, 'ab');
    expect(matches.map(m => m[0])).toEqual(['', '', '']);
  });

  it('should return the first match with its index', () => {
    const budget = new MatchBudget(LIMITS);
    const match = budget.first(/b+/g, 'abbc');
    expect(match?.[0]).toBe('bb');
    expect(match?.index).toBe(1);
  });
});

describe('Pattern safety', () => {
  it('should find nested unbounded quantifiers', () => {
    expect(findNestedQuantifier('(a+)+')).toBe('(a+)+');
    expect(findNestedQuantifier('(?:\\w*\\s)*x')).toBe('(?:\\w*\\s)*');
    expect(findNestedQuantifier('(a{2,})+')).toBe('(a{2,})+');
  });

  it('should accept ordinary patterns', () => {
    expect(findNestedQuantifier('\\btop\\s+(\\d{1,4})\\b')).toBeNull();
    expect(findNestedQuantifier('(?:a|b)+')).toBeNull();
    expect(findNestedQuantifier('[(+)]+')).toBeNull();
  });

  it('should compile safe patterns', () => {
    const regex = compileSafePattern('ok', '\\bjson\\b', 'i');
    expect(regex.test('Return JSON')).toBe(true);
  });

  it('should reject nested quantifiers', () => {
    expect(() => compileSafePattern('bad', '(\\w+)*$', 'i')).toThrow(InvalidPatternError);
  });

  it('should reject malformed patterns', () => {
    expect(() => compileSafePattern('broken', '(unclosed', 'i')).toThrow(InvalidPatternError);
  });
});
