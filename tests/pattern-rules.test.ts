/**
 * Tests for pattern rule sets
 */

import { MatchBudget } from '../src/language/budget.js';
import { PatternRuleSet } from '../src/language/rules.js';
import { loadLanguagePack } from '../src/language/registry.js';
import { PatternRuleData } from '../src/language/schemas.js';
import { InvalidPatternError } from '../src/errors.js';

const LIMITS = { patternStepBudget: 5000, patternTimeBudgetMs: 1000, maxPatternInputLength: 50000 };

function rule(overrides: Partial<PatternRuleData>): PatternRuleData {
  return {
    id: 'sla-hours',
    category: 'sla',
    pattern: '\\bsla\\s+of\\s+(\\d+)\\s+hours\\b',
    flags: 'i',
    key: 'SLA',
    value: '$1h',
    transform: 'none',
    attach: 'CTX',
    ...overrides,
  };
}

describe('PatternRuleSet', () => {
  const rules = loadLanguagePack('en').rules;
  let budget: MatchBudget;

  beforeEach(() => {
    budget = new MatchBudget(LIMITS);
  });

  it('should capture a limit and attach it to the target', () => {
    const matches = rules.apply('limit', 'Show the top 5 results', budget);

    expect(matches).toEqual([{
      ruleId: 'top-n',
      category: 'limit',
      key: 'LIMIT',
      value: '5',
      attach: 'TARGET',
      impliesIntent: undefined,
      index: 9,
      text: 'top 5',
    }]);
  });

  it('should order matches by position in the text', () => {
    const matches = rules.apply('ordering', 'Sort by relevance, highest first', budget);

    expect(matches.map(m => [m.key, m.value])).toEqual([['SORT', 'RELEVANCE'], ['ORDER', 'DESC']]);
    expect(matches[1].impliesIntent).toBe('RANK');
  });

  it('should render capture groups into values', () => {
    expect(rules.first('duration', 'Keep the call under 30 minutes', budget)?.value).toBe('30m');
    expect(rules.first('tone', 'The tone should be warm', budget)?.value).toBe('WARM');
    expect(rules.first('shape', 'Return an array of Products', budget)?.value).toBe('products');
  });

  it.each([
    'When the two conflict, custom rules take priority.',
    'Custom rules take precedence over basic rules.',
    'Custom instructions override the basic rules.',
    'Always prioritize custom rules over basic rules.',
    'Following the custom rules is paramount.',
  ])('should read custom-over-basic priority from "%s"', sentence => {
    expect(rules.first('priority', sentence, budget)?.value).toBe('CUSTOM_OVER_BASIC');
  });

  it('should read basic-over-custom priority', () => {
    expect(rules.first('priority', 'Basic rules take precedence over custom rules.', budget)?.value)
      .toBe('BASIC_OVER_CUSTOM');
  });

  it('should not read a rule priority as an ordering', () => {
    expect(rules.first('ordering', 'Always prioritize custom rules over basic rules.', budget)).toBeUndefined();
    expect(rules.first('ordering', 'Prioritize the billing tickets.', budget)?.value).toBe('BILLING');
  });

  it('should return nothing for an unknown category', () => {
    expect(rules.apply('no-such-category', 'top 5', budget)).toEqual([]);
  });

  it('should report the categories it covers', () => {
    expect(rules.has('format')).toBe(true);
    expect(rules.has('sla')).toBe(false);
    expect(rules.coverage).toBe('full');
  });

  it('should mark the Spanish rules as partial', () => {
    const spanish = loadLanguagePack('es').rules;
    expect(spanish.coverage).toBe('partial');
    expect(spanish.has('comparison')).toBe(false);
  });

  describe('compile', () => {
    it('should reject backtracking-prone patterns', () => {
      expect(() => PatternRuleSet.compile('en', 'full', [rule({ pattern: '(\\d+)+h' })])).toThrow(InvalidPatternError);
    });

    it('should skip matches whose value renders empty', () => {
      const set = PatternRuleSet.compile('en', 'full', [rule({ pattern: '\\bsla\\b', value: '$2' })]);
      expect(set.apply('sla', 'an sla applies', budget)).toEqual([]);
    });
  });

  describe('extend', () => {
    it('should append rules without touching the base set', () => {
      const extended = rules.extend([rule({})]);

      expect(extended.first('sla', 'We promise an SLA of 4 hours', budget)?.value).toBe('4h');
      expect(rules.has('sla')).toBe(false);
      expect(extended.rules).toHaveLength(rules.rules.length + 1);
    });

    it('should return the same set when nothing is added', () => {
      expect(rules.extend([])).toBe(rules);
    });
  });
});
