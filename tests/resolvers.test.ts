/**
 * Tests for the intent, target and output resolvers
 */

import { LexiconAnalyzer } from '../src/analysis/lexical.js';
import { Entity } from '../src/analysis/types.js';
import { MatchBudget } from '../src/language/budget.js';
import { buildLanguageResources } from '../src/language/registry.js';
import { collectRuleMatches, contextTokens } from '../src/resolvers/attributes.js';
import { orderChain, resolveIntents } from '../src/resolvers/intent.js';
import {
  findSchemaBlock,
  interpretScalar,
  parseSchema,
  renderSchema,
  resolveOutput,
  withItemAttribute,
} from '../src/resolvers/output.js';
import { resolveTargets } from '../src/resolvers/target.js';
import { PromptContext } from '../src/resolvers/types.js';
import { PromptOptions } from '../src/config/schema.js';
import { formatToken } from '../src/tokens/grammar.js';

const resources = buildLanguageResources('en');
const analyzer = new LexiconAnalyzer(resources.vocabulary);

const DEFAULT_OPTIONS: PromptOptions = {
  mode: 'auto',
  inferTypes: false,
  annotateEnums: true,
  minIntentConfidence: 0.8,
  minimize: true,
};

function context(text: string, options: Partial<PromptOptions> = {}): PromptContext {
  return {
    text,
    analysis: analyzer.analyze(text),
    vocabulary: resources.vocabulary,
    rules: resources.rules,
    budget: new MatchBudget({ patternStepBudget: 5000, patternTimeBudgetMs: 1000, maxPatternInputLength: 50000 }),
    options: { ...DEFAULT_OPTIONS, ...options },
  };
}

function resolveAll(text: string, ctx: PromptContext = context(text)) {
  const matches = collectRuleMatches(ctx.text, ctx.rules, ctx.budget);
  const intents = resolveIntents(ctx, matches);
  const output = resolveOutput(ctx, matches);
  return { intents, target: resolveTargets(ctx, intents, matches, output) };
}

describe('Intent Resolver', () => {
  it('should take a sentence-initial command verb', () => {
    const ctx = context('List the overdue invoices.');
    const result = resolveIntents(ctx, new Map());

    expect(result.intents).toEqual([{ intent: 'LIST', confidence: 1.0, strategy: 'imperative', position: 0 }]);
    expect(result.chain).toEqual(['LIST']);
    expect(result.verbWords.has('list')).toBe(true);
  });

  it('should ignore a verb after a determiner', () => {
    const ctx = context('Weed out duplicates from the list.');
    const result = resolveIntents(ctx, new Map());

    expect(result.intents).toEqual([{ intent: 'FILTER', confidence: 0.8, strategy: 'phrase', position: 0 }]);
  });

  it('should read a multi-word action phrase before its first word', () => {
    const ctx = context('Sum up the meeting notes in 3 bullet points for the team.');
    const result = resolveIntents(ctx, new Map());

    expect(result.intents).toEqual([{ intent: 'SUMMARIZE', confidence: 0.8, strategy: 'phrase', position: 0 }]);
    expect(result.chain).toEqual(['SUMMARIZE']);
  });

  it('should fall back to the question strategy when no verb matched', () => {
    const ctx = context('What is a refund?');
    const result = resolveIntents(ctx, new Map());

    expect(result.intents).toEqual([{ intent: 'EXPLAIN', confidence: 0.85, strategy: 'question', position: 0 }]);
  });

  it('should drop intents below the confidence threshold', () => {
    const ctx = context('What is a refund?', { minIntentConfidence: 0.9 });
    const result = resolveIntents(ctx, new Map());

    expect(result.intents).toEqual([]);
    expect(result.chain).toEqual([]);
  });

  it('should add intents implied by pattern rules', () => {
    const ctx = context('Show results, highest first.');
    const result = resolveIntents(ctx, collectRuleMatches(ctx.text, ctx.rules, ctx.budget));

    expect(result.intents).toEqual([
      { intent: 'EXPLAIN', confidence: 1.0, strategy: 'imperative', position: 0 },
      { intent: 'RANK', confidence: 0.8, strategy: 'rule', position: 2 },
    ]);
    expect(result.chain).toEqual(['EXPLAIN', 'RANK']);
  });

  describe('orderChain', () => {
    const pipelines = resources.vocabulary.pipelines;

    it('should put the longest complete pipeline first', () => {
      expect(orderChain(['RANK', 'MATCH', 'ANALYZE', 'EXPLAIN'], pipelines)).toEqual({
        chain: ['ANALYZE', 'MATCH', 'RANK', 'EXPLAIN'],
        pipeline: ['ANALYZE', 'MATCH', 'RANK'],
      });
    });

    it('should keep rank order without a pipeline', () => {
      expect(orderChain(['GENERATE', 'EXPLAIN'], pipelines)).toEqual({ chain: ['GENERATE', 'EXPLAIN'] });
    });
  });
});

describe('Target Resolver', () => {
  it('should skip nouns inside a role clause', () => {
    const { target } = resolveAll('You are an analyst who summarizes quarterly reports. Translate this email into French.');

    expect(target.targets).toEqual(['EMAIL']);
  });

  it('should skip names of people', () => {
    const text = 'Summarize the report for Case Morgan.';
    const ctx = context(text);
    const entities: Entity[] = [{ text: 'Case Morgan', type: 'PERSON' }];

    expect(resolveAll(text).target.targets).toEqual(['REPORT', 'TICKET']);
    expect(resolveAll(text, { ...ctx, analysis: { ...ctx.analysis, entities } }).target.targets).toEqual(['REPORT']);
  });

  it('should read extraction fields up to the source marker', () => {
    const { target } = resolveAll('Extract the name and email address from the support ticket.');

    expect(target.fields).toEqual(['NAME', 'EMAIL']);
    expect(target.targets).toEqual(['TICKET']);
    expect(target.extract).toBeUndefined();
    expect(target.token && formatToken(target.token)).toBe('[TARGET:TICKET]');
  });

  it('should detect a domain from two or more distinct cues', () => {
    const { target } = resolveAll('Summarize the support ticket about the billing error and the refund for the invoice.');

    expect(target.domain).toBe('FINANCE');
    expect(target.token && formatToken(target.token)).toBe('[TARGET:TICKET:DOMAIN=FINANCE]');
  });

  it('should build a catalog flow for matching intents', () => {
    const { target } = resolveAll('Match the transcript against the catalog.');

    expect(target.catalog).toBe('CATALOG');
    expect(target.token && formatToken(target.token)).toBe('[TARGET:TRANSCRIPT→CATALOG]');
  });

  it('should turn a generation object into items with a topic and limit', () => {
    const { intents, target } = resolveAll('Suggest five taglines for the launch.');

    expect(intents.chain).toEqual(['GENERATE']);
    expect(target.items).toEqual({ topic: 'TAGLINES', limit: '5' });
    expect(target.token && formatToken(target.token)).toBe('[TARGET:ITEMS:LIMIT=5:TOPIC=TAGLINES]');
  });
});

describe('Output Resolver', () => {
  function output(text: string, options: Partial<PromptOptions> = {}) {
    const ctx = context(text, options);
    return resolveOutput(ctx, collectRuleMatches(ctx.text, ctx.rules, ctx.budget));
  }

  it('should describe an array with empty-on-no-match behavior', () => {
    const result = output('Return a JSON array of ids, empty if none match.');

    expect(result.token && formatToken(result.token)).toBe('[OUT:JSON:ARRAY:EMPTY=[]]');
    expect(result.item).toBe('ID[]');
    expect(result.shape).toBe('ARRAY');
  });

  it('should name the element when no target carries it', () => {
    const result = withItemAttribute(output('Return a JSON array of ids, empty if none match.'));

    expect(result.token && formatToken(result.token)).toBe('[OUT:JSON:ARRAY:EMPTY=[]:OF=ID]');
  });

  it('should inline a response schema with enum and range annotations', () => {
    const result = output('Respond with {"summary": "string", "sentiment": "positive|negative", "score": "0-1"}');

    expect(result.token && formatToken(result.token)).toBe(
      '[OUT:JSON:{summary,sentiment,score}:ENUMS=sentiment(POSITIVE|NEGATIVE):RANGES=score(0-1)]'
    );
    expect(result.shape).toBe('SCHEMA');
  });

  it('should add field types when asked to', () => {
    const result = output('Respond with {"summary": "string", "sentiment": "positive|negative", "score": "0-1"}', {
      inferTypes: true,
      annotateEnums: false,
    });

    expect(result.token && formatToken(result.token)).toBe('[OUT:JSON:{summary:str,sentiment:str,score:num}]');
  });

  it('should list named keys when there is no schema', () => {
    const result = output('Return an object with the keys name, email and phone');

    expect(result.token && formatToken(result.token)).toBe('[OUT:KEYS=name+email+phone]');
  });

  it('should return nothing for text without output cues', () => {
    expect(output('Tell me about the weather')).toEqual({});
  });

  describe('schema reading', () => {
    it('should interpret scalar descriptions', () => {
      expect(interpretScalar('string')).toEqual({ kind: 'str' });
      expect(interpretScalar('0-1')).toEqual({ kind: 'num', range: '0-1' });
      expect(interpretScalar('positive | negative | neutral')).toEqual({
        kind: 'str',
        enumValues: ['POSITIVE', 'NEGATIVE', 'NEUTRAL'],
      });
      expect(interpretScalar('"42"')).toEqual({ kind: 'num' });
      expect(interpretScalar('...')).toEqual({ kind: 'any' });
    });

    it('should read loose schemas', () => {
      const fields = parseSchema('{summary, scores: {clarity: 0-1}, label: "a|b"}');

      expect(fields).toEqual([
        { name: 'summary', value: { kind: 'any' } },
        { name: 'scores', value: { kind: 'obj', fields: [{ name: 'clarity', value: { kind: 'num', range: '0-1' } }] } },
        { name: 'label', value: { kind: 'str', enumValues: ['A', 'B'] } },
      ]);
      expect(renderSchema(fields, false)).toBe('{summary,scores:{clarity},label}');
      expect(renderSchema(fields, true)).toBe('{summary,scores:{clarity:num},label:str}');
    });

    it('should skip placeholders when looking for a schema block', () => {
      expect(findSchemaBlock('Hello {{name}}, return {id, title}')).toBe('{id, title}');
      expect(findSchemaBlock('Pick option {1}')).toBeUndefined();
    });
  });
});

describe('Context tokens', () => {
  it('should emit one CTX token per key, sorted by key', () => {
    const ctx = context('Explain how caching works for beginners in a casual tone, in under 100 words.');
    const tokens = contextTokens(collectRuleMatches(ctx.text, ctx.rules, ctx.budget)).map(formatToken);

    expect(tokens).toEqual([
      '[CTX:AUDIENCE=BEGINNER]',
      '[CTX:FOCUS=PROCESS]',
      '[CTX:LENGTH=100w]',
      '[CTX:TONE=CASUAL]',
    ]);
  });
});
