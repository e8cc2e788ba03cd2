/**
 * Tests for prompt encoding in task and configuration mode
 */

import { createEncodingConfiguration } from '../src/config/schema.js';
import { SemanticEncoder } from '../src/encoder.js';
import { InvalidInputError, UnresolvedPlaceholderError } from '../src/errors.js';
import { MatchBudget } from '../src/language/budget.js';
import { buildLanguageResources } from '../src/language/registry.js';
import { PromptEncoder } from '../src/prompt/encoder.js';
import { dropReason } from '../src/prompt/minimizer.js';
import { detectPromptMode } from '../src/prompt/mode.js';
import { bindPlaceholders, extractPlaceholders, validateTemplate } from '../src/prompt/template.js';
import { createSession } from '../src/session.js';

const CONFIGURATION_PROMPT = [
  'Role: support agent for {{company}}',
  '<basic_rules>',
  'Never share account passwords.',
  '</basic_rules>',
  '<custom_rules>',
  'Offer a discount only to premium members.',
  '</custom_rules>',
  'Custom rules take precedence over basic rules.',
  'Remember: be concise.',
  'Thank you.',
].join('\n');

const BINDABLE_PROMPT = [
  'Role: assistant for {{company}}',
  'Greet the customer by name: {{customer_name}}.',
  'Remember: be concise and friendly at all times during the conversation.',
  'Note: this prompt is shared across every regional support team.',
  'Keep in mind that replies are read on small mobile screens.',
  'Thank you.',
  'Good luck.',
].join('\n');

function newBudget(): MatchBudget {
  return new MatchBudget({ patternStepBudget: 5000, patternTimeBudgetMs: 1000, maxPatternInputLength: 50000 });
}

describe('Task prompts', () => {
  const encoder = new SemanticEncoder(createEncodingConfiguration());

  it('should encode a list request and fall back when the tokens are longer', () => {
    const result = encoder.encode('List the top 5 issues');

    expect(result.metadata.tokens).toEqual(['[REQ:LIST]', '[TARGET:ITEMS:LIMIT=5:TOPIC=ISSUES]']);
    expect(result.fallbackApplied).toBe(true);
    expect(result.metadata.fallback.reason).toBe('NOT_SMALLER');
    expect(result.compressed).toBe('List the top 5 issues');
    expect(result.compressionRatio).toBe(0);
  });

  it('should encode a multi-step matching request', () => {
    const text = 'Analyze the transcript and match it to the NBA catalog, ranking by relevance, '
      + 'return JSON array of ids, empty if none match';

    const result = encoder.encode(text);

    expect(result.compressed).toBe(
      '[REQ:ANALYZE>MATCH>RANK] [TARGET:TRANSCRIPT→CATALOG→ID[]] [CTX:SORT=RELEVANCE] [OUT:JSON:ARRAY:EMPTY=[]]'
    );
    expect(result.fallbackApplied).toBe(false);
    expect(result.compressionRatio).toBeGreaterThan(0);
    expect(result.metadata.details.chain).toEqual(['ANALYZE', 'MATCH', 'RANK']);
    expect(result.metadata.details.pipeline).toEqual(['ANALYZE', 'MATCH', 'RANK']);
  });

  it('should rank the sentence-initial command first', () => {
    const result = encoder.encode('Suggest three names, and explain the reasoning briefly.');

    const intents = result.metadata.details.intents;
    expect(Array.isArray(intents) ? intents[0] : undefined).toEqual({
      intent: 'GENERATE',
      confidence: 1.0,
      strategy: 'imperative',
    });
    expect(result.metadata.details.chain).toEqual(['GENERATE', 'EXPLAIN']);
  });

  it('should finish a multi-sentence prompt within the default limits', () => {
    const text = [
      'Analyze the customer feedback report and summarize the main complaints.',
      'Focus on delivery problems and billing errors.',
      'Group similar complaints together and keep the tone neutral.',
      'Mention how often each complaint appears.',
      'Return the summary as a JSON object with a list of themes.',
    ].join(' ');

    const result = encoder.encode(text);

    expect(result.metadata.degraded).toBe(false);
    expect(result.metadata.warnings).toEqual([]);
    expect(result.metadata.tokens[1]).toMatch(/^\[TARGET:/);
  });

  it('should produce identical output for identical input', () => {
    const text = 'Summarize the support ticket in under 50 words';

    expect(encoder.encode(text).toJSON()).toEqual(encoder.encode(text).toJSON());
  });
});

describe('Prompt mode detection', () => {
  const { vocabulary, rules } = buildLanguageResources('en');
  const padding = 'Summarize the notes below. '.repeat(6);

  it('should treat a role declaration near the top as configuration', () => {
    expect(detectPromptMode('You are a helpful travel assistant.', vocabulary, rules, newBudget()))
      .toEqual({ mode: 'CONFIGURATION', reason: 'CUE' });
  });

  it('should ignore cues past the top of the prompt', () => {
    expect(detectPromptMode(`${padding}You are a poet.`, vocabulary, rules, newBudget()))
      .toEqual({ mode: 'TASK', reason: 'TASK' });
  });

  it('should detect rule blocks anywhere', () => {
    expect(detectPromptMode(`${padding}<custom_rules>Be brief.</custom_rules>`, vocabulary, rules, newBudget()))
      .toEqual({ mode: 'CONFIGURATION', reason: 'RULE_BLOCK' });
  });

  it('should need a role alongside placeholders', () => {
    expect(detectPromptMode(`${padding}Greet {{name}} warmly. Act as a stylist.`, vocabulary, rules, newBudget()))
      .toEqual({ mode: 'CONFIGURATION', reason: 'PLACEHOLDERS_WITH_ROLE' });
    expect(detectPromptMode('Translate {{text}} into French.', vocabulary, rules, newBudget()))
      .toEqual({ mode: 'TASK', reason: 'TASK' });
  });
});

describe('Configuration prompts', () => {
  const session = () => createSession(createEncodingConfiguration());
  const prompt = new PromptEncoder();

  it('should emit role, rule and priority tokens above the minimized body', () => {
    const candidate = prompt.encode(CONFIGURATION_PROMPT, {}, session());

    expect(candidate.tokens).toEqual([
      '[CTX:ROLE=SUPPORT_AGENT]',
      '[CTX:RULES=BASIC,CUSTOM]',
      '[CTX:PRIORITY=CUSTOM_OVER_BASIC]',
      '[REF:company]',
    ]);
    expect(candidate.compressed).toBe([
      '[CTX:ROLE=SUPPORT_AGENT] [CTX:RULES=BASIC,CUSTOM] [CTX:PRIORITY=CUSTOM_OVER_BASIC] [REF:company]',
      'Role: support agent for {{company}}',
      '<basic_rules>\nNever share account passwords.\n</basic_rules>',
      '<custom_rules>\nOffer a discount only to premium members.\n</custom_rules>',
    ].join('\n'));
    expect(candidate.warnings).toEqual([]);
  });

  it('should report why each sentence was dropped', () => {
    const candidate = prompt.encode(CONFIGURATION_PROMPT, {}, session());

    expect(candidate.details.mode).toBe('CONFIGURATION');
    expect(candidate.details.modeReason).toBe('CUE');
    expect(candidate.details.dropped).toEqual([
      { sentence: 'Custom rules take precedence over basic rules.', reason: 'PRIORITY' },
      { sentence: 'Remember: be concise.', reason: 'META' },
      { sentence: 'Thank you.', reason: 'FRAGMENT' },
    ]);
  });

  it('should read an override of the basic rules as priority', () => {
    const text = [
      'Role: billing assistant for {{company}}',
      '<basic_rules>',
      'Never share card numbers.',
      '</basic_rules>',
      'Custom instructions override the basic rules.',
    ].join('\n');

    const candidate = prompt.encode(text, {}, session());

    expect(candidate.details.rules).toEqual(['BASIC', 'CUSTOM']);
    expect(candidate.details.priority).toBe('CUSTOM_OVER_BASIC');
    expect(candidate.details.dropped).toEqual([
      { sentence: 'Custom instructions override the basic rules.', reason: 'PRIORITY' },
    ]);
  });

  it('should keep the body verbatim when minimizing is off', () => {
    const config = createEncodingConfiguration({ prompt: { minimize: false } });
    const candidate = prompt.encode(CONFIGURATION_PROMPT, {}, createSession(config));

    expect(candidate.compressed.endsWith(`\n${CONFIGURATION_PROMPT}`)).toBe(true);
    expect(candidate.details.dropped).toEqual([]);
  });

  it('should honor a forced mode', () => {
    const config = createEncodingConfiguration({ prompt: { mode: 'TASK' } });
    const candidate = prompt.encode(CONFIGURATION_PROMPT, {}, createSession(config));

    expect(candidate.details.mode).toBe('TASK');
  });

  describe('binding', () => {
    const encoder = new SemanticEncoder(createEncodingConfiguration());

    it('should compress and then bind runtime values', () => {
      const result = encoder.encode(BINDABLE_PROMPT, { kind: 'PROMPT' });

      expect(result.fallbackApplied).toBe(false);
      expect(result.compressed).toBe([
        '[CTX:ROLE=ASSISTANT] [REF:company,customer_name]',
        'Role: assistant for {{company}}',
        'Greet the customer by name: {{customer_name}}.',
      ].join('\n'));
      expect(encoder.bind(result, { company: 'Acme', customer_name: 'Sam' })).toBe([
        '[CTX:ROLE=ASSISTANT] [REF:company,customer_name]',
        'Role: assistant for Acme',
        'Greet the customer by name: Sam.',
      ].join('\n'));
    });

    it('should name every missing value', () => {
      const result = encoder.encode(BINDABLE_PROMPT, { kind: 'PROMPT' });

      expect(() => encoder.bind(result, {})).toThrow(new UnresolvedPlaceholderError(['company', 'customer_name']));
    });

    it('should refuse to bind task prompts', () => {
      const result = encoder.encode('List the top 5 issues');

      expect(() => encoder.bind(result, {})).toThrow(InvalidInputError);
    });
  });
});

describe('Minimizer', () => {
  const { vocabulary, rules } = buildLanguageResources('en');
  const facts = { role: true, priority: true, output: true };

  it('should keep sentences with protected words', () => {
    const resources = { vocabulary, rules, budget: newBudget() };
    expect(dropReason('Always reply in JSON.', resources, facts)).toBeNull();
    expect(dropReason('Never share passwords.', resources, facts)).toBeNull();
  });

  it('should drop sentences a token already carries', () => {
    const resources = { vocabulary, rules, budget: newBudget() };
    expect(dropReason('Reply in JSON.', resources, facts)).toBe('OUTPUT');
    expect(dropReason('You are a friendly bot.', resources, facts)).toBe('ROLE');
    expect(dropReason('Stay on topic.', resources, facts)).toBe('FRAGMENT');
  });

  it('should keep output sentences when no OUT token was emitted', () => {
    const resources = { vocabulary, rules, budget: newBudget() };
    expect(dropReason('Reply in JSON.', resources, { ...facts, output: false })).toBeNull();
  });
});

describe('Templates', () => {
  it('should list distinct placeholders in sorted order', () => {
    expect(extractPlaceholders('Hi {{ name }}, order {{order_id}} for {{name}}')).toEqual(['name', 'order_id']);
  });

  it('should validate placeholders and role facts', () => {
    const issues = validateTemplate('{{}} {{Name}} {{name}} {{bad name}}', { rules: [], priority: 'CUSTOM_OVER_BASIC' });

    expect(issues.map(issue => issue.code)).toEqual([
      'EMPTY_PLACEHOLDER',
      'INVALID_PLACEHOLDER_NAME',
      'DUPLICATE_PLACEHOLDER',
      'PRIORITY_WITHOUT_RULES',
      'MISSING_ROLE',
    ]);
    expect(issues[2].message).toBe('Placeholders differ only in case: Name, name');
  });

  it('should substitute every placeholder', () => {
    expect(bindPlaceholders('Hello {{ name }}, you have {{count}} items', { name: 'Sam', count: 3 }))
      .toBe('Hello Sam, you have 3 items');
  });

  it('should reject unresolved placeholders', () => {
    expect(() => bindPlaceholders('{{name}} at {{company}}', { name: 'Sam' }))
      .toThrow('Unresolved placeholders: company');
  });
});
