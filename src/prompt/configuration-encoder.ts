/**
 * Configuration prompt encoder
 *
 * Token line: `[CTX:ROLE=..] [CTX:RULES=..] [CTX:PRIORITY=..] [CTX:..]* [REF:..] [OUT:..]`,
 * then the minimized body on the following lines.
 */

import { AnalyzedToken } from '../analysis/types.js';
import { VocabularyStore } from '../language/vocabulary.js';
import { collectRuleMatches, contextTokens, firstMatch, matchesFor } from '../resolvers/attributes.js';
import { resolveOutput, withItemAttribute } from '../resolvers/output.js';
import { PromptContext } from '../resolvers/types.js';
import { ResolvedToken, attr, formatToken } from '../tokens/grammar.js';
import { EncodedCandidate } from '../types.js';
import { splitWords, toTokenValue, uniqueInOrder } from '../utils/text.js';
import { minimizeConfiguration } from './minimizer.js';
import { ModeDecision } from './mode.js';
import { referenceToken } from './task-encoder.js';
import { extractPlaceholders, validateTemplate } from './template.js';

const MAX_ROLE_WORDS = 4;

function roleFromWords(words: readonly string[], vocabulary: VocabularyStore): string | undefined {
  const kept: string[] = [];
  for (const word of words) {
    if (kept.length === 0 && (vocabulary.isStopWord(word) || vocabulary.isQuantifier(word))) continue;
    if (vocabulary.isRoleTerminator(word) || kept.length >= MAX_ROLE_WORDS) break;
    kept.push(word);
  }
  const value = toTokenValue(kept.join(' '));
  return value || undefined;
}

function markerLength(tokens: readonly AnalyzedToken[], at: number, vocabulary: VocabularyStore): number {
  for (const marker of vocabulary.roleMarkers) {
    if (marker.length > 0 && marker.every((word, k) => tokens[at + k]?.normal === word)) return marker.length;
  }
  return 0;
}

/**
 * The declared role: a `Role:` line, else the first "you are a ..." clause
 */
export function extractRole(ctx: PromptContext): string | undefined {
  const { vocabulary, budget } = ctx;
  const labelled = vocabulary.roleLabel ? budget.first(vocabulary.roleLabel, ctx.text) : null;
  if (labelled) {
    const role = roleFromWords(splitWords(labelled[1].replace(/\{\{[^{}]*\}\}/g, ' ')), vocabulary);
    if (role) return role;
  }

  for (const sentence of ctx.analysis.sentences) {
    const tokens = sentence.tokens;
    for (let i = 0; i < tokens.length; i++) {
      const length = markerLength(tokens, i, vocabulary);
      if (length === 0) continue;
      const lastMarker = tokens[i + length - 1];
      // "You are {{bot_name}}" names the bot, not a role
      if (lastMarker.post.includes('{')) return undefined;

      const words: string[] = [];
      for (const token of tokens.slice(i + length)) {
        words.push(token.normal);
        if (/[,;:.!?(){}]/.test(token.post)) break;
      }
      return roleFromWords(words, vocabulary);
    }
  }
  return undefined;
}

export function encodeConfiguration(ctx: PromptContext, decision: ModeDecision): EncodedCandidate {
  const ruleMatches = collectRuleMatches(ctx.text, ctx.rules, ctx.budget);
  const role = extractRole(ctx);
  const rules = uniqueInOrder(matchesFor(ruleMatches, 'rules').map(m => m.value));
  const priority = firstMatch(ruleMatches, 'priority')?.value;
  const output = withItemAttribute(resolveOutput(ctx, ruleMatches));
  const placeholders = extractPlaceholders(ctx.text);

  const resolved: ResolvedToken[] = [];
  if (role) resolved.push({ category: 'CTX', values: [], attributes: [attr('ROLE', role)] });
  if (rules.length > 0) resolved.push({ category: 'CTX', values: [], attributes: [attr('RULES', rules.join(','))] });
  if (priority) resolved.push({ category: 'CTX', values: [], attributes: [attr('PRIORITY', priority)] });
  resolved.push(...contextTokens(ruleMatches));
  const reference = referenceToken(ctx);
  if (reference) resolved.push(reference);
  if (output.token) resolved.push(output.token);

  const tokens = resolved.map(formatToken);
  const minimized = ctx.options.minimize
    ? minimizeConfiguration(ctx.text, ctx, { role: role !== undefined, priority: priority !== undefined, output: output.token !== undefined })
    : { body: ctx.text, dropped: [] };

  const header = tokens.join(' ');
  const compressed = [header, minimized.body].filter(part => part.length > 0).join('\n');
  const validation = validateTemplate(ctx.text, { role, rules, priority });

  return {
    kind: 'PROMPT',
    original: ctx.text,
    compressed,
    tokens,
    warnings: validation.filter(issue => issue.level === 'ERROR').map(issue => issue.message),
    details: {
      mode: 'CONFIGURATION',
      modeReason: decision.reason,
      analyzer: ctx.analysis.analyzer,
      role,
      rules,
      priority,
      placeholders,
      validation,
      dropped: minimized.dropped,
      output: { format: output.format, shape: output.shape, item: output.item, schema: output.schema },
    },
  };
}
