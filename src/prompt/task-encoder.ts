/**
 * Task prompt encoder
 * `[REQ] [TARGET] [EXTRACT] [CTX]* [OUT] [REF]`
 */

import { collectRuleMatches, contextTokens } from '../resolvers/attributes.js';
import { resolveIntents } from '../resolvers/intent.js';
import { resolveOutput, withItemAttribute } from '../resolvers/output.js';
import { resolveTargets } from '../resolvers/target.js';
import { IntentResolution, PromptContext, TargetResolution } from '../resolvers/types.js';
import { CHAIN, ResolvedToken, formatToken } from '../tokens/grammar.js';
import { EncodedCandidate } from '../types.js';
import { uniqueInOrder } from '../utils/text.js';
import { extractPlaceholders } from './template.js';

/** Ticket-style identifiers: ABC-123, INV-2024-0042 */
const IDENTIFIER = /\b[A-Z]{2,6}-\d[\d-]*\b/g;

function requestToken(intents: IntentResolution, target: TargetResolution): ResolvedToken | undefined {
  if (intents.chain.length === 0) return undefined;
  const qualifiers: string[] = [];
  if (intents.modifier) qualifiers.push(intents.modifier);
  const extractOnly = intents.chain.length === 1 && intents.chain[0] === 'EXTRACT';
  if (extractOnly && target.fields.length > 0) qualifiers.push(target.fields.join(','));
  return { category: 'REQ', values: [intents.chain.join(CHAIN)], qualifiers, attributes: [] };
}

export function referenceToken(ctx: PromptContext): ResolvedToken | undefined {
  const identifiers = ctx.budget.matchAll(IDENTIFIER, ctx.text).map(m => m[0]);
  const values = uniqueInOrder([...identifiers, ...extractPlaceholders(ctx.text)]);
  return values.length > 0 ? { category: 'REF', values, attributes: [] } : undefined;
}

export function encodeTask(ctx: PromptContext): EncodedCandidate {
  const ruleMatches = collectRuleMatches(ctx.text, ctx.rules, ctx.budget);
  const intents = resolveIntents(ctx, ruleMatches);
  const baseOutput = resolveOutput(ctx, ruleMatches);
  const target = resolveTargets(ctx, intents, ruleMatches, baseOutput);
  const output = target.catalog ? baseOutput : withItemAttribute(baseOutput);

  const resolved: ResolvedToken[] = [];
  const push = (token: ResolvedToken | undefined): void => {
    if (token) resolved.push(token);
  };
  push(requestToken(intents, target));
  push(target.token);
  push(target.extract);
  resolved.push(...contextTokens(ruleMatches));
  push(output.token);
  push(referenceToken(ctx));

  const tokens = resolved.map(formatToken);
  const warnings: string[] = [];
  if (intents.chain.length === 0) warnings.push('No operation detected in prompt');
  if (!target.token) warnings.push('No target detected in prompt');

  return {
    kind: 'PROMPT',
    original: ctx.text,
    compressed: tokens.join(' '),
    tokens,
    warnings,
    details: {
      mode: 'TASK',
      analyzer: ctx.analysis.analyzer,
      intents: intents.intents.map(({ intent, confidence, strategy }) => ({ intent, confidence, strategy })),
      chain: intents.chain,
      pipeline: intents.pipeline ? [...intents.pipeline] : undefined,
      modifier: intents.modifier,
      targets: target.targets,
      fields: target.fields,
      catalog: target.catalog,
      domain: target.domain,
      items: target.items,
      output: { format: output.format, shape: output.shape, item: output.item, schema: output.schema },
    },
  };
}
