/**
 * Target & Extraction Resolver
 *
 * Finds what the request operates on. Compound phrases are collapsed
 * before single-noun matching so "customer interaction transcript" yields
 * one TRANSCRIPT target instead of INTERACTION plus TRANSCRIPT. Matching
 * against "a list of X" or a named catalog yields a data-flow target
 * `IN→CATALOG→OUT`.
 */

import { AnalyzedToken } from '../analysis/types.js';
import { CompiledEntry } from '../language/vocabulary.js';
import { FLOW, ResolvedToken, TokenAttribute, attr, sortAttributes } from '../tokens/grammar.js';
import { toTokenValue, uniqueInOrder } from '../utils/text.js';
import { firstMatch, matchesFor } from './attributes.js';
import {
  IntentResolution,
  OutputResolution,
  PromptContext,
  RuleMatchIndex,
  TargetResolution,
} from './types.js';

/** Intents that compare an input against a reference set */
export const CATALOG_INTENTS: readonly string[] = ['MATCH', 'CLASSIFY', 'RANK', 'COMPARE', 'ROUTE', 'SEARCH', 'FILTER'];

/** Intents whose object is a list of generated items */
export const ITEM_INTENTS: readonly string[] = ['LIST', 'GENERATE'];

const MAX_TOPIC_WORDS = 3;
const MIN_DOMAIN_HITS = 2;

interface Span {
  canonical: string;
  start: number;
  end: number;
  text: string;
}

interface Range {
  start: number;
  end: number;
}

function mask(text: string, ranges: readonly Range[]): string {
  let masked = text;
  for (const { start, end } of ranges) {
    masked = masked.slice(0, start) + ' '.repeat(end - start) + masked.slice(end);
  }
  return masked;
}

/** Earliest first, longest first at the same start; overlapping spans dropped */
function nonOverlapping(spans: readonly Span[]): Span[] {
  const sorted = [...spans].sort((a, b) => a.start - b.start || (b.end - b.start) - (a.end - a.start));
  const kept: Span[] = [];
  for (const span of sorted) {
    if (kept.every(k => span.start >= k.end || span.end <= k.start)) kept.push(span);
  }
  return kept;
}

function scan(ctx: PromptContext, entries: readonly CompiledEntry[], text: string): Span[] {
  return entries.flatMap(entry =>
    ctx.budget.matchAll(entry.regex, text).map(match => ({
      canonical: entry.canonical,
      start: match.index,
      end: match.index + match[0].length,
      text: match[0].toLowerCase(),
    }))
  );
}

// ==================== Excluded Text ====================

/**
 * Character ranges of role clauses: in "You are an analyst who summarizes
 * reports" the reports describe the role, not the request
 */
function roleClauseRanges(ctx: PromptContext): Range[] {
  const ranges: Range[] = [];
  let searchFrom = 0;
  for (const sentence of ctx.analysis.sentences) {
    const sentenceStart = ctx.text.indexOf(sentence.text, searchFrom);
    if (sentenceStart < 0) continue;
    searchFrom = sentenceStart + sentence.text.length;

    let cursor = 0;
    let open: Range | undefined;
    for (const token of sentence.tokens) {
      const at = sentence.text.indexOf(token.text, cursor);
      if (at < 0) continue;
      cursor = at + token.text.length;
      if (token.clause !== 'role') {
        open = undefined;
        continue;
      }
      if (open) {
        open.end = sentenceStart + cursor;
      } else {
        open = { start: sentenceStart + at, end: sentenceStart + cursor };
        ranges.push(open);
      }
    }
  }
  return ranges;
}

/** Names of people and places are never what a request operates on */
function nameRanges(ctx: PromptContext): Range[] {
  const ranges: Range[] = [];
  for (const entity of ctx.analysis.entities) {
    if (entity.type !== 'PERSON' && entity.type !== 'PLACE') continue;
    for (let at = ctx.text.indexOf(entity.text); at >= 0; at = ctx.text.indexOf(entity.text, at + entity.text.length)) {
      ranges.push({ start: at, end: at + entity.text.length });
    }
  }
  return ranges;
}

// ==================== Extraction ====================

/**
 * Character range between an EXTRACT verb and the source marker ("from")
 */
function extractionRange(ctx: PromptContext): Range | undefined {
  for (const sentence of ctx.analysis.sentences) {
    const verb = sentence.tokens.find(t =>
      t.clause === 'main'
      && (ctx.vocabulary.imperativeFor(t.normal) === 'EXTRACT' || ctx.vocabulary.actionFor(t.lemma) === 'EXTRACT')
    );
    if (!verb) continue;

    const sentenceStart = ctx.text.indexOf(sentence.text);
    const verbOffset = sentence.text.indexOf(verb.text);
    if (sentenceStart < 0 || verbOffset < 0) continue;

    const start = sentenceStart + verbOffset + verb.text.length;
    const end = sentenceStart + sentence.text.length;
    const source = ctx.vocabulary.sourceMarker
      ? ctx.budget.first(ctx.vocabulary.sourceMarker, ctx.text.slice(start, end))
      : null;
    return { start, end: source ? start + source.index : end };
  }
  return undefined;
}

function extractionFields(ctx: PromptContext, range: Range): string[] {
  const segment = ctx.text.slice(range.start, range.end);
  return uniqueInOrder(nonOverlapping(scan(ctx, ctx.vocabulary.fields, segment)).map(s => s.canonical));
}

// ==================== Items ====================

function numberOf(token: AnalyzedToken, ctx: PromptContext): number | undefined {
  if (/^\d{1,4}$/.test(token.normal)) return Number(token.normal);
  return ctx.vocabulary.numberWord(token.normal);
}

/**
 * Object of a LIST/GENERATE command: "the top 5 issues" -> topic ISSUES,
 * limit 5. The topic ends at its first plural noun, a stop word or a break.
 */
function itemObject(ctx: PromptContext, intents: IntentResolution): { topic?: string; limit?: number } | undefined {
  for (const sentence of ctx.analysis.sentences) {
    const verbAt = sentence.tokens.findIndex(t => {
      const intent = ctx.vocabulary.imperativeFor(t.normal);
      return intents.verbWords.has(t.normal) && intent !== undefined && ITEM_INTENTS.includes(intent);
    });
    if (verbAt < 0) continue;

    let limit: number | undefined;
    const words: string[] = [];
    for (const token of sentence.tokens.slice(verbAt + 1)) {
      if (words.length === 0) {
        const n = numberOf(token, ctx);
        if (n !== undefined) {
          limit = limit ?? n;
          if (/[,;:.!?]/.test(token.post)) break;
          continue;
        }
        if (ctx.vocabulary.isQuantifier(token.normal) || ctx.vocabulary.isStopWord(token.normal)) continue;
      } else if (ctx.vocabulary.isStopWord(token.normal) || ctx.vocabulary.isRoleTerminator(token.normal)) {
        break;
      }
      words.push(token.normal);
      const plural = ctx.vocabulary.inflector.singular(token.normal) !== token.normal;
      if (plural || words.length >= MAX_TOPIC_WORDS || /[,;:.!?]/.test(token.post)) break;
    }
    const topic = words.length > 0 ? toTokenValue(words.join(' ')) : undefined;
    return { topic: topic || undefined, limit };
  }
  return undefined;
}

// ==================== Domain ====================

function detectDomain(ctx: PromptContext): string | undefined {
  let best: { canonical: string; hits: number } | undefined;
  for (const entry of ctx.vocabulary.domains) {
    const hits = new Set(ctx.budget.matchAll(entry.regex, ctx.text).map(m => m[0].toLowerCase())).size;
    if (hits >= MIN_DOMAIN_HITS && (!best || hits > best.hits)) {
      best = { canonical: entry.canonical, hits };
    }
  }
  return best?.canonical;
}

// ==================== Resolution ====================

export function resolveTargets(
  ctx: PromptContext,
  intents: IntentResolution,
  ruleMatches: RuleMatchIndex,
  output: OutputResolution
): TargetResolution {
  const masked: Range[] = [...roleClauseRanges(ctx), ...nameRanges(ctx)];

  let fields: string[] = [];
  if (intents.chain.includes('EXTRACT')) {
    const range = extractionRange(ctx);
    if (range) {
      fields = extractionFields(ctx, range);
      if (fields.length > 0) masked.push(range);
    }
  }

  const catalogMatches = matchesFor(ruleMatches, 'catalog');
  for (const match of catalogMatches) {
    masked.push({ start: match.index, end: match.index + match.text.length });
  }

  const compoundSpans: Span[] = [];
  let working = mask(ctx.text, masked);
  for (const compound of ctx.vocabulary.compounds) {
    for (const match of ctx.budget.matchAll(compound.regex, working)) {
      const span = { canonical: compound.canonical, start: match.index, end: match.index + match[0].length, text: match[0] };
      compoundSpans.push(span);
      working = mask(working, [span]);
    }
  }

  const spans = nonOverlapping([...compoundSpans, ...scan(ctx, ctx.vocabulary.targets, working)])
    .filter(span => !intents.verbWords.has(span.text));
  let targets = uniqueInOrder(spans.map(s => s.canonical));
  if (targets.some(t => !ctx.vocabulary.isGenericTarget(t))) {
    targets = targets.filter(t => !ctx.vocabulary.isGenericTarget(t));
  }

  const attributes: TokenAttribute[] = [];
  const limit = firstMatch(ruleMatches, 'limit');
  const domain = detectDomain(ctx);
  if (domain) attributes.push(attr('DOMAIN', domain));

  let values: string[] = targets;
  let catalog: string | undefined;
  let items: TargetResolution['items'];

  const wantsCatalog = intents.chain.some(intent => CATALOG_INTENTS.includes(intent));
  const object = intents.chain.some(intent => ITEM_INTENTS.includes(intent)) ? itemObject(ctx, intents) : undefined;

  if (wantsCatalog && catalogMatches.length > 0) {
    catalog = catalogMatches[0].value;
    const flow = [targets[0] ?? 'INPUT', 'CATALOG'];
    if (output.item) flow.push(output.item);
    values = [flow.join(FLOW)];
    if (catalog !== 'CATALOG') attributes.push(attr('CATALOG', catalog));
  } else if (object?.topic) {
    values = ['ITEMS'];
    attributes.push(attr('TOPIC', object.topic));
    if (targets[0]) attributes.push(attr('SOURCE', targets[0]));
  }

  const limitValue = limit?.value ?? (object?.limit !== undefined ? String(object.limit) : undefined);
  if (limitValue) attributes.push(attr('LIMIT', limitValue));
  if (object) items = { topic: object.topic, limit: limitValue };

  let extract: ResolvedToken | undefined;
  if (fields.length > 0 && !(intents.chain.length === 1 && intents.chain[0] === 'EXTRACT')) {
    extract = { category: 'EXTRACT', values: fields, attributes: [] };
  }

  const token: ResolvedToken | undefined = values.length > 0 || attributes.length > 0
    ? { category: 'TARGET', values, attributes: sortAttributes(attributes) }
    : undefined;

  return { token, extract, targets, fields, catalog, domain, items };
}
