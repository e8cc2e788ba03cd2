/**
 * Intent Resolver
 *
 * A tagged list of detection strategies evaluated in fixed priority order.
 * Strategies marked `fallbackOnly` run only when nothing above them matched;
 * the others are unioned, each intent keeping its best confidence.
 */

import { Analysis, AnalyzedToken } from '../analysis/types.js';
import { ActionPhrase, VocabularyStore } from '../language/vocabulary.js';
import { splitWords } from '../utils/text.js';
import { impliedIntentMatches } from './attributes.js';
import {
  IntentCandidate,
  IntentResolution,
  IntentStrategyName,
  PromptContext,
  RuleMatchIndex,
} from './types.js';

export interface StrategyHit {
  intent: string;
  position: number;
  word?: string;
}

export interface IntentStrategy {
  readonly name: IntentStrategyName;
  readonly confidence: number;
  readonly fallbackOnly: boolean;
  detect(analysis: Analysis, vocabulary: VocabularyStore): StrategyHit[];
}

/** Confidence given to intents implied by a pattern rule */
export const RULE_INTENT_CONFIDENCE = 0.8;

const MAX_PREFIX_SKIPS = 3;

function frameLength(tokens: readonly AnalyzedToken[], at: number, frames: readonly (readonly string[])[]): number {
  for (const frame of frames) {
    if (frame.length > 0 && frame.every((word, k) => tokens[at + k]?.normal === word)) {
      return frame.length;
    }
  }
  return 0;
}

/** The longest action phrase starting at `at`, e.g. "sum up" */
function phraseAt(tokens: readonly AnalyzedToken[], at: number, vocabulary: VocabularyStore): ActionPhrase | undefined {
  const first = tokens[at];
  if (!first) return undefined;
  return vocabulary.actionPhrases.find(phrase =>
    phrase.firstForms.has(first.normal) && phrase.rest.every((word, k) => tokens[at + 1 + k]?.normal === word)
  );
}

/**
 * Sentence-initial command verbs ("List X", "Give Y"), found by position
 * alone so tagging mistakes cannot hide them
 */
const imperativeStrategy: IntentStrategy = {
  name: 'imperative',
  confidence: 1.0,
  fallbackOnly: false,
  detect(analysis, vocabulary) {
    const hits: StrategyHit[] = [];
    for (const sentence of analysis.sentences) {
      const tokens = sentence.tokens;
      let i = 0;
      for (let skips = 0; skips < MAX_PREFIX_SKIPS && i < tokens.length; skips++) {
        const frame = frameLength(tokens, i, vocabulary.requestFrames);
        if (frame > 0) {
          i += frame;
        } else if (vocabulary.isLeadIn(tokens[i].normal) || tokens[i].pos === 'ADV') {
          i++;
        } else {
          break;
        }
      }
      const verb = tokens[i];
      if (!verb || verb.clause !== 'main') continue;
      // "Sum up" is SUMMARIZE, not "sum"; the phrase strategy reports it
      if (phraseAt(tokens, i, vocabulary)) continue;
      const intent = vocabulary.imperativeFor(verb.normal);
      if (intent) {
        hits.push({ intent, position: verb.index, word: verb.normal });
      }
    }
    return hits;
  },
};

function isVerbCandidate(
  token: AnalyzedToken,
  previous: AnalyzedToken | undefined,
  next: AnalyzedToken | undefined,
  vocabulary: VocabularyStore
): boolean {
  if (token.clause !== 'main') return false;
  if (token.opensClause) {
    // "and order number" is a noun phrase, "and match it" a verb
    return next === undefined || next.pos !== 'NOUN';
  }
  if (token.pos !== 'VERB') return false;
  return previous === undefined
    || (previous.pos !== 'DET' && previous.pos !== 'NUM' && !vocabulary.isQuantifier(previous.normal));
}

/**
 * Lemmatized verbs looked up in the action table. Verbs inside role and
 * conditional clauses describe the setting, not the request.
 */
const verbStrategy: IntentStrategy = {
  name: 'verb',
  confidence: 0.9,
  fallbackOnly: false,
  detect(analysis, vocabulary) {
    const hits: StrategyHit[] = [];
    for (const sentence of analysis.sentences) {
      sentence.tokens.forEach((token, i) => {
        if (!isVerbCandidate(token, sentence.tokens[i - 1], sentence.tokens[i + 1], vocabulary)) return;
        if (phraseAt(sentence.tokens, i, vocabulary)) return;
        const intent = vocabulary.actionFor(token.lemma) ?? vocabulary.actionFor(token.normal);
        if (intent) {
          hits.push({ intent, position: token.index, word: token.normal });
        }
      });
    }
    return hits;
  },
};

/** Multi-word action phrases: "rank by", "compare against", "sum up" */
const phraseStrategy: IntentStrategy = {
  name: 'phrase',
  confidence: 0.8,
  fallbackOnly: false,
  detect(analysis, vocabulary) {
    const hits: StrategyHit[] = [];
    for (const sentence of analysis.sentences) {
      sentence.tokens.forEach((token, i) => {
        if (token.clause !== 'main') return;
        const phrase = phraseAt(sentence.tokens, i, vocabulary);
        if (phrase) {
          hits.push({ intent: phrase.canonical, position: token.index, word: token.normal });
        }
      });
    }
    return hits;
  },
};

/** "What is X?" with no action verb anywhere: an implicit explain/extract */
const questionStrategy: IntentStrategy = {
  name: 'question',
  confidence: 0.85,
  fallbackOnly: true,
  detect(analysis, vocabulary) {
    const hits: StrategyHit[] = [];
    for (const sentence of analysis.sentences) {
      const entry = vocabulary.questions.find(q => q.regex.test(sentence.text));
      if (entry) {
        hits.push({ intent: entry.canonical, position: sentence.tokens[0]?.index ?? 0 });
      }
    }
    return hits;
  },
};

export const INTENT_STRATEGIES: readonly IntentStrategy[] = [
  imperativeStrategy,
  verbStrategy,
  phraseStrategy,
  questionStrategy,
];

function rank(candidates: Iterable<IntentCandidate>): IntentCandidate[] {
  return [...candidates].sort((a, b) => b.confidence - a.confidence || a.position - b.position);
}

/**
 * Emission order: the longest known pipeline whose steps are all present,
 * then the remaining intents by rank
 */
export function orderChain(
  ranked: readonly string[],
  pipelines: readonly (readonly string[])[]
): { chain: string[]; pipeline?: readonly string[] } {
  let best: readonly string[] | undefined;
  for (const pipeline of pipelines) {
    if (pipeline.every(step => ranked.includes(step)) && (!best || pipeline.length > best.length)) {
      best = pipeline;
    }
  }
  if (!best) return { chain: [...ranked] };
  const steps = best;
  return { chain: [...steps, ...ranked.filter(intent => !steps.includes(intent))], pipeline: steps };
}

export function resolveIntents(
  ctx: PromptContext,
  ruleMatches: RuleMatchIndex,
  strategies: readonly IntentStrategy[] = INTENT_STRATEGIES
): IntentResolution {
  const candidates = new Map<string, IntentCandidate>();
  const verbWords = new Set<string>();

  const add = (candidate: IntentCandidate): void => {
    const existing = candidates.get(candidate.intent);
    if (!existing) {
      candidates.set(candidate.intent, candidate);
      return;
    }
    const best = candidate.confidence > existing.confidence ? candidate : existing;
    candidates.set(candidate.intent, { ...best, position: Math.min(existing.position, candidate.position) });
  };

  let matched = false;
  for (const strategy of strategies) {
    if (strategy.fallbackOnly && matched) continue;
    const hits = strategy.detect(ctx.analysis, ctx.vocabulary);
    for (const hit of hits) {
      add({ intent: hit.intent, confidence: strategy.confidence, strategy: strategy.name, position: hit.position });
      if (hit.word) verbWords.add(hit.word);
    }
    matched = matched || hits.length > 0;
  }

  for (const match of impliedIntentMatches(ruleMatches)) {
    if (!match.impliesIntent) continue;
    add({
      intent: match.impliesIntent.toUpperCase(),
      confidence: RULE_INTENT_CONFIDENCE,
      strategy: 'rule',
      position: splitWords(ctx.text.slice(0, match.index)).length,
    });
  }

  const intents = rank(candidates.values()).filter(c => c.confidence >= ctx.options.minIntentConfidence);
  const { chain, pipeline } = orderChain(intents.map(c => c.intent), ctx.vocabulary.pipelines);

  let modifier: string | undefined;
  const primary = intents[0];
  if (primary) {
    modifier = ctx.vocabulary.modifiersFor(primary.intent).find(entry => ctx.budget.test(entry.regex, ctx.text))?.canonical;
  }

  return { intents, chain, pipeline, modifier, verbWords };
}
