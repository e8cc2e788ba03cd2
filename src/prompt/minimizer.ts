/**
 * Configuration prompt minimizer
 *
 * Drops sentences whose meaning a token now carries and keeps the rest.
 * XML-style blocks are rule content and always survive verbatim.
 */

import { splitSentences } from '../analysis/lexical.js';
import { MatchBudget } from '../language/budget.js';
import { PatternRuleSet } from '../language/rules.js';
import { VocabularyStore } from '../language/vocabulary.js';
import { splitWords } from '../utils/text.js';

export type DropReason = 'ROLE' | 'PRIORITY' | 'META' | 'FRAGMENT' | 'OUTPUT';

export interface DroppedSentence {
  sentence: string;
  reason: DropReason;
}

export interface MinimizerFacts {
  /** a ROLE token was emitted */
  role: boolean;
  /** a PRIORITY token was emitted */
  priority: boolean;
  /** an OUT token was emitted */
  output: boolean;
}

export interface MinimizerResources {
  vocabulary: VocabularyStore;
  rules: PatternRuleSet;
  budget: MatchBudget;
}

export interface MinimizedBody {
  body: string;
  dropped: DroppedSentence[];
}

const XML_BLOCK = /<([A-Za-z_][\w-]*)>[\s\S]*?<\/\1>/g;

function startsWithRoleMarker(sentence: string, vocabulary: VocabularyStore): boolean {
  const words = splitWords(sentence);
  return vocabulary.roleMarkers.some(marker => marker.length > 0 && marker.every((word, i) => words[i] === word));
}

export function dropReason(
  sentence: string,
  resources: MinimizerResources,
  facts: MinimizerFacts
): DropReason | null {
  const { vocabulary, rules, budget } = resources;

  if (sentence.includes('{{')) return null;
  if (vocabulary.protectedWords && budget.test(vocabulary.protectedWords, sentence)) return null;

  if (facts.role) {
    if ((vocabulary.roleLabel && budget.test(vocabulary.roleLabel, sentence)) || startsWithRoleMarker(sentence, vocabulary)) {
      return 'ROLE';
    }
  }
  if (facts.priority && rules.apply('priority', sentence, budget).length > 0) return 'PRIORITY';
  if (vocabulary.metaPrefixes && budget.test(vocabulary.metaPrefixes, sentence)) return 'META';
  if (vocabulary.fragments && budget.test(vocabulary.fragments, sentence.trim())) return 'FRAGMENT';
  if (facts.output && rules.apply('format', sentence, budget).length > 0) return 'OUTPUT';
  return null;
}

export function minimizeConfiguration(
  text: string,
  resources: MinimizerResources,
  facts: MinimizerFacts
): MinimizedBody {
  const pieces: string[] = [];
  const dropped: DroppedSentence[] = [];

  const addProse = (segment: string): void => {
    for (const line of segment.split(/\r?\n/)) {
      const kept: string[] = [];
      for (const sentence of splitSentences(line)) {
        const reason = dropReason(sentence, resources, facts);
        if (reason) {
          dropped.push({ sentence, reason });
        } else {
          kept.push(sentence);
        }
      }
      if (kept.length > 0) pieces.push(kept.join(' '));
    }
  };

  let last = 0;
  for (const block of text.matchAll(XML_BLOCK)) {
    const index = block.index ?? 0;
    addProse(text.slice(last, index));
    pieces.push(block[0].trim());
    last = index + block[0].length;
  }
  addProse(text.slice(last));

  return { body: pieces.join('\n'), dropped };
}
