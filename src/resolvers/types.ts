/**
 * Resolver inputs and outputs
 */

import { Analysis } from '../analysis/types.js';
import { PromptOptions } from '../config/schema.js';
import { MatchBudget } from '../language/budget.js';
import { RuleMatch, PatternRuleSet } from '../language/rules.js';
import { VocabularyStore } from '../language/vocabulary.js';
import { ResolvedToken } from '../tokens/grammar.js';

/**
 * One prompt being encoded: the text, its analysis and the shared tables
 */
export interface PromptContext {
  text: string;
  analysis: Analysis;
  vocabulary: VocabularyStore;
  rules: PatternRuleSet;
  budget: MatchBudget;
  options: Readonly<PromptOptions>;
}

/** Rule matches of one text, by rule category */
export type RuleMatchIndex = ReadonlyMap<string, readonly RuleMatch[]>;

export type IntentStrategyName = 'imperative' | 'verb' | 'phrase' | 'question' | 'rule';

export interface IntentCandidate {
  intent: string;
  confidence: number;
  strategy: IntentStrategyName;
  /** token index of the first occurrence */
  position: number;
}

export interface IntentResolution {
  /** ranked by confidence, then position; below-threshold intents removed */
  intents: IntentCandidate[];
  /** intents in emission order (pipeline order when one applies) */
  chain: string[];
  pipeline?: readonly string[];
  modifier?: string;
  /** surface words that produced an intent */
  verbWords: ReadonlySet<string>;
}

export interface TargetResolution {
  token?: ResolvedToken;
  extract?: ResolvedToken;
  targets: string[];
  fields: string[];
  catalog?: string;
  domain?: string;
  items?: { topic?: string; limit?: string };
}

export interface OutputResolution {
  token?: ResolvedToken;
  format?: string;
  shape?: 'ARRAY' | 'SCHEMA';
  /** array element, e.g. `ID[]` */
  item?: string;
  schema?: string;
}
