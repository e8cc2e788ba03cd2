/**
 * Prompt mode detection
 * Role/rule blocks and placeholders mean a configuration prompt; anything
 * else is treated as a task.
 */

import { MatchBudget } from '../language/budget.js';
import { PatternRuleSet } from '../language/rules.js';
import { VocabularyStore } from '../language/vocabulary.js';
import { PromptMode } from '../types.js';
import { containsPhrase } from '../utils/text.js';
import { hasPlaceholders } from './template.js';

/** Configuration cues only count near the top of the prompt */
export const CUE_WINDOW = 150;

export type ModeReason = 'CUE' | 'RULE_BLOCK' | 'PLACEHOLDERS_WITH_ROLE' | 'TASK' | 'OVERRIDE';

export interface ModeDecision {
  mode: PromptMode;
  reason: ModeReason;
}

export function hasRoleDeclaration(text: string, vocabulary: VocabularyStore, budget: MatchBudget): boolean {
  if (vocabulary.roleLabel && budget.test(vocabulary.roleLabel, text)) return true;
  return vocabulary.roleMarkers.some(words => containsPhrase(text, words.join(' ')));
}

export function detectPromptMode(
  text: string,
  vocabulary: VocabularyStore,
  rules: PatternRuleSet,
  budget: MatchBudget
): ModeDecision {
  if (vocabulary.configurationCues && budget.test(vocabulary.configurationCues, text.slice(0, CUE_WINDOW))) {
    return { mode: 'CONFIGURATION', reason: 'CUE' };
  }
  const blocks = rules.apply('rules', text, budget).filter(m => m.value === 'BASIC' || m.value === 'CUSTOM');
  if (blocks.length > 0) {
    return { mode: 'CONFIGURATION', reason: 'RULE_BLOCK' };
  }
  if (hasPlaceholders(text) && hasRoleDeclaration(text, vocabulary, budget)) {
    return { mode: 'CONFIGURATION', reason: 'PLACEHOLDERS_WITH_ROLE' };
  }
  return { mode: 'TASK', reason: 'TASK' };
}
