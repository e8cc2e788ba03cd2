/**
 * Sentiment trajectory
 *
 * Each customer turn is scored per emotional state as keyword hits times
 * the state's intensity; the top state wins, ties going to the earlier
 * table entry. Turns without cues keep the previous state.
 */

import { MatchBudget } from '../language/budget.js';
import { CompiledTranscriptVocabulary } from '../language/vocabulary.js';
import { Turn } from './turns.js';

export const NEUTRAL = 'NEUTRAL';

export interface TurnSentiment {
  turn: number;
  state: string;
  score: number;
}

export function scoreTurn(
  text: string,
  vocabulary: CompiledTranscriptVocabulary,
  budget: MatchBudget
): { state: string; score: number } | null {
  let best: { state: string; score: number } | null = null;
  for (const entry of vocabulary.sentiments) {
    const hits = budget.matchAll(entry.regex, text).length;
    if (hits === 0) continue;
    const score = hits * (vocabulary.raw.sentimentIntensity[entry.canonical] ?? 1);
    if (!best || score > best.score) {
      best = { state: entry.canonical, score };
    }
  }
  return best;
}

export function turnSentiments(
  customerTurns: readonly Turn[],
  vocabulary: CompiledTranscriptVocabulary,
  budget: MatchBudget
): TurnSentiment[] {
  const scored: TurnSentiment[] = [];
  for (const turn of customerTurns) {
    const result = scoreTurn(turn.text, vocabulary, budget);
    if (result) scored.push({ turn: turn.index, ...result });
  }
  return scored;
}

/**
 * Start state, turning points, end state. Always at least two states.
 */
export function sentimentTrajectory(sentiments: readonly TurnSentiment[]): string[] {
  const states: string[] = [];
  for (const { state } of sentiments) {
    if (states[states.length - 1] !== state) states.push(state);
  }
  if (states.length === 0) return [NEUTRAL, NEUTRAL];
  if (states.length === 1) return [states[0], states[0]];
  return states;
}
