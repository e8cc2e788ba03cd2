/**
 * Lexical tokenizer
 * Sentence and word splitting without an NLP model. Part-of-speech tags
 * come from the vocabulary alone, so this is what languages without a
 * tagger use, and what the tagger adapter falls back to.
 */

import { VocabularyStore } from '../language/vocabulary.js';
import { annotateClauses } from './clauses.js';
import { Analysis, AnalyzedSentence, AnalyzedToken, LinguisticAnalyzer, PartOfSpeech } from './types.js';

const WORD = /[\p{L}\p{N}][\p{L}\p{N}'’_-]*/gu;

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

function guessPos(word: string, vocabulary: VocabularyStore): PartOfSpeech {
  if (/^\d+(?:[.,]\d+)?$/.test(word) || vocabulary.numberWord(word) !== undefined) return 'NUM';
  if (vocabulary.imperativeFor(word) !== undefined) return 'VERB';
  if (vocabulary.isNoiseVerb(word)) return 'VERB';
  if (vocabulary.isStopWord(word)) return 'OTHER';
  return 'NOUN';
}

/**
 * Tokenize one sentence; `offset` is the index of its first token in the text
 */
export function tokenizeSentence(
  sentence: string,
  sentenceIndex: number,
  offset: number,
  vocabulary: VocabularyStore
): AnalyzedToken[] {
  const tokens: AnalyzedToken[] = [];
  const matches = [...sentence.matchAll(WORD)];

  matches.forEach((match, i) => {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    const nextStart = i + 1 < matches.length ? matches[i + 1].index ?? sentence.length : sentence.length;
    const normal = match[0].toLowerCase().replace(/’/g, "'");
    const pos = guessPos(normal, vocabulary);
    tokens.push({
      text: match[0],
      normal,
      lemma: pos === 'NOUN' ? vocabulary.inflector.singular(normal) : normal,
      pos,
      index: offset + i,
      sentence: sentenceIndex,
      post: sentence.slice(end, nextStart).replace(/\s+/g, ''),
      clause: 'main',
      opensClause: false,
    });
  });

  annotateClauses(tokens, vocabulary);
  return tokens;
}

export function isQuestion(sentence: string, vocabulary: VocabularyStore): boolean {
  return sentence.trimEnd().endsWith('?') || vocabulary.questions.some(q => q.regex.test(sentence));
}

export function lexicalAnalysis(text: string, vocabulary: VocabularyStore, analyzer: string): Analysis {
  const sentences: AnalyzedSentence[] = [];
  const all: AnalyzedToken[] = [];

  splitSentences(text).forEach((sentence, index) => {
    const tokens = tokenizeSentence(sentence, index, all.length, vocabulary);
    all.push(...tokens);
    sentences.push({ index, text: sentence, tokens, question: isQuestion(sentence, vocabulary) });
  });

  return { analyzer, sentences, tokens: all, entities: [] };
}

/**
 * Analyzer for languages without a tagger: vocabulary-driven tags only
 */
export class LexiconAnalyzer implements LinguisticAnalyzer {
  readonly name = 'lexicon';

  constructor(private readonly vocabulary: VocabularyStore) {}

  analyze(text: string): Analysis {
    return lexicalAnalysis(text, this.vocabulary, this.name);
  }
}
