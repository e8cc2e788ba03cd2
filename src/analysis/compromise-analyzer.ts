/**
 * compromise adapter
 * Part-of-speech tagging, lemmatization and named entities for English.
 * The toolkit's JSON output is validated before use; anything unexpected
 * drops the call back to the lexical tokenizer.
 */

import nlp from 'compromise';
import { z } from 'zod';
import { VocabularyStore } from '../language/vocabulary.js';
import { createLogger } from '../utils/logger.js';
import { annotateClauses } from './clauses.js';
import { isQuestion, lexicalAnalysis, splitSentences } from './lexical.js';
import {
  Analysis,
  AnalyzedSentence,
  AnalyzedToken,
  Entity,
  EntityType,
  LinguisticAnalyzer,
  PartOfSpeech,
} from './types.js';

const log = createLogger('analyzer');

const TermSchema = z.object({
  text: z.string(),
  normal: z.string().optional(),
  tags: z.union([z.array(z.string()), z.record(z.string(), z.unknown())]).optional(),
  post: z.string().optional(),
});

const DocumentSchema = z.array(z.object({
  terms: z.array(TermSchema),
}));

const StringListSchema = z.array(z.string());

const MAX_CACHED_LEMMAS = 5000;

type Term = z.infer<typeof TermSchema>;

function tagSet(term: Term): Set<string> {
  if (!term.tags) return new Set();
  return new Set(Array.isArray(term.tags) ? term.tags : Object.keys(term.tags));
}

function posFromTags(tags: ReadonlySet<string>): PartOfSpeech {
  if (tags.has('Value') || tags.has('Cardinal') || tags.has('NumericValue')) return 'NUM';
  if (tags.has('Auxiliary') || tags.has('Modal') || tags.has('Copula')) return 'OTHER';
  if (tags.has('Verb')) return 'VERB';
  if (tags.has('Pronoun')) return 'PRON';
  if (tags.has('Determiner')) return 'DET';
  if (tags.has('Preposition')) return 'PREP';
  if (tags.has('Conjunction')) return 'CONJ';
  if (tags.has('Adjective')) return 'ADJ';
  if (tags.has('Adverb')) return 'ADV';
  if (tags.has('Noun')) return 'NOUN';
  return 'OTHER';
}

/** Entity texts per type, deduplicated across sentences */
function collectEntities(found: Entity[], lists: ReadonlyArray<readonly [EntityType, unknown]>): void {
  for (const [type, raw] of lists) {
    const parsed = StringListSchema.safeParse(raw);
    if (!parsed.success) continue;
    for (const value of parsed.data) {
      const cleaned = value.trim().replace(/[.,;:!?]+$/, '');
      if (cleaned && !found.some(e => e.text === cleaned && e.type === type)) {
        found.push({ text: cleaned, type });
      }
    }
  }
}

function firstWord(text: string): string {
  return text.trim().toLowerCase().split(/\s+/)[0] ?? '';
}

export class CompromiseAnalyzer implements LinguisticAnalyzer {
  readonly name = 'compromise';

  private readonly lemmas = new Map<string, string>();

  constructor(private readonly vocabulary: VocabularyStore) {}

  analyze(text: string): Analysis {
    try {
      return this.tag(text);
    } catch (error) {
      log.warn('Tagger failed, using lexical tokenization', {
        error: error instanceof Error ? error.message : String(error),
      });
      return lexicalAnalysis(text, this.vocabulary, 'lexical');
    }
  }

  private tag(text: string): Analysis {
    const sentences: AnalyzedSentence[] = [];
    const all: AnalyzedToken[] = [];
    const entities: Entity[] = [];

    for (const [index, sentence] of splitSentences(text).entries()) {
      const doc = nlp(sentence);
      const parsed = DocumentSchema.safeParse(doc.json());
      if (!parsed.success) {
        log.warn('Unexpected tagger output, using lexical tokenization', {
          issues: parsed.error.issues.length,
        });
        return lexicalAnalysis(text, this.vocabulary, 'lexical');
      }

      const tokens: AnalyzedToken[] = [];
      for (const term of parsed.data.flatMap(s => s.terms)) {
        const surface = term.text.trim() || term.normal?.trim() || '';
        const normal = (term.normal?.trim() || surface).toLowerCase().replace(/’/g, "'").replace(/[^\p{L}\p{N}'_-]/gu, '');
        if (!normal) continue;
        const tags = tagSet(term);
        const pos = posFromTags(tags);
        tokens.push({
          text: surface,
          normal,
          lemma: this.lemmaOf(normal, pos, tags),
          pos,
          index: all.length + tokens.length,
          sentence: index,
          post: (term.post ?? '').replace(/\s+/g, ''),
          clause: 'main',
          opensClause: false,
        });
      }

      collectEntities(entities, [
        ['PERSON', doc.people().out('array')],
        ['PLACE', doc.places().out('array')],
        ['ORGANIZATION', doc.organizations().out('array')],
        ['MONEY', doc.match('#Money').out('array')],
      ]);
      annotateClauses(tokens, this.vocabulary);
      all.push(...tokens);
      sentences.push({ index, text: sentence, tokens, question: isQuestion(sentence, this.vocabulary) });
    }

    return { analyzer: this.name, sentences, tokens: all, entities };
  }

  private lemmaOf(normal: string, pos: PartOfSpeech, tags: ReadonlySet<string>): string {
    const plural = pos === 'NOUN' && tags.has('Plural');
    if (pos !== 'VERB' && !plural) return normal;

    const key = `${pos}:${normal}`;
    const cached = this.lemmas.get(key);
    if (cached !== undefined) return cached;

    const lemma = pos === 'VERB'
      ? firstWord(nlp(normal).verbs().toInfinitive().text()) || normal
      : firstWord(nlp(normal).nouns().toSingular().text()) || normal;
    if (this.lemmas.size >= MAX_CACHED_LEMMAS) this.lemmas.clear();
    this.lemmas.set(key, lemma);
    return lemma;
  }
}
