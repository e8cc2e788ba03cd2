/**
 * Tests for linguistic analysis
 */

import { LexiconAnalyzer, splitSentences } from '../src/analysis/lexical.js';
import { buildLanguageResources } from '../src/language/registry.js';

describe('Lexical analysis', () => {
  const { vocabulary } = buildLanguageResources('en');
  const analyzer = new LexiconAnalyzer(vocabulary);

  it('should split sentences on terminal punctuation and newlines', () => {
    expect(splitSentences('First one. Second one?\nThird line\n\n')).toEqual(['First one.', 'Second one?', 'Third line']);
  });

  it('should index tokens across sentences', () => {
    const analysis = analyzer.analyze('List the issues. Summarize them.');

    expect(analysis.analyzer).toBe('lexicon');
    expect(analysis.sentences).toHaveLength(2);
    expect(analysis.tokens.map(t => t.index)).toEqual([0, 1, 2, 3, 4]);
    expect(analysis.sentences[1].tokens[0].sentence).toBe(1);
    expect(analysis.tokens[2].post).toBe('.');
  });

  it('should tag vocabulary verbs, numbers and stop words', () => {
    const analysis = analyzer.analyze('Give me twelve ideas');

    expect(analysis.tokens.map(t => t.pos)).toEqual(['VERB', 'OTHER', 'NUM', 'NOUN']);
    expect(analysis.tokens[3].lemma).toBe('idea');
  });

  it('should mark role and conditional clauses', () => {
    const analysis = analyzer.analyze('You are a support agent. If no product matches, return an empty array.');

    expect(analysis.sentences[0].tokens.map(t => t.clause)).toEqual(['role', 'role', 'role', 'role', 'role']);
    expect(analysis.sentences[1].tokens.map(t => t.clause)).toEqual([
      'conditional', 'conditional', 'conditional', 'conditional', 'main', 'main', 'main', 'main',
    ]);
  });

  it('should mark tokens that open a clause', () => {
    const analysis = analyzer.analyze('Extract the names, and then rank them');

    expect(analysis.tokens.filter(t => t.opensClause).map(t => t.normal)).toEqual(['extract', 'and', 'then', 'rank']);
  });

  it('should detect questions', () => {
    const analysis = analyzer.analyze('How many orders shipped late. Why?');

    expect(analysis.sentences.map(s => s.question)).toEqual([true, true]);
  });
});

describe('compromise analysis', () => {
  const { analyzer } = buildLanguageResources('en');

  it('should tag English text with the NLP toolkit', () => {
    const analysis = analyzer.analyze('Summarize the report.');

    expect(analysis.analyzer).toBe('compromise');
    expect(analysis.tokens.map(t => t.normal)).toEqual(['summarize', 'the', 'report']);
    expect(analysis.tokens[2].post).toBe('.');
  });

  it('should return an empty analysis for empty text', () => {
    const analysis = analyzer.analyze('   ');

    expect(analysis.sentences).toEqual([]);
    expect(analysis.tokens).toEqual([]);
  });
});
