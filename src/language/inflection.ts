/**
 * Inflection
 * Generates surface forms for vocabulary lemmas so lookups work on raw
 * text as well as on analyzer lemmas.
 */

export interface Inflector {
  /** Surface forms of a verb lemma, the lemma included */
  verbForms(lemma: string): string[];
  plural(noun: string): string;
  singular(noun: string): string;
}

const VOWELS = 'aeiou';

function isConsonant(ch: string | undefined): boolean {
  return ch !== undefined && /[a-z]/.test(ch) && !VOWELS.includes(ch);
}

/** Single-syllable consonant-vowel-consonant verbs double the last letter: map -> mapped */
function doublesFinalConsonant(lemma: string): boolean {
  return /^[^aeiou]*[aeiou][bdgmnprt]$/.test(lemma);
}

export const englishInflector: Inflector = {
  verbForms(lemma: string): string[] {
    const word = lemma.toLowerCase();
    if (word.includes(' ')) return [word];

    const last = word[word.length - 1];
    const beforeLast = word[word.length - 2];
    const forms = new Set<string>([word]);

    // third person
    if (/(s|x|z|ch|sh)$/.test(word)) {
      forms.add(`${word}es`);
    } else if (last === 'y' && isConsonant(beforeLast)) {
      forms.add(`${word.slice(0, -1)}ies`);
    } else {
      forms.add(`${word}s`);
    }

    // past and gerund
    if (last === 'e') {
      forms.add(`${word}d`);
      forms.add(/(ee|ye|oe)$/.test(word) ? `${word}ing` : `${word.slice(0, -1)}ing`);
    } else if (last === 'y' && isConsonant(beforeLast)) {
      forms.add(`${word.slice(0, -1)}ied`);
      forms.add(`${word}ing`);
    } else if (doublesFinalConsonant(word)) {
      forms.add(`${word}${last}ed`);
      forms.add(`${word}${last}ing`);
    } else {
      forms.add(`${word}ed`);
      forms.add(`${word}ing`);
    }

    return [...forms];
  },

  plural(noun: string): string {
    const word = noun.toLowerCase();
    if (/(s|x|z|ch|sh)$/.test(word)) return `${word}es`;
    if (word.endsWith('y') && isConsonant(word[word.length - 2])) return `${word.slice(0, -1)}ies`;
    return `${word}s`;
  },

  singular(noun: string): string {
    const word = noun.toLowerCase();
    if (word.length > 4 && word.endsWith('ies')) return `${word.slice(0, -3)}y`;
    if (/(ss|x|z|ch|sh)es$/.test(word)) return word.slice(0, -2);
    if (word.length > 2 && word.endsWith('s') && !word.endsWith('ss') && !word.endsWith('us') && !word.endsWith('is')) {
      return word.slice(0, -1);
    }
    return word;
  },
};

/**
 * Regular Spanish conjugation for the imperative, present, gerund and
 * participle. Irregular verbs are listed in the vocabulary file.
 */
export const spanishInflector: Inflector = {
  verbForms(lemma: string): string[] {
    const word = lemma.toLowerCase();
    const forms = new Set<string>([word]);
    const match = word.match(/^(.+)(ar|er|ir)$/);
    if (!match || word.includes(' ')) return [...forms];

    const [, stem, ending] = match;
    if (ending === 'ar') {
      for (const suffix of ['a', 'e', 'an', 'en', 'ando', 'ado', 'ados', 'ada']) forms.add(`${stem}${suffix}`);
    } else {
      for (const suffix of ['e', 'a', 'en', 'an', 'iendo', 'ido', 'idos', 'ida']) forms.add(`${stem}${suffix}`);
    }
    return [...forms];
  },

  plural(noun: string): string {
    const word = noun.toLowerCase();
    if (/[aeiouáéó]$/.test(word)) return `${word}s`;
    if (word.endsWith('z')) return `${word.slice(0, -1)}ces`;
    return `${word}es`;
  },

  singular(noun: string): string {
    const word = noun.toLowerCase();
    if (word.endsWith('ces')) return `${word.slice(0, -3)}z`;
    if (/[^aeiou]es$/.test(word) && word.length > 4) return word.slice(0, -2);
    if (word.endsWith('s') && word.length > 3) return word.slice(0, -1);
    return word;
  },
};
