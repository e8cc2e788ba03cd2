/**
 * Vocabulary Store
 *
 * Immutable per-language phrase tables. A store is built once from the base
 * table plus an optional caller overlay and is then shared read-only by every
 * resolver and encoder of a configuration. Nothing mutates it afterwards.
 */

import { Inflector } from './inflection.js';
import {
  SynonymTable,
  TranscriptVocabulary,
  VocabularyData,
  VocabularyExtension,
} from './schemas.js';
import { escapeRegex, phraseAlternation, splitWords, wholePhraseRegex } from '../utils/text.js';

export interface CompiledEntry {
  canonical: string;
  phrases: readonly string[];
  regex: RegExp;
}

export interface ActionPhrase {
  canonical: string;
  firstForms: ReadonlySet<string>;
  rest: readonly string[];
}

export interface KeywordEntry {
  keyword: string;
  canonical: string;
  regex: RegExp;
}

export interface CompiledTranscriptVocabulary {
  raw: TranscriptVocabulary;
  agentLabels: ReadonlySet<string>;
  customerLabels: ReadonlySet<string>;
  systemLabels: ReadonlySet<string>;
  sales: RegExp | null;
  /** every issue keyword, longest first */
  issueKeywords: readonly KeywordEntry[];
  severity: readonly CompiledEntry[];
  actions: readonly CompiledEntry[];
  methods: readonly CompiledEntry[];
  steps: readonly CompiledEntry[];
  resolutions: readonly CompiledEntry[];
  sentiments: readonly CompiledEntry[];
  frequencies: readonly CompiledEntry[];
  completion: RegExp | null;
  tiers: RegExp | null;
}

function compileTable(table: SynonymTable, expand?: (phrase: string) => string[]): CompiledEntry[] {
  const entries: CompiledEntry[] = [];
  for (const [canonical, phrases] of Object.entries(table)) {
    const all = expand ? phrases.flatMap(expand) : [...phrases];
    const regex = wholePhraseRegex(all);
    if (regex) entries.push({ canonical, phrases: all, regex });
  }
  return entries;
}

function mergeTable(base: SynonymTable, extra: SynonymTable | undefined): SynonymTable {
  if (!extra) return base;
  const merged: SynonymTable = {};
  for (const [canonical, phrases] of Object.entries(base)) {
    merged[canonical] = [...phrases];
  }
  for (const [canonical, phrases] of Object.entries(extra)) {
    const key = canonical.toUpperCase();
    merged[key] = [...new Set([...(merged[key] ?? []), ...phrases.map(p => p.toLowerCase())])];
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class VocabularyStore {
  readonly language: string;
  readonly data: VocabularyData;

  private readonly actionIndex = new Map<string, string>();
  private readonly imperativeIndex = new Map<string, string>();
  private readonly noise = new Set<string>();
  private readonly stop: ReadonlySet<string>;
  private readonly leadInSet: ReadonlySet<string>;
  private readonly quantifierSet: ReadonlySet<string>;
  private readonly openerSet: ReadonlySet<string>;
  private readonly roleTerminatorSet: ReadonlySet<string>;

  readonly actionPhrases: readonly ActionPhrase[];
  readonly questions: readonly CompiledEntry[];
  readonly conditionalMarkers: readonly (readonly string[])[];
  readonly roleMarkers: readonly (readonly string[])[];
  /** polite wrappers before a command: "can you", "i need you to" */
  readonly requestFrames: readonly (readonly string[])[];
  readonly targets: readonly CompiledEntry[];
  readonly compounds: readonly KeywordEntry[];
  readonly fields: readonly CompiledEntry[];
  readonly domains: readonly CompiledEntry[];
  readonly configurationCues: RegExp | null;
  readonly protectedWords: RegExp | null;
  readonly fragments: RegExp | null;
  readonly metaPrefixes: RegExp | null;
  /** "from", "out of": where an extraction list ends and its source begins */
  readonly sourceMarker: RegExp | null;
  /** `Role: ...` line; group 1 is the declared role */
  readonly roleLabel: RegExp | null;
  readonly transcript?: CompiledTranscriptVocabulary;

  private readonly modifierIndex = new Map<string, CompiledEntry[]>();

  private constructor(data: VocabularyData, readonly inflector: Inflector) {
    this.language = data.language;
    this.data = deepFreeze(data);

    const formsOf = (lemma: string): string[] => [
      ...inflector.verbForms(lemma),
      ...(data.irregular[lemma.toLowerCase()] ?? []),
    ];

    for (const verb of data.noiseVerbs) {
      for (const form of formsOf(verb)) this.noise.add(form);
    }

    for (const [canonical, synonyms] of Object.entries(data.actions)) {
      for (const synonym of synonyms) {
        for (const form of formsOf(synonym)) {
          if (!this.actionIndex.has(form)) this.actionIndex.set(form, canonical);
          if (!this.imperativeIndex.has(form)) this.imperativeIndex.set(form, canonical);
        }
      }
    }
    for (const [canonical, verbs] of Object.entries(data.imperatives)) {
      for (const verb of verbs) {
        for (const form of formsOf(verb)) {
          if (!this.imperativeIndex.has(form)) this.imperativeIndex.set(form, canonical);
        }
      }
    }

    const phrases: ActionPhrase[] = [];
    for (const [canonical, list] of Object.entries(data.actionPhrases)) {
      for (const phrase of list) {
        const words = splitWords(phrase);
        if (words.length < 2) continue;
        phrases.push({ canonical, firstForms: new Set(formsOf(words[0])), rest: words.slice(1) });
      }
    }
    this.actionPhrases = phrases.sort((a, b) => b.rest.length - a.rest.length);

    this.questions = Object.entries(data.questions).flatMap(([canonical, list]) => {
      const alternation = phraseAlternation(list);
      return alternation
        ? [{ canonical, phrases: list, regex: new RegExp(`^\\s*(?:${alternation})(?![\\p{L}\\p{N}_])`, 'iu') }]
        : [];
    });

    for (const [intent, table] of Object.entries(data.modifiers)) {
      this.modifierIndex.set(intent, compileTable(table));
    }

    this.stop = new Set(data.stopWords);
    this.leadInSet = new Set(data.leadIns);
    this.quantifierSet = new Set(data.quantifiers);
    this.openerSet = new Set(data.clauses.openers);
    this.conditionalMarkers = data.clauses.conditional.map(splitWords);
    this.roleMarkers = data.clauses.role.map(splitWords).sort((a, b) => b.length - a.length);
    this.requestFrames = data.requestFrames.map(splitWords).sort((a, b) => b.length - a.length);

    const withPlurals = (phrase: string): string[] => {
      const words = phrase.toLowerCase().split(/\s+/);
      const last = words[words.length - 1];
      return [phrase.toLowerCase(), [...words.slice(0, -1), inflector.plural(last)].join(' ')];
    };
    this.targets = compileTable(data.targets, withPlurals);
    this.fields = compileTable(data.fields, withPlurals);
    this.domains = compileTable(data.domains);
    this.compounds = Object.entries(data.compounds)
      .flatMap(([canonical, list]) => list.flatMap(withPlurals).map(keyword => ({ keyword, canonical })))
      .sort((a, b) => b.keyword.length - a.keyword.length)
      .flatMap(({ keyword, canonical }) => {
        const regex = wholePhraseRegex([keyword]);
        return regex ? [{ keyword, canonical, regex }] : [];
      });

    this.configurationCues = wholePhraseRegex(data.configuration.cues);
    this.protectedWords = wholePhraseRegex(data.configuration.protectedWords);
    this.fragments = data.configuration.fragments.length > 0
      ? new RegExp(`^(?:${phraseAlternation(data.configuration.fragments)})[.!]?$`, 'i')
      : null;
    this.metaPrefixes = data.configuration.metaPrefixes.length > 0
      ? new RegExp(`^(?:${data.configuration.metaPrefixes.map(p => escapeRegex(p.toLowerCase())).join('|')})`, 'i')
      : null;
    this.roleLabel = data.configuration.roleLabels.length > 0
      ? new RegExp(`^[ \\t]*(?:${phraseAlternation(data.configuration.roleLabels)})[ \\t]*:[ \\t]*([^\\n]+)$`, 'im')
      : null;
    this.sourceMarker = wholePhraseRegex(data.sourceMarkers);
    this.roleTerminatorSet = new Set(data.configuration.roleTerminators);

    if (data.transcript) {
      this.transcript = compileTranscript(data.transcript);
    }
  }

  /**
   * Build a store from a base table and an optional overlay. The base table
   * is never modified; overlay synonyms are appended per canonical token.
   */
  static create(base: VocabularyData, inflector: Inflector, extension?: VocabularyExtension): VocabularyStore {
    if (!extension) {
      return new VocabularyStore(base, inflector);
    }
    const merged: VocabularyData = {
      ...base,
      actions: mergeTable(base.actions, extension.actions),
      actionPhrases: mergeTable(base.actionPhrases, extension.actionPhrases),
      imperatives: mergeTable(base.imperatives, extension.imperatives),
      targets: mergeTable(base.targets, extension.targets),
      compounds: mergeTable(base.compounds, extension.compounds),
      fields: mergeTable(base.fields, extension.fields),
      domains: mergeTable(base.domains, extension.domains),
      pipelines: [...base.pipelines, ...(extension.pipelines ?? []).map(p => p.map(step => step.toUpperCase()))],
    };
    return new VocabularyStore(merged, inflector);
  }

  /** Canonical action for a word (any inflection), unless it is a noise verb */
  actionFor(word: string): string | undefined {
    const key = word.toLowerCase();
    if (this.noise.has(key)) return undefined;
    return this.actionIndex.get(key);
  }

  /** Like actionFor, but also accepts command-only verbs (give, tell, ...) */
  imperativeFor(word: string): string | undefined {
    const key = word.toLowerCase();
    if (this.noise.has(key)) return undefined;
    return this.imperativeIndex.get(key);
  }

  isNoiseVerb(word: string): boolean {
    return this.noise.has(word.toLowerCase());
  }

  isStopWord(word: string): boolean {
    return this.stop.has(word.toLowerCase());
  }

  isLeadIn(word: string): boolean {
    return this.leadInSet.has(word.toLowerCase());
  }

  isQuantifier(word: string): boolean {
    return this.quantifierSet.has(word.toLowerCase());
  }

  isOpener(word: string): boolean {
    return this.openerSet.has(word.toLowerCase());
  }

  isRoleTerminator(word: string): boolean {
    return this.roleTerminatorSet.has(word.toLowerCase());
  }

  numberWord(word: string): number | undefined {
    return this.data.numberWords[word.toLowerCase()];
  }

  get pipelines(): readonly (readonly string[])[] {
    return this.data.pipelines;
  }

  modifiersFor(intent: string): readonly CompiledEntry[] {
    return this.modifierIndex.get(intent) ?? [];
  }

  isGenericTarget(canonical: string): boolean {
    return this.data.genericTargets.includes(canonical);
  }

  hasComponentVocabulary(component: 'TRANSCRIPT'): boolean {
    return component === 'TRANSCRIPT' && this.transcript !== undefined;
  }
}

function compileTranscript(raw: TranscriptVocabulary): CompiledTranscriptVocabulary {
  const issueKeywords = Object.entries(raw.issues)
    .flatMap(([canonical, keywords]) => keywords.map(keyword => ({ keyword: keyword.toLowerCase(), canonical })))
    // stable sort keeps data order among keywords of equal length
    .sort((a, b) => b.keyword.length - a.keyword.length)
    .flatMap(({ keyword, canonical }) => {
      const regex = wholePhraseRegex([keyword]);
      return regex ? [{ keyword, canonical, regex }] : [];
    });

  return {
    raw,
    agentLabels: new Set(raw.agentLabels),
    customerLabels: new Set(raw.customerLabels),
    systemLabels: new Set(raw.systemLabels),
    sales: wholePhraseRegex(raw.salesKeywords),
    issueKeywords,
    severity: compileTable(raw.severity),
    actions: compileTable(raw.actions),
    methods: compileTable(raw.methods),
    steps: compileTable(raw.steps),
    resolutions: compileTable(raw.resolutions),
    sentiments: compileTable(raw.sentiments),
    frequencies: compileTable(raw.frequencies),
    completion: wholePhraseRegex(raw.completion),
    tiers: raw.tiers.length > 0
      ? new RegExp(`\\b(${phraseAlternation(raw.tiers)})\\s+(?:member|customer|tier|plan|account|status)\\b`, 'i')
      : null,
  };
}
