/**
 * Language Registry
 *
 * Capability-keyed lookup: language code -> {vocabulary, rules, analyzer,
 * supported components}. Packs are independent of each other; a partial
 * language only declares what it actually has.
 */

import { ConfigurationError, UnsupportedLanguageError } from '../errors.js';
import { ComponentKind } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { CompromiseAnalyzer } from '../analysis/compromise-analyzer.js';
import { LexiconAnalyzer } from '../analysis/lexical.js';
import { LinguisticAnalyzer } from '../analysis/types.js';
import { Inflector, englishInflector, spanishInflector } from './inflection.js';
import { PatternRuleSet, RuleCoverage } from './rules.js';
import {
  PatternRuleData,
  RuleFileSchema,
  VocabularyData,
  VocabularyExtension,
  VocabularyFileSchema,
} from './schemas.js';
import { VocabularyStore } from './vocabulary.js';
import enVocabulary from './data/en.vocabulary.json';
import enRules from './data/en.rules.json';
import esVocabulary from './data/es.vocabulary.json';
import esRules from './data/es.rules.json';

const log = createLogger('language');

interface PackDefinition {
  components: readonly ComponentKind[];
  inflector: Inflector;
  vocabularyFile: unknown;
  ruleFile: unknown;
  analyzer: (vocabulary: VocabularyStore) => LinguisticAnalyzer;
}

const PACKS: Record<string, PackDefinition> = {
  en: {
    components: ['PROMPT', 'TRANSCRIPT', 'STRUCTURED_DATA'],
    inflector: englishInflector,
    vocabularyFile: enVocabulary,
    ruleFile: enRules,
    analyzer: vocabulary => new CompromiseAnalyzer(vocabulary),
  },
  es: {
    components: ['PROMPT', 'STRUCTURED_DATA'],
    inflector: spanishInflector,
    vocabularyFile: esVocabulary,
    ruleFile: esRules,
    analyzer: vocabulary => new LexiconAnalyzer(vocabulary),
  },
};

export interface LanguagePack {
  code: string;
  coverage: RuleCoverage;
  components: readonly ComponentKind[];
  inflector: Inflector;
  vocabulary: VocabularyData;
  rules: PatternRuleSet;
  createAnalyzer(vocabulary: VocabularyStore): LinguisticAnalyzer;
}

/**
 * Everything one configuration needs to encode, built once and then shared
 * read-only
 */
export interface LanguageResources {
  language: string;
  coverage: RuleCoverage;
  components: readonly ComponentKind[];
  vocabulary: VocabularyStore;
  rules: PatternRuleSet;
  analyzer: LinguisticAnalyzer;
}

const loadedPacks = new Map<string, LanguagePack>();

export function supportedLanguages(): string[] {
  return Object.keys(PACKS);
}

export function isLanguageSupported(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(PACKS, code.toLowerCase());
}

export function languageComponents(code: string): readonly ComponentKind[] {
  const definition = PACKS[code.toLowerCase()];
  if (!definition) {
    throw new UnsupportedLanguageError(code);
  }
  return definition.components;
}

/**
 * Parse and compile a language's packaged tables. Cached for the process.
 */
export function loadLanguagePack(code: string): LanguagePack {
  const key = code.toLowerCase();
  const cached = loadedPacks.get(key);
  if (cached) return cached;

  const definition = PACKS[key];
  if (!definition) {
    throw new UnsupportedLanguageError(code);
  }

  const vocabulary = VocabularyFileSchema.safeParse(definition.vocabularyFile);
  if (!vocabulary.success) {
    throw new ConfigurationError(
      `Vocabulary for '${key}' is invalid: ${vocabulary.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      'INVALID_LANGUAGE_RESOURCES',
      { language: key }
    );
  }
  const ruleFile = RuleFileSchema.safeParse(definition.ruleFile);
  if (!ruleFile.success) {
    throw new ConfigurationError(
      `Pattern rules for '${key}' are invalid: ${ruleFile.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      'INVALID_LANGUAGE_RESOURCES',
      { language: key }
    );
  }

  const pack: LanguagePack = {
    code: key,
    coverage: ruleFile.data.coverage,
    components: definition.components,
    inflector: definition.inflector,
    vocabulary: vocabulary.data,
    rules: PatternRuleSet.compile(key, ruleFile.data.coverage, ruleFile.data.rules),
    createAnalyzer: definition.analyzer,
  };

  if (pack.coverage === 'partial') {
    log.info(`Language '${key}' has partial rule coverage`, {
      categories: pack.rules.categories(),
      components: [...pack.components],
    });
  }

  loadedPacks.set(key, pack);
  return pack;
}

/**
 * Build per-configuration resources: the base tables plus the caller's overlay
 */
export function buildLanguageResources(
  code: string,
  extension?: VocabularyExtension,
  ruleExtensions: readonly PatternRuleData[] = []
): LanguageResources {
  const pack = loadLanguagePack(code);
  const vocabulary = VocabularyStore.create(pack.vocabulary, pack.inflector, extension);
  return {
    language: pack.code,
    coverage: pack.coverage,
    components: pack.components,
    vocabulary,
    rules: pack.rules.extend(ruleExtensions),
    analyzer: pack.createAnalyzer(vocabulary),
  };
}
