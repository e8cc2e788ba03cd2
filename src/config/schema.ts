/**
 * Encoding Configuration
 *
 * Built once per caller session by createEncodingConfiguration(). The
 * returned object is deep-frozen and may be shared freely between
 * concurrent encode calls; its language resources are built eagerly so
 * an unsupported language or a bad rule fails here rather than mid-encode.
 */

import { z } from 'zod';
import { InvalidConfigurationError, UnsupportedLanguageError } from '../errors.js';
import { MatchLimits } from '../language/budget.js';
import {
  LanguageResources,
  buildLanguageResources,
  languageComponents,
} from '../language/registry.js';
import { PatternRuleSchema, VocabularyExtensionSchema } from '../language/schemas.js';
import { COMPONENT_KINDS, ComponentKind, isPlainRecord } from '../types.js';
import { getConfig } from '../utils/config.js';

const ComponentKindSchema = z.enum(['PROMPT', 'TRANSCRIPT', 'STRUCTURED_DATA']);

export const PromptOptionsSchema = z.object({
  mode: z.enum(['auto', 'TASK', 'CONFIGURATION']).default('auto'),
  inferTypes: z.boolean().default(false),
  annotateEnums: z.boolean().default(true),
  minIntentConfidence: z.number().min(0).max(1).default(0.8),
  minimize: z.boolean().default(true),
}).strict();

export const TranscriptOptionsSchema = z.object({
  defaultChannel: z.string().min(1).default('VOICE'),
  turnsPerMinute: z.number().positive().default(2),
  includeContact: z.boolean().default(true),
  includeCustomer: z.boolean().default(true),
}).strict();

export const StructuredOptionsSchema = z.object({
  requiredFields: z.array(z.string().min(1)).default([]),
  excludedFields: z.array(z.string().min(1)).default([]),
  fieldImportance: z.record(z.string(), z.number().min(0).max(1)).default({}),
  importanceThreshold: z.number().min(0).max(1).default(0.5),
  autoDetect: z.boolean().default(true),
  maxFieldLength: z.number().int().positive().default(200),
  preserveStructure: z.boolean().default(true),
  datasetName: z.string().min(1).default('DATASET'),
}).strict();

const AssemblerOptionsSchema = z.object({
  charsPerToken: z.number().positive().optional(),
  minCompressionRatio: z.number().min(0).max(100).optional(),
}).strict();

const LimitsSchema = z.object({
  patternStepBudget: z.number().int().positive().optional(),
  patternTimeBudgetMs: z.number().positive().optional(),
  maxPatternInputLength: z.number().int().positive().optional(),
}).strict();

export const EncodingConfigurationSchema = z.object({
  language: z.string().min(2).optional(),
  components: z.array(ComponentKindSchema).min(1).optional(),
  prompt: PromptOptionsSchema.default({}),
  transcript: TranscriptOptionsSchema.default({}),
  structured: StructuredOptionsSchema.default({}),
  assembler: AssemblerOptionsSchema.default({}),
  limits: LimitsSchema.default({}),
  vocabularyExtension: VocabularyExtensionSchema.optional(),
  ruleExtensions: z.array(PatternRuleSchema).default([]),
}).strict();

export type EncodingConfigurationInput = z.input<typeof EncodingConfigurationSchema>;

export type PromptOptions = z.infer<typeof PromptOptionsSchema>;
export type TranscriptOptions = z.infer<typeof TranscriptOptionsSchema>;
export type StructuredOptions = z.infer<typeof StructuredOptionsSchema>;

export interface AssemblerOptions {
  charsPerToken: number;
  minCompressionRatio: number;
}

type Parsed = z.infer<typeof EncodingConfigurationSchema>;

export interface EncodingConfiguration {
  readonly language: string;
  readonly components: readonly ComponentKind[];
  readonly prompt: Readonly<PromptOptions>;
  readonly transcript: Readonly<TranscriptOptions>;
  readonly structured: Readonly<StructuredOptions>;
  readonly assembler: Readonly<AssemblerOptions>;
  readonly limits: Readonly<MatchLimits>;
  readonly vocabularyExtension?: Parsed['vocabularyExtension'];
  readonly ruleExtensions: Parsed['ruleExtensions'];
}

const resources = new WeakMap<EncodingConfiguration, LanguageResources>();

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate, default and freeze an encoding configuration.
 * Throws InvalidConfigurationError, UnsupportedLanguageError or
 * InvalidPatternError.
 */
export function createEncodingConfiguration(input: EncodingConfigurationInput = {}): EncodingConfiguration {
  return parseEncodingConfiguration(input);
}

/**
 * Same as createEncodingConfiguration(), for values of unknown shape such
 * as a parsed JSON file
 */
export function parseEncodingConfiguration(input: unknown): EncodingConfiguration {
  const parsed = EncodingConfigurationSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const settings = getConfig();
  const data = parsed.data;
  const language = (data.language ?? settings.language).toLowerCase();
  const supported = languageComponents(language);
  const components = data.components ? [...new Set(data.components)] : [...supported];

  for (const component of components) {
    if (!supported.includes(component)) {
      throw new UnsupportedLanguageError(language, component);
    }
  }

  const config: EncodingConfiguration = deepFreeze({
    language,
    components: COMPONENT_KINDS.filter(kind => components.includes(kind)),
    prompt: data.prompt,
    transcript: data.transcript,
    structured: data.structured,
    assembler: {
      charsPerToken: data.assembler.charsPerToken ?? settings.charsPerToken,
      minCompressionRatio: data.assembler.minCompressionRatio ?? settings.minCompressionRatio,
    },
    limits: {
      patternStepBudget: data.limits.patternStepBudget ?? settings.patternStepBudget,
      patternTimeBudgetMs: data.limits.patternTimeBudgetMs ?? settings.patternTimeBudgetMs,
      maxPatternInputLength: data.limits.maxPatternInputLength ?? settings.maxPatternInputLength,
    },
    vocabularyExtension: data.vocabularyExtension,
    ruleExtensions: data.ruleExtensions,
  });

  resources.set(config, buildLanguageResources(language, config.vocabularyExtension, config.ruleExtensions));
  return config;
}

/**
 * Lay `overrides` over `base` one section deep, so overriding
 * `prompt.mode` keeps the other prompt options of the base
 */
export function mergeConfigurationInput(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = merged[key];
    merged[key] = isPlainRecord(current) && isPlainRecord(value) ? { ...current, ...value } : value;
  }
  return merged;
}

/**
 * Language resources of a configuration, built on first use for objects
 * that did not come from createEncodingConfiguration()
 */
export function getLanguageResources(config: EncodingConfiguration): LanguageResources {
  const cached = resources.get(config);
  if (cached) return cached;
  const built = buildLanguageResources(config.language, config.vocabularyExtension, config.ruleExtensions);
  resources.set(config, built);
  return built;
}

export function isComponentEnabled(config: EncodingConfiguration, component: ComponentKind): boolean {
  return config.components.includes(component);
}
