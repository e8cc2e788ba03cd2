/**
 * Schemas for language resource files
 * Vocabulary and rule tables are plain JSON, validated once when first loaded.
 */

import { z } from 'zod';

/** canonical token -> phrases */
export const SynonymTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export type SynonymTable = z.infer<typeof SynonymTableSchema>;

export const TranscriptVocabularySchema = z.object({
  agentLabels: z.array(z.string()),
  customerLabels: z.array(z.string()),
  systemLabels: z.array(z.string()),
  salesKeywords: z.array(z.string()),
  issues: SynonymTableSchema,
  billingIssues: z.array(z.string()),
  severity: SynonymTableSchema,
  actions: SynonymTableSchema,
  creditActions: z.array(z.string()),
  methods: SynonymTableSchema,
  steps: SynonymTableSchema,
  completion: z.array(z.string()),
  resolutions: SynonymTableSchema,
  sentiments: SynonymTableSchema,
  sentimentIntensity: z.record(z.string(), z.number().nonnegative()),
  frequencies: SynonymTableSchema,
  tiers: z.array(z.string()),
});

export type TranscriptVocabulary = z.infer<typeof TranscriptVocabularySchema>;

export const VocabularyFileSchema = z.object({
  language: z.string().min(2),
  actions: SynonymTableSchema,
  actionPhrases: SynonymTableSchema,
  imperatives: SynonymTableSchema,
  irregular: z.record(z.string(), z.array(z.string())).default({}),
  pipelines: z.array(z.array(z.string()).min(2)),
  modifiers: z.record(z.string(), SynonymTableSchema),
  questions: SynonymTableSchema,
  noiseVerbs: z.array(z.string()),
  stopWords: z.array(z.string()),
  leadIns: z.array(z.string()),
  requestFrames: z.array(z.string()).default([]),
  sourceMarkers: z.array(z.string()).default([]),
  quantifiers: z.array(z.string()),
  numberWords: z.record(z.string(), z.number().int().positive()),
  clauses: z.object({
    conditional: z.array(z.string()),
    role: z.array(z.string()),
    openers: z.array(z.string()),
  }),
  targets: SynonymTableSchema,
  genericTargets: z.array(z.string()),
  compounds: SynonymTableSchema,
  fields: SynonymTableSchema,
  domains: SynonymTableSchema,
  configuration: z.object({
    cues: z.array(z.string()),
    protectedWords: z.array(z.string()),
    fragments: z.array(z.string()),
    metaPrefixes: z.array(z.string()),
    roleLabels: z.array(z.string()).default([]),
    roleTerminators: z.array(z.string()).default([]),
  }),
  transcript: TranscriptVocabularySchema.optional(),
});

export type VocabularyData = z.infer<typeof VocabularyFileSchema>;

/**
 * Caller-supplied additions layered over the base vocabulary
 */
export const VocabularyExtensionSchema = z.object({
  actions: SynonymTableSchema.optional(),
  actionPhrases: SynonymTableSchema.optional(),
  imperatives: SynonymTableSchema.optional(),
  targets: SynonymTableSchema.optional(),
  compounds: SynonymTableSchema.optional(),
  fields: SynonymTableSchema.optional(),
  domains: SynonymTableSchema.optional(),
  pipelines: z.array(z.array(z.string()).min(2)).optional(),
}).strict();

export type VocabularyExtension = z.infer<typeof VocabularyExtensionSchema>;

export const RULE_ATTACHMENTS = ['REQ', 'TARGET', 'CTX', 'OUT'] as const;

export type RuleAttachment = (typeof RULE_ATTACHMENTS)[number];

export const PatternRuleSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'flags may only contain i, m, s, u').default('i'),
  key: z.string().min(1),
  value: z.string(),
  transform: z.enum(['upper', 'lower', 'none']).default('upper'),
  attach: z.enum(RULE_ATTACHMENTS).default('CTX'),
  impliesIntent: z.string().optional(),
});

export type PatternRuleData = z.infer<typeof PatternRuleSchema>;

export type PatternRuleInput = z.input<typeof PatternRuleSchema>;

export const RuleFileSchema = z.object({
  language: z.string().min(2),
  coverage: z.enum(['full', 'partial']),
  rules: z.array(PatternRuleSchema),
});

export type RuleFileData = z.infer<typeof RuleFileSchema>;
