/**
 * Semantic Compressor
 *
 * Encodes verbose natural-language artifacts into a compact token grammar
 * a language model can read directly:
 * - Prompts (task and configuration mode) as REQ/TARGET/EXTRACT/CTX/OUT/REF tokens
 * - Customer-service transcripts as CALL/ISSUE/ACTION/RESOLUTION/SENTIMENT tokens
 * - Record sets as a schema header plus one compressed row per record
 *
 * Every result goes through a no-regression fallback: an encoding that is
 * not smaller than its input is replaced by the input.
 */

export * from './types.js';
export * from './errors.js';
export * from './encoder.js';
export * from './classifier.js';
export * from './session.js';

export {
  EncodingConfiguration,
  EncodingConfigurationInput,
  PromptOptions,
  TranscriptOptions,
  StructuredOptions,
  AssemblerOptions,
  createEncodingConfiguration,
  parseEncodingConfiguration,
  getLanguageResources,
  isComponentEnabled,
} from './config/schema.js';

export { EncodingResult } from './output/result.js';
export { assemble, estimateTokens, ratioOf } from './output/assembler.js';

export * from './tokens/grammar.js';

export { MatchBudget, MatchLimits } from './language/budget.js';
export { VocabularyStore } from './language/vocabulary.js';
export { PatternRuleSet, RuleMatch } from './language/rules.js';
export { supportedLanguages, isLanguageSupported, languageComponents } from './language/registry.js';
export { VocabularyExtension, PatternRuleInput } from './language/schemas.js';

export { PromptEncoder } from './prompt/encoder.js';
export { TranscriptEncoder } from './transcript/encoder.js';
export { StructuredDataEncoder } from './structured/encoder.js';
export { extractPlaceholders, validateTemplate, bindPlaceholders, TemplateIssue, BindingValue } from './prompt/template.js';

export { loadConfig, getConfig, updateConfig, resetConfig, saveConfig, validateConfig } from './utils/config.js';
