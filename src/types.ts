/**
 * Semantic Compressor - Core Type Definitions
 */

// ==================== Components ====================

export type ComponentKind = 'PROMPT' | 'TRANSCRIPT' | 'STRUCTURED_DATA';

export const COMPONENT_KINDS: readonly ComponentKind[] = ['PROMPT', 'TRANSCRIPT', 'STRUCTURED_DATA'];

export function isComponentKind(value: unknown): value is ComponentKind {
  return typeof value === 'string' && COMPONENT_KINDS.some(kind => kind === value);
}

export type PromptMode = 'TASK' | 'CONFIGURATION';

// ==================== Input ====================

export type StructuredRecord = Record<string, unknown>;

/**
 * Anything encode() accepts: free text, a list of records, or a single record
 */
export type EncoderInput = string | readonly unknown[] | StructuredRecord;

/**
 * Caller metadata. Known keys steer encoders; everything is echoed back
 * in the result metadata under `caller`.
 */
export interface EncodingMetadata {
  kind?: ComponentKind;
  [key: string]: unknown;
}

export function isPlainRecord(value: unknown): value is StructuredRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ==================== Engine Settings ====================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Process-wide engine settings (see utils/config.ts)
 */
export interface EngineSettings {
  language: string;
  charsPerToken: number;
  minCompressionRatio: number;
  patternStepBudget: number;
  patternTimeBudgetMs: number;
  maxPatternInputLength: number;
  logLevel: LogLevel;
}

// ==================== Result ====================

export type FallbackReason = 'EMPTY_INPUT' | 'EMPTY_ENCODING' | 'NOT_SMALLER' | 'BELOW_MIN_RATIO';

export interface FallbackInfo {
  applied: boolean;
  reason?: FallbackReason;
}

export interface ResultMetadata {
  language: string;
  caller: Record<string, unknown>;
  tokens: string[];
  fallback: FallbackInfo;
  degraded: boolean;
  warnings: string[];
  details: Record<string, unknown>;
}

/**
 * What an encoder hands to the output assembler
 */
export interface EncodedCandidate {
  kind: ComponentKind;
  original: string;
  compressed: string;
  tokens: string[];
  details: Record<string, unknown>;
  warnings: string[];
}
