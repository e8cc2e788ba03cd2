/**
 * Output Assembler
 *
 * Normalizes the encoder's text, estimates token counts and applies the
 * no-regression fallback: whenever the encoding is empty, not smaller
 * than the original, or below the configured minimum ratio, the original
 * is returned verbatim and the ratio is zero.
 */

import { AssemblerOptions } from '../config/schema.js';
import { MatchBudget } from '../language/budget.js';
import { EncodedCandidate, FallbackInfo, FallbackReason } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { normalizeWhitespace } from '../utils/text.js';
import { EncodingResult } from './result.js';

const log = createLogger('assembler');

export function estimateTokens(text: string, charsPerToken: number): number {
  if (text.length === 0) return 0;
  return Math.ceil(text.length / charsPerToken);
}

export function ratioOf(nTokens: number, cTokens: number): number {
  if (nTokens <= 0) return 0;
  return Math.max(0, (1 - cTokens / nTokens) * 100);
}

export interface AssembleInput {
  candidate: EncodedCandidate;
  language: string;
  caller: Record<string, unknown>;
  budget?: MatchBudget;
}

export function fallbackReason(
  original: string,
  compressed: string,
  options: Readonly<AssemblerOptions>
): FallbackReason | undefined {
  if (original.trim().length === 0) return 'EMPTY_INPUT';
  if (compressed.length === 0) return 'EMPTY_ENCODING';
  if (compressed.length >= original.length) return 'NOT_SMALLER';

  const ratio = ratioOf(
    estimateTokens(original, options.charsPerToken),
    estimateTokens(compressed, options.charsPerToken)
  );
  if (options.minCompressionRatio > 0 && ratio < options.minCompressionRatio) return 'BELOW_MIN_RATIO';
  return undefined;
}

export function assemble(input: AssembleInput, options: Readonly<AssemblerOptions>): EncodingResult {
  const { candidate, budget } = input;
  const original = candidate.original;
  const normalized = normalizeWhitespace(candidate.compressed);
  const reason = fallbackReason(original, normalized, options);
  const compressed = reason ? original : normalized;

  const fallback: FallbackInfo = reason ? { applied: true, reason } : { applied: false };
  if (reason) {
    log.debug('Fallback applied', { kind: candidate.kind, reason, originalLength: original.length });
  }

  const nTokens = estimateTokens(original, options.charsPerToken);
  return new EncodingResult({
    original,
    kind: candidate.kind,
    compressed,
    nTokens,
    cTokens: reason ? nTokens : estimateTokens(compressed, options.charsPerToken),
    metadata: {
      language: input.language,
      caller: { ...input.caller },
      tokens: [...candidate.tokens],
      fallback,
      degraded: budget?.degraded ?? false,
      warnings: [...candidate.warnings, ...(budget?.warnings() ?? [])],
      details: candidate.details,
    },
  });
}
