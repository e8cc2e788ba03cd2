/**
 * Semantic Encoder
 * Entry point tying classification, the three component encoders and the
 * output assembler together.
 */

import { classifyInput } from './classifier.js';
import {
  EncodingConfiguration,
  createEncodingConfiguration,
  isComponentEnabled,
} from './config/schema.js';
import {
  ComponentNotEnabledError,
  InvalidInputError,
  isCompressorError,
} from './errors.js';
import { assemble } from './output/assembler.js';
import { EncodingResult } from './output/result.js';
import { PromptEncoder } from './prompt/encoder.js';
import { BindingValue, bindPlaceholders } from './prompt/template.js';
import { createSession } from './session.js';
import { StructuredDataEncoder } from './structured/encoder.js';
import { TranscriptEncoder } from './transcript/encoder.js';
import {
  ComponentKind,
  EncodedCandidate,
  EncoderInput,
  EncodingMetadata,
  isComponentKind,
} from './types.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('encoder');

export interface BatchItem {
  input: EncoderInput;
  metadata?: EncodingMetadata;
}

export type BatchOutcome =
  | { ok: true; result: EncodingResult }
  | { ok: false; error: { code: string; message: string } };

function requestedKind(metadata: EncodingMetadata): ComponentKind | undefined {
  const kind: unknown = metadata.kind;
  if (kind === undefined) return undefined;
  if (!isComponentKind(kind)) {
    throw new InvalidInputError('metadata.kind', `unknown component kind '${String(kind)}'`);
  }
  return kind;
}

function emptyCandidate(kind: ComponentKind, original: string): EncodedCandidate {
  return { kind, original, compressed: '', tokens: [], warnings: [], details: {} };
}

export class SemanticEncoder {
  private readonly prompt = new PromptEncoder();
  private readonly transcript = new TranscriptEncoder();
  private readonly structured = new StructuredDataEncoder();

  constructor(
    readonly config: EncodingConfiguration = createEncodingConfiguration(),
    private readonly clock?: () => number
  ) {}

  /**
   * Encode one input. The returned result has already been through the
   * no-regression fallback.
   */
  encode(input: EncoderInput, metadata: EncodingMetadata = {}): EncodingResult {
    const session = createSession(this.config, this.clock);
    const requested = requestedKind(metadata);
    const classified = classifyInput(input, session.resources.vocabulary.transcript, requested);

    if (requested === 'STRUCTURED_DATA' && classified.kind !== 'STRUCTURED_DATA') {
      throw new InvalidInputError('input', 'structured data must be a list of records, a record or JSON text');
    }
    if (!isComponentEnabled(this.config, classified.kind)) {
      throw new ComponentNotEnabledError(classified.kind);
    }

    let candidate: EncodedCandidate;
    if (classified.kind === 'STRUCTURED_DATA') {
      candidate = this.structured.encode(classified.records, metadata, session, classified.source);
    } else if (classified.text.trim().length === 0) {
      candidate = emptyCandidate(classified.kind, classified.text);
    } else if (classified.kind === 'TRANSCRIPT') {
      candidate = this.transcript.encode(classified.text, metadata, session);
    } else {
      candidate = this.prompt.encode(classified.text, metadata, session);
    }

    const result = assemble(
      { candidate, language: this.config.language, caller: metadata, budget: session.budget },
      this.config.assembler
    );
    if (result.metadata.degraded) {
      log.warn('Pattern budget exhausted; result is partial', { kind: result.kind, warnings: result.metadata.warnings });
    }
    return result;
  }

  /**
   * Encode every item independently. A failing item is reported in place
   * and does not stop the batch.
   */
  encodeBatch(items: readonly BatchItem[]): BatchOutcome[] {
    return items.map((item, index): BatchOutcome => {
      try {
        return { ok: true, result: this.encode(item.input, item.metadata) };
      } catch (error) {
        const failure = isCompressorError(error)
          ? { code: error.code, message: error.message }
          : { code: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : String(error) };
        log.warn(`Batch item ${index} failed`, failure);
        return { ok: false, error: failure };
      }
    });
  }

  /**
   * Substitute runtime values into a compressed configuration prompt
   */
  bind(result: EncodingResult, values: Readonly<Record<string, BindingValue>>): string {
    if (result.kind !== 'PROMPT' || result.metadata.details.mode !== 'CONFIGURATION') {
      throw new InvalidInputError('result', 'only configuration prompts can be bound');
    }
    const bound = bindPlaceholders(result.compressed, values);
    if (bound.trim().length === 0) {
      throw new InvalidInputError('result', 'bound prompt is empty');
    }
    return bound;
  }
}

/**
 * One-off encode with a fresh encoder; reuse a SemanticEncoder when
 * encoding many inputs with the same configuration
 */
export function encode(
  input: EncoderInput,
  metadata: EncodingMetadata = {},
  config: EncodingConfiguration = createEncodingConfiguration()
): EncodingResult {
  return new SemanticEncoder(config).encode(input, metadata);
}
