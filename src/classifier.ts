/**
 * Input classification
 * Picks the component for an input from its shape.
 */

import { CompiledTranscriptVocabulary } from './language/vocabulary.js';
import { knownSpeaker, speakerLabel } from './transcript/turns.js';
import { ComponentKind, EncoderInput, StructuredRecord, isPlainRecord } from './types.js';

/** Share of non-empty lines that must carry a speaker label */
export const TRANSCRIPT_LINE_SHARE = 0.6;
export const MIN_TRANSCRIPT_TURNS = 2;

export type ClassifiedInput =
  | { kind: 'PROMPT' | 'TRANSCRIPT'; text: string }
  | {
    kind: 'STRUCTURED_DATA';
    records: readonly unknown[] | StructuredRecord;
    /** the caller's JSON text, when records were parsed from one */
    source?: string;
  };

/** JSON text holding a list or an object, parsed; anything else is null */
export function parseJsonRecords(text: string): readonly unknown[] | StructuredRecord | null {
  const trimmed = text.trim();
  if (!/^[[{]/.test(trimmed)) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    // prose that merely starts with a bracket
    return null;
  }
  if (Array.isArray(parsed) || isPlainRecord(parsed)) return parsed;
  return null;
}

export function looksLikeTranscript(text: string, vocabulary: CompiledTranscriptVocabulary | undefined): boolean {
  if (!vocabulary) return false;
  const lines = text.split(/\r?\n/).filter(line => line.trim().length > 0);
  const labels = lines.map(speakerLabel).flatMap(found => (found ? [found.label] : []));
  if (labels.length < MIN_TRANSCRIPT_TURNS) return false;
  if (labels.length / lines.length < TRANSCRIPT_LINE_SHARE) return false;
  return labels.some(label => {
    const speaker = knownSpeaker(label, vocabulary);
    return speaker === 'AGENT' || speaker === 'CUSTOMER';
  });
}

export function classifyInput(
  input: EncoderInput,
  transcriptVocabulary: CompiledTranscriptVocabulary | undefined,
  requested?: ComponentKind
): ClassifiedInput {
  if (typeof input !== 'string') {
    return { kind: 'STRUCTURED_DATA', records: input };
  }

  if (requested === 'STRUCTURED_DATA' || requested === undefined) {
    const records = parseJsonRecords(input);
    if (records) return { kind: 'STRUCTURED_DATA', records, source: input };
  }
  if (requested === 'PROMPT' || requested === 'TRANSCRIPT') {
    return { kind: requested, text: input };
  }
  return looksLikeTranscript(input, transcriptVocabulary)
    ? { kind: 'TRANSCRIPT', text: input }
    : { kind: 'PROMPT', text: input };
}
