/**
 * Transcript turn parsing
 * `Speaker: text` lines; unlabelled lines continue the previous turn.
 */

import { CompiledTranscriptVocabulary } from '../language/vocabulary.js';
import { splitWords } from '../utils/text.js';

export type Speaker = 'AGENT' | 'CUSTOMER' | 'SYSTEM';

export interface Turn {
  index: number;
  speaker: Speaker;
  label: string;
  text: string;
}

const LABELLED_LINE = /^\s*([A-Za-z][\w .'()-]{0,30}?)\s*:\s*(.*)$/;

/** One to three capitalized words: "Maria", "Sam Lee" */
const NAME_LABEL = /^[A-Z][\p{L}'-]*(?: [A-Z][\p{L}'-]*){0,2}$/u;

/** The speaker label of a line, or null when the line is not labelled */
export function speakerLabel(line: string): { label: string; text: string } | null {
  const match = LABELLED_LINE.exec(line);
  if (!match) return null;
  // "https://..." is not a speaker
  if (match[2].startsWith('//')) return null;
  return { label: match[1].trim(), text: match[2].trim() };
}

/** Speaker of a known label ("Agent", "Customer (Sam)", "IVR"), if any */
export function knownSpeaker(label: string, vocabulary: CompiledTranscriptVocabulary): Speaker | undefined {
  const words = splitWords(label);
  if (words.some(w => vocabulary.agentLabels.has(w))) return 'AGENT';
  if (words.some(w => vocabulary.customerLabels.has(w))) return 'CUSTOMER';
  if (words.some(w => vocabulary.systemLabels.has(w))) return 'SYSTEM';
  return undefined;
}

/**
 * Parse a transcript into turns. Labels that are not in the label lists
 * are taken as personal names and assigned by order of appearance: the
 * first becomes the agent, the next the customer. A label that does not
 * look like a name ("Order number: 12345"), or a new name once both sides
 * have spoken, continues the previous turn.
 */
export function parseTurns(text: string, vocabulary: CompiledTranscriptVocabulary): Turn[] {
  const turns: Turn[] = [];
  const assigned = new Map<string, Speaker>();
  const seen = new Set<Speaker>();

  const speakerFor = (label: string): Speaker | undefined => {
    const key = label.toLowerCase();
    const existing = assigned.get(key);
    if (existing) return existing;

    let speaker = knownSpeaker(label, vocabulary);
    if (!speaker) {
      if (!NAME_LABEL.test(label) || (seen.has('AGENT') && seen.has('CUSTOMER'))) return undefined;
      speaker = seen.has('AGENT') ? 'CUSTOMER' : 'AGENT';
    }
    assigned.set(key, speaker);
    return speaker;
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length === 0) continue;
    const labelled = speakerLabel(line);
    const speaker = labelled ? speakerFor(labelled.label) : undefined;
    if (labelled && speaker) {
      seen.add(speaker);
      turns.push({ index: turns.length, speaker, label: labelled.label, text: labelled.text });
      continue;
    }
    const previous = turns[turns.length - 1];
    if (previous) {
      previous.text = previous.text ? `${previous.text} ${line.trim()}` : line.trim();
    }
  }
  return turns;
}

export function turnsBy(turns: readonly Turn[], speaker: Speaker): Turn[] {
  return turns.filter(turn => turn.speaker === speaker);
}
