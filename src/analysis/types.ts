/**
 * Linguistic analysis types
 */

export type PartOfSpeech =
  | 'VERB'
  | 'NOUN'
  | 'ADJ'
  | 'ADV'
  | 'NUM'
  | 'PRON'
  | 'DET'
  | 'PREP'
  | 'CONJ'
  | 'OTHER';

/**
 * Where a token sits: the main request, a descriptive role clause
 * ("you are a ..."), or a conditional clause ("if no X matches ...")
 */
export type ClauseKind = 'main' | 'role' | 'conditional';

export interface AnalyzedToken {
  text: string;
  /** lowercased surface form */
  normal: string;
  lemma: string;
  pos: PartOfSpeech;
  /** position in the whole text, counting tokens */
  index: number;
  sentence: number;
  /** punctuation that follows the token */
  post: string;
  clause: ClauseKind;
  /** first token of a sentence or of a coordinated/punctuated clause */
  opensClause: boolean;
}

export interface AnalyzedSentence {
  index: number;
  text: string;
  tokens: AnalyzedToken[];
  question: boolean;
}

export type EntityType = 'PERSON' | 'PLACE' | 'ORGANIZATION' | 'MONEY';

export interface Entity {
  text: string;
  type: EntityType;
}

export interface Analysis {
  analyzer: string;
  sentences: AnalyzedSentence[];
  tokens: AnalyzedToken[];
  entities: Entity[];
}

/**
 * Adapter over an NLP toolkit (or a plain lexicon) for one language
 */
export interface LinguisticAnalyzer {
  readonly name: string;
  analyze(text: string): Analysis;
}
