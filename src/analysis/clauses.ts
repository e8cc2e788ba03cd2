/**
 * Clause annotation
 * Marks tokens that belong to role or conditional clauses, and tokens that
 * open a clause. Intent detection skips the former and leans on the latter.
 */

import { VocabularyStore } from '../language/vocabulary.js';
import { AnalyzedToken, ClauseKind } from './types.js';

const CLAUSE_BREAK = /[,;:.!?()\n]/;

function startsWithMarker(tokens: readonly AnalyzedToken[], at: number, markers: readonly (readonly string[])[]): number {
  for (const marker of markers) {
    if (marker.length === 0 || at + marker.length > tokens.length) continue;
    let matched = true;
    for (let k = 0; k < marker.length; k++) {
      if (tokens[at + k].normal !== marker[k]) {
        matched = false;
        break;
      }
      // a marker never spans punctuation
      if (k < marker.length - 1 && CLAUSE_BREAK.test(tokens[at + k].post)) {
        matched = false;
        break;
      }
    }
    if (matched) return marker.length;
  }
  return 0;
}

/**
 * Annotate the tokens of one sentence in place
 */
export function annotateClauses(tokens: AnalyzedToken[], vocabulary: VocabularyStore): void {
  let state: ClauseKind = 'main';

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const previous = i > 0 ? tokens[i - 1] : undefined;
    const afterBreak = previous !== undefined && CLAUSE_BREAK.test(previous.post);

    if (afterBreak) {
      state = 'main';
    } else if (state === 'role' && previous && vocabulary.isOpener(previous.normal)) {
      state = 'main';
    }

    if (startsWithMarker(tokens, i, vocabulary.conditionalMarkers) > 0) {
      state = 'conditional';
    } else if (startsWithMarker(tokens, i, vocabulary.roleMarkers) > 0) {
      state = 'role';
    }

    token.clause = state;
    token.opensClause = previous === undefined || afterBreak || vocabulary.isOpener(previous.normal);
  }
}
