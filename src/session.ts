/**
 * Per-call encoding session: the shared configuration and language
 * resources plus the one mutable thing an encode call owns, its budget
 */

import { EncodingConfiguration, getLanguageResources } from './config/schema.js';
import { MatchBudget } from './language/budget.js';
import { LanguageResources } from './language/registry.js';
import { ComponentKind, EncodedCandidate, EncodingMetadata } from './types.js';

export interface EncodingSession {
  config: EncodingConfiguration;
  resources: LanguageResources;
  budget: MatchBudget;
}

export function createSession(config: EncodingConfiguration, clock?: () => number): EncodingSession {
  return {
    config,
    resources: getLanguageResources(config),
    budget: new MatchBudget(config.limits, clock),
  };
}

/**
 * One encoder per component kind. Encoders never apply the fallback
 * themselves; the output assembler does.
 */
export interface ComponentEncoder<TInput> {
  readonly kind: ComponentKind;
  encode(input: TInput, metadata: EncodingMetadata, session: EncodingSession): EncodedCandidate;
}
