/**
 * Prompt Encoder
 * Detects the prompt mode and hands the analyzed prompt to the task or
 * configuration encoder.
 */

import { PromptContext } from '../resolvers/types.js';
import { ComponentEncoder, EncodingSession } from '../session.js';
import { ComponentKind, EncodedCandidate, EncodingMetadata } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { encodeConfiguration } from './configuration-encoder.js';
import { ModeDecision, detectPromptMode } from './mode.js';
import { encodeTask } from './task-encoder.js';

const log = createLogger('prompt');

export class PromptEncoder implements ComponentEncoder<string> {
  readonly kind: ComponentKind = 'PROMPT';

  encode(text: string, _metadata: EncodingMetadata, session: EncodingSession): EncodedCandidate {
    const { resources, budget, config } = session;
    const decision: ModeDecision = config.prompt.mode === 'auto'
      ? detectPromptMode(text, resources.vocabulary, resources.rules, budget)
      : { mode: config.prompt.mode, reason: 'OVERRIDE' };

    log.debug('Prompt mode selected', { mode: decision.mode, reason: decision.reason, length: text.length });

    const ctx: PromptContext = {
      text,
      analysis: resources.analyzer.analyze(text),
      vocabulary: resources.vocabulary,
      rules: resources.rules,
      budget,
      options: config.prompt,
    };

    return decision.mode === 'CONFIGURATION' ? encodeConfiguration(ctx, decision) : encodeTask(ctx);
  }
}
