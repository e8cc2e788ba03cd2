/**
 * Transcript Encoder
 *
 * `[CALL] [CUSTOMER]? [CONTACT]? [ISSUE] [ACTION]* [RESOLUTION] [SENTIMENT]`
 *
 * ISSUE, RESOLUTION and SENTIMENT are always present; when cues are
 * missing they carry their lowest-confidence defaults.
 */

import { UnsupportedLanguageError } from '../errors.js';
import { ComponentEncoder, EncodingSession } from '../session.js';
import { FLOW, ResolvedToken, TokenAttribute, attr, formatToken } from '../tokens/grammar.js';
import { ComponentKind, EncodedCandidate, EncodingMetadata } from '../types.js';
import { createLogger } from '../utils/logger.js';
import {
  ActionFacts,
  CallFacts,
  ContactFacts,
  CustomerFacts,
  DEFAULT_ISSUE,
  IssueFacts,
  ResolutionFacts,
  TranscriptScan,
  actionFacts,
  callFacts,
  contactFacts,
  customerFacts,
  issueFacts,
  resolutionFacts,
} from './analyzer.js';
import { sentimentTrajectory, turnSentiments } from './sentiment.js';
import { parseTurns, turnsBy } from './turns.js';

const log = createLogger('transcript');

/** Attributes in the given order, skipping absent values */
function attributes(entries: ReadonlyArray<[string, string | undefined]>): TokenAttribute[] {
  return entries.flatMap(([key, value]) => (value ? [attr(key, value)] : []));
}

function callToken(call: CallFacts): ResolvedToken {
  return {
    category: 'CALL',
    values: [call.type],
    attributes: attributes([
      ['AGENT', call.agent],
      ['DURATION', `${call.durationMinutes}m`],
      ['CHANNEL', call.channel],
    ]),
  };
}

function customerToken(customer: CustomerFacts): ResolvedToken | undefined {
  const found = attributes([
    ['ACCOUNT', customer.account],
    ['TIER', customer.tier],
    ['TENURE', customer.tenure],
  ]);
  return found.length > 0 ? { category: 'CUSTOMER', values: [], attributes: found } : undefined;
}

function contactToken(contact: ContactFacts): ResolvedToken | undefined {
  const found = attributes([
    ['EMAIL', contact.email],
    ['PHONE', contact.phone],
    ['ORDER', contact.order],
    ['TRACKING', contact.tracking],
    ['CASE', contact.case],
  ]);
  return found.length > 0 ? { category: 'CONTACT', values: [], attributes: found } : undefined;
}

function issueToken(issue: IssueFacts): ResolvedToken {
  return {
    category: 'ISSUE',
    values: [issue.type],
    attributes: attributes([
      ['AMOUNTS', issue.amounts.length > 0 ? issue.amounts.join('+') : undefined],
      ['DURATION', issue.duration],
      ['FREQ', issue.frequency],
      ['SEVERITY', issue.severity],
    ]),
  };
}

function actionToken(action: ActionFacts): ResolvedToken {
  return {
    category: 'ACTION',
    values: [action.type],
    attributes: attributes([
      ['STEP', action.step],
      ['REFERENCE', action.reference],
      ['TIMELINE', action.timeline],
      ['AMOUNT', action.amount],
      ['METHOD', action.method],
      ['RESULT', action.result],
    ]),
  };
}

function resolutionToken(resolution: ResolutionFacts): ResolvedToken {
  return {
    category: 'RESOLUTION',
    values: [resolution.status],
    attributes: attributes([
      ['TIMELINE', resolution.timeline],
      ['TICKET', resolution.ticket],
    ]),
  };
}

export class TranscriptEncoder implements ComponentEncoder<string> {
  readonly kind: ComponentKind = 'TRANSCRIPT';

  encode(text: string, metadata: EncodingMetadata, session: EncodingSession): EncodedCandidate {
    const { vocabulary } = session.resources;
    const transcript = vocabulary.transcript;
    if (!transcript) {
      throw new UnsupportedLanguageError(vocabulary.language, 'TRANSCRIPT');
    }

    const turns = parseTurns(text, transcript);
    const scan: TranscriptScan = {
      turns,
      vocabulary,
      transcript,
      budget: session.budget,
      metadata,
      options: session.config.transcript,
    };
    const { options } = scan;

    const call = callFacts(scan);
    const customer: CustomerFacts = options.includeCustomer ? customerFacts(scan) : {};
    const contact: ContactFacts = options.includeContact ? contactFacts(scan) : {};
    const issue = issueFacts(scan);
    const actions = actionFacts(scan);
    const resolution = resolutionFacts(scan, issue, actions);
    const sentiments = turnSentiments(turnsBy(turns, 'CUSTOMER'), transcript, session.budget);
    const trajectory = sentimentTrajectory(sentiments);

    log.debug('Transcript analyzed', { turns: turns.length, issue: issue.type, actions: actions.length });

    const resolved: ResolvedToken[] = [callToken(call)];
    const customerTok = customerToken(customer);
    if (customerTok) resolved.push(customerTok);
    const contactTok = contactToken(contact);
    if (contactTok) resolved.push(contactTok);
    resolved.push(issueToken(issue));
    resolved.push(...actions.map(actionToken));
    resolved.push(resolutionToken(resolution));
    resolved.push({ category: 'SENTIMENT', values: [trajectory.join(FLOW)], attributes: [] });

    const tokens = resolved.map(formatToken);
    const warnings: string[] = [];
    if (turns.length === 0) warnings.push('No speaker turns found in transcript');
    if (issue.type === DEFAULT_ISSUE) warnings.push('No issue keywords found; using GENERAL_INQUIRY');

    return {
      kind: 'TRANSCRIPT',
      original: text,
      compressed: tokens.join(' '),
      tokens,
      warnings,
      details: {
        turnCount: turns.length,
        speakers: {
          agent: turnsBy(turns, 'AGENT').length,
          customer: turnsBy(turns, 'CUSTOMER').length,
          system: turnsBy(turns, 'SYSTEM').length,
        },
        call,
        issue,
        actions,
        resolution,
        sentiment: { trajectory, turns: sentiments },
      },
    };
  }
}
