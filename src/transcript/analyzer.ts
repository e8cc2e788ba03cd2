/**
 * Transcript fact extraction
 *
 * Pulls call metadata, customer and contact identifiers, the issue, the
 * agent's actions and the resolution out of parsed turns. Every scan goes
 * through the call's match budget.
 */

import { TranscriptOptions } from '../config/schema.js';
import { MatchBudget } from '../language/budget.js';
import { CompiledEntry, CompiledTranscriptVocabulary, VocabularyStore } from '../language/vocabulary.js';
import { EncodingMetadata } from '../types.js';
import { toTokenValue } from '../utils/text.js';
import { Turn, turnsBy } from './turns.js';

export interface TranscriptScan {
  turns: readonly Turn[];
  vocabulary: VocabularyStore;
  transcript: CompiledTranscriptVocabulary;
  budget: MatchBudget;
  metadata: EncodingMetadata;
  options: Readonly<TranscriptOptions>;
}

export interface CallFacts {
  type: string;
  agent?: string;
  durationMinutes: number;
  channel: string;
}

export interface CustomerFacts {
  account?: string;
  tier?: string;
  tenure?: string;
}

export interface ContactFacts {
  email?: string;
  phone?: string;
  order?: string;
  tracking?: string;
  case?: string;
}

export interface IssueFacts {
  type: string;
  amounts: string[];
  duration?: string;
  frequency?: string;
  severity: string;
}

export type ActionResult = 'COMPLETED' | 'PENDING';

export interface ActionFacts {
  type: string;
  /** turn of first appearance */
  turn: number;
  step?: string;
  reference?: string;
  timeline?: string;
  amount?: string;
  method?: string;
  result: ActionResult;
}

export interface ResolutionFacts {
  status: string;
  timeline?: string;
  ticket?: string;
}

export const DEFAULT_ISSUE = 'GENERAL_INQUIRY';
export const DEFAULT_SEVERITY = 'LOW';
export const DEFAULT_RESOLUTION = 'UNKNOWN';

/** Agent turns searched for the resolution, newest first */
const RESOLUTION_WINDOW = 5;

const MONEY = /\$\s?\d[\d,]*(?:\.\d{1,2})?/g;
const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
const PHONE = /\+?\d[\d\s().-]{8,}\d/g;
const REFERENCE = /\b[A-Z]{2,6}-?\d{3,}\b/g;
const AGENT_INTRO = /(?:[Mm]y name is|[Tt]his is|I am|I'm)\s+([A-Z][a-z]+)/;
const TIMELINE = /\bwithin\s+(?:the\s+next\s+)?(\d+|[a-z]+)\s+(?:business\s+|working\s+)?(hour|day|week|month)s?\b/gi;
const ISSUE_DURATION =
  /\b(?:for|since|over)\s+(?:the\s+(?:past|last)\s+)?(\d+|[a-z]+)\s+(minute|hour|day|week|month|year)s?\b/gi;
const TENURE =
  /\b(?:customer|member|with you|with the company)\s+for\s+(?:over\s+|about\s+)?(\d+|[a-z]+)\s+(year|month)s?\b/gi;

const UNIT_SUFFIX: Record<string, string> = {
  minute: 'm',
  hour: 'h',
  day: 'd',
  week: 'w',
  month: 'mo',
  year: 'y',
};

function identifierPattern(nouns: string, qualifierRequired: boolean): RegExp {
  const qualifier = `(?:number|#|no\\.?|id)${qualifierRequired ? '' : '?'}`;
  return new RegExp(`\\b(?:${nouns})\\s*${qualifier}\\s*(?:is\\s*)?:?\\s*#?([A-Z0-9][A-Z0-9-]{3,})`, 'gi');
}

const ACCOUNT = identifierPattern('account|member(?:ship)?', true);
const ORDER = identifierPattern('order', false);
const TRACKING = identifierPattern('tracking', false);
const CASE = identifierPattern('case|ticket', false);

// ==================== Helpers ====================

function joined(turns: readonly Turn[]): string {
  return turns.map(turn => turn.text).join('\n');
}

function firstCanonical(entries: readonly CompiledEntry[], text: string, budget: MatchBudget): string | undefined {
  return entries.find(entry => budget.test(entry.regex, text))?.canonical;
}

function quantity(word: string, vocabulary: VocabularyStore): number | undefined {
  if (/^\d+$/.test(word)) return parseInt(word, 10);
  const lower = word.toLowerCase();
  if (lower === 'a' || lower === 'an') return 1;
  return vocabulary.numberWord(lower);
}

/** First `<number> <unit>` match rendered as `3d`, `2w`, `6mo` */
function span(pattern: RegExp, text: string, scan: TranscriptScan): string | undefined {
  for (const match of scan.budget.matchAll(pattern, text)) {
    const amount = quantity(match[1], scan.vocabulary);
    const suffix = UNIT_SUFFIX[match[2].toLowerCase()];
    if (amount !== undefined && suffix) return `${amount}${suffix}`;
  }
  return undefined;
}

/** First captured identifier that contains a digit */
function identifier(pattern: RegExp, text: string, budget: MatchBudget): string | undefined {
  return budget.matchAll(pattern, text).map(m => m[1].toUpperCase()).find(id => /\d/.test(id));
}

function amounts(text: string, budget: MatchBudget): string[] {
  return [...new Set(budget.matchAll(MONEY, text).map(m => m[0].replace(/\s/g, '')))];
}

function phone(text: string, budget: MatchBudget): string | undefined {
  for (const match of budget.matchAll(PHONE, text)) {
    const digits = match[0].replace(/\D/g, '');
    if (digits.length >= 10) return match[0].trim().startsWith('+') ? `+${digits}` : digits;
  }
  return undefined;
}

function stringField(metadata: EncodingMetadata, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = metadata[key];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  }
  return undefined;
}

// ==================== Facts ====================

export function callFacts(scan: TranscriptScan): CallFacts {
  const { metadata, transcript, budget, options } = scan;
  const customerText = joined(turnsBy(scan.turns, 'CUSTOMER'));

  const declaredType = stringField(metadata, 'callType');
  const type = declaredType
    ? toTokenValue(declaredType)
    : transcript.sales && budget.test(transcript.sales, customerText) ? 'SALES' : 'SUPPORT';

  let agent = stringField(metadata, 'agent', 'agentName');
  if (!agent) {
    for (const turn of turnsBy(scan.turns, 'AGENT')) {
      const intro = budget.first(AGENT_INTRO, turn.text);
      if (intro) {
        agent = intro[1];
        break;
      }
    }
  }

  const declaredMinutes = metadata.durationMinutes;
  const durationMinutes = typeof declaredMinutes === 'number' && declaredMinutes > 0
    ? Math.round(declaredMinutes)
    : Math.max(1, Math.floor(scan.turns.length / options.turnsPerMinute));

  return {
    type,
    agent,
    durationMinutes,
    channel: toTokenValue(stringField(metadata, 'channel') ?? options.defaultChannel),
  };
}

export function customerFacts(scan: TranscriptScan): CustomerFacts {
  const { transcript, budget } = scan;
  const text = joined(scan.turns);
  const tier = transcript.tiers ? budget.first(transcript.tiers, text) : null;
  return {
    account: identifier(ACCOUNT, text, budget),
    tier: tier ? tier[1].toUpperCase() : undefined,
    tenure: span(TENURE, text, scan),
  };
}

export function contactFacts(scan: TranscriptScan): ContactFacts {
  const { budget } = scan;
  const text = joined(scan.turns);
  return {
    email: budget.first(EMAIL, text)?.[0].toLowerCase(),
    phone: phone(text, budget),
    order: identifier(ORDER, text, budget),
    tracking: identifier(TRACKING, text, budget),
    case: identifier(CASE, text, budget),
  };
}

export function issueFacts(scan: TranscriptScan): IssueFacts {
  const { transcript, budget } = scan;
  const text = joined(turnsBy(scan.turns, 'CUSTOMER'));

  const keyword = transcript.issueKeywords.find(entry => budget.test(entry.regex, text));
  const type = keyword?.canonical ?? DEFAULT_ISSUE;

  return {
    type,
    amounts: transcript.raw.billingIssues.includes(type) ? amounts(text, budget) : [],
    duration: span(ISSUE_DURATION, text, scan),
    frequency: firstCanonical(transcript.frequencies, text, budget),
    severity: firstCanonical(transcript.severity, text, budget) ?? DEFAULT_SEVERITY,
  };
}

/**
 * Actions the agent took, in order of first appearance
 */
export function actionFacts(scan: TranscriptScan): ActionFacts[] {
  const { transcript, budget } = scan;
  const agentTurns = turnsBy(scan.turns, 'AGENT');

  const firstSeen = new Map<string, { turn: Turn; at: number }>();
  for (const turn of agentTurns) {
    for (const entry of transcript.actions) {
      if (firstSeen.has(entry.canonical)) continue;
      const match = budget.first(entry.regex, turn.text);
      if (match) firstSeen.set(entry.canonical, { turn, at: match.index });
    }
  }

  const ordered = [...firstSeen.entries()].sort(
    ([, a], [, b]) => a.turn.index - b.turn.index || a.at - b.at
  );

  return ordered.map(([type, { turn }]) => {
    const entry = transcript.actions.find(e => e.canonical === type);
    const mentions = entry ? agentTurns.filter(t => budget.test(entry.regex, t.text)) : [turn];
    const completion = transcript.completion;
    const completed = completion !== null && mentions.some(t => budget.test(completion, t.text));
    const isCredit = transcript.raw.creditActions.includes(type);

    return {
      type,
      turn: turn.index,
      step: type === 'TROUBLESHOOT' ? firstCanonical(transcript.steps, turn.text, budget) : undefined,
      reference: budget.first(REFERENCE, turn.text)?.[0],
      timeline: span(TIMELINE, turn.text, scan),
      amount: isCredit ? amounts(turn.text, budget)[0] : undefined,
      method: isCredit ? firstCanonical(transcript.methods, turn.text, budget) : undefined,
      result: completed || confirmedAfter(scan, turn) ? 'COMPLETED' : 'PENDING',
    };
  });
}

/** The customer's next turn confirms the action worked */
function confirmedAfter(scan: TranscriptScan, turn: Turn): boolean {
  const next = scan.turns.find(t => t.index > turn.index && t.speaker === 'CUSTOMER');
  const resolved = scan.transcript.resolutions.find(entry => entry.canonical === 'RESOLVED');
  return next !== undefined && resolved !== undefined && scan.budget.test(resolved.regex, next.text);
}

/** A billing issue whose refund or credit went through needs no closing words */
function settledByCredit(scan: TranscriptScan, issue: IssueFacts, actions: readonly ActionFacts[]): boolean {
  const { raw } = scan.transcript;
  return raw.billingIssues.includes(issue.type)
    && actions.some(action => raw.creditActions.includes(action.type) && action.result === 'COMPLETED');
}

export function resolutionFacts(
  scan: TranscriptScan,
  issue?: IssueFacts,
  actions: readonly ActionFacts[] = []
): ResolutionFacts {
  const { transcript, budget } = scan;
  const agentTurns = turnsBy(scan.turns, 'AGENT');
  const customerTurns = turnsBy(scan.turns, 'CUSTOMER');

  const candidates = agentTurns.slice(-RESOLUTION_WINDOW).reverse();
  const finalCustomer = customerTurns[customerTurns.length - 1];
  if (finalCustomer) candidates.push(finalCustomer);

  let status = DEFAULT_RESOLUTION;
  let timeline: string | undefined;
  for (const turn of candidates) {
    const found = firstCanonical(transcript.resolutions, turn.text, budget);
    if (found) {
      status = found;
      timeline = span(TIMELINE, turn.text, scan);
      break;
    }
  }
  if (status === DEFAULT_RESOLUTION && issue && settledByCredit(scan, issue, actions)) {
    status = 'RESOLVED';
  }

  return {
    status,
    timeline,
    ticket: identifier(CASE, joined(agentTurns), budget),
  };
}
