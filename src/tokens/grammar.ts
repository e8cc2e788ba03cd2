/**
 * Token Grammar
 *
 * `[CATEGORY:VALUE1,VALUE2:QUALIFIER:ATTR=VAL]`
 *
 * Chained actions join with `>`, data flows and sentiment trajectories
 * with `→`. Splitting is bracket-depth aware so inline schemas such as
 * `{a,b:{c}}` and values such as `EMPTY=[]` survive a round trip.
 */

import { InvalidInputError } from '../errors.js';

export const PROMPT_CATEGORIES = ['REQ', 'TARGET', 'EXTRACT', 'CTX', 'OUT', 'REF'] as const;

export const TRANSCRIPT_CATEGORIES = [
  'CALL',
  'CUSTOMER',
  'CONTACT',
  'ISSUE',
  'ACTION',
  'RESOLUTION',
  'SENTIMENT',
] as const;

export type PromptCategory = (typeof PROMPT_CATEGORIES)[number];
export type TranscriptCategory = (typeof TRANSCRIPT_CATEGORIES)[number];
export type TokenCategory = PromptCategory | TranscriptCategory;

export const CHAIN = '>';
export const FLOW = '→';

export interface TokenAttribute {
  key: string;
  value: string;
}

export interface ResolvedToken {
  category: TokenCategory;
  values: string[];
  qualifiers?: string[];
  attributes: TokenAttribute[];
}

export function isTokenCategory(value: string): value is TokenCategory {
  return PROMPT_CATEGORIES.some(c => c === value) || TRANSCRIPT_CATEGORIES.some(c => c === value);
}

export function attr(key: string, value: string | number): TokenAttribute {
  return { key, value: String(value) };
}

export function sortAttributes(attributes: readonly TokenAttribute[]): TokenAttribute[] {
  return [...attributes].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

/**
 * Render one token. The value slot may be empty only when the token has
 * attributes, as in `[CTX:SORT=RELEVANCE]`.
 */
export function formatToken(token: ResolvedToken): string {
  const parts: string[] = [token.category];
  const values = token.values.filter(v => v.length > 0);
  const qualifiers = (token.qualifiers ?? []).filter(q => q.length > 0);
  const attributes = token.attributes.filter(a => a.value.length > 0);

  if (values.length > 0) {
    parts.push(values.join(','));
  } else if (attributes.length === 0) {
    throw new InvalidInputError('token', `${token.category} token has neither a value nor attributes`);
  }
  parts.push(...qualifiers);
  parts.push(...attributes.map(a => `${a.key}=${a.value}`));
  return `[${parts.join(':')}]`;
}

export function formatTokens(tokens: readonly ResolvedToken[]): string[] {
  return tokens.map(formatToken);
}

// ==================== Parsing ====================

export interface ParsedToken {
  raw: string;
  category: string;
  values: string[];
  qualifiers: string[];
  attributes: TokenAttribute[];
}

const OPEN = '[{(';
const CLOSE = ']})';

/**
 * Split on a separator that is not nested inside brackets, braces or parentheses
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (OPEN.includes(ch)) depth++;
    else if (CLOSE.includes(ch)) depth = Math.max(0, depth - 1);

    if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function attributeOf(segment: string): TokenAttribute | null {
  const eq = splitTopLevel(segment, '=');
  if (eq.length < 2 || !/^[A-Z][A-Z0-9_]*$/.test(eq[0])) return null;
  return { key: eq[0], value: eq.slice(1).join('=') };
}

/**
 * Parse `[CATEGORY:...]`; returns null when the text is not a token
 */
export function parseToken(text: string): ParsedToken | null {
  const raw = text.trim();
  if (!raw.startsWith('[') || !raw.endsWith(']')) return null;

  const segments = splitTopLevel(raw.slice(1, -1), ':');
  const category = segments[0];
  if (!/^[A-Z][A-Z_]*$/.test(category)) return null;

  const token: ParsedToken = { raw, category, values: [], qualifiers: [], attributes: [] };
  segments.slice(1).forEach((segment, i) => {
    const attribute = attributeOf(segment);
    if (attribute) {
      token.attributes.push(attribute);
    } else if (i === 0) {
      token.values = splitTopLevel(segment, ',');
    } else {
      token.qualifiers.push(segment);
    }
  });
  return token;
}

/**
 * Pull every top-level bracketed token out of a compressed stream,
 * ignoring any free text around them
 */
export function parseTokenStream(text: string): ParsedToken[] {
  const tokens: ParsedToken[] = [];
  let depth = 0;
  let start = -1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '[') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === ']' && depth > 0) {
      depth--;
      if (depth === 0 && start >= 0) {
        const token = parseToken(text.slice(start, i + 1));
        if (token) tokens.push(token);
        start = -1;
      }
    }
  }
  return tokens;
}
