/**
 * Text helpers shared by resolvers and encoders
 */

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Collapse runs of spaces and tabs, trim every line and drop blank lines
 */
export function normalizeWhitespace(text: string): string {
  return text
    .split(/\r?\n/)
    .map(line => line.replace(/[ \t\f\v]+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');
}

export function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Uppercase a phrase into a token value: `customer support` -> `CUSTOMER_SUPPORT`
 */
export function toTokenValue(text: string): string {
  return collapseSpaces(text)
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .trim()
    .replace(/[\s-]+/g, '_')
    .toUpperCase();
}

/**
 * Regex source matching any of the phrases as whole words, longest first so
 * alternation never stops at a shorter prefix.
 */
export function phraseAlternation(phrases: Iterable<string>): string {
  const unique = [...new Set([...phrases].map(p => p.toLowerCase().trim()).filter(p => p.length > 0))];
  unique.sort((a, b) => b.length - a.length || a.localeCompare(b));
  return unique.map(p => escapeRegex(p).replace(/\s+/g, '\\s+')).join('|');
}

/**
 * Whole-phrase regex; word boundaries are only added next to word characters
 * so phrases like `rules:` or `<basic_rules>` still match.
 */
export function wholePhraseRegex(phrases: Iterable<string>, flags: string = 'i'): RegExp | null {
  const alternation = phraseAlternation(phrases);
  if (!alternation) return null;
  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${alternation})(?![\\p{L}\\p{N}_])`, flags.includes('u') ? flags : `${flags}u`);
}

export function containsPhrase(text: string, phrase: string): boolean {
  const regex = wholePhraseRegex([phrase]);
  return regex !== null && regex.test(text);
}

export function splitWords(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}][\p{L}\p{N}'’_-]*/gu) ?? [];
}

/**
 * Split a field name into lowercase words: `createdAt` / `created_at` -> [created, at]
 */
export function fieldNameWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(/[^A-Za-z0-9]+/)
    .map(w => w.toLowerCase())
    .filter(w => w.length > 0);
}

export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}
