/**
 * Configuration prompt templates
 * `{{name}}` placeholders survive compression verbatim and are bound later.
 */

import { UnresolvedPlaceholderError } from '../errors.js';

export type TemplateIssueLevel = 'ERROR' | 'WARNING';

export type TemplateIssueCode =
  | 'EMPTY_PLACEHOLDER'
  | 'INVALID_PLACEHOLDER_NAME'
  | 'DUPLICATE_PLACEHOLDER'
  | 'PRIORITY_WITHOUT_RULES'
  | 'MISSING_ROLE';

export interface TemplateIssue {
  level: TemplateIssueLevel;
  code: TemplateIssueCode;
  message: string;
}

export type BindingValue = string | number | boolean;

const PLACEHOLDER = /\{\{\s*([^{}]*?)\s*\}\}/g;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

function rawPlaceholders(text: string): string[] {
  return [...text.matchAll(PLACEHOLDER)].map(match => match[1]);
}

/** Distinct placeholder names, sorted */
export function extractPlaceholders(text: string): string[] {
  return [...new Set(rawPlaceholders(text).filter(name => name.length > 0))].sort();
}

export function hasPlaceholders(text: string): boolean {
  return rawPlaceholders(text).length > 0;
}

export interface TemplateFacts {
  role?: string;
  rules: readonly string[];
  priority?: string;
}

export function validateTemplate(text: string, facts: TemplateFacts): TemplateIssue[] {
  const issues: TemplateIssue[] = [];
  const raw = rawPlaceholders(text);

  if (raw.some(name => name.length === 0)) {
    issues.push({ level: 'ERROR', code: 'EMPTY_PLACEHOLDER', message: 'Template contains an empty placeholder {{}}' });
  }

  const names = extractPlaceholders(text);
  for (const name of names) {
    if (!IDENTIFIER.test(name)) {
      issues.push({
        level: 'WARNING',
        code: 'INVALID_PLACEHOLDER_NAME',
        message: `Placeholder {{${name}}} is not a plain identifier`,
      });
    }
  }

  const byLower = new Map<string, string[]>();
  for (const name of names) {
    const variants = byLower.get(name.toLowerCase()) ?? [];
    variants.push(name);
    byLower.set(name.toLowerCase(), variants);
  }
  for (const variants of byLower.values()) {
    if (variants.length > 1) {
      issues.push({
        level: 'ERROR',
        code: 'DUPLICATE_PLACEHOLDER',
        message: `Placeholders differ only in case: ${variants.join(', ')}`,
      });
    }
  }

  if (facts.priority && facts.rules.length === 0) {
    issues.push({
      level: 'WARNING',
      code: 'PRIORITY_WITHOUT_RULES',
      message: `Priority ${facts.priority} is declared but no rule block was found`,
    });
  }

  if (!facts.role) {
    issues.push({ level: 'WARNING', code: 'MISSING_ROLE', message: 'No role declaration found' });
  }

  return issues;
}

/**
 * Substitute every placeholder. Throws UnresolvedPlaceholderError naming
 * all placeholders without a value.
 */
export function bindPlaceholders(text: string, values: Readonly<Record<string, BindingValue>>): string {
  const missing = extractPlaceholders(text).filter(name => !Object.prototype.hasOwnProperty.call(values, name));
  if (rawPlaceholders(text).some(name => name.length === 0)) {
    missing.unshift('');
  }
  if (missing.length > 0) {
    throw new UnresolvedPlaceholderError(missing);
  }
  return text.replace(PLACEHOLDER, (_whole: string, name: string) => String(values[name]));
}
