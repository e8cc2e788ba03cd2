/**
 * Structured-data field selection
 *
 * A field is kept when it is required, or when it is not excluded and
 * its importance reaches the threshold. Required always wins over
 * excluded.
 */

import { z } from 'zod';
import { StructuredOptions } from '../config/schema.js';
import { StructuredRecord } from '../types.js';
import { fieldNameWords } from '../utils/text.js';
import importanceFile from './field-importance.json';

const ImportanceLevelSchema = z.enum(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'NEVER']);

const ImportanceTableSchema = z.object({
  levels: z.record(ImportanceLevelSchema, z.number().min(0).max(1)),
  fields: z.record(z.string(), ImportanceLevelSchema),
});

export type ImportanceLevel = z.infer<typeof ImportanceLevelSchema>;

export type ImportanceSource = 'REQUIRED' | 'EXCLUDED' | 'EXPLICIT' | 'TABLE' | 'NAME' | 'AUTO' | 'DEFAULT';

export interface FieldDecision {
  field: string;
  included: boolean;
  score: number;
  source: ImportanceSource;
}

/** Simple identity fields lead the header in this order */
export const DEFAULT_FIELD_ORDER: readonly string[] = ['id', 'external_id', 'title', 'name', 'type'];

/** Score used for every field when auto-detection is off */
export const NEUTRAL_IMPORTANCE = 0.5;

/** Average string length at which a field counts as long text */
const LONG_TEXT = 100;
const SHORT_TEXT = 2;

const table = ImportanceTableSchema.parse(importanceFile);

export function levelScore(level: ImportanceLevel): number {
  return table.levels[level] ?? 0;
}

/** Built-in importance of a field name: exact name first, then its last word */
export function tableImportance(field: string): number | undefined {
  const words = fieldNameWords(field);
  const exact = table.fields[words.join('_')];
  if (exact) return levelScore(exact);
  const last = words[words.length - 1];
  const byWord = last ? table.fields[last] : undefined;
  return byWord ? levelScore(byWord) : undefined;
}

export function nameImportance(field: string): number | undefined {
  if (field.startsWith('_')) return levelScore('LOW');
  if (/(?:_at|_date|[a-z]At|[a-z]Date)$/.test(field)) return levelScore('NEVER');
  return undefined;
}

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

/**
 * Value heuristics over every record's value of the field
 */
export function autoImportance(values: readonly unknown[]): number {
  const present = values.filter(v => !isEmptyValue(v));
  if (present.length === 0) return levelScore('NEVER');

  const strings = present.filter((v): v is string => typeof v === 'string');
  if (strings.length === present.length) {
    const average = strings.reduce((sum, s) => sum + s.trim().length, 0) / strings.length;
    if (average >= LONG_TEXT) return levelScore('MEDIUM');
    if (average <= SHORT_TEXT) return levelScore('LOW');
  }
  return levelScore('MEDIUM');
}

/**
 * Every field seen in the records, identity fields first, then in
 * first-seen order. Required fields nobody has are appended.
 */
export function orderFields(records: readonly StructuredRecord[], required: readonly string[]): string[] {
  const seen: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.includes(key)) seen.push(key);
    }
  }
  for (const field of required) {
    if (!seen.includes(field)) seen.push(field);
  }
  const leading = DEFAULT_FIELD_ORDER.filter(field => seen.includes(field));
  return [...leading, ...seen.filter(field => !leading.includes(field))];
}

export function decideField(
  field: string,
  records: readonly StructuredRecord[],
  options: Readonly<StructuredOptions>
): FieldDecision {
  if (options.requiredFields.includes(field)) {
    return { field, included: true, score: 1, source: 'REQUIRED' };
  }
  if (options.excludedFields.includes(field)) {
    return { field, included: false, score: 0, source: 'EXCLUDED' };
  }

  let score: number;
  let source: ImportanceSource;
  const explicit = options.fieldImportance[field];
  const fromTable = tableImportance(field);
  const fromName = nameImportance(field);

  if (explicit !== undefined) {
    score = explicit;
    source = 'EXPLICIT';
  } else if (fromTable !== undefined) {
    score = fromTable;
    source = 'TABLE';
  } else if (fromName !== undefined) {
    score = fromName;
    source = 'NAME';
  } else if (options.autoDetect) {
    score = autoImportance(records.map(record => record[field]));
    source = 'AUTO';
  } else {
    score = NEUTRAL_IMPORTANCE;
    source = 'DEFAULT';
  }

  return { field, included: score >= options.importanceThreshold, score, source };
}

export function selectFields(
  records: readonly StructuredRecord[],
  options: Readonly<StructuredOptions>
): FieldDecision[] {
  return orderFields(records, options.requiredFields).map(field => decideField(field, records, options));
}
