/**
 * Structured-Data Encoder
 *
 * [NAME:count]{field1,field2}
 * [value1,value2]
 * ...
 */

import { StructuredOptions } from '../config/schema.js';
import { CompressorError, InvalidInputError, MissingRequiredFieldError } from '../errors.js';
import { ComponentEncoder, EncodingSession } from '../session.js';
import { ComponentKind, EncodedCandidate, EncodingMetadata, StructuredRecord, isPlainRecord } from '../types.js';
import { collapseSpaces, toTokenValue } from '../utils/text.js';
import { FieldDecision, isEmptyValue, selectFields } from './field-selection.js';

export interface RecordError {
  index: number;
  code: string;
  message: string;
}

/**
 * Render one value for a row. Strings are normalized like token values;
 * nested arrays and maps stay inline, or are flattened with `+` when
 * structure preservation is off.
 */
export function formatValue(value: unknown, options: Readonly<StructuredOptions>): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  if (typeof value === 'string') return formatString(value, options.maxFieldLength);

  if (Array.isArray(value)) {
    const items = value.map(item => formatValue(item, options)).filter(item => item.length > 0);
    return options.preserveStructure ? `[${items.join(',')}]` : items.join('+');
  }

  if (isPlainRecord(value)) {
    const entries = Object.entries(value)
      .filter(([, v]) => !isEmptyValue(v))
      .map(([k, v]) => [k, formatValue(v, options)] as const);
    return options.preserveStructure
      ? `{${entries.map(([k, v]) => `${k}:${v}`).join(',')}}`
      : entries.map(([k, v]) => `${k}=${v}`).join('+');
  }

  return formatString(String(value), options.maxFieldLength);
}

function formatString(value: string, maxLength: number): string {
  let text = collapseSpaces(value);
  if (text.length > maxLength) {
    text = `${text.slice(0, maxLength).trimEnd()}...`;
  }
  return text
    .replace(/,/g, ';')
    .replace(/[[\]{}]/g, '')
    .trim()
    .replace(/\s+/g, '_')
    .toUpperCase();
}

function recordsOf(input: readonly unknown[] | StructuredRecord): readonly unknown[] {
  return Array.isArray(input) ? input : [input];
}

/**
 * JSON text of records given as values. Big integers become their decimal
 * digits; values JSON cannot hold are an input error.
 */
export function serializeRecords(input: readonly unknown[] | StructuredRecord): string {
  try {
    return JSON.stringify(input, (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));
  } catch (error) {
    throw new InvalidInputError('input', error instanceof Error ? error.message : String(error));
  }
}

export class StructuredDataEncoder implements ComponentEncoder<readonly unknown[] | StructuredRecord> {
  readonly kind: ComponentKind = 'STRUCTURED_DATA';

  encode(
    input: readonly unknown[] | StructuredRecord,
    metadata: EncodingMetadata,
    session: EncodingSession,
    source?: string
  ): EncodedCandidate {
    const options = session.config.structured;
    const items = recordsOf(input);
    const errors: RecordError[] = [];
    const fail = (index: number, error: CompressorError): void => {
      errors.push({ index, code: error.code, message: error.message });
    };

    const records: Array<{ index: number; record: StructuredRecord }> = [];
    items.forEach((item, index) => {
      if (!isPlainRecord(item)) {
        fail(index, new InvalidInputError(`records[${index}]`, 'expected an object'));
        return;
      }
      const missing = options.requiredFields.find(field => item[field] === undefined || item[field] === null);
      if (missing !== undefined) {
        fail(index, new MissingRequiredFieldError(missing, index));
        return;
      }
      records.push({ index, record: item });
    });

    const decisions: FieldDecision[] = selectFields(records.map(r => r.record), options);
    const fields = decisions.filter(d => d.included).map(d => d.field);

    const declaredName = metadata.datasetName;
    const name = typeof declaredName === 'string' && toTokenValue(declaredName)
      ? toTokenValue(declaredName)
      : options.datasetName;

    const header = `[${name}:${records.length}]{${fields.join(',')}}`;
    const rows = fields.length > 0
      ? records.map(({ record }) => `[${fields.map(field => formatValue(record[field], options)).join(',')}]`)
      : [];

    const warnings: string[] = [];
    if (errors.length > 0) warnings.push(`${errors.length} record(s) could not be encoded`);
    if (records.length > 0 && fields.length === 0) warnings.push('No field reached the importance threshold');

    return {
      kind: 'STRUCTURED_DATA',
      original: source ?? serializeRecords(input),
      compressed: records.length > 0 ? [header, ...rows].join('\n') : '',
      tokens: [header, ...rows],
      warnings,
      details: {
        recordCount: items.length,
        encodedCount: records.length,
        fields: decisions,
        errors,
      },
    };
  }
}
