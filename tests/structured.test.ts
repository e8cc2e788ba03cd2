/**
 * Tests for structured-data encoding and field selection
 */

import { createEncodingConfiguration, EncodingConfigurationInput } from '../src/config/schema.js';
import { SemanticEncoder } from '../src/encoder.js';
import { createSession } from '../src/session.js';
import { StructuredDataEncoder, formatValue } from '../src/structured/encoder.js';
import {
  autoImportance,
  decideField,
  nameImportance,
  orderFields,
  selectFields,
  tableImportance,
} from '../src/structured/field-selection.js';
import { EncodingMetadata, StructuredRecord } from '../src/types.js';

function structuredOptions(input: EncodingConfigurationInput['structured'] = {}) {
  return createEncodingConfiguration({ structured: input }).structured;
}

function encodeRecords(
  records: readonly unknown[] | StructuredRecord,
  input: EncodingConfigurationInput = {},
  metadata: EncodingMetadata = {}
) {
  return new StructuredDataEncoder().encode(records, metadata, createSession(createEncodingConfiguration(input)));
}

describe('Structured Data Encoder', () => {
  const products = [
    { id: 1, name: 'Widget', internal_code: 'X9' },
    { id: 2, name: 'Gadget', internal_code: 'Y7' },
  ];

  it('should drop fields below the importance threshold', () => {
    const config = createEncodingConfiguration({ structured: { fieldImportance: { internal_code: 0.2 } } });
    const result = new SemanticEncoder(config).encode(products);

    expect(result.kind).toBe('STRUCTURED_DATA');
    expect(result.fallbackApplied).toBe(false);
    expect(result.compressed).toBe('[DATASET:2]{id,name}\n[1,WIDGET]\n[2,GADGET]');
    expect(result.original).toBe(JSON.stringify(products));
  });

  it('should accept JSON text', () => {
    const config = createEncodingConfiguration({ structured: { fieldImportance: { internal_code: 0.2 } } });
    const result = new SemanticEncoder(config).encode(JSON.stringify(products, null, 2));

    expect(result.compressed).toBe('[DATASET:2]{id,name}\n[1,WIDGET]\n[2,GADGET]');
  });

  it('should return JSON text verbatim on fallback', () => {
    const text = '[{"id": 1, "name": "A"}]';
    const result = new SemanticEncoder(createEncodingConfiguration()).encode(text);

    expect(result.metadata.fallback).toEqual({ applied: true, reason: 'NOT_SMALLER' });
    expect(result.original).toBe(text);
    expect(result.compressed).toBe(text);
  });

  it('should encode big integers', () => {
    const result = new SemanticEncoder(createEncodingConfiguration()).encode([
      { id: 1n, name: 'Alpha widget' },
      { id: 2n, name: 'Beta gadget' },
    ]);

    expect(result.original).toBe('[{"id":"1","name":"Alpha widget"},{"id":"2","name":"Beta gadget"}]');
    expect(result.compressed).toBe('[DATASET:2]{id,name}\n[1,ALPHA_WIDGET]\n[2,BETA_GADGET]');
  });

  it('should encode a single record as a one-row dataset', () => {
    const candidate = encodeRecords({ id: 7, status: 'open' });

    expect(candidate.compressed).toBe('[DATASET:1]{id,status}\n[7,OPEN]');
  });

  it('should name the dataset from metadata', () => {
    const candidate = encodeRecords([{ id: 1 }], {}, { datasetName: 'open orders' });

    expect(candidate.tokens[0]).toBe('[OPEN_ORDERS:1]{id}');
  });

  it('should let required fields win over excluded ones', () => {
    const candidate = encodeRecords(
      [{ id: 1, password: 'test-secret' }],
      { structured: { requiredFields: ['password'], excludedFields: ['password', 'id'] } }
    );

    expect(candidate.compressed).toBe('[DATASET:1]{password}\n[TEST-SECRET]');
  });

  it('should collect records missing a required field', () => {
    const candidate = encodeRecords([{ id: 1, name: 'A' }, { name: 'B' }], { structured: { requiredFields: ['id'] } });

    expect(candidate.compressed).toBe('[DATASET:1]{id,name}\n[1,A]');
    expect(candidate.details.errors).toEqual([
      { index: 1, code: 'MISSING_REQUIRED_FIELD', message: 'Record 1 is missing required field: id' },
    ]);
    expect(candidate.warnings).toEqual(['1 record(s) could not be encoded']);
  });

  it('should reject items that are not records', () => {
    const candidate = encodeRecords([{ id: 1 }, 'oops']);

    expect(candidate.details.errors).toEqual([
      { index: 1, code: 'INVALID_INPUT', message: 'Invalid input for records[1]: expected an object' },
    ]);
    expect(candidate.details.recordCount).toBe(2);
    expect(candidate.details.encodedCount).toBe(1);
  });

  it('should warn when every field is dropped', () => {
    const candidate = encodeRecords([{ password: 'test-secret' }]);

    expect(candidate.compressed).toBe('[DATASET:1]{}');
    expect(candidate.warnings).toEqual(['No field reached the importance threshold']);
  });

  it('should fall back when there is nothing to encode', () => {
    const result = new SemanticEncoder(createEncodingConfiguration()).encode([]);

    expect(result.compressed).toBe('[]');
    expect(result.metadata.fallback).toEqual({ applied: true, reason: 'EMPTY_ENCODING' });
  });
});

describe('formatValue', () => {
  const options = structuredOptions();

  it('should render scalars', () => {
    expect(formatValue(null, options)).toBe('');
    expect(formatValue(undefined, options)).toBe('');
    expect(formatValue(true, options)).toBe('TRUE');
    expect(formatValue(false, options)).toBe('FALSE');
    expect(formatValue(3.5, options)).toBe('3.5');
  });

  it('should normalize strings', () => {
    expect(formatValue('Hello,  world [x]', options)).toBe('HELLO;_WORLD_X');
  });

  it('should truncate long strings', () => {
    expect(formatValue('abcdefgh', structuredOptions({ maxFieldLength: 5 }))).toBe('ABCDE...');
  });

  it('should keep nesting inline when preserving structure', () => {
    expect(formatValue(['a', null, 2], options)).toBe('[A,2]');
    expect(formatValue({ a: 'x', b: null, c: 1 }, options)).toBe('{a:X,c:1}');
  });

  it('should flatten nesting otherwise', () => {
    const flat = structuredOptions({ preserveStructure: false });

    expect(formatValue(['a', null, 2], flat)).toBe('A+2');
    expect(formatValue({ a: 'x', b: null, c: 1 }, flat)).toBe('a=X+c=1');
  });
});

describe('Field selection', () => {
  const options = structuredOptions();

  it('should score field names from the importance table', () => {
    expect(tableImportance('id')).toBe(1.0);
    expect(tableImportance('customerName')).toBe(0.8);
    expect(tableImportance('updatedAt')).toBe(0.3);
    expect(tableImportance('color')).toBeUndefined();
  });

  it('should score field names by shape', () => {
    expect(nameImportance('_rev')).toBe(0.3);
    expect(nameImportance('shippedAt')).toBe(0);
    expect(nameImportance('ship_date')).toBe(0);
    expect(nameImportance('color')).toBeUndefined();
  });

  it('should score values when nothing else applies', () => {
    expect(autoImportance([null, ''])).toBe(0);
    expect(autoImportance(['x', 'y'])).toBe(0.3);
    expect(autoImportance(['a'.repeat(120)])).toBe(0.6);
    expect(autoImportance([true, 'x'])).toBe(0.6);
  });

  it('should order identity fields first', () => {
    expect(orderFields([{ price: 1, name: 'A' }, { id: 2, sku: 'B' }], ['owner'])).toEqual([
      'id', 'name', 'price', 'sku', 'owner',
    ]);
  });

  it('should record why each field was kept or dropped', () => {
    const records = [{
      id: 1,
      title: 'Launch',
      description: 'd'.repeat(120),
      created_at: '2024-01-01',
      _rev: '3',
      password: 'test-secret',
      flag: true,
      color: 'x',
    }];

    expect(selectFields(records, options)).toEqual([
      { field: 'id', included: true, score: 1.0, source: 'TABLE' },
      { field: 'title', included: true, score: 0.8, source: 'TABLE' },
      { field: 'description', included: true, score: 0.6, source: 'TABLE' },
      { field: 'created_at', included: false, score: 0.3, source: 'TABLE' },
      { field: '_rev', included: false, score: 0.3, source: 'NAME' },
      { field: 'password', included: false, score: 0, source: 'TABLE' },
      { field: 'flag', included: true, score: 0.6, source: 'AUTO' },
      { field: 'color', included: false, score: 0.3, source: 'AUTO' },
    ]);
  });

  it('should use a neutral score when auto-detection is off', () => {
    const decision = decideField('color', [{ color: 'x' }], structuredOptions({ autoDetect: false }));

    expect(decision).toEqual({ field: 'color', included: true, score: 0.5, source: 'DEFAULT' });
  });

  it('should prefer explicit importance over the table', () => {
    const decision = decideField('internal_code', [], structuredOptions({ fieldImportance: { internal_code: 0.2 } }));

    expect(decision).toEqual({ field: 'internal_code', included: false, score: 0.2, source: 'EXPLICIT' });
  });
});
