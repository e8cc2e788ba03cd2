/**
 * Output Format Resolver
 *
 * Builds the OUT token: format, array shape, an inlined response schema
 * and the optional EMPTY / ENUMS / RANGES / KEYS attributes.
 */

import { z } from 'zod';
import { ResolvedToken, TokenAttribute, attr, sortAttributes } from '../tokens/grammar.js';
import { createLogger } from '../utils/logger.js';
import { toTokenValue } from '../utils/text.js';
import { firstMatch, matchesFor } from './attributes.js';
import { OutputResolution, PromptContext, RuleMatchIndex } from './types.js';

const log = createLogger('output');

// ==================== Schema Model ====================

export type ScalarKind = 'str' | 'num' | 'bool' | 'arr' | 'null' | 'any';

export type SchemaValue =
  | { kind: ScalarKind; enumValues?: string[]; range?: string }
  | { kind: 'obj'; fields: SchemaField[] };

export interface SchemaField {
  name: string;
  value: SchemaValue;
}

const TYPE_NAMES: Record<string, ScalarKind> = {
  string: 'str',
  str: 'str',
  text: 'str',
  number: 'num',
  num: 'num',
  int: 'num',
  integer: 'num',
  float: 'num',
  boolean: 'bool',
  bool: 'bool',
  array: 'arr',
  list: 'arr',
  null: 'null',
};

const RANGE = /^\s*(-?\d+(?:\.\d+)?)\s*(?:-|–|to|\.\.)\s*(-?\d+(?:\.\d+)?)\s*$/i;

/**
 * Interpret a schema value written as text: a type name, an enum
 * (`a|b|c`), a numeric range (`0-1`) or a literal
 */
export function interpretScalar(raw: string): SchemaValue {
  const text = raw.trim().replace(/^["']|["']$/g, '').trim();
  const typeName = TYPE_NAMES[text.toLowerCase()];
  if (typeName) return { kind: typeName };

  const range = text.match(RANGE);
  if (range) return { kind: 'num', range: `${range[1]}-${range[2]}` };

  if (text.includes('|')) {
    const options = text.split('|').map(o => o.trim()).filter(o => o.length > 0);
    if (options.length > 1) return { kind: 'str', enumValues: options.map(toTokenValue) };
  }

  if (/^-?\d+(?:\.\d+)?$/.test(text)) return { kind: 'num' };
  if (/^(?:true|false)$/i.test(text)) return { kind: 'bool' };
  if (text.length === 0 || text === '...') return { kind: 'any' };
  return { kind: 'str' };
}

function fromJson(value: unknown): SchemaValue {
  if (Array.isArray(value)) return { kind: 'arr' };
  if (value === null) return { kind: 'null' };
  if (typeof value === 'number') return { kind: 'num' };
  if (typeof value === 'boolean') return { kind: 'bool' };
  if (typeof value === 'string') return interpretScalar(value);
  if (typeof value === 'object') {
    return { kind: 'obj', fields: Object.entries(value).map(([name, child]) => ({ name, value: fromJson(child) })) };
  }
  return { kind: 'any' };
}

/**
 * Recursive-descent reader for loose schemas such as
 * `{summary, scores: {clarity: 0-1}, label: "a|b"}`
 */
class LooseSchemaReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  readObject(): SchemaField[] {
    const fields: SchemaField[] = [];
    this.expect('{');
    for (;;) {
      this.skipSeparators();
      if (this.peek() === '}' || this.peek() === undefined) {
        this.pos++;
        return fields;
      }
      const name = this.readKey();
      this.skipSpace();
      let value: SchemaValue = { kind: 'any' };
      if (this.peek() === ':') {
        this.pos++;
        this.skipSpace();
        value = this.readValue();
      }
      if (name) fields.push({ name, value });
      else this.skipValue();
    }
  }

  private readValue(): SchemaValue {
    const ch = this.peek();
    if (ch === '{') return { kind: 'obj', fields: this.readObject() };
    if (ch === '[') {
      this.skipBalanced('[', ']');
      return { kind: 'arr' };
    }
    if (ch === '"' || ch === "'") return interpretScalar(this.readQuoted(ch));
    const start = this.pos;
    this.skipValue();
    return interpretScalar(this.text.slice(start, this.pos));
  }

  private readKey(): string {
    const ch = this.peek();
    if (ch === '"' || ch === "'") return this.readQuoted(ch);
    const match = /^[\p{L}\p{N}_.$-]+/u.exec(this.text.slice(this.pos));
    if (!match) {
      this.pos++;
      return '';
    }
    this.pos += match[0].length;
    return match[0];
  }

  private readQuoted(quote: string): string {
    const end = this.text.indexOf(quote, this.pos + 1);
    const close = end < 0 ? this.text.length : end;
    const value = this.text.slice(this.pos + 1, close);
    this.pos = close + 1;
    return value;
  }

  /** Advance to the next top-level `,`, newline or `}` */
  private skipValue(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === ',' || ch === '\n' || ch === '}') return;
      if (ch === '{') this.skipBalanced('{', '}');
      else if (ch === '[') this.skipBalanced('[', ']');
      else this.pos++;
    }
  }

  private skipBalanced(open: string, close: string): void {
    let depth = 0;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos++];
      if (ch === open) depth++;
      else if (ch === close && --depth === 0) return;
    }
  }

  private skipSeparators(): void {
    while (this.pos < this.text.length && /[\s,;]/.test(this.text[this.pos])) this.pos++;
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }

  private expect(ch: string): void {
    this.skipSpace();
    if (this.text[this.pos] === ch) this.pos++;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }
}

const JsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * Parse a brace block as strict JSON first, then as a loose field list
 */
export function parseSchema(block: string): SchemaField[] {
  try {
    const parsed = JsonObjectSchema.safeParse(JSON.parse(block));
    if (parsed.success) {
      const value = fromJson(parsed.data);
      return value.kind === 'obj' ? value.fields : [];
    }
  } catch (error) {
    log.debug('Schema block is not strict JSON, reading it loosely', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return new LooseSchemaReader(block).readObject();
}

/**
 * First balanced `{...}` that is not a `{{placeholder}}`
 */
export function findSchemaBlock(text: string): string | undefined {
  for (let i = 0; i < text.length; i++) {
    if (text[i] !== '{' || text[i + 1] === '{' || text[i - 1] === '{') continue;
    let depth = 0;
    for (let j = i; j < text.length; j++) {
      if (text[j] === '{') depth++;
      else if (text[j] === '}' && --depth === 0) {
        const block = text.slice(i, j + 1);
        return /[\p{L}]/u.test(block) ? block : undefined;
      }
    }
    return undefined;
  }
  return undefined;
}

function cleanName(name: string): string {
  return name.trim().replace(/[[\]{}:,=()|]/g, '').replace(/\s+/g, '_');
}

export function renderSchema(fields: readonly SchemaField[], inferTypes: boolean): string {
  const parts = fields.map(field => {
    const name = cleanName(field.name);
    if (field.value.kind === 'obj') return `${name}:${renderSchema(field.value.fields, inferTypes)}`;
    if (inferTypes && field.value.kind !== 'any') return `${name}:${field.value.kind}`;
    return name;
  });
  return `{${parts.join(',')}}`;
}

interface Annotations {
  enums: string[];
  ranges: string[];
}

function collectAnnotations(fields: readonly SchemaField[], into: Annotations): Annotations {
  for (const field of fields) {
    const value = field.value;
    if (value.kind === 'obj') {
      collectAnnotations(value.fields, into);
      continue;
    }
    const name = cleanName(field.name);
    if (value.enumValues) into.enums.push(`${name}(${value.enumValues.join('|')})`);
    if (value.range) into.ranges.push(`${name}(${value.range})`);
  }
  return into;
}

// ==================== Resolution ====================

function keyList(raw: string): string {
  return raw
    .split(/\s*,\s*|\s+and\s+/i)
    .map(piece => /^[A-Za-z_][A-Za-z0-9_]*/.exec(piece.trim())?.[0].toLowerCase() ?? '')
    .filter(key => key.length > 0)
    .join('+');
}

export function resolveOutput(ctx: PromptContext, ruleMatches: RuleMatchIndex): OutputResolution {
  const format = firstMatch(ruleMatches, 'format')?.value;
  const shapeMatches = matchesFor(ruleMatches, 'shape');
  const itemMatch = shapeMatches.find(m => m.key === 'ITEM');
  const item = itemMatch
    ? `${toTokenValue(ctx.vocabulary.inflector.singular(itemMatch.value))}[]`
    : undefined;
  const isArray = item !== undefined || shapeMatches.some(m => m.key === 'SHAPE' && m.value === 'ARRAY');

  const block = findSchemaBlock(ctx.text);
  const fields = block ? parseSchema(block) : [];
  const schema = fields.length > 0 ? renderSchema(fields, ctx.options.inferTypes) : undefined;

  const attributes: TokenAttribute[] = [];
  const empty = firstMatch(ruleMatches, 'empty');
  if (empty) {
    attributes.push(attr('EMPTY', empty.value === 'NULL' || !isArray ? 'NULL' : '[]'));
  }
  if (schema && ctx.options.annotateEnums) {
    const { enums, ranges } = collectAnnotations(fields, { enums: [], ranges: [] });
    if (enums.length > 0) attributes.push(attr('ENUMS', enums.join('+')));
    if (ranges.length > 0) attributes.push(attr('RANGES', ranges.join('+')));
  }
  const keys = firstMatch(ruleMatches, 'keys');
  if (keys && !schema) {
    const list = keyList(keys.value);
    if (list) attributes.push(attr('KEYS', list));
  }

  const value = format ?? (schema ? 'JSON' : isArray ? 'LIST' : undefined);
  const qualifiers: string[] = [];
  if (isArray) qualifiers.push('ARRAY');
  if (schema) qualifiers.push(schema);

  if (!value && attributes.length === 0) {
    return {};
  }

  const token: ResolvedToken = {
    category: 'OUT',
    values: value ? [value] : [],
    qualifiers,
    attributes: sortAttributes(attributes),
  };
  return {
    token,
    format: value,
    shape: schema ? 'SCHEMA' : isArray ? 'ARRAY' : undefined,
    item,
    schema,
  };
}

/**
 * Add `OF=<item>` when no data-flow target carries the array element
 */
export function withItemAttribute(output: OutputResolution): OutputResolution {
  if (!output.token || !output.item) return output;
  const item = output.item.replace(/\[\]$/, '');
  return {
    ...output,
    token: { ...output.token, attributes: sortAttributes([...output.token.attributes, attr('OF', item)]) },
  };
}
