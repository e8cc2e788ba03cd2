#!/usr/bin/env node
/**
 * Semantic Compressor CLI
 * Command-line interface for encoding prompts, transcripts and records
 */

import * as fs from 'fs';
import { Command } from 'commander';
import { z } from 'zod';
import { EncodingConfiguration, mergeConfigurationInput, parseEncodingConfiguration } from '../config/schema.js';
import { SemanticEncoder } from '../encoder.js';
import { InvalidInputError } from '../errors.js';
import { parseTokenStream } from '../tokens/grammar.js';
import { EncodingMetadata, isPlainRecord } from '../types.js';
import { getConfig, loadConfig, validateConfig } from '../utils/config.js';

const EncodeOptionsSchema = z.object({
  json: z.boolean().optional(),
  kind: z.enum(['PROMPT', 'TRANSCRIPT', 'STRUCTURED_DATA']).optional(),
  language: z.string().min(2).optional(),
  config: z.string().optional(),
  metadata: z.string().optional(),
  settings: z.string().optional(),
});

const BindOptionsSchema = z.object({
  values: z.string(),
  language: z.string().min(2).optional(),
  config: z.string().optional(),
  settings: z.string().optional(),
});

const BindingValuesSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]));

function readJson(source: string, what: string): unknown {
  try {
    return JSON.parse(source);
  } catch (error) {
    throw new InvalidInputError(what, error instanceof Error ? error.message : 'not valid JSON');
  }
}

function readRecord(source: string, what: string): Record<string, unknown> {
  const value = readJson(source, what);
  if (!isPlainRecord(value)) {
    throw new InvalidInputError(what, 'expected a JSON object');
  }
  return value;
}

function readInput(file: string | undefined): string {
  return fs.readFileSync(file ?? 0, 'utf-8');
}

function buildConfiguration(
  configFile: string | undefined,
  overrides: Record<string, unknown>
): EncodingConfiguration {
  const base = configFile ? readRecord(fs.readFileSync(configFile, 'utf-8'), 'config') : {};
  return parseEncodingConfiguration(mergeConfigurationInput(base, overrides));
}

const program = new Command();

program
  .name('semcomp')
  .description('Semantic Compressor - compact token encoding for prompts, transcripts and records')
  .version('1.0.0');

// Encode command
program
  .command('encode [file]')
  .description('Encode a file (or stdin) and print the compressed text')
  .option('--json', 'Output the full result as JSON')
  .option('-k, --kind <kind>', 'Force the component: PROMPT, TRANSCRIPT or STRUCTURED_DATA')
  .option('-l, --language <code>', 'Language code')
  .option('-c, --config <file>', 'Encoding configuration JSON file')
  .option('-m, --metadata <json>', 'Caller metadata as a JSON object')
  .option('-s, --settings <file>', 'Engine settings file')
  .action((file: string | undefined, rawOptions: unknown) => {
    try {
      const options = EncodeOptionsSchema.parse(rawOptions);
      loadConfig(options.settings);

      const config = buildConfiguration(options.config, options.language ? { language: options.language } : {});
      const caller = options.metadata ? readRecord(options.metadata, 'metadata') : {};
      const metadata: EncodingMetadata = options.kind ? { ...caller, kind: options.kind } : caller;

      const result = new SemanticEncoder(config).encode(readInput(file), metadata);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(result.compressed);
        if (result.fallbackApplied) {
          console.error(`Note: original kept (${result.metadata.fallback.reason})`);
        }
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Bind command
program
  .command('bind <file>')
  .description('Encode a configuration prompt and bind runtime values into it')
  .requiredOption('-v, --values <json>', 'Placeholder values as a JSON object')
  .option('-l, --language <code>', 'Language code')
  .option('-c, --config <file>', 'Encoding configuration JSON file')
  .option('-s, --settings <file>', 'Engine settings file')
  .action((file: string, rawOptions: unknown) => {
    try {
      const options = BindOptionsSchema.parse(rawOptions);
      loadConfig(options.settings);

      const overrides: Record<string, unknown> = { prompt: { mode: 'CONFIGURATION' } };
      if (options.language) overrides.language = options.language;
      const config = buildConfiguration(options.config, overrides);

      const values = BindingValuesSchema.parse(readJson(options.values, 'values'));
      const encoder = new SemanticEncoder(config);
      const result = encoder.encode(readInput(file), { kind: 'PROMPT' });

      console.log(encoder.bind(result, values));
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Inspect command
program
  .command('inspect <text>')
  .description('Split a compressed token stream into its tokens')
  .option('--json', 'Output as JSON')
  .action((text: string, rawOptions: unknown) => {
    try {
      const options = z.object({ json: z.boolean().optional() }).parse(rawOptions);
      const tokens = parseTokenStream(text);

      if (options.json) {
        console.log(JSON.stringify(tokens, null, 2));
        return;
      }
      if (tokens.length === 0) {
        console.log('No tokens found');
        return;
      }
      for (const token of tokens) {
        console.log(token.category);
        if (token.values.length > 0) console.log(`  values: ${token.values.join(', ')}`);
        if (token.qualifiers.length > 0) console.log(`  qualifiers: ${token.qualifiers.join(', ')}`);
        for (const attribute of token.attributes) {
          console.log(`  ${attribute.key} = ${attribute.value}`);
        }
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Config command
program
  .command('config')
  .description('Show the effective engine settings')
  .option('-s, --settings <file>', 'Engine settings file')
  .action((rawOptions: unknown) => {
    try {
      const options = z.object({ settings: z.string().optional() }).parse(rawOptions);
      loadConfig(options.settings);
      console.log(JSON.stringify(getConfig(), null, 2));

      const validation = validateConfig();
      if (!validation.valid) {
        console.log('\nValidation errors:');
        for (const message of validation.errors) {
          console.log(`  - ${message}`);
        }
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parse();
