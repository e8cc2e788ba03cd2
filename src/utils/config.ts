/**
 * Engine Settings Management
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { EngineSettings, LogLevel } from '../types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const DEFAULT_CONFIG: EngineSettings = {
  language: 'en',

  // Token estimation and fallback
  charsPerToken: 4,
  minCompressionRatio: 0,

  // Pattern matching budget, per encode() call
  patternStepBudget: 5000,
  patternTimeBudgetMs: 250,
  maxPatternInputLength: 50000,

  logLevel: 'warn',
};

const SettingsFileSchema = z.object({
  language: z.string().min(2),
  charsPerToken: z.number().positive(),
  minCompressionRatio: z.number().min(0).max(100),
  patternStepBudget: z.number().int().positive(),
  patternTimeBudgetMs: z.number().positive(),
  maxPatternInputLength: z.number().int().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
}).partial();

let currentConfig: EngineSettings = { ...DEFAULT_CONFIG };
let configLoaded = false;

function defaultConfigPath(): string {
  return path.join(
    process.env.HOME || process.env.USERPROFILE || '',
    '.semantic-compressor',
    'config.json'
  );
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Load settings from file and environment
 * Idempotent - only loads once unless a specific configPath is provided
 * Preserves any manual overrides from updateConfig()
 */
export function loadConfig(configPath?: string): EngineSettings {
  if (configLoaded && !configPath) {
    return currentConfig;
  }

  const filePath = configPath || defaultConfigPath();

  // Preserve any manual overrides before resetting
  const manualOverrides = configLoaded ? { ...currentConfig } : {};

  currentConfig = { ...DEFAULT_CONFIG };

  if (fs.existsSync(filePath)) {
    try {
      const fileContent = fs.readFileSync(filePath, 'utf-8');
      const parsed = SettingsFileSchema.safeParse(JSON.parse(fileContent));
      if (parsed.success) {
        currentConfig = { ...currentConfig, ...parsed.data };
      } else {
        console.warn(`Ignoring invalid settings in ${filePath}:`, parsed.error.issues.map(i => i.message).join('; '));
      }
    } catch (error) {
      console.warn(`Failed to load config from ${filePath}:`, error);
    }
  }

  // Override with environment variables
  if (process.env.SEMCOMP_LANGUAGE) {
    currentConfig.language = process.env.SEMCOMP_LANGUAGE;
  }
  const envLevel = process.env.SEMCOMP_LOG_LEVEL;
  if (envLevel && isLogLevel(envLevel)) {
    currentConfig.logLevel = envLevel;
  }
  if (process.env.SEMCOMP_CHARS_PER_TOKEN) {
    const value = parseFloat(process.env.SEMCOMP_CHARS_PER_TOKEN);
    if (Number.isFinite(value) && value > 0) {
      currentConfig.charsPerToken = value;
    }
  }
  if (process.env.SEMCOMP_MIN_RATIO) {
    const value = parseFloat(process.env.SEMCOMP_MIN_RATIO);
    if (Number.isFinite(value)) {
      currentConfig.minCompressionRatio = value;
    }
  }

  // Re-apply any manual overrides
  if (Object.keys(manualOverrides).length > 0) {
    currentConfig = { ...currentConfig, ...manualOverrides };
  }

  configLoaded = true;
  return currentConfig;
}

/**
 * Get current settings
 */
export function getConfig(): EngineSettings {
  return currentConfig;
}

/**
 * Update settings (marks settings as loaded to prevent reset)
 */
export function updateConfig(updates: Partial<EngineSettings>): EngineSettings {
  currentConfig = { ...currentConfig, ...updates };
  configLoaded = true;
  return currentConfig;
}

/**
 * Reset settings to defaults (for testing)
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
  configLoaded = false;
}

/**
 * Save settings to file
 */
export function saveConfig(configPath?: string): void {
  const filePath = configPath || defaultConfigPath();

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(filePath, JSON.stringify(currentConfig, null, 2));
}

/**
 * Validate settings
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!(currentConfig.charsPerToken > 0)) {
    errors.push('charsPerToken must be greater than 0');
  }

  if (currentConfig.minCompressionRatio < 0 || currentConfig.minCompressionRatio > 100) {
    errors.push('minCompressionRatio must be between 0 and 100');
  }

  if (currentConfig.patternStepBudget < 1) {
    errors.push('patternStepBudget must be at least 1');
  }

  if (currentConfig.patternTimeBudgetMs <= 0) {
    errors.push('patternTimeBudgetMs must be greater than 0');
  }

  if (currentConfig.maxPatternInputLength < 1) {
    errors.push('maxPatternInputLength must be at least 1');
  }

  if (!isLogLevel(currentConfig.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
