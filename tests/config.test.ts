/**
 * Tests for engine settings management
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  loadConfig,
  getConfig,
  updateConfig,
  saveConfig,
  validateConfig,
  resetConfig,
} from '../src/utils/config';

describe('Engine Settings', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;
  let warnSpy: jest.SpyInstance;

  beforeAll(() => {
    testDir = path.join(os.tmpdir(), `semcomp-config-test-${Date.now()}`);
    fs.mkdirSync(testDir, { recursive: true });
    originalEnv = { ...process.env };
  });

  afterAll(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    process.env = originalEnv;
  });

  beforeEach(() => {
    resetConfig();
    delete process.env.SEMCOMP_LANGUAGE;
    delete process.env.SEMCOMP_LOG_LEVEL;
    delete process.env.SEMCOMP_CHARS_PER_TOKEN;
    delete process.env.SEMCOMP_MIN_RATIO;
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
    resetConfig();
  });

  describe('loadConfig', () => {
    it('should load default settings', () => {
      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.language).toBe('en');
      expect(config.charsPerToken).toBe(4);
      expect(config.minCompressionRatio).toBe(0);
      expect(config.patternStepBudget).toBe(5000);
      expect(config.logLevel).toBe('warn');
    });

    it('should merge file settings with defaults', () => {
      const configPath = path.join(testDir, 'settings.json');
      fs.writeFileSync(configPath, JSON.stringify({ charsPerToken: 3.5, patternStepBudget: 800 }));

      const config = loadConfig(configPath);

      expect(config.charsPerToken).toBe(3.5);
      expect(config.patternStepBudget).toBe(800);
      expect(config.patternTimeBudgetMs).toBe(250);
    });

    it('should ignore a settings file that fails validation', () => {
      const configPath = path.join(testDir, 'invalid.json');
      fs.writeFileSync(configPath, JSON.stringify({ charsPerToken: -1 }));

      const config = loadConfig(configPath);

      expect(config.charsPerToken).toBe(4);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should warn and keep defaults when the file is not JSON', () => {
      const configPath = path.join(testDir, 'broken.json');
      fs.writeFileSync(configPath, '{ not json');

      const config = loadConfig(configPath);

      expect(config.language).toBe('en');
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should override with environment variables', () => {
      process.env.SEMCOMP_LANGUAGE = 'es';
      process.env.SEMCOMP_LOG_LEVEL = 'debug';
      process.env.SEMCOMP_CHARS_PER_TOKEN = '3';
      process.env.SEMCOMP_MIN_RATIO = '10';

      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.language).toBe('es');
      expect(config.logLevel).toBe('debug');
      expect(config.charsPerToken).toBe(3);
      expect(config.minCompressionRatio).toBe(10);
    });

    it('should ignore an unknown log level in the environment', () => {
      process.env.SEMCOMP_LOG_LEVEL = 'verbose';

      const config = loadConfig(path.join(testDir, 'nonexistent.json'));

      expect(config.logLevel).toBe('warn');
    });
  });

  describe('updateConfig', () => {
    it('should update settings', () => {
      const updated = updateConfig({ minCompressionRatio: 25 });

      expect(updated.minCompressionRatio).toBe(25);
      expect(getConfig().minCompressionRatio).toBe(25);
    });

    it('should keep manual overrides across a later load', () => {
      updateConfig({ charsPerToken: 2 });

      loadConfig();

      expect(getConfig().charsPerToken).toBe(2);
    });
  });

  describe('saveConfig', () => {
    it('should write settings that load back', () => {
      const configPath = path.join(testDir, 'nested', 'saved.json');
      updateConfig({ patternTimeBudgetMs: 500 });

      saveConfig(configPath);
      resetConfig();
      const config = loadConfig(configPath);

      expect(fs.existsSync(configPath)).toBe(true);
      expect(config.patternTimeBudgetMs).toBe(500);
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig()).toEqual({ valid: true, errors: [] });
    });

    it('should report out-of-range values', () => {
      updateConfig({ charsPerToken: 0, minCompressionRatio: 120 });

      const result = validateConfig();

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'charsPerToken must be greater than 0',
        'minCompressionRatio must be between 0 and 100',
      ]);
    });
  });
});
