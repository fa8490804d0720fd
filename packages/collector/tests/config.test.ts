/**
 * Tests for config module - configuration loading and merging
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  mergeConfig,
  findConfigFile,
  parseConfigOverride,
  resolveTargetPath,
  ConfigError,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
} from '../src/config.js';

function createFile(basePath: string, relativePath: string, content: string): void {
  const fullPath = join(basePath, relativePath);
  mkdirSync(join(fullPath, '..'), { recursive: true });
  writeFileSync(fullPath, content);
}

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sqltrail-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('DEFAULT_CONFIG', () => {
    it('has required version', () => {
      expect(DEFAULT_CONFIG.version).toBe('1.0');
    });

    it('includes Pascal units', () => {
      expect(DEFAULT_CONFIG.include).toEqual(['**/*.pas']);
    });

    it('excludes IDE history folders', () => {
      expect(DEFAULT_CONFIG.exclude).toContain('**/__history/**');
    });

    it('has extraction defaults', () => {
      expect(DEFAULT_CONFIG.extraction).toEqual({
        dynamicSql: 'template',
        bodyMatching: 'block-stack',
        quoteReservedWords: true,
      });
    });
  });

  describe('CONFIG_FILE_NAMES', () => {
    it('lists YAML and JSON config names', () => {
      expect(CONFIG_FILE_NAMES).toContain('sqltrail.config.yaml');
      expect(CONFIG_FILE_NAMES).toContain('sqltrail.config.json');
      expect(CONFIG_FILE_NAMES).toContain('.sqltrailrc');
    });
  });

  describe('loadConfig', () => {
    it('returns defaults when no config file exists', async () => {
      const config = await loadConfig(tempDir);
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('loads sqltrail.config.yaml', async () => {
      createFile(
        tempDir,
        'sqltrail.config.yaml',
        ['include:', '  - "src/**/*.pas"', 'extraction:', '  dynamicSql: sentinel'].join('\n')
      );

      const config = await loadConfig(tempDir);

      expect(config.include).toEqual(['src/**/*.pas']);
      expect(config.exclude).toEqual(DEFAULT_CONFIG.exclude);
      expect(config.extraction).toEqual({
        dynamicSql: 'sentinel',
        bodyMatching: 'block-stack',
        quoteReservedWords: true,
      });
    });

    it('loads sqltrail.config.json', async () => {
      createFile(tempDir, 'sqltrail.config.json', JSON.stringify({ encoding: 'latin1' }));

      const config = await loadConfig(tempDir);
      expect(config.encoding).toBe('latin1');
    });

    it('loads .sqltrail/config.yaml', async () => {
      createFile(tempDir, '.sqltrail/config.yaml', 'extraction:\n  bodyMatching: begin-count\n');

      const config = await loadConfig(tempDir);
      expect(config.extraction.bodyMatching).toBe('begin-count');
    });

    it('treats an empty file as no override', async () => {
      createFile(tempDir, '.sqltrailrc', '');

      const config = await loadConfig(tempDir);
      expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('rejects malformed YAML', async () => {
      createFile(tempDir, 'sqltrail.config.yaml', 'include: [unclosed');

      await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects malformed JSON', async () => {
      createFile(tempDir, 'sqltrail.config.json', '{"include": ');

      await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(ConfigError);
    });

    it('reports the offending file', async () => {
      createFile(tempDir, 'sqltrail.config.yaml', 'extraction:\n  dynamicSql: guess\n');

      await expect(loadConfig(tempDir)).rejects.toMatchObject({
        name: 'ConfigError',
        message: '"extraction.dynamicSql" must be one of: template, sentinel',
        configPath: join(tempDir, 'sqltrail.config.yaml'),
      });
    });
  });

  describe('findConfigFile', () => {
    it('prefers the first listed name', () => {
      createFile(tempDir, '.sqltrailrc', 'include: []');
      createFile(tempDir, 'sqltrail.config.yaml', 'include: []');

      expect(findConfigFile(tempDir)).toBe(join(tempDir, 'sqltrail.config.yaml'));
    });

    it('returns undefined without a config file', () => {
      expect(findConfigFile(tempDir)).toBeUndefined();
    });
  });

  describe('parseConfigOverride', () => {
    it('accepts a partial document', () => {
      expect(parseConfigOverride({ exclude: ['**/legacy/**'] }, 'x.yaml')).toEqual({ exclude: ['**/legacy/**'] });
    });

    it('rejects a document that is not a mapping', () => {
      expect(() => parseConfigOverride(['a'], 'x.yaml')).toThrow('config must be a mapping');
    });

    it('rejects include entries that are not strings', () => {
      expect(() => parseConfigOverride({ include: [1] }, 'x.yaml')).toThrow(
        '"include" must be a list of glob patterns'
      );
    });

    it('rejects an unknown encoding', () => {
      expect(() => parseConfigOverride({ encoding: 'ebcdic' }, 'x.yaml')).toThrow(ConfigError);
    });

    it('rejects a non-boolean quoteReservedWords', () => {
      expect(() => parseConfigOverride({ extraction: { quoteReservedWords: 'yes' } }, 'x.yaml')).toThrow(
        '"extraction.quoteReservedWords" must be true or false'
      );
    });
  });

  describe('mergeConfig', () => {
    it('replaces arrays and merges extraction options', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, {
        include: ['**/*.dpr'],
        extraction: { quoteReservedWords: false },
      });

      expect(merged.include).toEqual(['**/*.dpr']);
      expect(merged.exclude).toEqual(DEFAULT_CONFIG.exclude);
      expect(merged.extraction).toEqual({
        dynamicSql: 'template',
        bodyMatching: 'block-stack',
        quoteReservedWords: false,
      });
    });

    it('does not modify the base config', () => {
      mergeConfig(DEFAULT_CONFIG, { extraction: { dynamicSql: 'sentinel' } });
      expect(DEFAULT_CONFIG.extraction.dynamicSql).toBe('template');
    });
  });

  describe('resolveTargetPath', () => {
    it('returns cwd for undefined input', () => {
      expect(resolveTargetPath(undefined)).toBe(process.cwd());
    });

    it('resolves relative paths', () => {
      expect(resolveTargetPath('src')).toBe(resolve('src'));
    });
  });
});
