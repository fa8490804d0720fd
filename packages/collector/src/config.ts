/**
 * Default configuration and config loading for sqltrail
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve, join } from 'path';
import { parse as parseYaml } from 'yaml';
import type { CollectorConfig, ExtractionConfig } from './types.js';

export const DEFAULT_CONFIG: CollectorConfig = {
  version: '1.0',

  // Units; programs (*.dpr) and include files (*.inc) are opt-in
  include: ['**/*.pas'],
  exclude: [
    // IDE history and recovery copies
    '**/__history/**',
    '**/__recovery/**',
    '**/backup/**',
    // Build output
    '**/Win32/**',
    '**/Win64/**',
    '**/dcu/**',
    // Tooling
    '**/node_modules/**',
    '**/.git/**',
  ],

  // latin1 for ANSI-encoded units
  encoding: 'utf8',

  extraction: {
    dynamicSql: 'template',
    bodyMatching: 'block-stack',
    quoteReservedWords: true,
  },
};

export const CONFIG_FILE_NAMES = [
  'sqltrail.config.yaml',
  'sqltrail.config.yml',
  'sqltrail.config.json',
  '.sqltrailrc',
  '.sqltrailrc.yaml',
  '.sqltrailrc.yml',
];

const ENCODINGS: readonly BufferEncoding[] = ['utf8', 'utf-8', 'latin1', 'binary', 'ascii', 'utf16le', 'ucs2'];

/** A config file that parsed but does not describe a valid configuration */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ConfigOverride {
  include?: string[];
  exclude?: string[];
  encoding?: BufferEncoding;
  extraction?: Partial<ExtractionConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, key: string, configPath: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    throw new ConfigError(`"${key}" must be a list of glob patterns`, configPath);
  }
  return value;
}

function readOption<T extends string>(
  value: unknown,
  key: string,
  allowed: readonly T[],
  configPath: string
): T | undefined {
  if (value === undefined) return undefined;
  const match = allowed.find((option) => option === value);
  if (match === undefined) {
    throw new ConfigError(`"${key}" must be one of: ${allowed.join(', ')}`, configPath);
  }
  return match;
}

function readExtraction(value: unknown, configPath: string): Partial<ExtractionConfig> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError('"extraction" must be a mapping', configPath);
  }

  const extraction: Partial<ExtractionConfig> = {};
  const dynamicSql = readOption(value['dynamicSql'], 'extraction.dynamicSql', ['template', 'sentinel'], configPath);
  if (dynamicSql) extraction.dynamicSql = dynamicSql;

  const bodyMatching = readOption(
    value['bodyMatching'],
    'extraction.bodyMatching',
    ['block-stack', 'begin-count'],
    configPath
  );
  if (bodyMatching) extraction.bodyMatching = bodyMatching;

  const quote = value['quoteReservedWords'];
  if (quote !== undefined) {
    if (typeof quote !== 'boolean') {
      throw new ConfigError('"extraction.quoteReservedWords" must be true or false', configPath);
    }
    extraction.quoteReservedWords = quote;
  }
  return extraction;
}

/**
 * Validate a parsed config document. An empty document is an empty override.
 */
export function parseConfigOverride(value: unknown, configPath: string): ConfigOverride {
  if (value === null || value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError('config must be a mapping', configPath);
  }

  const override: ConfigOverride = {};
  const include = readStringList(value['include'], 'include', configPath);
  if (include) override.include = include;
  const exclude = readStringList(value['exclude'], 'exclude', configPath);
  if (exclude) override.exclude = exclude;
  const encoding = readOption(value['encoding'], 'encoding', ENCODINGS, configPath);
  if (encoding) override.encoding = encoding;
  const extraction = readExtraction(value['extraction'], configPath);
  if (extraction) override.extraction = extraction;
  return override;
}

async function readConfigFile(configPath: string): Promise<ConfigOverride> {
  const content = await readFile(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), configPath);
  }
  return parseConfigOverride(parsed, configPath);
}

/** Path of the config file that applies to `targetPath`, if any */
export function findConfigFile(targetPath: string): string | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = join(targetPath, fileName);
    if (existsSync(configPath)) return configPath;
  }

  // Check for config in .sqltrail directory
  const configPath = join(targetPath, '.sqltrail', 'config.yaml');
  return existsSync(configPath) ? configPath : undefined;
}

export async function loadConfig(targetPath: string): Promise<CollectorConfig> {
  const configPath = findConfigFile(targetPath);
  if (!configPath) {
    // Return default config if no config file found
    return DEFAULT_CONFIG;
  }
  return mergeConfig(DEFAULT_CONFIG, await readConfigFile(configPath));
}

export function mergeConfig(base: CollectorConfig, override: ConfigOverride): CollectorConfig {
  return {
    ...base,
    // Arrays replace, they are not appended
    include: override.include ?? base.include,
    exclude: override.exclude ?? base.exclude,
    encoding: override.encoding ?? base.encoding,
    extraction: override.extraction ? { ...base.extraction, ...override.extraction } : base.extraction,
  };
}

export function resolveTargetPath(input?: string): string {
  if (!input) {
    return process.cwd();
  }
  return resolve(input);
}
