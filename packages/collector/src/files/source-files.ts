import { readFile } from 'fs/promises';
import { basename, extname, relative, sep } from 'path';
import { glob } from 'glob';
import type { CollectorConfig } from '../types.js';
import { stripComments } from '../scanner/comments.js';

// ============================================================================
// SCALABILITY LIMITS
// ============================================================================

/**
 * Maximum number of units to process before warning/limiting.
 */
const MAX_SOURCE_FILES = parseInt(process.env['SQLTRAIL_MAX_FILES'] || '20000', 10);

/**
 * Check if we should warn about oversized trees
 */
const WARN_ON_OVERSIZED = process.env['SQLTRAIL_WARN_OVERSIZED'] !== '0';

const UNIT_HEADER_PATTERN = /^\s*(?:unit|program|library|package)\s+([\w.]+)\s*;/im;

export interface SourceFileLoaderOptions {
  targetPath: string;
  config: CollectorConfig;
  /** Overrides config.include */
  patterns?: string[];
}

export interface SourceUnit {
  /** Absolute path */
  path: string;
  /** Path relative to the collection root, with forward slashes */
  file: string;
  unitName: string;
  source: string;
}

export function toRelativePath(filePath: string, targetPath: string): string {
  return relative(targetPath, filePath).split(sep).join('/');
}

function normalizePattern(pattern: string): string {
  return pattern.replace(/\\/g, '/').replace(/^\.\//, '');
}

/**
 * Unit name from the `unit Name;` header, or the file name without extension.
 * A header inside a comment does not count.
 */
export function resolveUnitName(source: string, filePath: string): string {
  const header = UNIT_HEADER_PATTERN.exec(stripComments(source));
  return header?.[1] ?? basename(filePath, extname(filePath));
}

export async function collectFilePaths(options: SourceFileLoaderOptions): Promise<string[]> {
  const { targetPath, config } = options;
  const patterns = (options.patterns ?? config.include).map(normalizePattern);
  if (patterns.length === 0) return [];

  const files = await glob(patterns, {
    cwd: targetPath,
    absolute: true,
    nodir: true,
    ignore: config.exclude.map(normalizePattern),
  });

  const unique = Array.from(new Set(files)).sort();

  // Scalability check: warn and limit if too many files
  if (unique.length > MAX_SOURCE_FILES) {
    if (WARN_ON_OVERSIZED) {
      console.warn(
        `[collector] Warning: ${unique.length} files exceed limit (${MAX_SOURCE_FILES}). ` +
          `Analysis will be limited. Set SQLTRAIL_MAX_FILES to increase.`
      );
    }
    return unique.slice(0, MAX_SOURCE_FILES);
  }

  return unique;
}

/**
 * Read one unit with the configured encoding.
 */
export async function loadSourceUnit(
  filePath: string,
  targetPath: string,
  encoding: BufferEncoding
): Promise<SourceUnit> {
  const source = await readFile(filePath, { encoding });
  return {
    path: filePath,
    file: toRelativePath(filePath, targetPath),
    unitName: resolveUnitName(source, filePath),
    source,
  };
}
