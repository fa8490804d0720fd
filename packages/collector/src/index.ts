/**
 * @sqltrail/collector
 *
 * Recovers the SQL each method of an Object Pascal unit runs: statement text,
 * target table, operation kind, bound parameters and transaction membership.
 * No parser, no database; only the source text.
 */

// Types
export * from './types.js';

// Pattern tables
export * from './patterns.js';

// Schema version (for consumer compatibility checks)
export { ARTIFACT_SCHEMA_VERSION } from './schema/index.js';

// Configuration
export {
  loadConfig,
  mergeConfig,
  findConfigFile,
  parseConfigOverride,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  ConfigError,
  resolveTargetPath,
  type ConfigOverride,
} from './config.js';

// File inventory helpers
export * from './files/index.js';

// Scanner
export { stripComments, countNewlines } from './scanner/comments.js';
export { locateMethodBodies, findBodyEnd } from './scanner/method-bodies.js';

// SQL text
export { normalizeSql, toPascalCase, unquoteIdentifiers, uppercaseKeywords } from './sql/normalize.js';
export { quoteReservedWords, quoteIfReserved, isReservedWord } from './sql/quoting.js';
export { classifyOperation, extractTableName } from './sql/classify.js';

// Extractors
export * from './extractors/index.js';

// ============================================================================
// Main Collect Function
// ============================================================================

import type { CollectorArtifact, RefineStatement, SkippedFile, UnitExtraction } from './types.js';
import { ARTIFACT_SCHEMA_VERSION } from './schema/index.js';
import { loadConfig, mergeConfig, resolveTargetPath, type ConfigOverride } from './config.js';
import { collectFilePaths, loadSourceUnit, toRelativePath } from './files/index.js';
import { extractUnit } from './extractors/index.js';
import { debugLog, logCollectorMemory } from './debug.js';

export interface CollectOptions {
  targetPath?: string;
  /** Applied on top of the config file found in the target */
  config?: ConfigOverride;
  refineStatement?: RefineStatement;
}

/**
 * Sort entries deterministically by file path.
 * This ensures stable output for CI, caching, and diffs.
 */
function sortByFile<T extends { file: string }>(entries: T[]): T[] {
  return [...entries].sort((a, b) => a.file.localeCompare(b.file));
}

/**
 * Collect database operations from every unit under the target
 *
 * @example
 * ```ts
 * const artifact = await collect({
 *   targetPath: '/path/to/delphi/project',
 *   config: { extraction: { dynamicSql: 'sentinel' } },
 * });
 * ```
 */
export async function collect(options: CollectOptions = {}): Promise<CollectorArtifact> {
  const targetPath = resolveTargetPath(options.targetPath);

  // Load config
  const baseConfig = await loadConfig(targetPath);
  const config = options.config ? mergeConfig(baseConfig, options.config) : baseConfig;

  const paths = await collectFilePaths({ targetPath, config });
  debugLog(`${paths.length} unit(s) under ${targetPath}`);
  logCollectorMemory('scan start');

  const units: UnitExtraction[] = [];
  const skippedFiles: SkippedFile[] = [];

  for (const path of paths) {
    try {
      const unit = await loadSourceUnit(path, targetPath, config.encoding);
      units.push(
        extractUnit(unit.source, unit.file, {
          unitName: unit.unitName,
          dynamicSql: config.extraction.dynamicSql,
          bodyMatching: config.extraction.bodyMatching,
          quoteReservedWords: config.extraction.quoteReservedWords,
          refineStatement: options.refineStatement,
        })
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      debugLog(`skipped ${path}: ${reason}`);
      skippedFiles.push({ file: toRelativePath(path, targetPath), reason });
    }
  }

  logCollectorMemory('scan done');

  // Sort all arrays deterministically for stable output
  const sortedUnits = sortByFile(units);

  return {
    version: '1.0',
    schemaVersion: ARTIFACT_SCHEMA_VERSION,
    extractedAt: new Date().toISOString(),
    codebase: {
      root: targetPath,
      filesScanned: paths.length,
      unitsWithOperations: sortedUnits.filter((unit) => unit.operations.length > 0).length,
    },
    units: sortedUnits,
    operations: sortedUnits.flatMap((unit) => unit.operations),
    transactionGroups: sortedUnits.flatMap((unit) => unit.transactionGroups),
    skippedFiles: sortByFile(skippedFiles),
  };
}
