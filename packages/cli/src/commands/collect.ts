/**
 * Collect command - extract database operations from a Delphi project
 */

import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import {
  ConfigError,
  collect,
  type CollectorArtifact,
  type ConfigOverride,
  type DynamicSqlMode,
} from '../../../collector/src/index.js';
import { CLIError, ErrorCodes, wrapConfigError, wrapError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { OUTPUT_FORMATS, formatArtifact, type OutputFormat } from '../lib/output.js';

export interface CollectCommandOptions {
  target?: string;
  out?: string;
  format?: string;
  pretty?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  dynamicSql?: string;
}

const DYNAMIC_SQL_MODES: readonly DynamicSqlMode[] = ['template', 'sentinel'];

/** Format duration for human-readable output */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function parseFormat(value: string | undefined): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === (value ?? 'json'));
  if (!format) {
    throw new CLIError(
      ErrorCodes.CLI_INVALID_ARGUMENT,
      `Unknown format: ${value}. Available formats: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return format;
}

function parseDynamicSql(value: string | undefined): DynamicSqlMode | undefined {
  if (value === undefined) return undefined;
  const mode = DYNAMIC_SQL_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new CLIError(
      ErrorCodes.CLI_INVALID_ARGUMENT,
      `Unknown dynamic SQL mode: ${value}. Available modes: ${DYNAMIC_SQL_MODES.join(', ')}`
    );
  }
  return mode;
}

async function runCollect(targetPath: string, override: ConfigOverride | undefined): Promise<CollectorArtifact> {
  try {
    return await collect({ targetPath, config: override });
  } catch (error) {
    if (error instanceof ConfigError) throw wrapConfigError(error);
    throw wrapError(error, ErrorCodes.EXTRACT_FAILED);
  }
}

export async function collectCommand(options: CollectCommandOptions): Promise<void> {
  const startTime = Date.now();
  const format = parseFormat(options.format);
  const dynamicSql = parseDynamicSql(options.dynamicSql);
  const targetPath = resolve(options.target ?? process.cwd());

  if (!existsSync(targetPath)) {
    throw new CLIError(ErrorCodes.IO_PATH_NOT_FOUND, `Target not found: ${targetPath}`);
  }

  logger.info(`Collecting database operations from ${targetPath}...`);

  const artifact = await runCollect(targetPath, dynamicSql ? { extraction: { dynamicSql } } : undefined);
  const duration = Date.now() - startTime;

  for (const skipped of artifact.skippedFiles) {
    logger.warn(`Skipped ${skipped.file}: ${skipped.reason}`);
  }
  logger.debug('Collection summary', {
    filesScanned: artifact.codebase.filesScanned,
    unitsWithOperations: artifact.codebase.unitsWithOperations,
    operations: artifact.operations.length,
    transactionGroups: artifact.transactionGroups.length,
  });

  const output = formatArtifact(artifact, format, options.pretty);

  // Determine output destination
  const outputToStdout = options.out === '-' || options.out === undefined;
  if (outputToStdout) {
    process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
    logger.info(`Collected in ${formatDuration(duration)}`);
    return;
  }

  const outputPath = resolve(options.out ?? '');
  try {
    // Create directory if needed
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, output, 'utf-8');
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_WRITE_ERROR, `Failed to write ${outputPath}`);
  }

  logger.success(`Operations written to ${outputPath}`);
  logger.info(`  Files scanned: ${artifact.codebase.filesScanned}`);
  logger.info(`  Operations: ${artifact.operations.length}`);
  logger.info(`  Transaction groups: ${artifact.transactionGroups.length}`);
  logger.info(`  Duration: ${formatDuration(duration)}`);
}
