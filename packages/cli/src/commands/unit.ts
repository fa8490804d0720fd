/**
 * Unit command - show the operations found in a single unit
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import pc from 'picocolors';
import {
  extractUnit,
  loadConfig,
  resolveUnitName,
  type CollectorConfig,
} from '../../../collector/src/index.js';
import { CLIError, ErrorCodes, wrapConfigError, wrapError } from '../lib/errors.js';
import { renderOperationsTable } from '../lib/output.js';

export interface UnitCommandOptions {
  json?: boolean;
  unitName?: string;
}

async function loadUnitConfig(directory: string): Promise<CollectorConfig> {
  try {
    return await loadConfig(directory);
  } catch (error) {
    throw wrapConfigError(error);
  }
}

export async function unitCommand(file: string, options: UnitCommandOptions): Promise<void> {
  const filePath = resolve(file);
  if (!existsSync(filePath)) {
    throw new CLIError(ErrorCodes.IO_PATH_NOT_FOUND, `Unit not found: ${filePath}`);
  }

  const config = await loadUnitConfig(dirname(filePath));

  let source: string;
  try {
    source = await readFile(filePath, { encoding: config.encoding });
  } catch (error) {
    throw wrapError(error, ErrorCodes.IO_READ_ERROR, `Failed to read ${filePath}`);
  }

  const unit = extractUnit(source, file, {
    unitName: options.unitName ?? resolveUnitName(source, filePath),
    dynamicSql: config.extraction.dynamicSql,
    bodyMatching: config.extraction.bodyMatching,
    quoteReservedWords: config.extraction.quoteReservedWords,
  });

  if (options.json) {
    console.log(JSON.stringify(unit, null, 2));
    return;
  }

  console.log('');
  console.log(pc.bold(`${unit.unitName}`) + pc.dim(` (${unit.lineCount} lines)`));
  if (unit.componentTypes.length > 0) {
    console.log(pc.dim(`Components: ${unit.componentTypes.join(', ')}`));
  }
  console.log('');
  console.log(renderOperationsTable(unit.operations));
  console.log('');
  console.log(
    pc.dim(`${unit.operations.length} operation(s), ${unit.transactionGroups.length} transaction group(s)`)
  );
}
