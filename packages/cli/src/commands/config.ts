/**
 * Config command - show the configuration that applies to a target
 */

import { resolve } from 'path';
import pc from 'picocolors';
import { findConfigFile, loadConfig, type CollectorConfig } from '../../../collector/src/index.js';
import { wrapConfigError } from '../lib/errors.js';

export interface ConfigCommandOptions {
  target?: string;
  json?: boolean;
}

export async function configCommand(options: ConfigCommandOptions): Promise<void> {
  const targetPath = resolve(options.target ?? process.cwd());
  const configPath = findConfigFile(targetPath);

  let config: CollectorConfig;
  try {
    config = await loadConfig(targetPath);
  } catch (error) {
    throw wrapConfigError(error);
  }

  if (options.json) {
    console.log(JSON.stringify({ configPath: configPath ?? null, config }, null, 2));
    return;
  }

  console.log('');
  console.log(pc.bold('Include:'));
  for (const pattern of config.include) console.log(`  ${pattern}`);
  console.log(pc.bold('Exclude:'));
  for (const pattern of config.exclude) console.log(`  ${pattern}`);
  console.log(`${pc.bold('Encoding:')} ${config.encoding}`);
  console.log(pc.bold('Extraction:'));
  console.log(`  dynamicSql: ${config.extraction.dynamicSql}`);
  console.log(`  bodyMatching: ${config.extraction.bodyMatching}`);
  console.log(`  quoteReservedWords: ${config.extraction.quoteReservedWords}`);
  console.log('');
  console.log(pc.dim(configPath ? `Config file: ${configPath}` : 'Config file: none (defaults)'));
  console.log('');
}
