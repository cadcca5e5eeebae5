/**
 * Shared CLI option helpers for ThreatScope commands.
 *
 * Provides the global dataset options, config resolution, output format
 * parsing and the coloured message helpers used across all commands.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig, type ConfigOverrides } from '../config/loader.js';
import type { ThreatScopeConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/** Options every command accepts (declared once on the root program). */
export interface GlobalOptions {
  url?: string;
  cache?: string;
  offline?: boolean;
  refresh?: boolean;
  classifier?: string;
  verbose?: boolean;
}

/**
 * Register the dataset source and logging options on the root program.
 */
export function addGlobalOptions(program: Command): Command {
  return program
    .option('--url <url>', 'URL of the ATT&CK Enterprise STIX bundle')
    .option('--cache <path>', 'Path of the local bundle cache')
    .option('--offline', 'Use the cached bundle only, never download')
    .option('--refresh', 'Download the bundle even when a cache exists')
    .option('--classifier <file>', 'YAML file overriding the actor classification keywords')
    .option('--verbose', 'Verbose output');
}

/**
 * Add the --page-size option to an interactive command.
 */
export function addPageSizeOption(cmd: Command): Command {
  return cmd.option('--page-size <n>', 'Techniques per page in the technique pager');
}

/**
 * Add the --format option to a lookup command.
 */
export function addFormatOption(cmd: Command): Command {
  return cmd.option('-f, --format <format>', 'Output format: table, json, yaml', 'table');
}

// ---------------------------------------------------------------------------
// Config resolution
// ---------------------------------------------------------------------------

/**
 * Merge the command's options (including globals) over the environment and
 * apply the configured log level.
 */
export function resolveConfig(overrides: ConfigOverrides): ThreatScopeConfig {
  const config = loadConfig(process.env, overrides);
  setLogLevel(config.logging.level);
  return config;
}

// ---------------------------------------------------------------------------
// Format parsing
// ---------------------------------------------------------------------------

export type OutputFormat = 'table' | 'json' | 'yaml';

const VALID_FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml'];

function isOutputFormat(value: string): value is OutputFormat {
  return (VALID_FORMATS as readonly string[]).includes(value);
}

/**
 * @example parseOutputFormat('JSON') => 'json'
 */
export function parseOutputFormat(formatStr: string): OutputFormat {
  const format = formatStr.trim().toLowerCase();
  if (!isOutputFormat(format)) {
    throw new ConfigError(
      `Unknown format "${formatStr}". Valid formats: ${VALID_FORMATS.join(', ')}`,
      'format',
    );
  }
  return format;
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}
