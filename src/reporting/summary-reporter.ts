/**
 * Terminal summary box for the loaded ATT&CK dataset (`threatscope info`
 * and `threatscope update`).
 */

import chalk from 'chalk';

import type { DatasetMetadata } from '../types/threat-intel.js';
import { visibleLength } from '../utils/text.js';

export interface DatasetSummary {
  metadata: DatasetMetadata;
  source: string;                // URL or cache path
  origin: 'cache' | 'network' | 'memory';
}

/** Fixed width of the summary box interior (between the box edges). */
const BOX_WIDTH = 56;

/**
 * Format the dataset summary as a box-drawn table.
 */
export function formatDatasetSummary(data: DatasetSummary): string {
  const { metadata } = data;
  const lines: string[] = [];

  lines.push(chalk.cyan(`╔${''.padStart(BOX_WIDTH, '═')}╗`));
  lines.push(formatCenteredLine('MITRE ATT&CK Enterprise Dataset'));
  lines.push(chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`));

  lines.push(formatLine(`Version: ${metadata.version}`));
  lines.push(formatLine(`Last Modified: ${metadata.lastModified || 'unknown'}`));
  lines.push(formatLine(`Loaded From: ${data.origin}`));
  lines.push(formatLine(truncate(`Source: ${data.source}`, BOX_WIDTH - 2)));

  lines.push(chalk.cyan(`╠${''.padStart(BOX_WIDTH, '═')}╣`));
  lines.push(formatSectionHeader('OBJECTS'));
  lines.push(formatLine(`  Threat Actors: ${formatNumber(metadata.actorCount)}`));
  lines.push(formatLine(`  Tools: ${formatNumber(metadata.toolCount)}`));
  lines.push(formatLine(`  Techniques: ${formatNumber(metadata.techniqueCount)}`));
  lines.push(formatLine(`  Relationships: ${formatNumber(metadata.relationshipCount)}`));
  lines.push(formatLine(`  Total STIX Objects: ${formatNumber(metadata.objectCount)}`));

  lines.push(chalk.cyan(`╚${''.padStart(BOX_WIDTH, '═')}╝`));

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Formatting Helpers
// ---------------------------------------------------------------------------

function formatLine(text: string): string {
  const padding = Math.max(0, BOX_WIDTH - 2 - visibleLength(text));
  return `${chalk.cyan('║')} ${text}${' '.repeat(padding)} ${chalk.cyan('║')}`;
}

function formatCenteredLine(text: string): string {
  const totalPadding = BOX_WIDTH - 2 - text.length;
  const leftPad = Math.floor(totalPadding / 2);
  const rightPad = totalPadding - leftPad;
  const padded = ' '.repeat(leftPad) + text + ' '.repeat(rightPad);
  return `${chalk.cyan('║')} ${chalk.bold.white(padded)} ${chalk.cyan('║')}`;
}

function formatSectionHeader(text: string): string {
  const padded = text.padEnd(BOX_WIDTH - 2);
  return `${chalk.cyan('║')} ${chalk.cyan.bold(padded)} ${chalk.cyan('║')}`;
}

function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : `${chars.slice(0, max - 1).join('')}…`;
}

/**
 * Format a number with thousands separators.
 */
function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}
