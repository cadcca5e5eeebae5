/**
 * Paged technique table for a single threat actor.
 */

import chalk from 'chalk';

import type { ActorTechnique } from '../types/threat-intel.js';
import { renderTable, type TableColumn } from './table.js';

const TECHNIQUE_COLUMNS: TableColumn[] = [
  { header: 'No.', maxWidth: 4, minWidth: 3, style: chalk.dim },
  { header: 'Name', maxWidth: 40, minWidth: 12, style: chalk.bold.greenBright },
  { header: 'Platform', maxWidth: 15, minWidth: 8, style: chalk.cyanBright },
  { header: 'Kill Chain Phase', maxWidth: 20, minWidth: 10, style: chalk.yellowBright },
  { header: 'Description', maxWidth: 160, minWidth: 20 },
];

/**
 * Bullet lines ("* text") become "• text"; every other line is indented
 * by four spaces.
 */
export function formatTechniqueDescription(description: string): string {
  return description
    .split('\n')
    .map((line) => {
      const trimmed = line.trim();
      return trimmed.startsWith('*') ? `•${trimmed.slice(1).trim()}` : `    ${line}`;
    })
    .join('\n');
}

export function techniqueTableTitle(actorName: string, total: number): string {
  return `Techniques for ${actorName} - Total Techniques: ${total}`;
}

/**
 * Render one page of techniques. Row numbers start at `startNumber` so they
 * continue across pages.
 */
export function renderTechniquePage(
  techniques: ActorTechnique[],
  actorName: string,
  total: number,
  startNumber: number,
  width: number,
): string {
  const rows = techniques.map((technique, i) => [
    String(startNumber + i),
    technique.name,
    technique.platforms,
    technique.killChainPhases,
    formatTechniqueDescription(technique.description),
  ]);

  return renderTable(TECHNIQUE_COLUMNS, rows, {
    width,
    title: techniqueTableTitle(actorName, total),
    headerStyle: chalk.bold.magenta,
    showLines: true,
  });
}
