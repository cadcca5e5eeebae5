/**
 * Numbered grid of threat actors grouped by one classification dimension.
 */

import chalk from 'chalk';

import type { ActorDimension, ThreatActor } from '../types/threat-intel.js';
import { renderTable } from './table.js';

export interface ActorGrid {
  dimension: ActorDimension;
  /** Group labels, in order of first appearance. */
  headers: string[];
  /** Row-major cells: "3. APT29" or "" where a group has run out. */
  rows: string[][];
  /** Actor names indexed by selection number - 1. */
  order: string[];
}

/**
 * Group `actors` (already sorted) by `dimension` and number them across each
 * row, then down. Every actor gets a row: the grid is as tall as the largest
 * group.
 */
export function buildActorGrid(actors: ThreatActor[], dimension: ActorDimension): ActorGrid {
  const groups = new Map<string, ThreatActor[]>();
  for (const actor of actors) {
    const key = actor[dimension];
    const group = groups.get(key);
    if (group) {
      group.push(actor);
    } else {
      groups.set(key, [actor]);
    }
  }

  const columns = [...groups.values()];
  const rowCount = Math.max(0, ...columns.map((group) => group.length));
  const rows: string[][] = [];
  const order: string[] = [];

  for (let row = 0; row < rowCount; row++) {
    rows.push(
      columns.map((group) => {
        const actor = group[row];
        if (!actor) return '';
        order.push(actor.name);
        return `${order.length}. ${actor.name}`;
      }),
    );
  }

  return { dimension, headers: [...groups.keys()], rows, order };
}

export function renderActorGrid(grid: ActorGrid, width: number): string {
  if (grid.headers.length === 0) {
    return chalk.yellow('No threat actors in the dataset.');
  }

  return renderTable(
    grid.headers.map((header) => ({ header, style: chalk.bold.cyan })),
    grid.rows,
    { width, headerStyle: chalk.bold.green, showLines: true },
  );
}
