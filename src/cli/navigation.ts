/**
 * Menu labels, number selection and the technique pager's key handling.
 */

import type { ActorDimension } from '../types/threat-intel.js';

export const MENU_MESSAGE = 'Select an option'.toUpperCase();

export const MAIN_MENU = {
  actors: 'Threat Actors',
  tools: 'Tools',
  exit: 'Exit',
} as const;

export const ACTOR_MENU: ReadonlyArray<{ label: string; dimension: ActorDimension }> = [
  { label: 'Geographical Region', dimension: 'geography' },
  { label: 'Activity Type', dimension: 'activity' },
  { label: 'Target Sector', dimension: 'sector' },
];

export const BACK_TO_MAIN_MENU = 'Back to Main Menu';

export const MESSAGES = {
  invalidChoice: 'Invalid choice. Please enter a valid number.',
  invalidInput: 'Invalid input.',
  actorPrompt: 'Enter the number of the Threat Actor: ',
  toolPrompt: 'Enter the number of the Tool: ',
  toolAgainPrompt: "Press Enter to see another tool or 'q' to return to the main menu: ",
  actorNotFound: (name: string) => `Could not find the selected actor: ${name}.`,
  noTechniques: (name: string) => `No techniques found for the selected actor: ${name}.`,
} as const;

/**
 * Parse a 1-based menu number. Returns the 0-based index, or undefined when
 * the input is not an integer within 1..count.
 */
export function parseSelection(input: string, count: number): number | undefined {
  const trimmed = input.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;

  const index = Number.parseInt(trimmed, 10) - 1;
  return index >= 0 && index < count ? index : undefined;
}

// ---------------------------------------------------------------------------
// Pager
// ---------------------------------------------------------------------------

export type PagerAction = 'next' | 'previous' | 'exit' | 'invalid';

export function pageCount(total: number, pageSize: number): number {
  return Math.ceil(total / pageSize);
}

/** Items on 1-based `page`. */
export function pageSlice<T>(items: readonly T[], page: number, pageSize: number): T[] {
  const start = (page - 1) * pageSize;
  return items.slice(start, start + pageSize);
}

export function pagerPrompt(page: number, totalPages: number): string {
  const enter = page === totalPages ? 'to start over' : 'for next';
  return `Page ${page}/${totalPages}. Press Enter ${enter}, 'p' for previous, 'q' to quit: `;
}

/**
 * Map a pager keystroke to an action. On the last page Enter leaves the
 * pager, like 'q'; 'p' on the first page is invalid.
 */
export function resolvePagerInput(input: string, page: number, totalPages: number): PagerAction {
  const key = input.trim().toLowerCase();
  const isLastPage = page >= totalPages;

  if (key === 'q') return 'exit';
  if (key === '') return isLastPage ? 'exit' : 'next';
  if (key === 'p' && page > 1) return 'previous';
  return 'invalid';
}
