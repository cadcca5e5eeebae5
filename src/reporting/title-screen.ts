/**
 * Title screen shown above every main-menu prompt.
 */

import { readFileSync } from 'node:fs';
import chalk from 'chalk';

import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('title-screen');

export const APP_TITLE = 'Threat Scope';

const BANNER_URL = new URL('../../assets/banner.txt', import.meta.url);

let cachedBanner: string | undefined;

/**
 * Banner art from assets/banner.txt. A missing file only costs the art.
 */
export function loadBanner(): string {
  if (cachedBanner === undefined) {
    try {
      cachedBanner = readFileSync(BANNER_URL, 'utf-8').replace(/\s+$/, '');
    } catch (err) {
      log.debug(`Banner unavailable: ${errorMessage(err)}`);
      cachedBanner = '';
    }
  }
  return cachedBanner;
}

export function renderTitleScreen(banner: string = loadBanner()): string {
  const lines: string[] = [];
  if (banner.length > 0) {
    lines.push(chalk.bold.green(banner));
  }
  lines.push(chalk.bold.yellow.underline(APP_TITLE), '');
  return lines.join('\n');
}
