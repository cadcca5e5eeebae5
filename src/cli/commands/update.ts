/**
 * `threatscope update`: download the ATT&CK bundle and rewrite the cache.
 *
 * Unlike `--refresh`, a failed download or cache write is fatal here; there
 * is no fallback to the previous cache.
 */

import type { Command } from 'commander';
import ora from 'ora';

import { AttackKnowledgeBase } from '../../knowledge/mitre-attack/loader.js';
import {
  downloadAttackBundle,
  writeBundleCache,
  type SourceOptions,
} from '../../knowledge/mitre-attack/source.js';
import { formatDatasetSummary } from '../../reporting/summary-reporter.js';
import { ConfigError, errorMessage } from '../../utils/errors.js';
import { printSuccess, resolveConfig, type GlobalOptions } from '../options.js';

export function registerUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Download the latest ATT&CK Enterprise bundle into the local cache')
    .action(async (_options: GlobalOptions, command: Command) => {
      await updateAction(command.optsWithGlobals<GlobalOptions>());
    });
}

export async function updateAction(
  options: GlobalOptions,
  transport: Pick<SourceOptions, 'fetchImpl' | 'retry'> = {},
): Promise<void> {
  if (options.offline) {
    throw new ConfigError('update cannot run with --offline', 'offline');
  }

  const config = resolveConfig({ ...options, refresh: true });
  const { url, cachePath } = config.attack;

  const spinner = ora(`Downloading MITRE ATT&CK content from ${url}...`).start();
  let kb: AttackKnowledgeBase;
  try {
    const { bundle, raw } = await downloadAttackBundle(url, { ...config.attack, ...transport });
    await writeBundleCache(cachePath, raw);
    kb = AttackKnowledgeBase.fromBundle(bundle);
    spinner.succeed(`Downloaded MITRE ATT&CK ${kb.metadata.version}`);
  } catch (err) {
    spinner.fail(`Update failed: ${errorMessage(err)}`);
    throw err;
  }

  console.log('');
  console.log(formatDatasetSummary({ metadata: kb.metadata, source: url, origin: 'network' }));
  console.log('');
  printSuccess(`Cache written to ${cachePath}`);
}
