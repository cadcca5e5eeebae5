/**
 * `threatscope info`: summary of the dataset the other commands would use.
 */

import type { Command } from 'commander';

import { formatDatasetSummary } from '../../reporting/summary-reporter.js';
import { loadKnowledgeBase } from '../context.js';
import { resolveConfig, type GlobalOptions } from '../options.js';

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show version, modification date and object counts of the ATT&CK dataset')
    .action(async (_options: GlobalOptions, command: Command) => {
      const config = resolveConfig(command.optsWithGlobals<GlobalOptions>());
      const kb = await loadKnowledgeBase(config);
      const source = kb.origin === 'network' ? config.attack.url : config.attack.cachePath;

      console.log('');
      console.log(formatDatasetSummary({ metadata: kb.metadata, source, origin: kb.origin }));
      console.log('');
    });
}
