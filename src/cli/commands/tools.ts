/**
 * Tool commands.
 *
 *   threatscope tools                interactive tool browser
 *   threatscope tool <name>          techniques and actors of one tool
 */

import type { Command } from 'commander';

import { findTool, getActorsForTool, getTechniquesForTool } from '../../knowledge/mitre-attack/tools.js';
import type { AttackKnowledgeBase } from '../../knowledge/mitre-attack/loader.js';
import { buildToolReport, serializeReport } from '../../reporting/json-reporter.js';
import { renderToolPanel } from '../../reporting/tool-panel.js';
import { LookupError } from '../../utils/errors.js';
import { loadCommandContext } from '../context.js';
import { addFormatOption, addPageSizeOption, parseOutputFormat, resolveConfig, type GlobalOptions, type OutputFormat } from '../options.js';
import { runInteractiveSession, type InteractiveOptions } from './explore.js';

interface ToolLookupOptions extends GlobalOptions {
  format: string;
}

export function registerToolsCommand(program: Command): void {
  addPageSizeOption(
    program
      .command('tools')
      .description('Browse ATT&CK tools and the actors known to use them'),
  ).action(async (_options: InteractiveOptions, command: Command) => {
    await runInteractiveSession(command.optsWithGlobals<InteractiveOptions>(), 'tools');
  });

  addFormatOption(
    program
      .command('tool')
      .description('Print the techniques and correlated actors of one tool')
      .argument('<name>', 'Tool name, e.g. Mimikatz'),
  ).action(async (name: string, _options: ToolLookupOptions, command: Command) => {
    const options = command.optsWithGlobals<ToolLookupOptions>();
    const format = parseOutputFormat(options.format);
    const { kb } = await loadCommandContext(resolveConfig(options));
    console.log(renderToolLookup(kb, name, format, process.stdout.columns || 120));
  });
}

/**
 * Render the lookup result for `name`. Throws LookupError for an unknown
 * tool.
 */
export function renderToolLookup(
  kb: AttackKnowledgeBase,
  name: string,
  format: OutputFormat,
  width: number,
): string {
  const tool = findTool(kb, name);
  if (!tool) {
    throw new LookupError('tool', name);
  }

  const techniques = getTechniquesForTool(kb, tool.id);
  const actors = getActorsForTool(kb, tool.id);

  if (format === 'table') {
    return renderToolPanel(tool, techniques, actors, width);
  }
  return serializeReport(buildToolReport(tool, techniques, actors, kb.metadata), format);
}
