/**
 * Actor commands.
 *
 *   threatscope actors               interactive actor browser
 *   threatscope actor <name>         every technique of one actor
 */

import type { Command } from 'commander';

import { getActorId, getAllThreatActors, getTechniquesForActor } from '../../knowledge/mitre-attack/actors.js';
import { buildActorReport, serializeReport } from '../../reporting/json-reporter.js';
import { renderTechniquePage } from '../../reporting/technique-table.js';
import { LookupError } from '../../utils/errors.js';
import { loadCommandContext, type CommandContext } from '../context.js';
import {
  addFormatOption,
  addPageSizeOption,
  parseOutputFormat,
  resolveConfig,
  type GlobalOptions,
  type OutputFormat,
} from '../options.js';
import { runInteractiveSession, type InteractiveOptions } from './explore.js';

interface ActorLookupOptions extends GlobalOptions {
  format: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerActorsCommand(program: Command): void {
  addPageSizeOption(
    program
      .command('actors')
      .description('Browse threat actors by region, activity type or target sector'),
  ).action(async (_options: InteractiveOptions, command: Command) => {
    await runInteractiveSession(command.optsWithGlobals<InteractiveOptions>(), 'actors');
  });

  addFormatOption(
    program
      .command('actor')
      .description('Print every technique attributed to one threat actor')
      .argument('<name>', 'Actor name or alias, e.g. APT29'),
  ).action(async (name: string, _options: ActorLookupOptions, command: Command) => {
    const options = command.optsWithGlobals<ActorLookupOptions>();
    const format = parseOutputFormat(options.format);
    const context = await loadCommandContext(resolveConfig(options));
    console.log(renderActorLookup(context, name, format, process.stdout.columns || 120));
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

/**
 * Render the lookup result for `name`. Throws LookupError for an unknown
 * actor.
 */
export function renderActorLookup(
  context: Pick<CommandContext, 'kb' | 'classifier'>,
  name: string,
  format: OutputFormat,
  width: number,
): string {
  const { kb, classifier } = context;

  const actorId = getActorId(kb, name);
  const actor = actorId ? getAllThreatActors(kb, classifier).find((a) => a.id === actorId) : undefined;
  if (!actorId || !actor) {
    throw new LookupError('actor', name);
  }

  const techniques = getTechniquesForActor(kb, actorId);

  if (format !== 'table') {
    return serializeReport(buildActorReport(actor, techniques, kb.metadata), format);
  }

  const heading = [
    `${actor.name}${actor.attackId ? ` (${actor.attackId})` : ''}`,
    `Region: ${actor.geography} | Activity: ${actor.activity} | Sector: ${actor.sector}`,
    ...(actor.aliases.length > 0 ? [`Aliases: ${actor.aliases.join(', ')}`] : []),
    '',
  ];

  if (techniques.length === 0) {
    return [...heading, `No techniques found for the selected actor: ${actor.name}.`].join('\n');
  }
  return [...heading, renderTechniquePage(techniques, actor.name, techniques.length, 1, width)].join('\n');
}
