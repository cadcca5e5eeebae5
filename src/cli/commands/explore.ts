/**
 * Interactive commands: `explore` (default), plus the shared runner used by
 * the stand-alone `actors` and `tools` browsers.
 */

import type { Command } from 'commander';

import { loadCommandContext } from '../context.js';
import { ConsoleScreen, InquirerPrompter, PromptCancelledError, type Prompter, type Screen } from '../io.js';
import { addPageSizeOption, resolveConfig, type GlobalOptions } from '../options.js';
import { ExplorerSession } from '../session.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InteractiveOptions extends GlobalOptions {
  pageSize?: string;
}

export type SessionMode = 'explore' | 'actors' | 'tools';

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerExploreCommand(program: Command): void {
  addPageSizeOption(
    program
      .command('explore', { isDefault: true })
      .description('Browse threat actors and tools from an interactive menu'),
  ).action(async (_options: InteractiveOptions, command: Command) => {
    await runInteractiveSession(command.optsWithGlobals<InteractiveOptions>(), 'explore');
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

export async function runInteractiveSession(
  options: InteractiveOptions,
  mode: SessionMode,
  io: { prompter?: Prompter; screen?: Screen } = {},
): Promise<void> {
  const config = resolveConfig(options);
  const { kb, classifier } = await loadCommandContext(config);

  const session = new ExplorerSession({
    kb,
    classifier,
    prompter: io.prompter ?? new InquirerPrompter(),
    screen: io.screen ?? new ConsoleScreen(),
    pageSize: config.display.pageSize,
  });

  try {
    if (mode === 'actors') {
      await session.runActors();
    } else if (mode === 'tools') {
      await session.runTools();
    } else {
      await session.run();
    }
  } catch (err) {
    if (err instanceof PromptCancelledError) {
      return;
    }
    throw err;
  }
}
