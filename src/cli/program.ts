/**
 * The `threatscope` commander program and the mapping from its outcome to a
 * process exit code.
 */

import { readFileSync } from 'node:fs';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';

import { errorMessage, ThreatScopeError } from '../utils/errors.js';
import { registerActorsCommand } from './commands/actors.js';
import { registerExploreCommand } from './commands/explore.js';
import { registerInfoCommand } from './commands/info.js';
import { registerToolsCommand } from './commands/tools.js';
import { registerUpdateCommand } from './commands/update.js';
import { addGlobalOptions, printError } from './options.js';

function readVersion(): string {
  const pkg = z
    .object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')));
  return pkg.version;
}

export function createProgram(): Command {
  const program = new Command();

  addGlobalOptions(
    program
      .name('threatscope')
      .description('Explore MITRE ATT&CK threat actors, tools and techniques from the terminal')
      .version(readVersion()),
  );

  // Set before registering so every sub-command inherits it
  program.exitOverride();

  registerExploreCommand(program);
  registerActorsCommand(program);
  registerToolsCommand(program);
  registerUpdateCommand(program);
  registerInfoCommand(program);

  return program;
}

/**
 * Run the CLI on `argv` (node-style, program path first) and return the exit
 * code.
 */
export async function runCli(argv: readonly string[], program: Command = createProgram()): Promise<number> {
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    // Commander has already written its own message for usage errors
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof ThreatScopeError && err.reported) {
      return 1;
    }

    printError(errorMessage(err), 'Run "threatscope --help" for usage information.');
    return 1;
  }
}
