/**
 * Tests for command registration and the interactive command runner.
 *
 * The runner reads the ATT&CK bundle from a cache file in offline mode.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { Command } from 'commander';
import { registerActorsCommand } from '@/cli/commands/actors.js';
import { registerExploreCommand, runInteractiveSession } from '@/cli/commands/explore.js';
import { registerInfoCommand } from '@/cli/commands/info.js';
import { LOAD_FAILED } from '@/cli/context.js';
import { InquirerPrompter } from '@/cli/io.js';
import { registerToolsCommand } from '@/cli/commands/tools.js';
import { registerUpdateCommand } from '@/cli/commands/update.js';
import { AttackKnowledgeBase } from '@/knowledge/mitre-attack/loader.js';
import { AttackDataError } from '@/utils/errors.js';
import { setLogLevel } from '@/utils/logger.js';
import { buildAttackBundle } from '../../../fixtures/attack-bundle.js';
import { CLEAR, RecordingScreen, ScriptedPrompter } from '../../../helpers/terminal.js';

describe('command registration', () => {
  it('should register every command with explore as the default', () => {
    const program = new Command();
    registerExploreCommand(program);
    registerActorsCommand(program);
    registerToolsCommand(program);
    registerUpdateCommand(program);
    registerInfoCommand(program);

    expect(program.commands.map((cmd) => cmd.name())).toEqual([
      'explore',
      'actors',
      'actor',
      'tools',
      'tool',
      'update',
      'info',
    ]);
  });

  it('should give the lookups a --format option', () => {
    const program = new Command();
    registerActorsCommand(program);

    const actor = program.commands.find((cmd) => cmd.name() === 'actor');
    expect(actor?.options.map((option) => option.long)).toEqual(['--format']);
  });
});

describe('runInteractiveSession', () => {
  let dir: string;
  let cachePath: string;

  beforeEach(async () => {
    AttackKnowledgeBase.reset();
    dir = await mkdtemp(join(tmpdir(), 'threatscope-cli-'));
    cachePath = join(dir, 'enterprise-attack.json');
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setLogLevel('warn');
    await rm(dir, { recursive: true, force: true });
  });

  it('should run the tool browser against the cached dataset', async () => {
    await writeFile(cachePath, JSON.stringify(buildAttackBundle()), 'utf-8');
    const prompter = new ScriptedPrompter(['1', 'q']);
    const screen = new RecordingScreen();

    await runInteractiveSession({ cache: cachePath, offline: true }, 'tools', { prompter, screen });

    expect(screen.output[0]).toBe(CLEAR);
    expect(screen.output.some((text) => text.startsWith('╭') && text.includes(' Mimikatz '))).toBe(true);
    expect(prompter.remaining).toBe(0);
  });

  it('should treat a cancelled prompt as a normal exit', async () => {
    await writeFile(cachePath, JSON.stringify(buildAttackBundle()), 'utf-8');
    const prompter = new ScriptedPrompter([]);

    await expect(
      runInteractiveSession({ cache: cachePath, offline: true }, 'explore', {
        prompter,
        screen: new RecordingScreen(),
      }),
    ).resolves.toBeUndefined();
    expect(prompter.calls).toHaveLength(1);
  });

  it('should end quietly when Ctrl+C is pressed at the main menu', async () => {
    await writeFile(cachePath, JSON.stringify(buildAttackBundle()), 'utf-8');
    const input = new PassThrough();
    const output = new PassThrough();
    output.once('data', () => input.write('\x03'));
    const screen = new RecordingScreen();

    await expect(
      runInteractiveSession({ cache: cachePath, offline: true }, 'explore', {
        prompter: new InquirerPrompter({ input, output }),
        screen,
      }),
    ).resolves.toBeUndefined();
    expect(screen.output[0]).toBe(CLEAR);
  });

  it('should fail when the dataset cannot be loaded', async () => {
    await expect(
      runInteractiveSession({ cache: cachePath, offline: true }, 'explore', {
        prompter: new ScriptedPrompter([]),
        screen: new RecordingScreen(),
      }),
    ).rejects.toThrow(AttackDataError);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining(LOAD_FAILED));
  });

  it('should reject an invalid page size before loading anything', async () => {
    await expect(
      runInteractiveSession({ cache: cachePath, offline: true, pageSize: '0' }, 'actors'),
    ).rejects.toThrow('Invalid value for --page-size: "0" must be a positive integer');
  });
});
