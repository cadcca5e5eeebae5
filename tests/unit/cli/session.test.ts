/**
 * Unit tests for the interactive explorer.
 *
 * The session is driven by a scripted prompter; the screen records what
 * would have been printed.
 */

import { describe, it, expect } from 'vitest';
import { PromptCancelledError } from '@/cli/io.js';
import { MENU_MESSAGE, MESSAGES, pagerPrompt } from '@/cli/navigation.js';
import { ExplorerSession } from '@/cli/session.js';
import { createClassifier } from '@/knowledge/mitre-attack/classifier.js';
import type { AttackKnowledgeBase } from '@/knowledge/mitre-attack/loader.js';
import { buildAttackObjects, createTestKnowledgeBase } from '../../fixtures/attack-bundle.js';
import { CLEAR, RecordingScreen, ScriptedPrompter } from '../../helpers/terminal.js';

const TITLE = 'TITLE';

function createSession(answers: string[], options: { pageSize?: number; kb?: AttackKnowledgeBase } = {}) {
  const prompter = new ScriptedPrompter(answers);
  const screen = new RecordingScreen();
  const session = new ExplorerSession({
    kb: options.kb ?? createTestKnowledgeBase(),
    classifier: createClassifier(),
    prompter,
    screen,
    pageSize: options.pageSize ?? 5,
    titleScreen: TITLE,
  });
  return { session, prompter, screen };
}

function inputMessages(prompter: ScriptedPrompter): string[] {
  return prompter.calls.filter((call) => call.kind === 'input').map((call) => call.message);
}

describe('ExplorerSession.run', () => {
  it('should show the title and main menu, then exit', async () => {
    const { session, prompter, screen } = createSession(['Exit']);

    await session.run();

    expect(screen.output).toEqual([CLEAR, TITLE]);
    expect(prompter.calls).toEqual([
      { kind: 'select', message: MENU_MESSAGE, choices: ['Threat Actors', 'Tools', 'Exit'] },
    ]);
  });

  it('should page through the techniques of the chosen actor', async () => {
    const { session, prompter, screen } = createSession([
      'Threat Actors',
      'Geographical Region',
      '2',
      '',
      'Exit',
    ]);

    await session.run();

    expect(prompter.calls[1]).toEqual({
      kind: 'select',
      message: MENU_MESSAGE,
      choices: ['Geographical Region', 'Activity Type', 'Target Sector', 'Back to Main Menu'],
    });
    expect(inputMessages(prompter)).toEqual([MESSAGES.actorPrompt, pagerPrompt(1, 1)]);

    expect(screen.output).toHaveLength(7);
    expect(screen.output.slice(0, 2)).toEqual([CLEAR, TITLE]);
    expect(screen.output[2]).toContain('2. APT29');
    expect(screen.output[3]).toBe(CLEAR);
    expect(screen.output[4]).toContain('Techniques for APT29 - Total Techniques: 2');
    expect(screen.output.slice(5)).toEqual([CLEAR, TITLE]);
  });

  it('should move between pages and reject unknown keys', async () => {
    const { session, prompter, screen } = createSession(
      ['Threat Actors', 'Geographical Region', '2', '', 'p', 'x', 'q', 'Exit'],
      { pageSize: 1 },
    );

    await session.run();

    expect(inputMessages(prompter)).toEqual([
      MESSAGES.actorPrompt,
      pagerPrompt(1, 2),
      pagerPrompt(2, 2),
      pagerPrompt(1, 2),
      pagerPrompt(1, 2),
    ]);

    const pages = screen.output.filter((text) => text.includes('Techniques for APT29'));
    expect(pages).toHaveLength(4);
    expect(pages[1]).toContain('Command and Scripting Interpreter');
    expect(pages[1]).not.toContain('Phishing');

    const notice = screen.output.indexOf(MESSAGES.invalidInput);
    expect(notice).toBeGreaterThan(0);
    expect(screen.output[notice - 1]).toContain('Phishing');
    expect(screen.output[notice - 2]).toBe(CLEAR);
  });

  it('should report an invalid actor number under the next title', async () => {
    const { session, screen } = createSession(['Threat Actors', 'Geographical Region', '99', 'Exit']);

    await session.run();

    expect(screen.output.slice(-3)).toEqual([CLEAR, TITLE, MESSAGES.invalidChoice]);
  });

  it('should report an actor without techniques', async () => {
    const { session, screen } = createSession(['Threat Actors', 'Geographical Region', '3', 'Exit']);

    await session.run();

    expect(screen.output.slice(-3)).toEqual([
      CLEAR,
      TITLE,
      'No techniques found for the selected actor: FIN7.',
    ]);
  });

  it('should go back to the main menu', async () => {
    const { session, prompter, screen } = createSession(['Threat Actors', 'Back to Main Menu', 'Exit']);

    await session.run();

    expect(screen.output).toEqual([CLEAR, TITLE, CLEAR, TITLE]);
    expect(prompter.remaining).toBe(0);
  });

  it('should browse tools until the user quits', async () => {
    const { session, prompter, screen } = createSession(['Tools', '1', '', 'abc', '3', 'q', 'Exit']);

    await session.run();

    expect(inputMessages(prompter)).toEqual([
      MESSAGES.toolPrompt,
      MESSAGES.toolAgainPrompt,
      MESSAGES.toolPrompt,
      MESSAGES.toolPrompt,
      MESSAGES.toolAgainPrompt,
    ]);

    const panels = screen.output.filter((text) => text.startsWith('╭'));
    expect(panels).toHaveLength(2);
    expect(panels[0]).toContain(' Mimikatz ');
    expect(panels[1]).toContain('No techniques found for this tool.');

    const notice = screen.output.indexOf(MESSAGES.invalidChoice);
    expect(screen.output[notice - 1]).toBe('');
    expect(screen.output[notice - 2]).toContain('Select a tool to see which actors are known to use it:');
  });

  it('should stop when a prompt is cancelled', async () => {
    const { session } = createSession([]);
    await expect(session.run()).rejects.toBeInstanceOf(PromptCancelledError);
  });
});

describe('ExplorerSession.runActors', () => {
  it('should end the actor menu with Exit', async () => {
    const { session, prompter, screen } = createSession(['Activity Type', '4', 'q', 'Exit']);

    await session.runActors();

    expect(prompter.calls[0].choices).toEqual(['Geographical Region', 'Activity Type', 'Target Sector', 'Exit']);
    expect(screen.output.some((text) => text.includes('Techniques for APT29'))).toBe(true);
    expect(prompter.remaining).toBe(0);
  });
});

describe('ExplorerSession.runTools', () => {
  it('should show the tool list straight away', async () => {
    const { session, screen } = createSession(['2', 'q']);

    await session.runTools();

    expect(screen.output[0]).toBe(CLEAR);
    expect(screen.output[1]).toContain('1. Mimikatz   2. PsExec   3. ngrok');
    expect(screen.output.find((text) => text.startsWith('╭'))).toContain('* Lazarus Group:');
  });

  it('should say so when the dataset has no tools', async () => {
    const kb = createTestKnowledgeBase(buildAttackObjects().filter((obj) => obj.type !== 'tool'));
    const { session, prompter, screen } = createSession([], { kb });

    await session.runTools();

    expect(screen.output).toEqual([CLEAR, 'No tools found in the ATT&CK dataset.']);
    expect(prompter.calls).toEqual([]);
  });
});
