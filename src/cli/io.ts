/**
 * Terminal input/output seams for the interactive session.
 *
 * The session only talks to a Prompter and a Screen, so tests can script the
 * answers and capture what would have been printed.
 */

import chalk from 'chalk';
import inquirer from 'inquirer';

export interface Prompter {
  /** Arrow-key menu; resolves to the chosen label. */
  select(message: string, choices: readonly string[]): Promise<string>;
  /** Free-text line. */
  input(message: string): Promise<string>;
}

export interface Screen {
  print(text?: string): void;
  clear(): void;
  /** Usable width in columns. */
  readonly width: number;
}

/** The user aborted a prompt (Ctrl+C / closed input). */
export class PromptCancelledError extends Error {
  constructor() {
    super('Prompt cancelled');
    this.name = 'PromptCancelledError';
  }
}

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class InquirerPrompter implements Prompter {
  private readonly prompt: ReturnType<typeof inquirer.createPromptModule>;

  constructor(streams: PromptStreams = {}) {
    this.prompt = inquirer.createPromptModule(streams);
  }

  async select(message: string, choices: readonly string[]): Promise<string> {
    const answers = await guard(
      this.prompt<{ choice: string }>([
        { type: 'select', name: 'choice', message, choices: [...choices] },
      ]),
    );
    return answers.choice;
  }

  async input(message: string): Promise<string> {
    const answers = await guard(
      this.prompt<{ value: string }>([
        { type: 'input', name: 'value', message: chalk.bold.yellow(message) },
      ]),
    );
    return answers.value;
  }
}

const DEFAULT_WIDTH = 120;

export class ConsoleScreen implements Screen {
  print(text = ''): void {
    console.log(text);
  }

  clear(): void {
    console.clear();
  }

  get width(): number {
    return process.stdout.columns || DEFAULT_WIDTH;
  }
}

async function guard<T>(pending: Promise<T>): Promise<T> {
  try {
    return await pending;
  } catch (err) {
    // Ctrl+C rejects the prompt with inquirer's ExitPromptError
    if (err instanceof Error && err.name === 'ExitPromptError') {
      throw new PromptCancelledError();
    }
    throw err;
  }
}
