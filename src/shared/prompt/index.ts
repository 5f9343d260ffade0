/**
 * Line-based interactive input
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import { blankLine, error, info, warn } from '../ui/index.js';
import { getErrorMessage } from '../utils/error.js';

/** Tokens that end an interactive loop (matched case-insensitively) */
export const EXIT_COMMANDS = ['quit', 'exit', 'q', 'bye'] as const;

export function isExitCommand(input: string): boolean {
  const normalized = input.trim().toLowerCase();
  return EXIT_COMMANDS.some((command) => command === normalized);
}

/**
 * Read a single line from stdin.
 * Resolves null on EOF (Ctrl+D).
 */
export function readLine(prompt: string): Promise<string | null> {
  return new Promise((resolve) => {
    if (process.stdin.readable && !process.stdin.destroyed) {
      process.stdin.resume();
    }

    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    let answered = false;

    rl.question(prompt, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });

    rl.on('close', () => {
      if (!answered) {
        resolve(null);
      }
    });
  });
}

/**
 * Prompt for optional free text.
 * @returns trimmed input, or null when empty or EOF
 */
export async function promptInput(message: string): Promise<string | null> {
  const answer = await readLine(chalk.green(`${message}: `));
  const trimmed = answer?.trim() ?? '';
  return trimmed ? trimmed : null;
}

export interface InteractiveLoopOptions {
  /** Prompt shown before each line */
  prompt: string;
  /** Handles one non-empty, non-exit input line */
  onInput: (input: string) => Promise<void>;
  /** Line reader (defaults to stdin) */
  read?: (prompt: string) => Promise<string | null>;
}

/**
 * Read lines until an exit token or EOF.
 * Handler failures are printed and the loop keeps reading.
 * @returns number of inputs handled
 */
export async function runInteractiveLoop(options: InteractiveLoopOptions): Promise<number> {
  const read = options.read ?? readLine;
  let handled = 0;

  info(`Interactive mode - type ${EXIT_COMMANDS.map((c) => `'${c}'`).join(', ')} to leave`);

  while (true) {
    const line = await read(chalk.green(options.prompt));

    if (line === null) {
      blankLine();
      info('Goodbye!');
      return handled;
    }

    const trimmed = line.trim();
    if (isExitCommand(trimmed)) {
      info('Goodbye!');
      return handled;
    }

    if (!trimmed) {
      warn('Please enter a valid message.');
      continue;
    }

    try {
      await options.onInput(trimmed);
      handled++;
    } catch (err) {
      error(getErrorMessage(err));
    }
  }
}
