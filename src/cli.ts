#!/usr/bin/env node

/**
 * labgraph CLI
 *
 * Usage:
 *   labgraph post [prompt]             - Single completion
 *   labgraph haiku                     - Write a haiku and rate it
 *   labgraph rental [text]             - Free text to rental JSON
 *   labgraph song [inputs...]          - Parse song requests (interactive without inputs)
 *   labgraph chat                      - Tool-calling chat
 *   labgraph payments [query]          - Payment-method lookup
 *   labgraph assistant [input]         - Confidence-routed assistant
 *   labgraph merchants                 - Merchant analysis, saved as JSON
 */

import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import {
  assistantCommand,
  chatCommand,
  haikuCommand,
  merchantsCommand,
  MERCHANTS_DEFAULTS,
  paymentsCommand,
  postCommand,
  rentalCommand,
  songCommand,
  type GlobalCommandOptions,
} from './commands/index.js';
import type { GlobalConfig } from './core/models/index.js';
import { getEffectiveDebugConfig, loadGlobalConfig } from './infra/config/global/index.js';
import { error, setLogLevel } from './shared/ui/index.js';
import { createLogger, getErrorMessage, initDebugLogger, isRecord, setVerboseConsole } from './shared/utils/index.js';

const log = createLogger('cli');

function readCliVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return isRecord(manifest) && typeof manifest.version === 'string' ? manifest.version : '0.0.0';
}

const cliVersion = readCliVersion();

const program = new Command();

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a whole number of 1 or more.');
  }
  return parsed;
}

function parseDate(value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError('Expected a date such as 2025-06-30.');
  }
  return parsed;
}

function loadConfigOrExit(): GlobalConfig {
  try {
    return loadGlobalConfig();
  } catch (err) {
    error(getErrorMessage(err));
    process.exit(1);
  }
}

function globalOptions(): GlobalCommandOptions {
  return program.opts<GlobalCommandOptions>();
}

/** Top-level failure boundary: print and exit 1 */
async function runCommand(name: string, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    log.error('Command failed', { command: name, error: getErrorMessage(err) });
    error(getErrorMessage(err));
    process.exit(1);
  }
}

program
  .name('labgraph')
  .description('Step-state LLM workflow labs')
  .version(cliVersion);

// --- Global options ---
program
  .option('-m, --model <name>', 'Override the generation model')
  .option('-v, --verbose', 'Show workflow steps and debug output');

// Common initialization for all commands
program.hook('preAction', () => {
  const { verbose } = globalOptions();

  const config = loadConfigOrExit();
  let debugConfig = getEffectiveDebugConfig(config);
  if (verbose && !debugConfig?.enabled) {
    debugConfig = { enabled: true };
  }
  initDebugLogger(debugConfig, process.cwd());

  if (verbose) {
    setVerboseConsole(true);
    setLogLevel('debug');
  } else {
    setLogLevel(config.logLevel);
  }

  log.info('labgraph CLI starting', { version: cliVersion, verbose: verbose === true, model: config.model });
});

// --- Subcommands ---

program
  .command('post')
  .description('Send one prompt and print the completion')
  .argument('[prompt]', 'User prompt')
  .action(async (prompt?: string) => {
    await runCommand('post', () => postCommand(prompt, globalOptions()));
  });

program
  .command('haiku')
  .description('Write a haiku about the sea and rate it')
  .action(async () => {
    await runCommand('haiku', () => haikuCommand(globalOptions()));
  });

program
  .command('rental')
  .description('Turn a free-text car rental request into JSON')
  .argument('[text]', 'Customer request text')
  .action(async (text?: string) => {
    await runCommand('rental', () => rentalCommand(text, globalOptions()));
  });

program
  .command('song')
  .description('Parse song requests into validated JSON')
  .argument('[inputs...]', 'Requests to parse in order')
  .option('-i, --interactive', 'Read requests from the terminal')
  .action(async (inputs: string[], options: { interactive?: boolean }) => {
    await runCommand('song', () => songCommand(inputs, { ...globalOptions(), ...options }));
  });

program
  .command('chat')
  .description('Chat with a tool-calling assistant')
  .action(async () => {
    await runCommand('chat', () => chatCommand(globalOptions()));
  });

program
  .command('payments')
  .description('Look up payment methods by country and type')
  .argument('[query]', 'Query such as "US card"')
  .option('--heuristic', 'Parse the query locally without the model')
  .option('--json', 'Print the lookup result as JSON')
  .action(async (query: string | undefined, options: { heuristic?: boolean; json?: boolean }) => {
    await runCommand('payments', () => paymentsCommand(query, { ...globalOptions(), ...options }));
  });

program
  .command('assistant')
  .description('Answer through the confidence-routed assistant')
  .argument('[input]', 'Request text')
  .option('-c, --context <text>', 'Extra context appended to the request')
  .action(async (input: string | undefined, options: { context?: string }) => {
    await runCommand('assistant', () => assistantCommand(input, { ...globalOptions(), ...options }));
  });

program
  .command('merchants')
  .description('Find merchants with a high q50/avg ratio and analyze their transactions')
  .option('-o, --output <file>', 'Results file (default: merchant_analysis_results_<timestamp>.json)')
  .option('-d, --dataset <name>', 'Dataset directory', MERCHANTS_DEFAULTS.dataset)
  .option('-t, --table <name>', 'Transaction table', MERCHANTS_DEFAULTS.table)
  .option('--days <n>', 'Days of history to analyze', parsePositiveInt, MERCHANTS_DEFAULTS.days)
  .option('--as-of <date>', 'End of the analysis window (default: now)', parseDate)
  .action(async (options: { output?: string; dataset: string; table: string; days: number; asOf?: Date }) => {
    await runCommand('merchants', () => merchantsCommand({ ...globalOptions(), ...options }));
  });

await program.parseAsync();
