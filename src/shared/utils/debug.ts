/**
 * Debug logging
 *
 * Structured per-module loggers. Records go to a log file when debug
 * is enabled and are mirrored to stderr in verbose mode.
 */

import { appendFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import chalk from 'chalk';

type DebugLevel = 'debug' | 'info' | 'warn' | 'error';

/** Debug settings (mirrors the `debug` block of the global config) */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

let debugEnabled = false;
let logFilePath: string | null = null;
let verboseConsole = false;

function timestampForFile(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '-').slice(0, 15);
}

/**
 * Initialize the debug logger.
 * When enabled without an explicit log_file, writes to
 * `<cwd>/.labgraph/logs/debug-<timestamp>.log`.
 */
export function initDebugLogger(config: DebugConfig | undefined, cwd: string): void {
  debugEnabled = config?.enabled ?? false;
  if (!debugEnabled) {
    logFilePath = null;
    return;
  }

  logFilePath = config?.logFile ?? join(cwd, '.labgraph', 'logs', `debug-${timestampForFile(new Date())}.log`);
  const dir = dirname(logFilePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  appendFileSync(logFilePath, `=== labgraph debug log started ${new Date().toISOString()} ===\n`, 'utf-8');
}

export function setVerboseConsole(enabled: boolean): void {
  verboseConsole = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

export function getDebugLogFile(): string | null {
  return logFilePath;
}

/** Reset logger state (for testing) */
export function resetDebugLogger(): void {
  debugEnabled = false;
  logFilePath = null;
  verboseConsole = false;
}

function formatRecord(level: DebugLevel, name: string, message: string, data?: Record<string, unknown>): string {
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  return `${new Date().toISOString()} [${level.toUpperCase()}] [${name}] ${message}${suffix}`;
}

function write(level: DebugLevel, name: string, message: string, data?: Record<string, unknown>): void {
  if (!debugEnabled && !verboseConsole) return;

  const line = formatRecord(level, name, message, data);
  if (debugEnabled && logFilePath) {
    appendFileSync(logFilePath, `${line}\n`, 'utf-8');
  }
  if (verboseConsole) {
    process.stderr.write(`${chalk.gray(line)}\n`);
  }
}

/** Create a logger scoped to a module name */
export function createLogger(name: string): Logger {
  return {
    debug: (message, data) => write('debug', name, message, data),
    info: (message, data) => write('info', name, message, data),
    warn: (message, data) => write('warn', name, message, data),
    error: (message, data) => write('error', name, message, data),
  };
}
