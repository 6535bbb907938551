/**
 * Debug logger for netmerge CLI
 * Appends merge, path and check activity to .netmerge/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';
import { MergeStepError, NetmergeError, type MergeLogger } from '@netmerge/engine';

const NETMERGE_DIR = '.netmerge';
const DEBUG_LOG_FILE = 'debug.log';
const LOG_FILE_ENV = 'NETMERGE_LOG_FILE';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG' | 'CMD';

let logFilePath: string | null = null;
let sessionStarted = false;
let disabled = false;

/**
 * Where the debug log goes, first match wins:
 * NETMERGE_LOG_FILE, a .netmerge directory in the working directory,
 * then ~/.netmerge
 */
export function getLogPath(): string {
  if (logFilePath) return logFilePath;

  const fromEnv = process.env[LOG_FILE_ENV];
  const projectDir = path.join(process.cwd(), NETMERGE_DIR);

  if (fromEnv) {
    logFilePath = path.resolve(fromEnv);
  } else if (fs.existsSync(projectDir)) {
    logFilePath = path.join(projectDir, DEBUG_LOG_FILE);
  } else {
    logFilePath = path.join(homedir(), NETMERGE_DIR, DEBUG_LOG_FILE);
  }
  return logFilePath;
}

/**
 * Forget the resolved log path and session, so the next entry starts a new
 * session (possibly in another file)
 */
export function resetLogger(): void {
  logFilePath = null;
  sessionStarted = false;
  disabled = false;
}

// Stop writing once the log cannot be written; the CLI keeps running
function disable(reason: unknown): void {
  disabled = true;
  if (process.env.NETMERGE_DEBUG) {
    console.error(`netmerge: debug log disabled: ${reason instanceof Error ? reason.message : String(reason)}`);
  }
}

// Keep one previous log next to the current one
function rotate(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) return;
  fs.renameSync(logPath, `${logPath}.old`);
}

function startSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();
  const separator = '='.repeat(80);

  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    rotate(logPath);
    fs.appendFileSync(
      logPath,
      `\n${separator}\n[${new Date().toISOString()}] netmerge CLI Session Started\n${separator}\n`
    );
  } catch (err) {
    disable(err);
  }
}

/**
 * Format a log entry
 */
export function formatEntry(level: LogLevel, message: string, data?: unknown): string {
  let entry = `[${new Date().toISOString()}] [${level}] ${message}`;

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (data !== null && typeof data === 'object') {
    entry += `\n  Data: ${serialize(data).split('\n').join('\n  ')}`;
  } else if (data !== undefined) {
    entry += `\n  Data: ${String(data)}`;
  }

  return entry + '\n';
}

function serialize(data: object): string {
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return '[Could not serialize]';
  }
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  startSession();
  if (disabled) return;

  try {
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch (err) {
    disable(err);
  }
}

/**
 * Describe an error for the log. Engine errors add their code, and a failed
 * merge step names the source document, package and underlying cause.
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { rawError: String(error) };
  }

  const details: Record<string, unknown> = {
    errorName: error.name,
    errorMessage: error.message,
    errorStack: error.stack,
  };
  if (error instanceof NetmergeError) {
    details.errorCode = error.code;
  }
  if (error instanceof MergeStepError) {
    details.source = error.source;
    details.pkg = error.pkg;
    details.cause = describeError(error.cause);
  }
  return details;
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(context: string, error: unknown, additionalData?: Record<string, unknown>): void {
  writeLog('ERROR', `Error in ${context}`, { context, ...additionalData, ...describeError(error) });
}

export interface CommandLogger extends MergeLogger {
  command(cmd: string, args?: Record<string, unknown>): void;
}

/**
 * Create a logger for a specific command. It can be handed to engine
 * operations as their MergeLogger.
 */
export function createCommandLogger(commandName: string): CommandLogger {
  const at =
    (level: LogLevel) =>
    (message: string, data?: unknown): void =>
      writeLog(level, `[${commandName}] ${message}`, data);

  return {
    info: at('INFO'),
    warn: at('WARN'),
    error: at('ERROR'),
    debug: at('DEBUG'),
    command: (cmd, args) => writeLog('CMD', `Executing: [${commandName}] ${cmd}`, args),
  };
}
