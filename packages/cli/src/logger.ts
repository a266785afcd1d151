/**
 * Debug logger for the fluxlint CLI
 * Writes debug output to .fluxlint/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const FLUXLINT_DIR = '.fluxlint';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;
let disabled = false;

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    // Prefer a local .fluxlint directory, fall back to the home directory
    const localDir = path.join(process.cwd(), FLUXLINT_DIR);
    const homeDir = path.join(homedir(), FLUXLINT_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else {
      fs.mkdirSync(homeDir, { recursive: true });
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

function rotate(logPath: string): void {
  if (!fs.existsSync(logPath) || fs.statSync(logPath).size <= MAX_LOG_SIZE) return;

  const backupPath = logPath + '.old';
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(logPath, backupPath);
}

/**
 * Start a logging session with a separator
 */
function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();
  rotate(logPath);

  const timestamp = new Date().toISOString();
  const separator = '='.repeat(80);
  fs.appendFileSync(logPath, `\n${separator}\n[${timestamp}] fluxlint session started\n${separator}\n`);
}

function formatEntry(level: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level}] ${message}`;

  if (data instanceof Error) {
    entry += `\n  Error: ${data.message}`;
    if (data.stack) {
      entry += `\n  Stack: ${data.stack}`;
    }
  } else if (typeof data === 'object' && data !== null) {
    entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
  } else if (data !== undefined) {
    entry += `\n  Data: ${String(data)}`;
  }

  return entry + '\n';
}

function writeLog(level: string, message: string, data?: unknown): void {
  if (disabled) return;

  try {
    initSession();
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch (err) {
    // The log is best effort; stop trying after the first failure
    disabled = true;
    process.emitWarning(`fluxlint debug log disabled: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log command execution
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Create a logger for a specific command
 */
export function createCommandLogger(commandName: string) {
  return {
    info: (message: string, data?: unknown) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message: string, data?: unknown) => logWarn(`[${commandName}] ${message}`, data),
    error: (message: string, data?: unknown) => logError(`[${commandName}] ${message}`, data),
    debug: (message: string, data?: unknown) => logDebug(`[${commandName}] ${message}`, data),
    command: (cmd: string, args?: Record<string, unknown>) =>
      logCommand(`[${commandName}] ${cmd}`, args),
  };
}

export type CommandLogger = ReturnType<typeof createCommandLogger>;
