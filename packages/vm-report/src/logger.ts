/**
 * Debug logger for the vm-report CLI
 * Writes debug output to .vm-report/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir } from 'os';

const VM_REPORT_DIR = '.vm-report';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Resolve the directory the debug log lives in.
 *
 * VM_REPORT_LOG_DIR wins, then a .vm-report directory in the working
 * directory, then ~/.vm-report.
 */
function resolveLogDir(): string {
  const override = process.env.VM_REPORT_LOG_DIR;
  if (override) {
    return override;
  }

  const localDir = path.join(process.cwd(), VM_REPORT_DIR);
  if (fs.existsSync(localDir)) {
    return localDir;
  }

  return path.join(homedir(), VM_REPORT_DIR);
}

/**
 * Get the debug log file path
 */
export function getLogPath(): string {
  if (!logFilePath) {
    const dir = resolveLogDir();
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch {
      // Reported by writeLog when the append fails
    }
    logFilePath = path.join(dir, DEBUG_LOG_FILE);
  }
  return logFilePath;
}

/**
 * Initialize logging session with separator
 */
function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  const logPath = getLogPath();

  try {
    if (fs.existsSync(logPath)) {
      const stats = fs.statSync(logPath);
      if (stats.size > MAX_LOG_SIZE) {
        const backupPath = logPath + '.old';
        if (fs.existsSync(backupPath)) {
          fs.unlinkSync(backupPath);
        }
        fs.renameSync(logPath, backupPath);
      }
    }
  } catch {
    // Rotation is best effort
  }

  const timestamp = new Date().toISOString();
  const separator = '='.repeat(80);
  const header = `\n${separator}\n[${timestamp}] vm-report session started\n${separator}\n`;

  try {
    fs.appendFileSync(logPath, header);
  } catch {
    // The log must never interrupt a report run
  }
}

function formatEntry(level: string, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let entry = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

function writeLog(level: string, message: string, data?: unknown): void {
  initSession();
  const entry = formatEntry(level, message, data);

  try {
    fs.appendFileSync(getLogPath(), entry);
  } catch {
    // The log must never interrupt a report run
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

/**
 * Log a gcloud invocation before it runs
 */
export function logCommand(command: string): void {
  writeLog('CMD', `Executing: ${command}`);
}

/**
 * Log whatever gcloud printed on stderr for a successful call
 */
export function logStderr(output: string): void {
  if (output.trim()) {
    writeLog('STDERR', output.trim());
  }
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Create a logger that prefixes every entry with the command name
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
  };
}
