import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.LOG]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LogEntry {
  fileName: string;
  functionName: string;
  account?: string;
  level: LogLevel;
  message: string;
}

type ExtraInformation = Record<string, unknown>;

/**
 * Parses a level name, falling back to LOG for anything unrecognised
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = (value ?? '').toUpperCase();
  return Object.values(LogLevel).find((level) => level === upper) ?? LogLevel.LOG;
}

/**
 * Appends (or, with reset, overwrites) a line in the file named by LOG_FILE.
 * Does nothing when LOG_FILE is unset.
 *
 * @param message - The message to write
 * @param reset - If true, overwrites the file; if false, appends to the file
 */
export function logToFile(message: string, reset: boolean = false) {
  const logFilePath = process.env.LOG_FILE;
  if (!logFilePath) {
    return;
  }
  const logFile = fs.createWriteStream(logFilePath, { flags: reset ? 'w' : 'a' });
  // Write failures are reported on the console only
  logFile.on('error', (error) => {
    console.error(`Could not write to log file ${logFilePath}: ${error.message}`);
  });
  logFile.write(message + '\n');
  logFile.end();
}

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;

  try {
    Error.prepareStackTrace = (_, stack) => stack;
    const stack = new Error().stack as unknown as NodeJS.CallSite[];

    if (stack && stack.length > depth) {
      const caller = stack[depth];
      const fileName = caller.getFileName();
      const functionName = caller.getFunctionName();

      return {
        fileName: fileName ? path.basename(fileName).replace(/\.(ts|js)$/, '') : 'unknown',
        functionName: functionName || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

export function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(' | ');
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

/**
 * Builds the output line for a log call
 */
export function formatLogLine(entry: LogEntry, extraInformation?: ExtraInformation): string {
  const parts: string[] = [];

  if (entry.account) {
    parts.push(entry.account);
  }
  parts.push(entry.level);
  parts.push(`${entry.fileName}:${entry.functionName}`);
  parts.push(entry.message);

  if (extraInformation && Object.keys(extraInformation).length > 0) {
    parts.push(formatExtraInformation(extraInformation));
  }

  return parts.join(' | ');
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[parseLogLevel(process.env.LOG_LEVEL)]) {
    return;
  }

  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods

  // A trailing plain object is treated as extraInformation
  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;
  if (args.length > 0) {
    const lastArg = args[args.length - 1];
    if (isExtraInformation(lastArg)) {
      extraInformation = lastArg;
      messageParts = args.slice(0, -1);
    }
  }

  const message = messageParts.map((part) => (typeof part === 'string' ? part : formatValue(part))).join(' ');

  const logEntry: LogEntry = {
    fileName,
    functionName,
    level,
    message,
  };
  if (process.env.LOG_ACCOUNT) {
    logEntry.account = process.env.LOG_ACCOUNT;
  }

  const fullOutput = formatLogLine(logEntry, extraInformation);

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.LOG:
      console.log(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
  }

  logToFile(fullOutput);
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Window for', scope, { start: '2024-01-01' })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Completion recorded', { accountId: 'acc-1' })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Dispatch failed for', noticeId, { error })
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Failed to persist', key, { error: 'EACCES' })
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}
