import path from 'path';
import { LogLevel, parseLogLevel } from './log';

export type BudgetConfig = {
  port: number;
  dataDir: string;
  logLevel: LogLevel;
  logFile: string | null;
  // 0 disables pruning of notification/completion flags
  flagRetentionPeriods: number;
};

// Data directory at repository root (CommonJS)
export const DEFAULT_DATA_DIR = path.join(__dirname, '../../data');
export const DEFAULT_PORT = 5002;

function parseNonNegativeInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${name} '${raw}': expected a non-negative integer`);
  }
  return value;
}

/**
 * Reads the service configuration from environment variables.
 *
 * @param env - Environment to read, normally process.env after dotenv has loaded .env
 * @returns Validated configuration
 * @throws Error if a numeric setting is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BudgetConfig {
  const port = parseNonNegativeInteger('PORT', env.PORT, DEFAULT_PORT);
  if (port === 0 || port > 65535) {
    throw new Error(`Invalid PORT '${env.PORT}': expected 1-65535`);
  }

  return {
    port,
    dataDir: env.DATA_DIR ? path.resolve(env.DATA_DIR) : DEFAULT_DATA_DIR,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE || null,
    flagRetentionPeriods: parseNonNegativeInteger('FLAG_RETENTION_PERIODS', env.FLAG_RETENTION_PERIODS, 0),
  };
}
