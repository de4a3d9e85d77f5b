import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { DEFAULT_DATA_DIR } from '../config';

let baseDataDir = DEFAULT_DATA_DIR;

/**
 * Points load/save at another data directory (from DATA_DIR at start-up)
 */
export function setDataDir(dir: string) {
  baseDataDir = dir;
}

export function getDataDir(): string {
  return baseDataDir;
}

/**
 * Loads and parses a JSON document from the data directory
 * @throws Error if the file cannot be read or parsed
 */
export function load<T>(fn: string): T {
  const data = readFileSync(path.join(baseDataDir, fn), 'utf8');
  return JSON.parse(data) as T;
}

/**
 * Writes a JSON document to the data directory, creating the directory on first use
 */
export function save<T>(data: T, fn: string) {
  if (!existsSync(baseDataDir)) {
    mkdirSync(baseDataDir, { recursive: true });
  }
  writeFileSync(path.join(baseDataDir, fn), JSON.stringify(data, null, 2));
}

export function checkExists(fn: string) {
  return existsSync(path.join(baseDataDir, fn));
}
