import { checkExists, load, save } from '../io/io';
import { withPersistence } from '../io/errors';
import { debug } from '../log';
import { MemoryStore } from './memoryStore';
import { StoreValue } from './types';

export const STORE_FILE_NAME = 'budget-store.json';

type EncodedValue = number | boolean | { $date: string };

export type EncodedStore = Record<string, EncodedValue>;

export function encodeValue(value: StoreValue): EncodedValue {
  return value instanceof Date ? { $date: value.toISOString() } : value;
}

/**
 * Decodes one stored value, returning undefined for anything this store never writes
 */
export function decodeValue(value: unknown): StoreValue | undefined {
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'object' && value !== null && '$date' in value && typeof value.$date === 'string') {
    const date = new Date(value.$date);
    return isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

/**
 * Key-value store persisted as a single JSON document in the data directory.
 * The whole document is read once and rewritten on every mutation; memory only changes
 * once the rewrite has succeeded.
 */
export class JsonFileStore extends MemoryStore {
  private readonly fileName: string;

  constructor(fileName: string = STORE_FILE_NAME) {
    super();
    this.fileName = fileName;
    this.values = new Map(Object.entries(this.read()));
  }

  private read(): Record<string, StoreValue> {
    return withPersistence(`Reading ${this.fileName}`, () => {
      if (!checkExists(this.fileName)) {
        return {};
      }
      const raw = load<Record<string, unknown>>(this.fileName);
      const decoded: Record<string, StoreValue> = {};
      for (const [key, value] of Object.entries(raw)) {
        const parsed = decodeValue(value);
        if (parsed === undefined) {
          debug('Skipping unreadable store entry', { key });
          continue;
        }
        decoded[key] = parsed;
      }
      return decoded;
    });
  }

  protected commit(next: Map<string, StoreValue>): void {
    const encoded: EncodedStore = {};
    for (const [key, value] of next.entries()) {
      encoded[key] = encodeValue(value);
    }
    withPersistence(`Writing ${this.fileName}`, () => save<EncodedStore>(encoded, this.fileName));
    super.commit(next);
  }
}
