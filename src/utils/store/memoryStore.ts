import { StoreKey, serializeKey } from './keys';
import { KeyValueStore, StoreValue } from './types';

function copyValue(value: StoreValue): StoreValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

/**
 * Map-backed store. Subclasses persist by overriding `commit`, saving the next map
 * before handing it to `super.commit`; a failed save leaves the current values as they were.
 */
export class MemoryStore implements KeyValueStore {
  protected values: Map<string, StoreValue>;

  constructor(initial: Record<string, StoreValue> = {}) {
    this.values = new Map(Object.entries(initial).map(([key, value]) => [key, copyValue(value)]));
  }

  get(key: StoreKey): StoreValue | undefined {
    const value = this.values.get(serializeKey(key));
    return value === undefined ? undefined : copyValue(value);
  }

  set(key: StoreKey, value: StoreValue): void {
    const next = new Map(this.values);
    next.set(serializeKey(key), copyValue(value));
    this.commit(next);
  }

  delete(key: StoreKey): void {
    const serialized = serializeKey(key);
    if (!this.values.has(serialized)) {
      return;
    }
    const next = new Map(this.values);
    next.delete(serialized);
    this.commit(next);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  /** Raw snapshot, keyed by serialized key */
  snapshot(): Record<string, StoreValue> {
    return Object.fromEntries([...this.values.entries()].map(([key, value]) => [key, copyValue(value)]));
  }

  protected commit(next: Map<string, StoreValue>): void {
    this.values = next;
  }
}
