import { StoreKey } from './keys';

export type StoreValue = number | boolean | Date;

/**
 * Persistent key-value store for budget configuration and idempotency flags.
 * All calls are synchronous; implementations throw PersistenceError when the backing medium fails.
 */
export interface KeyValueStore {
  get(key: StoreKey): StoreValue | undefined;
  set(key: StoreKey, value: StoreValue): void;
  delete(key: StoreKey): void;
  /** Serialized form of every key currently held */
  keys(): string[];
}
