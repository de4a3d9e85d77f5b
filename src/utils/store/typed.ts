import { StoreKey } from './keys';
import { KeyValueStore } from './types';

// Typed reads; a value of the wrong type reads as absent

export function readNumber(store: KeyValueStore, key: StoreKey): number {
  const value = store.get(key);
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function readInteger(store: KeyValueStore, key: StoreKey): number {
  return Math.max(0, Math.trunc(readNumber(store, key)));
}

export function readDate(store: KeyValueStore, key: StoreKey): Date | undefined {
  const value = store.get(key);
  return value instanceof Date ? value : undefined;
}

export function readFlag(store: KeyValueStore, key: StoreKey): boolean {
  return store.get(key) === true;
}
