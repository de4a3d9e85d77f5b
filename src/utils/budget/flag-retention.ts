import { log } from '../log';
import { parseFlagKey, parseWindowEndKey } from '../store/keys';
import { KeyValueStore } from '../store/types';
import { readDate } from '../store/typed';
import { DEFAULT_PERIOD_KIND, periodKeyOf, periodsBetween } from './period-kind';

/**
 * The date flag ages are measured from: `now`, or the earliest stored window end of the
 * account when one lies before it. Stored windows are never rolled forward, so a closed
 * window still decides which period gets credited on the next observation.
 */
export function retentionReference(store: KeyValueStore, accountId: string, now: Date = new Date()): Date {
  let reference = now;
  for (const raw of store.keys()) {
    const key = parseWindowEndKey(raw);
    if (key === null || key.type !== 'windowBound' || key.scope.accountId !== accountId) {
      continue;
    }
    const end = readDate(store, key);
    if (end && end.getTime() < reference.getTime()) {
      reference = end;
    }
  }
  return reference;
}

/**
 * Deletes an account's notification and completion flags whose period is more than
 * `keepPeriods` periods before the reference period (see `retentionReference`). Flags of
 * an active window, current or closed, are never touched. Only runs when called.
 *
 * @returns Number of flags deleted
 */
export function pruneFlags(store: KeyValueStore, accountId: string, keepPeriods: number, now: Date = new Date()): number {
  if (!Number.isInteger(keepPeriods) || keepPeriods < 0) {
    throw new Error(`keepPeriods must be a non-negative integer, got ${keepPeriods}`);
  }

  const reference = retentionReference(store, accountId, now);
  let removed = 0;
  for (const raw of store.keys()) {
    const key = parseFlagKey(raw);
    if (key === null) {
      continue;
    }
    if (key.type !== 'notificationFlag' && key.type !== 'completionFlag') {
      continue;
    }
    if (key.scope.accountId !== accountId) {
      continue;
    }
    // Notification flags carry no kind; only monthly periods exist for them
    const kind = key.type === 'completionFlag' ? key.periodKind : DEFAULT_PERIOD_KIND;
    const age = periodsBetween(key.periodKey, periodKeyOf(reference, kind), kind);
    if (age !== null && age > keepPeriods) {
      store.delete(key);
      removed++;
    }
  }

  if (removed > 0) {
    log('Pruned budget flags', { accountId, keepPeriods, removed, from: periodKeyOf(reference) });
  }
  return removed;
}
