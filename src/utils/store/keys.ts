import { BudgetScope, CategoryScope, Threshold } from '../../data/budget/types';
import { categoryScope, normalizeCategoryName, overallScope } from '../budget/scope';
import { PeriodKind, isPeriodKind } from '../budget/period-kind';

export type StoreKey =
  | { type: 'overallLimit'; accountId: string }
  | { type: 'categoryLimitById'; accountId: string; categoryId: string }
  | { type: 'categoryLimitByName'; accountId: string; categoryName: string }
  | { type: 'windowBound'; scope: BudgetScope; bound: 'start' | 'end'; periodKind: PeriodKind }
  | { type: 'notificationFlag'; scope: BudgetScope; periodKey: string; threshold: Threshold }
  | { type: 'completionFlag'; scope: BudgetScope; periodKind: PeriodKind; periodKey: string }
  | { type: 'completionCount'; accountId: string; counter: 'overall' | 'category' }
  | { type: 'medalCycleStart'; accountId: string };

/**
 * Serializes a key to the string namespace already present in persisted data.
 * These strings must not change: existing stores are read with them.
 */
export function serializeKey(key: StoreKey): string {
  // Category names are compared trimmed, so they are stored trimmed
  const name = (scope: CategoryScope) => normalizeCategoryName(scope.category.name);
  switch (key.type) {
    case 'overallLimit':
      return `budget_limit_${key.accountId}`;
    case 'categoryLimitById':
      return `budget_limit_cat_${key.accountId}_id_${key.categoryId}`;
    case 'categoryLimitByName':
      return `budget_limit_cat_${key.accountId}_${normalizeCategoryName(key.categoryName)}`;
    case 'windowBound':
      if (key.scope.kind === 'overall') {
        return `budget_period_${key.bound}_${key.scope.accountId}_${key.periodKind}`;
      }
      return `budget_cat_${key.bound}_${key.periodKind}_${key.scope.accountId}_${name(key.scope)}`;
    case 'notificationFlag':
      if (key.scope.kind === 'overall') {
        return `budget_notified_${key.scope.accountId}_${key.periodKey}_${key.threshold}`;
      }
      return `budget_cat_notified_${key.scope.accountId}_${key.periodKey}_${name(key.scope)}_${key.threshold}`;
    case 'completionFlag':
      if (key.scope.kind === 'overall') {
        return `budget_completion_recorded_${key.scope.accountId}_${key.periodKind}_${key.periodKey}`;
      }
      return `budget_cat_completion_recorded_${key.scope.accountId}_${name(key.scope)}_${key.periodKind}_${key.periodKey}`;
    case 'completionCount':
      return `budget_${key.counter}_completion_count_${key.accountId}`;
    case 'medalCycleStart':
      return `medal_cycle_start_total_${key.accountId}`;
  }
}

const OVERALL_NOTIFIED = /^budget_notified_([^_]+)_(\d+)_(100|80|50)$/;
const CATEGORY_NOTIFIED = /^budget_cat_notified_([^_]+)_(\d+)_(.+)_(100|80|50)$/;
const OVERALL_COMPLETION = /^budget_completion_recorded_([^_]+)_([a-z]+)_(\d+)$/;
const CATEGORY_COMPLETION = /^budget_cat_completion_recorded_([^_]+)_(.+)_([a-z]+)_(\d+)$/;
const OVERALL_WINDOW_END = /^budget_period_end_([^_]+)_([a-z]+)$/;
const CATEGORY_WINDOW_END = /^budget_cat_end_([a-z]+)_([^_]+)_(.+)$/;

function toThreshold(value: string): Threshold | null {
  switch (value) {
    case '100':
      return 100;
    case '80':
      return 80;
    case '50':
      return 50;
    default:
      return null;
  }
}

/**
 * Recovers a notification or completion flag key from its serialized form.
 * Category flags carry only the category name, so the parsed category has no identifier.
 * Returns null for any other key.
 */
export function parseFlagKey(raw: string): StoreKey | null {
  let match = OVERALL_NOTIFIED.exec(raw);
  if (match) {
    const threshold = toThreshold(match[3]);
    return threshold === null
      ? null
      : { type: 'notificationFlag', scope: overallScope(match[1]), periodKey: match[2], threshold };
  }

  match = CATEGORY_NOTIFIED.exec(raw);
  if (match) {
    const threshold = toThreshold(match[4]);
    return threshold === null
      ? null
      : {
          type: 'notificationFlag',
          scope: categoryScope(match[1], { id: null, name: match[3] }),
          periodKey: match[2],
          threshold,
        };
  }

  match = OVERALL_COMPLETION.exec(raw);
  if (match) {
    const periodKind = match[2];
    return isPeriodKind(periodKind)
      ? { type: 'completionFlag', scope: overallScope(match[1]), periodKind, periodKey: match[3] }
      : null;
  }

  match = CATEGORY_COMPLETION.exec(raw);
  if (match) {
    const periodKind = match[3];
    return isPeriodKind(periodKind)
      ? {
          type: 'completionFlag',
          scope: categoryScope(match[1], { id: null, name: match[2] }),
          periodKind,
          periodKey: match[4],
        }
      : null;
  }

  return null;
}

/**
 * Recovers the key of a stored window end, or null for any other key
 */
export function parseWindowEndKey(raw: string): StoreKey | null {
  let match = OVERALL_WINDOW_END.exec(raw);
  if (match) {
    const periodKind = match[2];
    return isPeriodKind(periodKind)
      ? { type: 'windowBound', scope: overallScope(match[1]), bound: 'end', periodKind }
      : null;
  }

  match = CATEGORY_WINDOW_END.exec(raw);
  if (match) {
    const periodKind = match[1];
    return isPeriodKind(periodKind)
      ? {
          type: 'windowBound',
          scope: categoryScope(match[2], { id: null, name: match[3] }),
          bound: 'end',
          periodKind,
        }
      : null;
  }

  return null;
}
