import { v4 as uuidv4 } from 'uuid';
import { BudgetNotice, BudgetScope, Threshold } from '../../data/budget/types';
import { log } from '../log';
import { KeyValueStore } from '../store/types';
import { readFlag } from '../store/typed';
import { describeScope } from './scope';

// Highest first: a single evaluation claims at most one threshold
export const THRESHOLDS: readonly Threshold[] = [100, 80, 50];

/**
 * Percentage of the limit used, capped at 100 and rounded half up
 */
export function percentUsed(spend: number, limit: number): number {
  if (limit <= 0) {
    return 0;
  }
  return Math.round(Math.min(100, (spend / limit) * 100));
}

/**
 * Decides which threshold notification, if any, is due for a scope in a period.
 *
 * Each (scope, period, threshold) fires at most once. The scan stops at the highest
 * unclaimed threshold reached, so a jump straight past 50% and 80% to 100% announces 100%
 * only; the lower thresholds are not back-filled later in the period.
 */
export class ThresholdNotifier {
  constructor(private readonly store: KeyValueStore) {}

  evaluate(scope: BudgetScope, spend: number, limit: number, periodKey: string): Threshold | null {
    if (limit <= 0) {
      return null;
    }
    const pct = percentUsed(spend, limit);

    for (const threshold of THRESHOLDS) {
      if (pct < threshold) {
        continue;
      }
      const flag = { type: 'notificationFlag' as const, scope, periodKey, threshold };
      if (readFlag(this.store, flag)) {
        return null;
      }
      this.store.set(flag, true);
      log('Threshold reached', describeScope(scope), { periodKey, threshold, pct });
      return threshold;
    }
    return null;
  }

  composeNotice(scope: BudgetScope, threshold: Threshold, periodKey: string): BudgetNotice {
    const { title, body } = noticeText(scope, threshold);
    return {
      id: uuidv4(),
      accountId: scope.accountId,
      scope,
      threshold,
      periodKey,
      title,
      body,
      createdAt: new Date(),
    };
  }
}

export function noticeText(scope: BudgetScope, threshold: Threshold): { title: string; body: string } {
  if (scope.kind === 'overall') {
    return {
      title: 'Budget Update',
      body: threshold === 100 ? "You've fully used this month's budget." : `You've reached ${threshold}% of this month's budget.`,
    };
  }
  const { name } = scope.category;
  return {
    title: `${name} budget`,
    body: threshold === 100 ? `You've fully used the budget for ${name}.` : `You've reached ${threshold}% of ${name} budget.`,
  };
}
