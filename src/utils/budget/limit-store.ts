import { BudgetScope } from '../../data/budget/types';
import { log } from '../log';
import { StoreKey } from '../store/keys';
import { KeyValueStore } from '../store/types';
import { readNumber } from '../store/typed';
import { PeriodCalculator } from './period-calculator';
import { describeScope } from './scope';

/**
 * Reads and writes budget limits. Category limits live under an identifier key; values
 * written before identifiers existed stay readable under the legacy name key until the
 * next write for that category.
 */
export class BudgetLimitStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly periods: PeriodCalculator,
  ) {}

  /**
   * @returns The configured limit, or 0 when none is set
   */
  getLimit(scope: BudgetScope): number {
    if (scope.kind === 'overall') {
      return Math.max(0, readNumber(this.store, { type: 'overallLimit', accountId: scope.accountId }));
    }

    if (scope.category.id !== null) {
      const byId = readNumber(this.store, {
        type: 'categoryLimitById',
        accountId: scope.accountId,
        categoryId: scope.category.id,
      });
      if (byId > 0) {
        return byId;
      }
    }
    return Math.max(0, readNumber(this.store, this.legacyKey(scope)));
  }

  setLimit(scope: BudgetScope, amount: number): void {
    if (scope.kind === 'overall') {
      this.store.set({ type: 'overallLimit', accountId: scope.accountId }, amount);
    } else if (scope.category.id !== null) {
      this.store.set({ type: 'categoryLimitById', accountId: scope.accountId, categoryId: scope.category.id }, amount);
      this.store.delete(this.legacyKey(scope));
    } else {
      this.store.set(this.legacyKey(scope), amount);
    }
    log('Budget limit set', describeScope(scope), { amount });
  }

  /**
   * Removes the limit and the scope's stored window
   */
  clearLimit(scope: BudgetScope): void {
    if (scope.kind === 'overall') {
      this.store.delete({ type: 'overallLimit', accountId: scope.accountId });
    } else {
      if (scope.category.id !== null) {
        this.store.delete({ type: 'categoryLimitById', accountId: scope.accountId, categoryId: scope.category.id });
      }
      this.store.delete(this.legacyKey(scope));
    }
    this.periods.clearWindow(scope);
    log('Budget limit cleared', describeScope(scope));
  }

  private legacyKey(scope: Extract<BudgetScope, { kind: 'category' }>): StoreKey {
    return { type: 'categoryLimitByName', accountId: scope.accountId, categoryName: scope.category.name };
  }
}
