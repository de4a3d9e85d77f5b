import { BudgetScope, CompletionCounts } from '../../data/budget/types';
import { KeyValueStore } from '../store/types';
import { readInteger } from '../store/typed';
import { StoreKey } from '../store/keys';

/**
 * Completion counters of one account. Created when the account is selected and
 * discarded with it; values only ever grow.
 */
export class CompletionCounters {
  constructor(
    private readonly store: KeyValueStore,
    readonly accountId: string,
  ) {}

  get overallCompletions(): number {
    return readInteger(this.store, { type: 'completionCount', accountId: this.accountId, counter: 'overall' });
  }

  get categoryCompletions(): number {
    return readInteger(this.store, { type: 'completionCount', accountId: this.accountId, counter: 'category' });
  }

  get total(): number {
    return this.overallCompletions + this.categoryCompletions;
  }

  counts(): CompletionCounts {
    const overallCompletions = this.overallCompletions;
    const categoryCompletions = this.categoryCompletions;
    return { overallCompletions, categoryCompletions, total: overallCompletions + categoryCompletions };
  }

  /**
   * Adds one completion to the counter matching the scope's kind
   * @returns The new value of that counter
   */
  increment(scope: BudgetScope): number {
    if (scope.accountId !== this.accountId) {
      throw new Error(`Counters for account ${this.accountId} cannot record scope of account ${scope.accountId}`);
    }
    const counter = scope.kind === 'overall' ? 'overall' : 'category';
    const key: StoreKey = { type: 'completionCount', accountId: this.accountId, counter };
    const next = readInteger(this.store, key) + 1;
    this.store.set(key, next);
    return next;
  }

  get cycleStart(): number {
    return readInteger(this.store, { type: 'medalCycleStart', accountId: this.accountId });
  }

  /**
   * Marks the current total as the start of a new medal cycle
   */
  restartCycle(): number {
    const total = this.total;
    this.store.set({ type: 'medalCycleStart', accountId: this.accountId }, total);
    return total;
  }
}
