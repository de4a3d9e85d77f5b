import { BudgetScope, CategorySpend, PeriodWindow } from '../../data/budget/types';
import { LedgerQuery, LedgerRecord, TransactionLedger } from '../ledger/types';

const UNCATEGORIZED = 'Uncategorized';

/**
 * Sums expenses from the ledger for a scope and window. Reads the ledger on every call.
 */
export class SpendAggregator {
  constructor(private readonly ledger: TransactionLedger) {}

  /**
   * Total expense amount for the scope inside [window.start, window.end], excluding
   * income and carry-over records. 0 when nothing matches.
   */
  spend(scope: BudgetScope, window: PeriodWindow): number {
    return this.expenses(scope, window).reduce((total, record) => total + record.amount, 0);
  }

  /**
   * Largest expense categories in the window, highest first
   */
  topCategories(scope: BudgetScope, window: PeriodWindow, limit: number = 3): CategorySpend[] {
    const totals = new Map<string, number>();
    for (const record of this.expenses(scope, window)) {
      const name = record.category?.name ?? UNCATEGORIZED;
      totals.set(name, (totals.get(name) ?? 0) + record.amount);
    }
    return [...totals.entries()]
      .map(([name, amount]) => ({ name, amount }))
      .sort((a, b) => b.amount - a.amount)
      .slice(0, Math.max(0, limit));
  }

  private expenses(scope: BudgetScope, window: PeriodWindow): LedgerRecord[] {
    const query: LedgerQuery = {
      accountId: scope.accountId,
      isExpense: true,
      isCarryOver: false,
      from: window.start,
      to: window.end,
    };
    if (scope.kind === 'category') {
      query.category = scope.category;
    }
    return this.ledger.find(query);
  }
}
