import { isAfterOrSame, isBeforeOrSame } from '../date/date';
import { sameCategory } from '../budget/scope';
import { LedgerQuery, LedgerRecord, TransactionLedger } from './types';

export function matchesQuery(record: LedgerRecord, query: LedgerQuery): boolean {
  if (record.accountId !== query.accountId) {
    return false;
  }
  if (record.isExpense !== query.isExpense || record.isCarryOver !== query.isCarryOver) {
    return false;
  }
  if (!isAfterOrSame(record.date, query.from) || !isBeforeOrSame(record.date, query.to)) {
    return false;
  }
  if (query.category) {
    return record.category !== null && sameCategory(record.category, query.category);
  }
  return true;
}

/**
 * Ledger over records held in memory; the array is read on every call, so later pushes are visible
 */
export class ArrayLedger implements TransactionLedger {
  constructor(private readonly records: LedgerRecord[]) {}

  find(query: LedgerQuery): LedgerRecord[] {
    return this.records.filter((record) => matchesQuery(record, query));
  }
}
