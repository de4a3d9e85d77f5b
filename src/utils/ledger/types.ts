import { CategoryRef } from '../../data/budget/types';

export type LedgerRecord = {
  id: string;
  amount: number;
  date: Date;
  isExpense: boolean;
  isCarryOver: boolean;
  accountId: string;
  category: CategoryRef | null;
};

export type LedgerQuery = {
  accountId: string;
  // Omitted to match every category
  category?: CategoryRef;
  isExpense: boolean;
  isCarryOver: boolean;
  // Inclusive on both ends, compared by UTC day
  from: Date;
  to: Date;
};

/**
 * Read-only view of the transaction ledger. Every call reflects the ledger as it is at call time.
 */
export interface TransactionLedger {
  find(query: LedgerQuery): LedgerRecord[];
}
