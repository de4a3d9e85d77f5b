import { CategoryRef } from '../../data/budget/types';
import { parseDate } from '../date/date';
import { checkExists, load } from '../io/io';
import { withPersistence } from '../io/errors';
import { matchesQuery } from './arrayLedger';
import { LedgerQuery, LedgerRecord, TransactionLedger } from './types';

export const LEDGER_FILE_NAME = 'transactions.json';

export type RawLedgerRecord = {
  id: string;
  amount: number;
  date: string;
  isExpense: boolean;
  isCarryOver?: boolean;
  accountId: string;
  category?: { id?: string | null; name: string } | null;
};

function toCategory(raw: RawLedgerRecord['category']): CategoryRef | null {
  if (!raw) {
    return null;
  }
  return { id: raw.id ?? null, name: raw.name };
}

export function toLedgerRecord(raw: RawLedgerRecord): LedgerRecord {
  if (typeof raw.amount !== 'number' || !Number.isFinite(raw.amount)) {
    throw new Error(`Transaction ${raw.id} has a non-numeric amount`);
  }
  return {
    id: raw.id,
    amount: raw.amount,
    date: parseDate(raw.date),
    isExpense: raw.isExpense === true,
    isCarryOver: raw.isCarryOver === true,
    accountId: raw.accountId,
    category: toCategory(raw.category),
  };
}

/**
 * Ledger read from transactions.json in the data directory. The file is re-read on every query.
 */
export class JsonFileLedger implements TransactionLedger {
  constructor(private readonly fileName: string = LEDGER_FILE_NAME) {}

  find(query: LedgerQuery): LedgerRecord[] {
    return withPersistence(`Reading ${this.fileName}`, () => {
      if (!checkExists(this.fileName)) {
        return [];
      }
      return load<RawLedgerRecord[]>(this.fileName)
        .map(toLedgerRecord)
        .filter((record) => matchesQuery(record, query));
    });
  }
}
