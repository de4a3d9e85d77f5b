import { Request } from 'express';
import { BudgetScope, CategoryRef } from '../../data/budget/types';
import { BudgetSession } from '../../utils/budget/session';
import { BudgetConfig, loadConfig } from '../../utils/config';
import { loadExpenseCategories, resolveCategory } from '../../utils/io/categories';
import { setDataDir } from '../../utils/io/io';
import { JsonFileLedger } from '../../utils/ledger/jsonFileLedger';
import { TransactionLedger } from '../../utils/ledger/types';
import { getAccountId, getBody, getQueryString, parseOptionalString } from '../../utils/net/request';
import { NotificationDispatcher, OutboxDispatcher } from '../../utils/notifications/dispatcher';
import { JsonFileStore } from '../../utils/store/jsonFileStore';
import { KeyValueStore } from '../../utils/store/types';

export type BudgetServices = {
  store: KeyValueStore;
  ledger: TransactionLedger;
  dispatcher: NotificationDispatcher;
  categories: () => CategoryRef[];
  flagRetentionPeriods: number;
};

let services: BudgetServices | null = null;

/**
 * Builds the file-backed services for the configured data directory
 */
export function createBudgetServices(config: BudgetConfig): BudgetServices {
  setDataDir(config.dataDir);
  return {
    store: new JsonFileStore(),
    ledger: new JsonFileLedger(),
    dispatcher: new OutboxDispatcher(),
    categories: loadExpenseCategories,
    flagRetentionPeriods: config.flagRetentionPeriods,
  };
}

export function setBudgetServices(next: BudgetServices | null) {
  services = next;
}

export function getBudgetServices(): BudgetServices {
  if (!services) {
    services = createBudgetServices(loadConfig());
  }
  return services;
}

/**
 * Opens the budget session for the account named in the route
 */
export function openSession(request: Request): BudgetSession {
  const { store, ledger, flagRetentionPeriods } = getBudgetServices();
  return BudgetSession.open(getAccountId(request), { store, ledger, flagRetentionPeriods });
}

/**
 * Category named by the route, body or query. Without an explicit identifier the
 * identifier is looked up among the expense categories by name.
 */
export function getRequestedCategory(request: Request): CategoryRef | null {
  const body = getBody(request);
  const name =
    parseOptionalString(request.params.categoryName) ??
    parseOptionalString(body.category) ??
    getQueryString(request, 'category');
  if (!name) {
    return null;
  }
  const id = parseOptionalString(body.categoryId) ?? getQueryString(request, 'categoryId');
  return id ? { id, name } : resolveCategory(name, getBudgetServices().categories());
}

/**
 * Category scope when the request names a category, otherwise the overall scope
 */
export function getRequestedScope(request: Request, session: BudgetSession): BudgetScope {
  const category = getRequestedCategory(request);
  return category ? session.category(category) : session.overall();
}
