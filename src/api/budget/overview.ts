import { Request } from 'express';
import { CategorySpend, CompletionCounts, MedalBreakdown, MedalCycle, PeriodWindow } from '../../data/budget/types';
import { ScopeStatus } from '../../utils/budget/session';
import { getBudgetServices, getRequestedScope, openSession } from './services';

export type BudgetOverview = {
  accountId: string;
  overall: ScopeStatus;
  categories: ScopeStatus[];
  topCategories: CategorySpend[];
  counters: CompletionCounts;
  medals: MedalBreakdown;
  cycle: MedalCycle;
};

/**
 * Everything the budget screen shows for an account: the overall budget, every expense
 * category, the largest categories in the window and the medal standing.
 *
 * @param request - Express request object with accountId param
 */
export function getBudgetOverview(request: Request): BudgetOverview {
  const session = openSession(request);
  const overall = session.status(session.overall());
  const categories = getBudgetServices()
    .categories()
    .map((category) => session.status(session.category(category)));

  return {
    accountId: session.accountId,
    overall,
    categories,
    topCategories: session.spending.topCategories(session.overall(), overall.window),
    counters: session.counters.counts(),
    medals: session.medals(),
    cycle: session.medalCycle(),
  };
}

/**
 * Spend in the active window of the overall budget, or of the category given as ?category=
 */
export function getSpend(request: Request): { window: PeriodWindow; spend: number } {
  const session = openSession(request);
  const scope = getRequestedScope(request, session);
  const window = session.activeWindow(scope);
  return { window, spend: session.spend(scope, window) };
}
