import { Request } from 'express';
import { BudgetScope, PeriodWindow } from '../../data/budget/types';
import { getBody, parseAmount, parseOptionalDateField } from '../../utils/net/request';
import { BudgetSession } from '../../utils/budget/session';
import { ApiError } from '../errors';
import { getRequestedCategory, openSession } from './services';

export type LimitResponse = {
  scope: BudgetScope;
  limit: number;
  window: PeriodWindow | null;
};

/**
 * Sets the overall limit and stores its window, starting at body.start or at the current
 * window start, never before today.
 *
 * @param request - Express request object with accountId param and { amount, start? } body
 * @throws ApiError 400 if the amount is not positive or the start is not a date
 */
export function setOverallLimit(request: Request): LimitResponse {
  const session = openSession(request);
  const body = getBody(request);
  const amount = parseAmount(body.amount, 'Amount');
  const start = parseOptionalDateField(body.start, 'Start');

  const scope = session.overall();
  session.setLimit(scope, amount);
  const window = session.setWindow(scope, start ?? session.activeWindow(scope).start);

  return { scope, limit: session.getLimit(scope), window };
}

/**
 * Removes the overall limit together with its window
 */
export function clearOverallLimit(request: Request): LimitResponse {
  const session = openSession(request);
  const scope = session.overall();
  session.clearLimit(scope);
  return { scope, limit: 0, window: null };
}

export function requireCategoryScope(request: Request): { session: BudgetSession; scope: BudgetScope } {
  const session = openSession(request);
  const category = getRequestedCategory(request);
  if (!category) {
    throw new ApiError('Category is required', 400);
  }
  return { session, scope: session.category(category) };
}

/**
 * Sets a category limit. The value is written under the category identifier when one is
 * known, replacing any entry stored under the category name.
 *
 * @param request - Express request object with accountId and categoryName params and { amount, categoryId? } body
 * @throws ApiError 400 if the amount is not positive
 */
export function setCategoryLimit(request: Request): LimitResponse {
  const { session, scope } = requireCategoryScope(request);
  const amount = parseAmount(getBody(request).amount, 'Amount');
  session.setLimit(scope, amount);
  return { scope, limit: session.getLimit(scope), window: session.activeWindow(scope) };
}

export function clearCategoryLimit(request: Request): LimitResponse {
  const { session, scope } = requireCategoryScope(request);
  session.clearLimit(scope);
  return { scope, limit: 0, window: null };
}
