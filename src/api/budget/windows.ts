import { Request } from 'express';
import { BudgetScope, PeriodWindow } from '../../data/budget/types';
import { getBody, parseDateField, parseOptionalDateField } from '../../utils/net/request';
import { requireCategoryScope } from './limits';
import { openSession } from './services';

export type WindowResponse = {
  scope: BudgetScope;
  window: PeriodWindow;
};

/**
 * Moves the overall window to start at body.start (clamped to today); the end follows one month later
 *
 * @param request - Express request object with accountId param and { start, end? } body
 * @throws ApiError 400 if start is missing or invalid
 */
export function setOverallWindow(request: Request): WindowResponse {
  const session = openSession(request);
  const body = getBody(request);
  const start = parseDateField(body.start, 'Start');
  const end = parseOptionalDateField(body.end, 'End');
  const scope = session.overall();
  return { scope, window: session.setWindow(scope, start, end) };
}

/**
 * Moves the overall window so it ends near body.end; the start becomes one month earlier, never before today
 */
export function setOverallWindowEnd(request: Request): WindowResponse {
  const session = openSession(request);
  const end = parseDateField(getBody(request).end, 'End');
  const scope = session.overall();
  return { scope, window: session.shiftEndTowardStart(scope, end) };
}

export function setCategoryWindow(request: Request): WindowResponse {
  const { session, scope } = requireCategoryScope(request);
  const body = getBody(request);
  const start = parseDateField(body.start, 'Start');
  const end = parseOptionalDateField(body.end, 'End');
  return { scope, window: session.setWindow(scope, start, end) };
}

/**
 * Category counterpart of setOverallWindowEnd
 */
export function setCategoryWindowEnd(request: Request): WindowResponse {
  const { session, scope } = requireCategoryScope(request);
  const end = parseDateField(getBody(request).end, 'End');
  return { scope, window: session.shiftEndTowardStart(scope, end) };
}
