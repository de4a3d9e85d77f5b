import { Request } from 'express';
import { BudgetNotice, BudgetScope, Threshold } from '../../data/budget/types';
import { periodKeyOf } from '../../utils/budget/period-kind';
import { ObservationResult } from '../../utils/budget/session';
import { DispatchReport, dispatchAll } from '../../utils/notifications/dispatcher';
import {
  getBody,
  parseDateField,
  parseNumber,
  parseOptionalDateField,
  parseOptionalString,
} from '../../utils/net/request';
import { ApiError } from '../errors';
import { getBudgetServices, getRequestedScope, openSession } from './services';

export type EvaluationResponse = {
  scope: BudgetScope;
  periodKey: string;
  threshold: Threshold | null;
  notice: BudgetNotice | null;
};

export type CompletionResponse = {
  scope: BudgetScope;
  recorded: boolean;
  overallCompletions: number;
  categoryCompletions: number;
  total: number;
};

export type ObserveResponse = ObservationResult & { dispatch: DispatchReport };

/**
 * Decides whether a threshold notification is due for the given spend and limit.
 * The period defaults to the one of the active window's end.
 *
 * @param request - Express request object with accountId param and { spend, limit, periodKey?, category? } body
 * @throws ApiError 400 if spend or limit is not a number
 */
export function evaluateThreshold(request: Request): EvaluationResponse {
  const session = openSession(request);
  const body = getBody(request);
  const spend = parseNumber(body.spend, 'Spend');
  const limit = parseNumber(body.limit, 'Limit');
  const scope = getRequestedScope(request, session);

  const periodKey = parseOptionalString(body.periodKey) ?? periodKeyOf(session.activeWindow(scope).end);
  if (!/^\d{6}$/.test(periodKey)) {
    throw new ApiError('Period key must be in YYYYMM format', 400);
  }

  const threshold = session.evaluate(scope, spend, limit, periodKey);
  return {
    scope,
    periodKey,
    threshold,
    notice: threshold === null ? null : session.notifier.composeNotice(scope, threshold, periodKey),
  };
}

/**
 * Credits a finished window that stayed within its limit. The window defaults to the active one.
 *
 * @param request - Express request object with accountId param and { spend, limit, start?, end?, category? } body
 */
export function recordCompletion(request: Request): CompletionResponse {
  const session = openSession(request);
  const body = getBody(request);
  const spend = parseNumber(body.spend, 'Spend');
  const limit = parseNumber(body.limit, 'Limit');
  const scope = getRequestedScope(request, session);

  const active = session.activeWindow(scope);
  const start = parseOptionalDateField(body.start, 'Start') ?? active.start;
  const end = body.end === undefined ? active.end : parseDateField(body.end, 'End');
  if (end.getTime() < start.getTime()) {
    throw new ApiError('End must not be before start', 400);
  }

  const recorded = session.tryRecordCompletion(scope, { start, end }, spend, limit);
  return { scope, recorded, ...session.counters.counts() };
}

/**
 * Runs a full observation for the account (overall budget and every expense category)
 * and hands the resulting notices to the dispatcher.
 */
export async function observeBudget(request: Request): Promise<ObserveResponse> {
  const session = openSession(request);
  const { categories, dispatcher } = getBudgetServices();
  const result = session.observe(categories());
  const dispatch = await dispatchAll(dispatcher, result.notices);
  return { ...result, dispatch };
}
