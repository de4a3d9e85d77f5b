import { Request } from 'express';
import { getBody, parseCount } from '../../utils/net/request';
import { getBudgetServices, openSession } from './services';

/**
 * Deletes notification and completion flags older than `keepPeriods` periods
 * (body value, or the configured retention when omitted).
 */
export function pruneBudgetFlags(request: Request): { keepPeriods: number; removed: number } {
  const session = openSession(request);
  const body = getBody(request);
  const keepPeriods =
    body.keepPeriods === undefined ? getBudgetServices().flagRetentionPeriods : parseCount(body.keepPeriods, 'Keep periods');
  return { keepPeriods, removed: session.pruneFlags(keepPeriods) };
}
