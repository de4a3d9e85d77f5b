import { Request } from 'express';
import { CompletionCounts, MedalBreakdown, MedalCycle } from '../../data/budget/types';
import { breakdown } from '../../utils/budget/medal-tally';
import { getQueryString, parseCount } from '../../utils/net/request';
import { ApiError } from '../errors';
import { openSession } from './services';

export type MedalsResponse = {
  counters: CompletionCounts;
  medals: MedalBreakdown;
  cycle: MedalCycle;
};

export function getMedals(request: Request): MedalsResponse {
  const session = openSession(request);
  return {
    counters: session.counters.counts(),
    medals: session.medals(),
    cycle: session.medalCycle(),
  };
}

/**
 * Medal breakdown of an arbitrary completion total given as ?total=
 *
 * @throws ApiError 400 if total is missing or not a non-negative integer
 */
export function getMedalBreakdown(request: Request): MedalBreakdown {
  const total = getQueryString(request, 'total');
  if (total === undefined) {
    throw new ApiError('Total is required', 400);
  }
  return breakdown(parseCount(total, 'Total'));
}

export function restartMedalCycle(request: Request): MedalCycle {
  return openSession(request).restartMedalCycle();
}
