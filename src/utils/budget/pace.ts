import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { PaceSummary, PeriodWindow } from '../../data/budget/types';

dayjs.extend(utc);

/**
 * Derived figures for how spending is tracking against a limit within the active window.
 * Day counts follow the calendar month the window starts in.
 */
export function summarize(window: PeriodWindow, spend: number, limit: number, now: Date = new Date()): PaceSummary {
  const start = dayjs.utc(window.start).startOf('day');
  const daysTotal = start.daysInMonth();
  const daysElapsed = Math.max(1, dayjs.utc(now).startOf('day').diff(start, 'day') + 1);
  const remainingDays = Math.max(1, daysTotal - daysElapsed + 1);
  const remaining = Math.max(0, limit - spend);
  const projectedSpend = spend > 0 ? (spend / daysElapsed) * daysTotal : 0;

  return {
    progress: limit > 0 ? Math.min(1, spend / limit) : 0,
    remaining,
    daysElapsed,
    daysTotal,
    remainingDays,
    safeToSpendToday: remaining / remainingDays,
    recommendedSpendToDate: limit > 0 ? (limit * daysElapsed) / daysTotal : 0,
    projectedSpend,
    trendingOver: limit > 0 && projectedSpend > limit,
  };
}
