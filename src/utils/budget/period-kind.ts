import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { PeriodWindow } from '../../data/budget/types';

dayjs.extend(utc);

export type PeriodKind = 'monthly';

type PeriodKindDefinition = {
  spanAmount: number;
  spanUnit: 'day' | 'week' | 'month' | 'year';
  // dayjs format of the period key derived from a window's end date
  periodKeyFormat: string;
  // Start of the default window containing `today`
  defaultStart: (today: dayjs.Dayjs) => dayjs.Dayjs;
  // Sequential index of a period key, used to measure age in periods
  periodIndex: (periodKey: string) => number | null;
};

/**
 * Every supported period kind. Key encoding only ever sees the kind's name,
 * so a new kind is added here and nowhere else.
 */
export const PERIOD_KINDS: Record<PeriodKind, PeriodKindDefinition> = {
  monthly: {
    spanAmount: 1,
    spanUnit: 'month',
    periodKeyFormat: 'YYYYMM',
    defaultStart: (today) => today.startOf('month'),
    periodIndex: (periodKey) => {
      const match = /^(\d{4})(\d{2})$/.exec(periodKey);
      if (!match) {
        return null;
      }
      return parseInt(match[1], 10) * 12 + parseInt(match[2], 10) - 1;
    },
  },
};

export const DEFAULT_PERIOD_KIND: PeriodKind = 'monthly';

export function isPeriodKind(value: string): value is PeriodKind {
  return Object.prototype.hasOwnProperty.call(PERIOD_KINDS, value);
}

/**
 * Stable identifier of the period a date falls in, e.g. "202401" for a monthly window ending in January 2024
 */
export function periodKeyOf(date: Date, kind: PeriodKind = DEFAULT_PERIOD_KIND): string {
  return dayjs.utc(date).format(PERIOD_KINDS[kind].periodKeyFormat);
}

/**
 * Moves a date forward (1) or back (-1) by one span of the kind
 */
export function shiftBySpan(date: Date, kind: PeriodKind, direction: 1 | -1): Date {
  const { spanAmount, spanUnit } = PERIOD_KINDS[kind];
  return dayjs
    .utc(date)
    .add(direction * spanAmount, spanUnit)
    .toDate();
}

/**
 * The window used when nothing has been persisted: the span containing `now`,
 * ending on the last day of that span.
 */
export function defaultWindow(kind: PeriodKind, now: Date): PeriodWindow {
  const { spanAmount, spanUnit, defaultStart } = PERIOD_KINDS[kind];
  const start = defaultStart(dayjs.utc(now));
  return {
    start: start.toDate(),
    end: start.add(spanAmount, spanUnit).subtract(1, 'day').toDate(),
  };
}

/**
 * Number of periods between two keys of the same kind (newer - older), or null if either key is malformed
 */
export function periodsBetween(olderKey: string, newerKey: string, kind: PeriodKind): number | null {
  const older = PERIOD_KINDS[kind].periodIndex(olderKey);
  const newer = PERIOD_KINDS[kind].periodIndex(newerKey);
  if (older === null || newer === null) {
    return null;
  }
  return newer - older;
}
