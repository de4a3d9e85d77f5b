import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { BudgetScope, PeriodWindow } from '../../data/budget/types';
import { formatDate, maxDate, startOfToday } from '../date/date';
import { debug } from '../log';
import { KeyValueStore } from '../store/types';
import { readDate } from '../store/typed';
import { DEFAULT_PERIOD_KIND, PeriodKind, defaultWindow, shiftBySpan } from './period-kind';
import { describeScope } from './scope';

dayjs.extend(utc);

function startOfDay(date: Date): Date {
  return dayjs.utc(date).startOf('day').toDate();
}

/**
 * Maintains the rolling window a scope's budget is measured against.
 *
 * Windows are stored per (scope, period kind). Edits never backdate: the start is clamped
 * to today and the end is always one span after the start.
 */
export class PeriodCalculator {
  constructor(private readonly store: KeyValueStore) {}

  /**
   * Persisted window for the scope, or the span containing today when none is stored.
   * The fallback is not written back.
   */
  activeWindow(scope: BudgetScope, kind: PeriodKind = DEFAULT_PERIOD_KIND): PeriodWindow {
    const start = readDate(this.store, { type: 'windowBound', scope, bound: 'start', periodKind: kind });
    const end = readDate(this.store, { type: 'windowBound', scope, bound: 'end', periodKind: kind });
    if (start && end) {
      return { start, end };
    }
    return defaultWindow(kind, new Date());
  }

  hasPersistedWindow(scope: BudgetScope, kind: PeriodKind = DEFAULT_PERIOD_KIND): boolean {
    return (
      readDate(this.store, { type: 'windowBound', scope, bound: 'start', periodKind: kind }) !== undefined &&
      readDate(this.store, { type: 'windowBound', scope, bound: 'end', periodKind: kind }) !== undefined
    );
  }

  /**
   * Stores a window starting at `start` (clamped to today). The end is recomputed as one span
   * after the clamped start; a supplied `end` that disagrees is replaced.
   */
  setWindow(scope: BudgetScope, start: Date, end?: Date, kind: PeriodKind = DEFAULT_PERIOD_KIND): PeriodWindow {
    const clampedStart = maxDate(startOfDay(start), startOfToday());
    const window = { start: clampedStart, end: shiftBySpan(clampedStart, kind, 1) };

    if (end && end.getTime() !== window.end.getTime()) {
      debug('Recomputed window end', describeScope(scope), {
        requestedEnd: formatDate(end),
        end: formatDate(window.end),
      });
    }

    this.persist(scope, window, kind);
    return window;
  }

  /**
   * Moves the start bound; the end follows one span later
   */
  shiftStartTowardEnd(scope: BudgetScope, start: Date, kind: PeriodKind = DEFAULT_PERIOD_KIND): PeriodWindow {
    return this.setWindow(scope, start, undefined, kind);
  }

  /**
   * Moves the end bound; the start becomes one span earlier (never before today)
   * and the end is then re-derived from it so the window keeps its exact span.
   */
  shiftEndTowardStart(scope: BudgetScope, end: Date, kind: PeriodKind = DEFAULT_PERIOD_KIND): PeriodWindow {
    const start = maxDate(shiftBySpan(startOfDay(end), kind, -1), startOfToday());
    const window = { start, end: shiftBySpan(start, kind, 1) };
    this.persist(scope, window, kind);
    return window;
  }

  clearWindow(scope: BudgetScope, kind: PeriodKind = DEFAULT_PERIOD_KIND): void {
    this.store.delete({ type: 'windowBound', scope, bound: 'start', periodKind: kind });
    this.store.delete({ type: 'windowBound', scope, bound: 'end', periodKind: kind });
  }

  private persist(scope: BudgetScope, window: PeriodWindow, kind: PeriodKind): void {
    this.store.set({ type: 'windowBound', scope, bound: 'start', periodKind: kind }, window.start);
    this.store.set({ type: 'windowBound', scope, bound: 'end', periodKind: kind }, window.end);
    debug('Window stored', describeScope(scope), { start: formatDate(window.start), end: formatDate(window.end) });
  }
}
