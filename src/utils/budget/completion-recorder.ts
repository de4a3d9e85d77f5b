import { BudgetScope, PeriodWindow } from '../../data/budget/types';
import { isAfter } from '../date/date';
import { debug, log } from '../log';
import { KeyValueStore } from '../store/types';
import { readFlag } from '../store/typed';
import { CompletionCounters } from './completion-counters';
import { DEFAULT_PERIOD_KIND, PeriodKind, periodKeyOf } from './period-kind';
import { describeScope } from './scope';

/**
 * Credits closed periods that ended within budget, once per (scope, kind, period).
 *
 * Only successes leave a flag behind. A period judged over budget can therefore still be
 * credited on a later call if its spend is revised down.
 */
export class CompletionRecorder {
  constructor(
    private readonly store: KeyValueStore,
    private readonly counters: CompletionCounters,
  ) {}

  /**
   * @returns true when this call recorded the completion
   */
  tryRecordCompletion(
    scope: BudgetScope,
    window: PeriodWindow,
    spend: number,
    limit: number,
    kind: PeriodKind = DEFAULT_PERIOD_KIND,
  ): boolean {
    if (limit <= 0) {
      return false;
    }
    // The window's last day is still open
    if (!isAfter(new Date(), window.end)) {
      return false;
    }
    if (spend > limit) {
      debug('Period closed over budget', describeScope(scope), { spend, limit });
      return false;
    }

    const periodKey = periodKeyOf(window.end, kind);
    const flag = { type: 'completionFlag' as const, scope, periodKind: kind, periodKey };
    if (readFlag(this.store, flag)) {
      return false;
    }

    this.store.set(flag, true);
    const count = this.counters.increment(scope);
    log('Completion recorded', describeScope(scope), { periodKey, spend, limit, count });
    return true;
  }
}
