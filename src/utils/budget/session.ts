import {
  BudgetNotice,
  BudgetScope,
  CategoryRef,
  CompletionCounts,
  MedalBreakdown,
  MedalCycle,
  PaceSummary,
  PeriodWindow,
  Threshold,
} from '../../data/budget/types';
import { TransactionLedger } from '../ledger/types';
import { debug } from '../log';
import { KeyValueStore } from '../store/types';
import { CompletionCounters } from './completion-counters';
import { CompletionRecorder } from './completion-recorder';
import { pruneFlags } from './flag-retention';
import { BudgetLimitStore } from './limit-store';
import { breakdown, medalCycle } from './medal-tally';
import { summarize } from './pace';
import { PeriodCalculator } from './period-calculator';
import { periodKeyOf } from './period-kind';
import { categoryScope, describeScope, overallScope } from './scope';
import { SpendAggregator } from './spend-aggregator';
import { ThresholdNotifier } from './threshold-notifier';

export type BudgetDependencies = {
  store: KeyValueStore;
  ledger: TransactionLedger;
  // Periods of flags to keep when observing; 0 disables pruning
  flagRetentionPeriods?: number;
};

export type ScopeStatus = {
  scope: BudgetScope;
  window: PeriodWindow;
  // false while the scope runs on the default calendar window
  windowStored: boolean;
  periodKey: string;
  limit: number;
  spend: number;
  pace: PaceSummary;
};

export type ScopeObservation = {
  scope: BudgetScope;
  spend: number;
  limit: number;
  periodKey: string;
  threshold: Threshold | null;
  completed: boolean;
};

export type ObservationResult = {
  accountId: string;
  scopes: ScopeObservation[];
  notices: BudgetNotice[];
  completionsRecorded: number;
  counters: CompletionCounts;
  medals: MedalBreakdown;
  cycle: MedalCycle;
  prunedFlags: number;
};

/**
 * Budget state of the selected account. Open one when an account is selected and drop it
 * when another is; nothing here is shared across accounts.
 */
export class BudgetSession {
  readonly periods: PeriodCalculator;
  readonly spending: SpendAggregator;
  readonly limits: BudgetLimitStore;
  readonly notifier: ThresholdNotifier;
  readonly counters: CompletionCounters;
  readonly recorder: CompletionRecorder;

  private constructor(
    readonly accountId: string,
    private readonly deps: BudgetDependencies,
  ) {
    this.periods = new PeriodCalculator(deps.store);
    this.spending = new SpendAggregator(deps.ledger);
    this.limits = new BudgetLimitStore(deps.store, this.periods);
    this.notifier = new ThresholdNotifier(deps.store);
    this.counters = new CompletionCounters(deps.store, accountId);
    this.recorder = new CompletionRecorder(deps.store, this.counters);
  }

  static open(accountId: string, deps: BudgetDependencies): BudgetSession {
    if (!accountId || accountId.trim() === '') {
      throw new Error('An account id is required to open a budget session');
    }
    return new BudgetSession(accountId, deps);
  }

  overall(): BudgetScope {
    return overallScope(this.accountId);
  }

  category(category: CategoryRef): BudgetScope {
    return categoryScope(this.accountId, category);
  }

  activeWindow(scope: BudgetScope): PeriodWindow {
    return this.periods.activeWindow(this.own(scope));
  }

  setWindow(scope: BudgetScope, start: Date, end?: Date): PeriodWindow {
    return this.periods.setWindow(this.own(scope), start, end);
  }

  shiftStartTowardEnd(scope: BudgetScope, start: Date): PeriodWindow {
    return this.periods.shiftStartTowardEnd(this.own(scope), start);
  }

  shiftEndTowardStart(scope: BudgetScope, end: Date): PeriodWindow {
    return this.periods.shiftEndTowardStart(this.own(scope), end);
  }

  spend(scope: BudgetScope, window: PeriodWindow = this.activeWindow(scope)): number {
    return this.spending.spend(this.own(scope), window);
  }

  getLimit(scope: BudgetScope): number {
    return this.limits.getLimit(this.own(scope));
  }

  setLimit(scope: BudgetScope, amount: number): void {
    this.limits.setLimit(this.own(scope), amount);
  }

  clearLimit(scope: BudgetScope): void {
    this.limits.clearLimit(this.own(scope));
  }

  evaluate(scope: BudgetScope, spend: number, limit: number, periodKey: string): Threshold | null {
    return this.notifier.evaluate(this.own(scope), spend, limit, periodKey);
  }

  tryRecordCompletion(scope: BudgetScope, window: PeriodWindow, spend: number, limit: number): boolean {
    return this.recorder.tryRecordCompletion(this.own(scope), window, spend, limit);
  }

  medals(): MedalBreakdown {
    return breakdown(this.counters.total);
  }

  medalCycle(): MedalCycle {
    return medalCycle(this.counters.total, this.counters.cycleStart);
  }

  restartMedalCycle(): MedalCycle {
    this.counters.restartCycle();
    return this.medalCycle();
  }

  pruneFlags(keepPeriods: number): number {
    return pruneFlags(this.deps.store, this.accountId, keepPeriods);
  }

  status(scope: BudgetScope): ScopeStatus {
    const window = this.activeWindow(scope);
    const limit = this.getLimit(scope);
    const spend = this.spend(scope, window);
    return {
      scope,
      window,
      windowStored: this.periods.hasPersistedWindow(scope),
      periodKey: periodKeyOf(window.end),
      limit,
      spend,
      pace: summarize(window, spend, limit),
    };
  }

  /**
   * Runs window → spend → threshold → completion for one scope
   */
  observeScope(scope: BudgetScope): { observation: ScopeObservation; notice: BudgetNotice | null } {
    const window = this.activeWindow(scope);
    const spend = this.spend(scope, window);
    const limit = this.getLimit(scope);
    const periodKey = periodKeyOf(window.end);

    const threshold = this.evaluate(scope, spend, limit, periodKey);
    const completed = this.tryRecordCompletion(scope, window, spend, limit);

    return {
      observation: { scope, spend, limit, periodKey, threshold, completed },
      notice: threshold === null ? null : this.notifier.composeNotice(scope, threshold, periodKey),
    };
  }

  /**
   * Evaluates the overall budget and every given category, then recomputes medal tiers.
   * Safe to repeat: flags stop a threshold or completion from being counted twice.
   */
  observe(categories: CategoryRef[]): ObservationResult {
    const scopes = [this.overall(), ...categories.map((category) => this.category(category))];
    const observations: ScopeObservation[] = [];
    const notices: BudgetNotice[] = [];

    for (const scope of scopes) {
      const { observation, notice } = this.observeScope(scope);
      observations.push(observation);
      if (notice) {
        notices.push(notice);
      }
    }

    const keepPeriods = this.deps.flagRetentionPeriods ?? 0;
    const prunedFlags = keepPeriods > 0 ? this.pruneFlags(keepPeriods) : 0;
    const completionsRecorded = observations.filter((observation) => observation.completed).length;

    debug('Observation finished', describeScope(this.overall()), {
      scopes: observations.length,
      notices: notices.length,
      completionsRecorded,
    });

    return {
      accountId: this.accountId,
      scopes: observations,
      notices,
      completionsRecorded,
      counters: this.counters.counts(),
      medals: this.medals(),
      cycle: this.medalCycle(),
      prunedFlags,
    };
  }

  private own(scope: BudgetScope): BudgetScope {
    if (scope.accountId !== this.accountId) {
      throw new Error(`Scope for account ${scope.accountId} used in session of account ${this.accountId}`);
    }
    return scope;
  }
}
