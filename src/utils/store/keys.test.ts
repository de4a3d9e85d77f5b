import { describe, it, expect } from 'vitest';
import { categoryScope, overallScope } from '../budget/scope';
import { parseFlagKey, parseWindowEndKey, serializeKey } from './keys';

const overall = overallScope('acc-1');
const groceries = categoryScope('acc-1', { id: 'cat-9', name: 'Groceries' });

describe('Store keys', () => {
  describe('serializeKey', () => {
    it('should serialize limit keys', () => {
      expect(serializeKey({ type: 'overallLimit', accountId: 'acc-1' })).toBe('budget_limit_acc-1');
      expect(serializeKey({ type: 'categoryLimitById', accountId: 'acc-1', categoryId: 'cat-9' })).toBe(
        'budget_limit_cat_acc-1_id_cat-9',
      );
      expect(serializeKey({ type: 'categoryLimitByName', accountId: 'acc-1', categoryName: 'Groceries' })).toBe(
        'budget_limit_cat_acc-1_Groceries',
      );
    });

    it('should serialize window bounds by scope kind', () => {
      expect(serializeKey({ type: 'windowBound', scope: overall, bound: 'start', periodKind: 'monthly' })).toBe(
        'budget_period_start_acc-1_monthly',
      );
      expect(serializeKey({ type: 'windowBound', scope: groceries, bound: 'end', periodKind: 'monthly' })).toBe(
        'budget_cat_end_monthly_acc-1_Groceries',
      );
    });

    it('should serialize notification and completion flags', () => {
      expect(serializeKey({ type: 'notificationFlag', scope: overall, periodKey: '202401', threshold: 80 })).toBe(
        'budget_notified_acc-1_202401_80',
      );
      expect(serializeKey({ type: 'notificationFlag', scope: groceries, periodKey: '202401', threshold: 50 })).toBe(
        'budget_cat_notified_acc-1_202401_Groceries_50',
      );
      expect(serializeKey({ type: 'completionFlag', scope: overall, periodKind: 'monthly', periodKey: '202401' })).toBe(
        'budget_completion_recorded_acc-1_monthly_202401',
      );
      expect(serializeKey({ type: 'completionFlag', scope: groceries, periodKind: 'monthly', periodKey: '202401' })).toBe(
        'budget_cat_completion_recorded_acc-1_Groceries_monthly_202401',
      );
    });

    it('should serialize counters and the medal cycle start', () => {
      expect(serializeKey({ type: 'completionCount', accountId: 'acc-1', counter: 'category' })).toBe(
        'budget_category_completion_count_acc-1',
      );
      expect(serializeKey({ type: 'medalCycleStart', accountId: 'acc-1' })).toBe('medal_cycle_start_total_acc-1');
    });
  });

  it('should serialize trimmed category names', () => {
    const spaced = { kind: 'category' as const, accountId: 'acc-1', category: { id: null, name: ' Food ' } };

    expect(serializeKey({ type: 'categoryLimitByName', accountId: 'acc-1', categoryName: 'Food ' })).toBe(
      'budget_limit_cat_acc-1_Food',
    );
    expect(serializeKey({ type: 'windowBound', scope: spaced, bound: 'start', periodKind: 'monthly' })).toBe(
      'budget_cat_start_monthly_acc-1_Food',
    );
    expect(serializeKey({ type: 'notificationFlag', scope: spaced, periodKey: '202401', threshold: 80 })).toBe(
      'budget_cat_notified_acc-1_202401_Food_80',
    );
    expect(serializeKey({ type: 'completionFlag', scope: spaced, periodKind: 'monthly', periodKey: '202401' })).toBe(
      'budget_cat_completion_recorded_acc-1_Food_monthly_202401',
    );
  });

  describe('parseFlagKey', () => {
    it('should recover an overall notification flag', () => {
      expect(parseFlagKey('budget_notified_acc-1_202401_100')).toEqual({
        type: 'notificationFlag',
        scope: overall,
        periodKey: '202401',
        threshold: 100,
      });
    });

    it('should recover a category completion flag with a name containing underscores', () => {
      expect(parseFlagKey('budget_cat_completion_recorded_acc-1_Eating_Out_monthly_202312')).toEqual({
        type: 'completionFlag',
        scope: categoryScope('acc-1', { id: null, name: 'Eating_Out' }),
        periodKind: 'monthly',
        periodKey: '202312',
      });
    });

    it('should reverse serializeKey for a category notification flag', () => {
      const raw = serializeKey({ type: 'notificationFlag', scope: groceries, periodKey: '202402', threshold: 80 });
      const parsed = parseFlagKey(raw);
      expect(parsed).not.toBeNull();
      expect(parsed === null ? null : serializeKey(parsed)).toBe(raw);
    });

    it('should return null for keys that are not flags', () => {
      expect(parseFlagKey('budget_limit_acc-1')).toBeNull();
      expect(parseFlagKey('budget_notified_acc-1_202401_75')).toBeNull();
      expect(parseFlagKey('budget_completion_recorded_acc-1_weekly_202401')).toBeNull();
    });
  });

  describe('parseWindowEndKey', () => {
    it('should parse overall and category window ends', () => {
      expect(parseWindowEndKey('budget_period_end_acc-1_monthly')).toEqual({
        type: 'windowBound',
        scope: overall,
        bound: 'end',
        periodKind: 'monthly',
      });
      expect(parseWindowEndKey('budget_cat_end_monthly_acc-1_Dining Out')).toEqual({
        type: 'windowBound',
        scope: categoryScope('acc-1', { id: null, name: 'Dining Out' }),
        bound: 'end',
        periodKind: 'monthly',
      });
    });

    it('should ignore start bounds and unknown kinds', () => {
      expect(parseWindowEndKey('budget_period_start_acc-1_monthly')).toBeNull();
      expect(parseWindowEndKey('budget_period_end_acc-1_weekly')).toBeNull();
      expect(parseWindowEndKey('budget_limit_acc-1')).toBeNull();
    });
  });
});
