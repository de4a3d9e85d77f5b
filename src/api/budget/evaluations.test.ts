import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MemoryStore } from '../../utils/store/memoryStore';
import { createMockRecord, createMockRequest, createMockServices, GROCERIES, RecordingDispatcher } from '../../utils/test/mockData';
import { evaluateThreshold, observeBudget, recordCompletion } from './evaluations';
import { setBudgetServices } from './services';

describe('Budget evaluation API', () => {
  let store: MemoryStore;
  let dispatcher: RecordingDispatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T10:00:00Z'));
    store = new MemoryStore();
    dispatcher = new RecordingDispatcher();
    setBudgetServices(
      createMockServices({
        store,
        dispatcher,
        categories: [GROCERIES],
        records: [
          createMockRecord({ amount: 450, date: new Date('2024-01-05T00:00:00Z'), category: GROCERIES }),
          createMockRecord({ amount: 100, date: new Date('2024-01-09T00:00:00Z') }),
        ],
      }),
    );
  });

  afterEach(() => {
    setBudgetServices(null);
    vi.useRealTimers();
  });

  describe('evaluateThreshold', () => {
    it('should return the due threshold with its notice for the active period', () => {
      const request = createMockRequest({ params: { accountId: 'acc-1' }, body: { spend: 85, limit: 100 } });

      const result = evaluateThreshold(request);

      expect(result.periodKey).toBe('202401');
      expect(result.threshold).toBe(80);
      expect(result.notice).toEqual(
        expect.objectContaining({
          accountId: 'acc-1',
          threshold: 80,
          title: 'Budget Update',
          body: "You've reached 80% of this month's budget.",
        }),
      );
    });

    it('should return no threshold when it was already announced', () => {
      const request = createMockRequest({
        params: { accountId: 'acc-1' },
        body: { spend: 85, limit: 100, category: 'Groceries', periodKey: '202312' },
      });
      evaluateThreshold(request);

      expect(evaluateThreshold(request)).toEqual({
        scope: { kind: 'category', accountId: 'acc-1', category: GROCERIES },
        periodKey: '202312',
        threshold: null,
        notice: null,
      });
      expect(store.keys()).toEqual(['budget_cat_notified_acc-1_202312_Groceries_80']);
    });

    it('should reject a malformed period key', () => {
      const request = createMockRequest({
        params: { accountId: 'acc-1' },
        body: { spend: 85, limit: 100, periodKey: 'Jan' },
      });

      expect(() => evaluateThreshold(request)).toThrow('Period key must be in YYYYMM format');
    });

    it('should reject a missing spend', () => {
      const request = createMockRequest({ params: { accountId: 'acc-1' }, body: { limit: 100 } });

      expect(() => evaluateThreshold(request)).toThrow('Spend must be a number');
    });
  });

  describe('recordCompletion', () => {
    it('should credit a closed window within budget once', () => {
      const request = createMockRequest({
        params: { accountId: 'acc-1' },
        body: { spend: 90, limit: 100, start: '2023-12-01', end: '2023-12-31' },
      });

      expect(recordCompletion(request)).toEqual({
        scope: { kind: 'overall', accountId: 'acc-1' },
        recorded: true,
        overallCompletions: 1,
        categoryCompletions: 0,
        total: 1,
      });
      expect(recordCompletion(request).recorded).toBe(false);
    });

    it('should not credit the active window before it ends', () => {
      const request = createMockRequest({ params: { accountId: 'acc-1' }, body: { spend: 10, limit: 100 } });

      expect(recordCompletion(request).recorded).toBe(false);
    });

    it('should reject a window that ends before it starts', () => {
      const request = createMockRequest({
        params: { accountId: 'acc-1' },
        body: { spend: 10, limit: 100, start: '2023-12-31', end: '2023-12-01' },
      });

      expect(() => recordCompletion(request)).toThrow('End must not be before start');
    });
  });

  describe('observeBudget', () => {
    it('should dispatch the notices raised by the observation', async () => {
      store.set({ type: 'overallLimit', accountId: 'acc-1' }, 1000);
      store.set({ type: 'categoryLimitById', accountId: 'acc-1', categoryId: 'cat-groceries' }, 500);

      const result = await observeBudget(createMockRequest({ params: { accountId: 'acc-1' } }));

      expect(result.scopes.map((scope) => [scope.spend, scope.threshold])).toEqual([
        [550, 50],
        [450, 80],
      ]);
      expect(dispatcher.notices.map((notice) => notice.body)).toEqual([
        "You've reached 50% of this month's budget.",
        "You've reached 80% of Groceries budget.",
      ]);
      expect(result.dispatch).toEqual({ delivered: result.notices.map((notice) => notice.id), failed: [] });
    });
  });
});
