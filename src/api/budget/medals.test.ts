import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryStore } from '../../utils/store/memoryStore';
import { createMockRequest, createMockServices } from '../../utils/test/mockData';
import { getMedalBreakdown, getMedals, restartMedalCycle } from './medals';
import { setBudgetServices } from './services';

describe('Medal API', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore({
      'budget_overall_completion_count_acc-1': 4,
      'budget_category_completion_count_acc-1': 7,
    });
    setBudgetServices(createMockServices({ store }));
  });

  afterEach(() => {
    setBudgetServices(null);
  });

  it('should return counters, medals and the current cycle', () => {
    expect(getMedals(createMockRequest({ params: { accountId: 'acc-1' } }))).toEqual({
      counters: { overallCompletions: 4, categoryCompletions: 7, total: 11 },
      medals: { bronze: 1, silver: 2, gold: 0, perfect: 0 },
      cycle: { cycleStart: 0, progress: 11, currentMedal: 'silver' },
    });
  });

  it('should break down a requested total', () => {
    const request = createMockRequest({ params: { accountId: 'acc-1' }, query: { total: '99' } });

    expect(getMedalBreakdown(request)).toEqual({ bronze: 4, silver: 9, gold: 1, perfect: 0 });
  });

  it('should require a valid total', () => {
    expect(() => getMedalBreakdown(createMockRequest({ params: { accountId: 'acc-1' } }))).toThrow('Total is required');
    expect(() =>
      getMedalBreakdown(createMockRequest({ params: { accountId: 'acc-1' }, query: { total: '-4' } })),
    ).toThrow('Total must be a non-negative integer');
  });

  it('should restart the cycle at the current total', () => {
    expect(restartMedalCycle(createMockRequest({ params: { accountId: 'acc-1' } }))).toEqual({
      cycleStart: 11,
      progress: 0,
      currentMedal: null,
    });
    expect(store.get({ type: 'medalCycleStart', accountId: 'acc-1' })).toBe(11);
  });
});
