export type CategoryRef = {
  // Stable identifier; null for categories created before identifiers existed
  id: string | null;
  name: string;
};

export type OverallScope = {
  kind: 'overall';
  accountId: string;
};

export type CategoryScope = {
  kind: 'category';
  accountId: string;
  category: CategoryRef;
};

export type BudgetScope = OverallScope | CategoryScope;

export type PeriodWindow = {
  start: Date;
  end: Date;
};

export type Threshold = 100 | 80 | 50;

export type MedalTier = 'bronze' | 'silver' | 'gold' | 'perfect';

export type MedalBreakdown = Record<MedalTier, number>;

export type CompletionCounts = {
  overallCompletions: number;
  categoryCompletions: number;
  total: number;
};

export type MedalCycle = {
  cycleStart: number;
  progress: number;
  currentMedal: MedalTier | null;
};

export type BudgetNotice = {
  id: string;
  accountId: string;
  scope: BudgetScope;
  threshold: Threshold;
  periodKey: string;
  title: string;
  body: string;
  createdAt: Date;
};

export type PaceSummary = {
  progress: number;
  remaining: number;
  daysElapsed: number;
  daysTotal: number;
  remainingDays: number;
  safeToSpendToday: number;
  recommendedSpendToDate: number;
  projectedSpend: number;
  trendingOver: boolean;
};

export type CategorySpend = {
  name: string;
  amount: number;
};
