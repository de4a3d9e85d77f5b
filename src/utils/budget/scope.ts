import { BudgetScope, CategoryRef, CategoryScope, OverallScope } from '../../data/budget/types';

export function overallScope(accountId: string): OverallScope {
  return { kind: 'overall', accountId };
}

export function normalizeCategoryName(name: string): string {
  return name.trim();
}

export function categoryScope(accountId: string, category: CategoryRef): CategoryScope {
  return { kind: 'category', accountId, category: { id: category.id, name: normalizeCategoryName(category.name) } };
}

/**
 * Categories match by identifier when both carry one, otherwise by normalized name
 */
export function sameCategory(a: CategoryRef, b: CategoryRef): boolean {
  if (a.id !== null && b.id !== null) {
    return a.id === b.id;
  }
  return normalizeCategoryName(a.name) === normalizeCategoryName(b.name);
}

export function sameScope(a: BudgetScope, b: BudgetScope): boolean {
  if (a.accountId !== b.accountId) {
    return false;
  }
  if (a.kind === 'overall' || b.kind === 'overall') {
    return a.kind === b.kind;
  }
  return sameCategory(a.category, b.category);
}

/**
 * Short human-readable label used in log lines
 */
export function describeScope(scope: BudgetScope): string {
  return scope.kind === 'overall' ? `overall:${scope.accountId}` : `category:${scope.accountId}:${scope.category.name}`;
}
