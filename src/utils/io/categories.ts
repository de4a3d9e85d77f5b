import { CategoryRef } from '../../data/budget/types';
import { checkExists, load } from './io';
import { withPersistence } from './errors';

const FILE_NAME = 'categories';

export type StoredCategory = {
  id?: string | null;
  name: string;
  type?: string | null;
};

/**
 * Loads the expense categories from categories.json, sorted by name.
 * Category records are owned elsewhere; this file is only read.
 *
 * @example
 * ```typescript
 * // categories.json: [{ "id": "c-1", "name": "Groceries", "type": "expense" }, { "name": "Salary", "type": "income" }]
 * loadExpenseCategories(); // [{ id: 'c-1', name: 'Groceries' }]
 * ```
 */
export function loadExpenseCategories(): CategoryRef[] {
  return withPersistence(`Reading ${FILE_NAME}.json`, () => {
    if (!checkExists(`${FILE_NAME}.json`)) {
      return [];
    }
    return load<StoredCategory[]>(`${FILE_NAME}.json`)
      .filter((category) => (category.type ?? '').toLowerCase() === 'expense' && category.name)
      .map((category) => ({ id: category.id ?? null, name: category.name }))
      .sort((a, b) => a.name.localeCompare(b.name));
  });
}

/**
 * Finds a category by name among the expense categories, keeping its identifier when known
 */
export function resolveCategory(name: string, categories: CategoryRef[] = loadExpenseCategories()): CategoryRef {
  return categories.find((category) => category.name === name) ?? { id: null, name };
}
