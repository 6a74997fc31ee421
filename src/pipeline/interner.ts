import type { CategoryTable, RawRow } from '../types/location.js';
import type { ImportStore } from '../types/store.js';
import type { Reporter } from '../utils/reporter.js';

export const CATEGORY_LABELS: Record<CategoryTable, string> = {
  building_uses: 'BuildingUse',
  watersheds: 'Watershed',
};

/** Uppercase the first letter of every word and lowercase the rest. */
export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{Ll})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

/**
 * Title-case a category name unless it already starts with a capital
 * (leaves acronyms and proper-cased names alone).
 */
export function normalizeCategoryName(value: string): string {
  return /^\p{Ll}/u.test(value) ? titleCase(value) : value;
}

/** Distinct, non-empty, normalized values of one column, sorted. */
export function distinctCategoryValues(rows: Iterable<RawRow>, field: string): string[] {
  const values = new Set<string>();
  for (const row of rows) {
    const value = row[field];
    if (value == null) continue;
    const normalized = normalizeCategoryName(value);
    if (normalized) values.add(normalized);
  }
  return [...values].sort();
}

export interface InternOptions {
  store: ImportStore;
  reporter: Reporter;
  dryRun?: boolean;
}

/**
 * Insert one reference-table row per distinct value of `field`.
 * Meant for an empty table: existing names make the store raise a
 * unique violation.
 */
export async function internColumn(
  rows: readonly RawRow[],
  field: string,
  table: CategoryTable,
  { store, reporter, dryRun = false }: InternOptions,
): Promise<string[]> {
  reporter.info(`Extracting ${field} values...`);
  const values = distinctCategoryValues(rows, field);

  reporter.info(`Found ${values.length} distinct, non-empty ${field} values:`);
  for (const value of values) {
    reporter.info(`    "${value}"`);
  }

  reporter.info(`Inserting ${values.length} ${CATEGORY_LABELS[table]} records...`);
  if (!dryRun && values.length > 0) {
    await store.insertCategoricalValues(table, values);
  }

  return values;
}
