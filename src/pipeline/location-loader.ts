import type { CategoricalValue, CategoryLookup, NewLocation, RawRow } from '../types/location.js';
import type { ImportStore } from '../types/store.js';
import type { Reporter } from '../utils/reporter.js';
import { slugify } from '../utils/slug.js';
import { CategoryLookupError } from './errors.js';
import { normalizeCategoryName } from './interner.js';
import type { NeighborhoodIndex } from './neighborhood-index.js';

/** Pre-fetched reference data the loader resolves rows against. */
export interface LocationLookups {
  buildingUses: CategoryLookup;
  watersheds: CategoryLookup;
  neighborhoods: NeighborhoodIndex;
}

export interface LoadLocationsOptions {
  store: ImportStore;
  reporter: Reporter;
  dryRun?: boolean;
}

export interface LoadLocationsResult {
  locations: NewLocation[];
  skipped: number;
}

export function toLookup(records: Iterable<CategoricalValue>): CategoryLookup {
  const lookup: CategoryLookup = new Map();
  for (const record of records) lookup.set(record.name, record);
  return lookup;
}

/**
 * Hands out unique names within one run by appending -1, -2, ...
 * Names already in the store are not considered.
 */
export class NameRegistry {
  private readonly used = new Set<string>();

  claim(name: string): string {
    let candidate = name;
    for (let i = 1; this.used.has(candidate); i++) {
      candidate = `${name}-${i}`;
    }
    this.used.add(candidate);
    return candidate;
  }
}

function lookupCategory(field: string, raw: string, lookup: CategoryLookup): CategoricalValue {
  const value = normalizeCategoryName(raw);
  const record = lookup.get(value);
  if (!record) {
    const choices = [...lookup.keys()].sort();
    throw new CategoryLookupError(
      field,
      value,
      choices,
      `"${value}" is not one of the available choices for ${field}; available choices: ${choices.join(', ')}`,
    );
  }
  return record;
}

/** Resolve a required categorical column. A blank value aborts the load. */
export function resolveCategory(row: RawRow, field: string, lookup: CategoryLookup): CategoricalValue {
  const raw = row[field] ?? null;
  if (raw === null) {
    throw new CategoryLookupError(
      field,
      null,
      [...lookup.keys()].sort(),
      `Expected a value for ${field} in ${JSON.stringify(row)}`,
    );
  }
  return lookupCategory(field, raw, lookup);
}

/** Resolve a nullable categorical column. */
export function resolveOptionalCategory(
  row: RawRow,
  field: string,
  lookup: CategoryLookup,
): CategoricalValue | null {
  const raw = row[field] ?? null;
  return raw === null ? null : lookupCategory(field, raw, lookup);
}

/** WKT point, longitude first. */
export function toWktPoint(longitude: string, latitude: string): string {
  return `POINT(${longitude} ${latitude})`;
}

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Plain decimal only: the raw string goes into the WKT as-is. */
function parseCoordinate(value: string | null): number | null {
  if (value === null || !DECIMAL_RE.test(value)) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Turn rows into locations and bulk insert them.
 * Rows without a name or without usable coordinates are skipped; a missing
 * or unknown building use aborts the load.
 */
export async function loadLocations(
  rows: readonly RawRow[],
  lookups: LocationLookups,
  { store, reporter, dryRun = false }: LoadLocationsOptions,
): Promise<LoadLocationsResult> {
  const locations: NewLocation[] = [];
  const names = new NameRegistry();
  const slugs = new NameRegistry();
  let skipped = 0;

  for (const row of rows) {
    const displayName = row['name'] ?? row['project'] ?? null;
    if (displayName === null) {
      reporter.warn(`Name (and project) not set for location: ${JSON.stringify(row)}; skipping`);
      skipped++;
      continue;
    }

    const name = names.claim(displayName);

    const buildingUse = resolveCategory(row, 'building_use', lookups.buildingUses);
    const watershed = resolveOptionalCategory(row, 'watershed', lookups.watersheds);

    const lonRaw = row['longitude'] ?? null;
    const latRaw = row['latitude'] ?? null;
    const longitude = parseCoordinate(lonRaw);
    const latitude = parseCoordinate(latRaw);
    if (lonRaw === null || latRaw === null || longitude === null || latitude === null) {
      reporter.warn(`Coordinates not set for location "${name}": POINT(${lonRaw} ${latRaw}); skipping`);
      skipped++;
      continue;
    }

    const neighborhood = lookups.neighborhoods.findContaining(longitude, latitude);

    locations.push({
      name,
      slug: slugs.claim(slugify(name)),
      point: toWktPoint(lonRaw, latRaw),
      buildingUseId: buildingUse.id,
      watershedId: watershed?.id ?? null,
      neighborhoodId: neighborhood?.id ?? null,
    });
  }

  reporter.info(`Creating ${locations.length} locations...`);
  if (!dryRun && locations.length > 0) {
    await store.insertLocations(locations);
  }

  return { locations, skipped };
}
