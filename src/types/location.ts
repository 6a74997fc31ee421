import type { MultiPolygon, Polygon } from 'geojson';

/** One CSV record keyed by normalized field name. Blank values are null. */
export type RawRow = Record<string, string | null>;

/** Reference tables filled by interning a CSV column. */
export type CategoryTable = 'building_uses' | 'watersheds';

/** A BuildingUse or Watershed row. */
export interface CategoricalValue {
  id: number;
  name: string;
}

/** name -> record, built from a reference table before locations are loaded */
export type CategoryLookup = Map<string, CategoricalValue>;

export interface NeighborhoodBoundary {
  id: number;
  name: string;
  boundary: Polygon | MultiPolygon;
}

/** A location ready for bulk insert. */
export interface NewLocation {
  name: string;
  slug: string;
  /** WKT, longitude first, e.g. 'POINT(-122.6 45.5)' */
  point: string;
  buildingUseId: number;
  watershedId: number | null;
  neighborhoodId: number | null;
}
