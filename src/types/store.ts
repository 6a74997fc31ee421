import type {
  CategoricalValue,
  CategoryTable,
  NeighborhoodBoundary,
  NewLocation,
} from './location.js';

/**
 * Write surface the importer needs from the database.
 * No transactional guarantees are assumed.
 */
export interface ImportStore {
  countLocations(): Promise<number>;
  countNeighborhoods(): Promise<number>;
  deleteAllLocations(): Promise<void>;
  deleteAllWatersheds(): Promise<void>;
  /** Bulk insert. Fails on a name that already exists. */
  insertCategoricalValues(table: CategoryTable, names: string[]): Promise<void>;
  fetchCategoricalValues(table: CategoryTable): Promise<CategoricalValue[]>;
  /** Bulk insert. Fails on a name or slug that already exists. */
  insertLocations(locations: NewLocation[]): Promise<void>;
  fetchNeighborhoods(): Promise<NeighborhoodBoundary[]>;
}
