import type { Sql } from 'postgres';
import type {
  CategoricalValue,
  CategoryTable,
  NeighborhoodBoundary,
  NewLocation,
} from '../types/location.js';
import type { ImportStore } from '../types/store.js';

/** ImportStore backed by PostgreSQL + PostGIS. Points are stored in SRID 4326. */
export function createPostgresStore(sql: Sql): ImportStore {
  return {
    async countLocations() {
      const [row] = await sql<{ count: number }[]>`SELECT count(*)::int AS count FROM locations`;
      return row?.count ?? 0;
    },

    async countNeighborhoods() {
      const [row] = await sql<{ count: number }[]>`SELECT count(*)::int AS count FROM neighborhoods`;
      return row?.count ?? 0;
    },

    async deleteAllLocations() {
      await sql`DELETE FROM locations`;
    },

    async deleteAllWatersheds() {
      await sql`DELETE FROM watersheds`;
    },

    async insertCategoricalValues(table: CategoryTable, names: string[]) {
      if (names.length === 0) return;
      await sql`
        INSERT INTO ${sql(table)} ${sql(names.map((name) => ({ name })), 'name')}
      `;
    },

    async fetchCategoricalValues(table: CategoryTable) {
      return sql<CategoricalValue[]>`
        SELECT id, name FROM ${sql(table)} ORDER BY name
      `;
    },

    async insertLocations(locations: NewLocation[]) {
      if (locations.length === 0) return;
      await sql`
        INSERT INTO locations (name, slug, point, building_use_id, watershed_id, neighborhood_id)
        SELECT t.name, t.slug, ST_GeomFromText(t.point, 4326), t.building_use_id, t.watershed_id, t.neighborhood_id
        FROM unnest(
          ${locations.map((l) => l.name)}::text[],
          ${locations.map((l) => l.slug)}::text[],
          ${locations.map((l) => l.point)}::text[],
          ${locations.map((l) => l.buildingUseId)}::int[],
          ${locations.map((l) => l.watershedId)}::int[],
          ${locations.map((l) => l.neighborhoodId)}::int[]
        ) AS t(name, slug, point, building_use_id, watershed_id, neighborhood_id)
      `;
    },

    async fetchNeighborhoods() {
      return sql<NeighborhoodBoundary[]>`
        SELECT id, name, ST_AsGeoJSON(boundary)::json AS boundary
        FROM neighborhoods
        ORDER BY id
      `;
    },
  };
}
