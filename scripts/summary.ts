/**
 * Print a summary of the imported survey data.
 */
import { sql } from '../src/db/pool.js';

const [counts] = await sql<{ locations: number; building_uses: number; watersheds: number; neighborhoods: number }[]>`
  SELECT
    (SELECT count(*)::int FROM locations) AS locations,
    (SELECT count(*)::int FROM building_uses) AS building_uses,
    (SELECT count(*)::int FROM watersheds) AS watersheds,
    (SELECT count(*)::int FROM neighborhoods) AS neighborhoods
`;
console.log('=== Table Counts ===');
for (const [table, count] of Object.entries(counts ?? {})) console.log(`  ${table}: ${count}`);

const byUse = await sql<{ name: string; count: number }[]>`
  SELECT b.name, count(l.id)::int AS count
  FROM building_uses b LEFT JOIN locations l ON l.building_use_id = b.id
  GROUP BY b.name ORDER BY count DESC, b.name
`;
console.log('\n=== Locations by Building Use ===');
for (const r of byUse) console.log(`  ${r.name}: ${r.count}`);

const byNeighborhood = await sql<{ name: string | null; count: number }[]>`
  SELECT n.name, count(*)::int AS count
  FROM locations l LEFT JOIN neighborhoods n ON n.id = l.neighborhood_id
  GROUP BY n.name ORDER BY count DESC
`;
console.log('\n=== Locations by Neighborhood ===');
for (const r of byNeighborhood) console.log(`  ${r.name ?? '(none)'}: ${r.count}`);

await sql.end();
