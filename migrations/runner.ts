import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Sql } from 'postgres';
import { logger } from '../src/utils/logger.js';

const MIGRATIONS_DIR = path.dirname(fileURLToPath(import.meta.url));

/** Pending *.sql files in this directory, in name order. */
export function pendingMigrations(applied: ReadonlySet<string>, dir = MIGRATIONS_DIR): string[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql') && !applied.has(f))
    .sort();
}

export async function runMigrations(sql: Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;

  const applied = await sql<{ name: string }[]>`SELECT name FROM _migrations ORDER BY id`;
  const pending = pendingMigrations(new Set(applied.map((r) => r.name)));

  for (const file of pending) {
    const content = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf-8');
    logger.info({ file }, 'Applying migration');
    await sql.begin(async (tx) => {
      await tx.unsafe(content);
      await tx.unsafe('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    });
  }

  logger.info({ applied: pending.length }, 'Migrations up to date');
}
