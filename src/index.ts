#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { sql } from './db/pool.js';
import { createPostgresStore } from './db/queries.js';
import { Importer } from './pipeline/importer.js';
import { logger } from './utils/logger.js';

const USAGE = 'Usage: roof-import <file.csv> [--overwrite] [--dry-run] [--quiet]';

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      overwrite: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      quiet: { type: 'boolean', short: 'q', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const [file] = positionals;
  if (!file || positionals.length > 1) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const importer = new Importer(createPostgresStore(sql), {
    file,
    overwrite: values.overwrite,
    dryRun: values['dry-run'],
    quiet: values.quiet,
  });

  try {
    const summary = await importer.run();
    if (!values.quiet) logger.info(summary, 'Import finished');
  } finally {
    await sql.end();
  }
}

main().catch((err) => {
  logger.fatal(err, 'Import failed');
  process.exit(1);
});
