import fs from 'node:fs';
import type { Readable } from 'node:stream';
import { parse } from 'csv-parse';
import type { RawRow } from '../types/location.js';
import { normalizeHeaders } from './field-normalizer.js';

function cleanValue(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/** Build a row from one record. Later columns overwrite earlier ones of the same name. */
export function toRawRow(fields: (string | null)[], record: readonly string[]): RawRow {
  const row: RawRow = {};
  fields.forEach((field, i) => {
    if (field === null) return;
    row[field] = cleanValue(record[i]);
  });
  return row;
}

/**
 * Parse CSV text or a byte stream into rows keyed by normalized field name.
 * The first record is the header row.
 */
export async function* readRows(source: string | Readable): AsyncGenerator<RawRow> {
  const options = {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  };
  const parser = typeof source === 'string' ? parse(source, options) : parse(options);
  if (typeof source !== 'string') {
    // pipe() does not forward source errors (e.g. ENOENT)
    source.on('error', (err) => parser.destroy(err));
    source.pipe(parser);
  }

  let fields: (string | null)[] | null = null;

  try {
    for await (const record of parser) {
      const values: string[] = record;
      if (fields === null) {
        fields = normalizeHeaders(values);
        continue;
      }
      yield toRawRow(fields, values);
    }
  } finally {
    // The parser is torn down on a throw or an early return; release the file too
    if (typeof source !== 'string') source.destroy();
  }
}

export function readRowsFromFile(filePath: string): AsyncGenerator<RawRow> {
  return readRows(fs.createReadStream(filePath));
}
