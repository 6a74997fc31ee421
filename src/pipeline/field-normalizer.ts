import { FieldNameError } from './errors.js';

/**
 * Survey spreadsheet headers -> field names.
 * An empty string drops the column entirely.
 */
export const FIELD_NAME_MAP: Readonly<Record<string, string>> = {
  'Name in BES Reports': 'name',
  'Project': 'project',
  'Address': '',
  'Address (Obscured)': '',
  'Address_Clean': '',
  'Watershed': 'watershed',
  'Building Use': 'building_use',
  'Solar over Ecoroof': '',
  'Type': '',
  'Year': 'year_built',
  'Size (sf)': 'square_footage',
  'Number': '',
  'Latitude(Non Obscured)': 'latitude',
  'Longitude (Non Obscured)': 'longitude',
  'Confidence (Non Obscured)': 'confidence',
  'Latitude': 'latitude_obscured',
  'Longitude': 'longitude_obscured',
  'Confidence': 'confidence_obscured',
  'Depth': '',
  'Cost': '',
  'Composition': '',
  'Irrigation': '',
  'Drainage': '',
  'Plants': '',
  'Maintenance': '',
  'Contractor': '',
};

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

/** Lowercase, strip punctuation, and join words with underscores. */
export function deriveFieldName(header: string): string {
  return header
    .toLowerCase()
    .replace(/[^a-z0-9_\s]/g, '')
    .replace(/\s+/g, '_');
}

/**
 * Map a raw header to its field name. Returns '' for a dropped column.
 * Throws FieldNameError when the derived name is not an identifier.
 */
export function normalizeFieldName(header: string): string {
  if (Object.hasOwn(FIELD_NAME_MAP, header)) {
    return FIELD_NAME_MAP[header] ?? '';
  }

  const name = deriveFieldName(header);
  if (!isValidIdentifier(name)) {
    throw new FieldNameError(header, name);
  }
  return name;
}

/**
 * Normalize a whole header row. Dropped columns come back as null.
 * Duplicate names are not detected; the later column wins when rows are built.
 */
export function normalizeHeaders(headers: readonly string[]): (string | null)[] {
  return headers.map((header) => normalizeFieldName(header) || null);
}
