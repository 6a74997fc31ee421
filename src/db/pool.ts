import postgres from 'postgres';
import { config } from '../config.js';

// One writer; the importer never issues queries in parallel.
export const sql = postgres(config.DATABASE_URL, {
  max: 1,
  connect_timeout: 10,
  onnotice: () => {},
});
