import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import db from './client.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export function readSchemaSql(): string {
  return readFileSync(join(__dirname, 'schema.sql'), 'utf8');
}

export async function bootstrapDatabase(): Promise<void> {
  await db.query(readSchemaSql());
}
