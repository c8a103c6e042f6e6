/**
 * Load environment variables FIRST before anything else
 * This file must be imported before any other modules
 */
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from './utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '../../');
const backendDir = join(__dirname, '../');

const log = createLogger('Env');

const envName = (process.env.PILLBOX_ENV || process.env.NODE_ENV || 'development').trim();
const candidateFiles = [
  `.env.${envName}`,
  `.env.${envName}.local`
];

const searchDirs = [rootDir, backendDir];
const loadedFiles: string[] = [];

for (const candidate of candidateFiles) {
  for (const dir of searchDirs) {
    const fullPath = join(dir, candidate);
    if (existsSync(fullPath) && !loadedFiles.includes(fullPath)) {
      dotenv.config({ path: fullPath, override: true });
      loadedFiles.push(fullPath);
    }
  }
}

if (loadedFiles.length > 0) {
  log.info(`Loaded environment files: ${loadedFiles.join(', ')}`);
} else {
  log.warn(`No environment files found. Expected one of ${candidateFiles.join(', ')}`);
}

const isTestEnv = process.env.NODE_ENV === 'test';

// Tests never reach a real database; the pool only needs a well-formed URL.
if (isTestEnv) {
  process.env.DATABASE_URL ??= 'postgres://localhost:5432/pillbox_test';
}

interface RequiredSetting {
  key: string;
  description: string;
}

const requiredSettings: RequiredSetting[] = [
  { key: 'DATABASE_URL', description: 'Postgres connection string' }
];

const missing = requiredSettings
  .filter(({ key }) => !process.env[key])
  .map(({ key, description }) => `${key} (${description})`);

if (missing.length > 0) {
  log.error(`Missing required environment variables:\n  - ${missing.join('\n  - ')}`);
  log.error('Set the variables above before starting the backend.');
  process.exit(1);
}
