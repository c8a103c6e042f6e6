import { afterEach, beforeEach, vi } from 'vitest';
import { __setClockForTests } from './src/utils/clock.js';

// Calendar-day arithmetic runs in local time; pin it so dates read back from
// the database land on the same day in every environment.
process.env.TZ = 'UTC';
process.env.NODE_ENV = 'test';

const settingsSnapshot = { ...process.env };

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (!(key in settingsSnapshot)) delete process.env[key];
  }
  Object.assign(process.env, settingsSnapshot);
});

afterEach(() => {
  __setClockForTests(null);
  vi.restoreAllMocks();
});
