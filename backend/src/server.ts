// Load environment variables FIRST
import './env.js';

import { createServer } from 'http';
import { createApp } from './app.js';
import { getAppConfig } from './config.js';
import { bootstrapDatabase } from './db/bootstrap.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Server');

await bootstrapDatabase().catch((error: unknown) => {
  log.error('Database bootstrap failed', error);
});

const { port } = getAppConfig();
const server = createServer(createApp());

server.listen(port, '0.0.0.0', () => {
  log.info(`Server running on http://localhost:${port}`);
});
