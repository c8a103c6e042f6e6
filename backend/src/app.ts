import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { getAppConfig } from './config.js';
import { registerRoutes } from './routes/registry.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('Http');

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function createApp(): Express {
  const app = express();
  const { corsOrigins } = getAppConfig();

  app.use(cors({ origin: corsOrigins, credentials: corsOrigins !== '*' }));
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Pillbox API is running' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  registerRoutes(app);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isMalformedJson(err)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (res.headersSent) {
      next(err);
      return;
    }
    log.error('Unhandled middleware error', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
