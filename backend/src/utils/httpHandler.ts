import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { fromDatabaseError, HttpError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('Http');

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function toHttpError(error: unknown): HttpError | null {
  if (error instanceof HttpError) {
    return error;
  }
  return fromDatabaseError(error);
}

export function route(handler: AsyncHandler): RequestHandler {
  return async (req: Request, res: Response, _next: NextFunction): Promise<void> => {
    try {
      await handler(req, res);
    } catch (error) {
      const httpError = toHttpError(error);
      if (!httpError) {
        log.error(`${req.method} ${req.originalUrl} failed`, error);
        res.status(500).json({ error: 'Internal server error' });
        return;
      }
      if (httpError.status >= 500) {
        log.error(httpError.message, httpError);
      } else if (httpError !== error) {
        log.warn(`${req.method} ${req.originalUrl} rejected by database`, httpError.details);
      }
      res.status(httpError.status).json(httpError.toBody());
    }
  };
}
