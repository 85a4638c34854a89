/**
 * pipetrack API — express app factory.
 *
 * Everything the routes need is passed in, so tests can build an app over
 * an in-memory store and listen on an ephemeral port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { errorMessage, PipetrackError, ValidationError } from '@pipetrack/shared';
import { createRoutes, type RouteDeps } from './routes.js';

export type AppDeps = RouteDeps;

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use('/api', createRoutes(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  const log = deps.logger.child({ component: 'api' });

  // express recognises error middleware by its four parameters
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ success: false, error: err.message, issues: err.issues });
      return;
    }
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, error: 'Malformed JSON body' });
      return;
    }

    log.error('request failed', {
      method: req.method,
      path: req.path,
      error: errorMessage(err),
      code: err instanceof PipetrackError ? err.code : undefined,
    });
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}

export { createRoutes } from './routes.js';
export type { RouteDeps } from './routes.js';
export * from './schemas.js';
