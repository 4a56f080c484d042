import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { createGlobalLimiter } from './middleware/globalLimiter.js';
import { createApiRouter, type ApiDeps } from './routes/api.js';
import logger from '@logger';

export interface AppOptions extends ApiDeps {
  corsOrigin: string;
  isProduction: boolean;
}

export function createApp(options: AppOptions) {
  const app = express();
  app.disable('x-powered-by');

  app.use(helmet());
  app.use(
    cors({
      origin: options.corsOrigin,
      methods: ['GET', 'POST'],
    }),
  );

  app.use(express.json({ limit: '256kb' }));
  app.use(createGlobalLimiter());

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'OK',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
    options.metrics
      .render()
      .then((body) => {
        res.set('Content-Type', options.metrics.contentType());
        res.send(body);
      })
      .catch(next);
  });

  app.use('/api', createApiRouter(options));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Not found',
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser rejects malformed JSON with a 400
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ success: false, code: 'INVALID_INPUT', error: 'Malformed JSON body' });
      return;
    }

    logger.error('[HTTP_ERROR] Unhandled error', { error: err instanceof Error ? err.message : err });
    const message = err instanceof Error ? err.message : 'Internal Server Error';

    res.status(500).json({
      success: false,
      error: message,
      ...(!options.isProduction && {
        stack: err instanceof Error ? err.stack : undefined,
      }),
    });
  });

  return app;
}
