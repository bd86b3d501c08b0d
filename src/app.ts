import express, { Application, NextFunction, Request, Response } from 'express';
import { getSupportedFormats } from './converter.js';
import { createApiRoutes, sendError } from './routes/api.js';
import { knownSystems } from './skills.js';
import type { ConverterConfig } from './config.js';

// Raw JSON bodies carry the text plus a little envelope
const BODY_OVERHEAD = 64 * 1024;

function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Create and configure the Express application
 */
export function createApp(config: ConverterConfig): Application {
  const app = express();

  // Middleware
  app.use(express.json({ limit: config.maxFileSize + BODY_OVERHEAD }));

  // API routes
  app.use('/api', createApiRoutes(config));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      formats: getSupportedFormats(),
      systems: knownSystems(),
      validation: config.enableValidation,
      strict: config.strictMode
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'NotFound', message: 'Not found' });
  });

  // Body parser failures (bad JSON, too large) carry their own status
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      const message = err instanceof Error ? err.message : 'Bad request';
      res.status(status).json({ error: 'BadRequest', message });
      return;
    }
    sendError(res, err);
  });

  return app;
}
