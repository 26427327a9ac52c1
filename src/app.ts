import express, { Express, Request, Response, NextFunction } from 'express';
import packageJson from '../package.json';
import { createLedgerRouter } from './routes/ledger';
import { errorHandler, notFoundHandler } from './lib/errors';
import { formatAmount } from './lib/money';
import type { LedgerEngine } from './lib/ledger';
import type Decimal from 'decimal.js';
import { loggingMiddleware } from './middleware/logging';
import { getMetrics, incHttpRequest, observeHttpDuration } from './metrics';

export interface AppDeps {
  ledger: LedgerEngine;
  /** Shown on the root descriptor */
  defaultLimit: Decimal;
  timeZone: string;
}

/**
 * Create and configure Express application
 */
export function createApp({ ledger, defaultLimit, timeZone }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Structured logging middleware (adds req.id and req.log)
  app.use(loggingMiddleware);

  // Metrics middleware (track request duration and count)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - startTime) / 1000; // seconds
      const route = req.baseUrl + (req.route?.path ?? req.path);

      incHttpRequest(route, req.method, res.statusCode);
      observeHttpDuration(route, req.method, duration);
    });

    next();
  });

  // Metrics endpoint (no auth required for monitoring)
  app.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.set('Content-Type', 'text/plain');
      res.send(await getMetrics());
    } catch (error) {
      next(error);
    }
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Root endpoint with API documentation
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: packageJson.name,
      version: packageJson.version,
      description: packageJson.description,
      release_notes: packageJson.changelog.description,
      endpoints: {
        health: 'GET /health',
        metrics: 'GET /metrics',
        register: 'POST /users (body: { username, destination })',
        add_expense: 'POST /users/:username/expenses (body: { amount })',
        list_month: 'GET /users/:username/expenses',
        clear_month: 'DELETE /users/:username/expenses',
        remove_last: 'DELETE /users/:username/expenses/last',
        summary: 'GET /users/:username/summary',
        update_limit: 'PUT /users/:username/limit (body: { limit })',
        year_summary: 'GET /users/:username/year',
        destinations: 'GET /destinations',
      },
      config: {
        default_limit: formatAmount(defaultLimit),
        timezone: timeZone,
      },
    });
  });

  // Mount ledger routes
  app.use('/', createLedgerRouter(ledger));

  // 404 handler (must come before error handler)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
