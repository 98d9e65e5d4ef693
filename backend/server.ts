import express, { type ErrorRequestHandler, type Express } from 'express';
import cors from 'cors';
import * as dotenv from 'dotenv';
import morgan from 'morgan';

import { loadConfig, type AppConfig } from './config';
import { createPool, createStore, type QueryRunner } from './db';
import { AppError, createErrorResponse, NotFoundError } from './errors';
import { createRideRouter } from './rideRoutes';

export interface AppDeps {
  config: AppConfig;
  store: QueryRunner;
  now?: () => Date;
}

/*
  Maps AppError subclasses to their status; anything else is a 500 with the
  error name and message attached outside production.
*/
function errorHandler(config: AppConfig): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof AppError) {
      if (error.status >= 500) {
        console.error(`${req.method} ${req.originalUrl} failed:`, error, error.cause);
      }
      res.status(error.status).json(createErrorResponse(error.message, error.code, error.details));
      return;
    }

    console.error(`${req.method} ${req.originalUrl} failed:`, error);
    const details =
      config.NODE_ENV !== 'production' && error instanceof Error
        ? { name: error.name, message: error.message }
        : undefined;
    res.status(500).json(createErrorResponse('Internal server error', 'INTERNAL_SERVER_ERROR', details));
  };
}

export function createApp({ config, store, now = () => new Date() }: AppDeps): Express {
  const app = express();

  app.use(cors({
    origin: config.FRONTEND_URL,
    credentials: true,
  }));

  app.use(morgan(config.LOG_FORMAT, { skip: () => config.NODE_ENV === 'test' }));

  // ===== RIDE ENDPOINTS =====

  app.use('/api/rides', createRideRouter({ store, config, now }));

  // ===== HEALTH CHECK =====

  /*
    Health check endpoint
    Returns server status and database connectivity
  */
  app.get('/api/health', async (_req, res) => {
    try {
      await store.query('SELECT 1');
      res.json({
        status: 'ok',
        timestamp: now().toISOString(),
        database: 'connected'
      });
    } catch (error) {
      console.error('Health check failed:', error);
      res.status(500).json({
        status: 'error',
        timestamp: now().toISOString(),
        database: 'disconnected'
      });
    }
  });

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  app.use(errorHandler(config));

  return app;
}

export function startServer(): void {
  dotenv.config();
  const config = loadConfig();
  const pool = createPool(config);
  const store = createStore({ query: (text, values) => pool.query(text, values) });
  const app = createApp({ config, store });

  const server = app.listen(config.PORT, '0.0.0.0', () => {
    console.log(`Server running on port ${config.PORT} and listening on 0.0.0.0`);
    console.log(`Environment: ${config.NODE_ENV}`);
    console.log(`Database connection: ${config.DATABASE_URL ? 'Using DATABASE_URL' : 'Using individual DB params'}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Error closing database pool:', error);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  startServer();
}
