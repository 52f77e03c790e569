/**
 * Trust Radar API Server
 * Express-based REST API around the discovery engine
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import './types.js'; // Augments Express.Request with requestId
import cors from 'cors';
import { randomUUID } from 'crypto';
import { createHealthRouter } from './routes/health.js';
import { createDiscoverRouter, DISCOVER_REQUEST_TIMEOUT_MS } from './routes/discover.js';
import { closePool } from '../core/http-fetch.js';

export interface ServerConfig {
  port?: number;
  corsOrigins?: string[];
}

export function createApp(config: ServerConfig = {}): Express {
  const app = express();

  // Every request gets an id so errors and logs are traceable
  app.use((req: Request, res: Response, next: NextFunction) => {
    req.requestId = randomUUID();
    res.setHeader('X-Request-Id', req.requestId);
    next();
  });

  // Discovery runs fetch up to a few dozen pages; cap the whole request
  app.use((req: Request, res: Response, next: NextFunction) => {
    const timeoutMs = req.path.startsWith('/v1/discover') ? DISCOVER_REQUEST_TIMEOUT_MS : 30_000;
    res.setTimeout(timeoutMs, () => {
      if (!res.headersSent) {
        res.status(504).json({
          success: false,
          error: { type: 'timeout', message: `Request timed out after ${timeoutMs / 1000}s` },
          requestId: req.requestId,
        });
      }
    });
    next();
  });

  // SECURITY: Limit request body size
  app.use(express.json({ limit: '100kb' }));

  const envOrigins = process.env.CORS_ORIGINS ? process.env.CORS_ORIGINS.split(',').map(s => s.trim()) : [];
  const defaultOrigins = process.env.NODE_ENV !== 'production' ? ['http://localhost:3000', 'http://localhost:5173'] : [];
  app.use(cors({
    origin: config.corsOrigins ?? [...new Set([...defaultOrigins, ...envOrigins])],
  }));

  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");
    next();
  });

  // Malformed JSON bodies
  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        success: false,
        error: { type: 'invalid_request', message: 'Malformed JSON in request body' },
        requestId: req.requestId,
      });
      return;
    }
    next(err);
  });

  app.use(createHealthRouter());
  app.use(createDiscoverRouter());

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: { type: 'not_found', message: `Route not found: ${req.method} ${req.path}` },
      requestId: req.requestId,
    });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    if (res.headersSent) return;

    res.status(500).json({
      success: false,
      error: {
        type: 'internal_error',
        message: process.env.NODE_ENV === 'production'
          ? 'An unexpected error occurred'
          : err.message || 'An unexpected error occurred',
      },
      requestId: req.requestId,
    });
  });

  return app;
}

export function startServer(config: ServerConfig = {}): void {
  const app = createApp(config);
  const port = config.port || parseInt(process.env.PORT || '3000', 10);

  const server = app.listen(port, () => {
    console.log(`Trust Radar API listening on port ${port}`);
    console.log(`Health check: http://localhost:${port}/health`);
    console.log(`Discover: POST http://localhost:${port}/v1/discover`);
  });

  const shutdown = () => {
    console.log('\nShutting down gracefully...');
    server.close(() => {
      console.log('Server closed');
      void closePool()
        .catch((error: unknown) => {
          console.error('Pool close failed:', error instanceof Error ? error.message : String(error));
        })
        .finally(() => process.exit(0));
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}
