/**
 * HTTP Server for the topic-share dashboard API
 *
 * Middleware:
 * - CORS (configurable allowlist or wildcard)
 * - Security headers (nosniff, DENY)
 * - JSON body parser
 * - Request logging (method, path, status, duration)
 * - Error-handling middleware
 */

import express, { Request, Response, NextFunction } from 'express';
import http from 'http';
import { createLogger } from '../utils/logger';
import { createDashboardRouter, LOGIN_HEADER, PASSWORD_HEADER } from './api';
import type { DashboardDeps } from './handlers';

const logger = createLogger('server');

// =============================================================================
// CONFIG TYPES
// =============================================================================

export interface CorsConfig {
  /** List of allowed origins, or true for wildcard '*' */
  origins: string[] | true;
}

export interface ServerConfig {
  port: number;
  host?: string;
  /** CORS configuration. Defaults to disabled. */
  cors?: CorsConfig;
}

// =============================================================================
// SERVER FACTORY
// =============================================================================

export function createServer(config: ServerConfig, deps: DashboardDeps) {
  const app = express();
  app.disable('x-powered-by');

  // ---------------------------------------------------------------------------
  // 1. CORS middleware
  // ---------------------------------------------------------------------------
  const corsConfig = config.cors;
  if (corsConfig) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const originHeader = req.headers.origin;
      let origin = '';

      if (Array.isArray(corsConfig.origins)) {
        if (originHeader && corsConfig.origins.includes(originHeader)) {
          origin = originHeader;
        }
      } else {
        origin = '*';
      }

      if (origin) {
        res.setHeader('Access-Control-Allow-Origin', origin);
        res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
        res.setHeader(
          'Access-Control-Allow-Headers',
          `Content-Type, ${LOGIN_HEADER}, ${PASSWORD_HEADER}`,
        );
      }

      // Handle preflight
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }

      next();
    });
  }

  // ---------------------------------------------------------------------------
  // 2. Security headers
  // ---------------------------------------------------------------------------
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  // ---------------------------------------------------------------------------
  // Body parser
  // ---------------------------------------------------------------------------
  app.use(express.json({ limit: '5mb' }));

  // ---------------------------------------------------------------------------
  // 3. Request logging
  // ---------------------------------------------------------------------------
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level](
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration,
        },
        '%s %s %d %dms',
        req.method,
        req.path,
        res.statusCode,
        duration,
      );
    });

    next();
  });

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'topic-share',
      timestamp: Date.now(),
      uptime: process.uptime() * 1000,
    });
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  app.use('/api', createDashboardRouter(deps));

  // ---------------------------------------------------------------------------
  // 4. Error-handling middleware (must be last middleware)
  // ---------------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error(
      { err: err.message, stack: err.stack, method: req.method, path: req.path },
      'Unhandled error in request handler',
    );

    if (res.headersSent) {
      return;
    }

    // body-parser errors carry a 4xx status
    const status =
      'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500
        ? err.status
        : 500;
    res.status(status).json({
      error: process.env.NODE_ENV === 'production' && status === 500 ? 'Internal server error' : err.message,
    });
  });

  // ---------------------------------------------------------------------------
  // Create HTTP server
  // ---------------------------------------------------------------------------
  const server = http.createServer(app);

  return {
    app,
    server,
    start(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host ?? '127.0.0.1', () => {
          logger.info({ port: config.port }, 'Dashboard server started');
          resolve();
        });
      });
    },
    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info('Dashboard server stopped');
          resolve();
        });
      });
    },
  };
}
