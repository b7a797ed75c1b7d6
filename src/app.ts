/**
 * HTTP App
 *
 * Hono app without a listener, so tests can drive it with `app.request()`.
 */

import { timingSafeEqual } from 'node:crypto';
import { Hono } from 'hono';
import type { Context, Next } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { version as APP_VERSION } from '../package.json';
import { getConfigStatus, getServerConfig, type ServerConfig } from './lib/config-parser';
import { handleNotFoundError, handleUnauthorizedError } from './lib/error-handler';
import { logger } from './lib/logger';
import { analysisRouter } from './routes/analysis';

export interface AppOptions {
  serverConfig?: ServerConfig;
  analysisRoutes?: Hono;
}

/** Timing-safe comparison of the X-API-Key header */
function verifyApiKey(c: Context, secret: string): boolean {
  const apiKey = c.req.header('X-API-Key');
  if (!apiKey || apiKey.length !== secret.length) return false;
  return timingSafeEqual(Buffer.from(apiKey), Buffer.from(secret));
}

export function createApp(options: AppOptions = {}): Hono {
  const serverConfig = options.serverConfig ?? getServerConfig();
  const app = new Hono();

  app.use('*', honoLogger());
  app.use(
    '*',
    cors({
      origin: serverConfig.allowedOrigins.length > 0 ? serverConfig.allowedOrigins : '*',
    })
  );

  const secret = serverConfig.apiSecret;
  if (secret) {
    app.use('/api/*', async (c: Context, next: Next) => {
      if (!verifyApiKey(c, secret)) {
        return handleUnauthorizedError(c);
      }
      await next();
    });
  } else {
    logger.warn('[Security] API_SECRET is not set, /api routes are unauthenticated');
  }

  app.onError((err: Error, c: Context) => {
    logger.error({ err, url: c.req.url, method: c.req.method }, 'Unhandled error');

    return c.json(
      {
        error: 'Internal Server Error',
        message: err.message,
      },
      500
    );
  });

  app.get('/health', (c: Context) =>
    c.json({
      status: 'ok',
      service: 'perf-consensus-engine',
      version: APP_VERSION,
      config: getConfigStatus(),
      timestamp: new Date().toISOString(),
    })
  );

  app.route('/api/analysis', options.analysisRoutes ?? analysisRouter);

  app.notFound((c: Context) => handleNotFoundError(c, 'Route'));

  return app;
}
