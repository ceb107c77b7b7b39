import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import logger from './lib/logger.js';
import { createGenerateRoutes } from './routes/generate.js';
import type { GenerateRouteOptions } from './routes/generate.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

export function createApp(options: GenerateRouteOptions = {}): Hono {
  const app = new Hono();

  app.use('*', async (c, next) => {
    const candidate = c.req.header('X-Request-ID')?.trim().slice(0, 64);
    const requestId = candidate && REQUEST_ID_RE.test(candidate) ? candidate : randomUUID();
    c.set('requestId', requestId);
    c.header('X-Request-ID', requestId);

    const startedAt = Date.now();
    await next();
    logger.info(
      { requestId, method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - startedAt },
      'Request completed',
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/api', createGenerateRoutes(options));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
