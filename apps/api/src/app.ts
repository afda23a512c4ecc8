import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { TokenLedger } from '@mona/core';
import { logger } from '@mona/observability';
import { createCorsMiddleware } from './middleware/cors.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { healthRoute } from './routes/v1/health.js';
import { ledgerRoutes } from './routes/v1/ledger/index.js';
import type { AppBindings } from './types/context.js';

export type CreateAppOptions = {
  ledger: TokenLedger;
  corsOrigins?: string[];
};

export function createApp({ ledger, corsOrigins = [] }: CreateAppOptions) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.use('*', createCorsMiddleware(corsOrigins));

  // Every route works against the one deployed ledger
  app.use('*', async (c, next) => {
    c.set('ledger', ledger);
    await next();
  });

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();
  v1.route('/', ledgerRoutes);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  // Domain errors are answered by the routes; anything reaching here is a bug
  app.onError((error, c) => {
    // Malformed request bodies surface as HTTP exceptions from the validators
    if (error instanceof HTTPException) {
      return error.getResponse();
    }

    logger.error(
      { err: error, requestId: c.get('requestId'), method: c.req.method, path: c.req.path },
      'Unhandled error'
    );
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
