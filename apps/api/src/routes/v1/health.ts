import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  const ledger = c.get('ledger');
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    ledger: ledger.address,
    paused: ledger.paused(),
  };

  return c.json(response);
});

export { healthRoute };
