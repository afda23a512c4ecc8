import { serve } from '@hono/node-server';
import { logger } from '@mona/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { deployLedger } from './services/index.js';

const config = loadConfig();
logger.level = config.logLevel;

// Initialize audit logging before deployment so the genesis events are logged
initializeAuditLogging();

const ledger = deployLedger(config);
const app = createApp({ ledger, corsOrigins: config.corsOrigins });

logger.info({ port: config.port }, 'Starting server');

serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port, ledgerAddress: ledger.address }, 'Server running');
