import 'dotenv/config';
import { serve } from '@hono/node-server';
import { buildApp } from './app.js';
import { getConfig, type Config } from './config.js';
import { createLogger } from './logger.js';
import type { SafetyRules } from './rules/interface.js';
import { loadSafetyRules } from './rules/loader.js';

const logger = createLogger('server');

let startup: { config: Config; rules: SafetyRules };
try {
  const loaded = getConfig();
  startup = { config: loaded, rules: await loadSafetyRules(loaded.rulesPath) };
} catch (error) {
  // Bad configuration is fatal: never serve with partial rules
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Startup failed');
  process.exit(1);
}

const { config, rules } = startup;
const { app, rateLimiter } = buildApp(config, rules);

const port = config.port;

logger.info({ port }, 'Starting tale-guard server');

const server = serve({
  fetch: app.fetch,
  port,
}, (info) => {
  logger.info({ port: info.port, rulesPath: config.rulesPath }, 'tale-guard HTTP server started');
});

function shutdown(): void {
  logger.info('Shutting down server');
  rateLimiter.destroy();
  server.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

export default app;
