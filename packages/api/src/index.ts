import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
  AnthropicLlmClient,
  PgCleaningStorage,
  createLogger,
  createPool,
  loadRulesFromDirectory,
  runMigrations,
} from '@dataherd/core';
import { loadConfig } from './config.js';
import { createServer } from './server.js';
import { createServices, seedRules } from './services.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const logger = createLogger('api');

async function main() {
  const config = loadConfig(process.env);
  const pool = createPool(config.database);

  // Run migrations
  const migrationsDir = join(__dirname, '../../core/migrations');
  await runMigrations(pool, migrationsDir);

  const llm = new AnthropicLlmClient(config.llm);
  if (!llm.isConfigured()) {
    logger.warn('LLM_API_KEY is not set; rules compile with the pattern library only');
  }

  const storage = new PgCleaningStorage(pool);
  const services = createServices(storage, {
    llm: llm.isConfigured() ? llm : null,
    ordering: config.ruleOrdering,
  });

  const rulesDir = config.rulesDir ?? join(__dirname, '../../../rules');
  await seedRules(services.ruleStore, loadRulesFromDirectory(rulesDir));

  const server = createServer({
    services,
    healthCheck: () => pool.query('SELECT 1'),
    logLevel: config.logLevel,
  });

  await server.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port }, 'DataHerd API listening');

  // Graceful shutdown
  const shutdown = async () => {
    await server.close();
    await pool.end();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
