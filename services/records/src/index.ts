import 'dotenv/config';
import { loadConfig } from './config';
import { createConnector } from './db';
import { buildApp } from './server';
import { RecordService } from './service/recordService';
import { SqlRecordStore } from './storage/sqlRecordStore';

/**
 * Main entrypoint for the records service.
 * Loads config, prepares the schema (with bounded retries), then listens.
 */
async function main() {
  const config = loadConfig();
  const store = new SqlRecordStore(createConnector(config.store));
  const service = new RecordService(store, { defaultLimit: config.pagination.defaultLimit });
  const app = await buildApp({ config, service });

  // --- Schema bootstrap ---
  try {
    await store.initialize({
      attempts: config.store.connect.attempts,
      delayMs: config.store.connect.delayMs,
      onRetry: (attempt, attempts, err) => {
        app.log.warn(
          { err },
          `Store connection failed (attempt ${attempt}/${attempts}), retrying in ${config.store.connect.delayMs}ms`,
        );
      },
    });
    app.log.info({ driver: config.store.driver }, 'Database structure initialized');
  } catch (err) {
    app.log.fatal({ err }, 'Store initialization failed');
    process.exit(1);
  }

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Records service listening on http://${config.host}:${config.port} (${config.presentation})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch, e.g. invalid configuration before the logger exists
  console.error('Fatal error starting records service:', err);
  process.exit(1);
});
