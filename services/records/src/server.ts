import Fastify from 'fastify';
import type { AppConfig } from './config';
import type { RecordService } from './service/recordService';
import type { RouteDeps } from './routes/deps';
import { registerErrorHandler } from './routes/errors';
import { registerExportRoutes } from './routes/export';
import { registerFormRoutes } from './routes/forms';
import { registerRecordRoutes } from './routes/records';
import { registerSearchRoutes } from './routes/search';

export interface BuildAppOptions {
  config: AppConfig;
  service: RecordService;
  /** Pino options or `false`; defaults to the configured level. */
  logger?: boolean | { level: string };
}

export async function buildApp({ config, service, logger }: BuildAppOptions) {
  const app = Fastify({ logger: logger ?? { level: config.logLevel } });
  const deps: RouteDeps = { service, config };

  registerErrorHandler(app);

  app.get('/health', async (req) => {
    try {
      await service.ping();
      return { status: 'ok', store: 'ok' };
    } catch (err) {
      req.log.error({ err }, 'Store health check failed');
      return { status: 'degraded', store: 'error' };
    }
  });

  // One presentation contract per deployment
  if (config.presentation === 'form') {
    await registerFormRoutes(app, deps);
  } else {
    await registerRecordRoutes(app, deps);
    await registerSearchRoutes(app, deps);
  }
  await registerExportRoutes(app, deps);

  return app;
}
