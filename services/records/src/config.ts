import { z } from 'zod';

export type StoreDriver = 'sqlite' | 'postgres';
export type Presentation = 'json' | 'form';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  store: {
    driver: StoreDriver;
    sqlitePath: string;
    databaseUrl?: string;
    connect: {
      attempts: number;
      delayMs: number;
    };
  };
  presentation: Presentation;
  export: {
    csv: boolean;
    json: boolean;
    dir: string;
  };
  pagination: {
    defaultLimit: number;
    maxLimit: number;
  };
}

const MAX_PAGE_LIMIT = 1000;

// startup retry defaults per driver
const DEFAULT_CONNECT_ATTEMPTS: Record<StoreDriver, number> = {
  postgres: 10,
  sqlite: 1,
};

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STORE_DRIVER: z.enum(['sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().min(1).default('db/database.db'),
  DATABASE_URL: z.string().min(1).optional(),
  STORE_CONNECT_ATTEMPTS: z.coerce.number().int().positive().optional(),
  STORE_CONNECT_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  PRESENTATION: z.enum(['json', 'form']).default('json'),
  EXPORT_CSV: flag,
  EXPORT_JSON: flag,
  EXPORT_DIR: z.string().min(1).default('exports'),
  PAGE_LIMIT: z.coerce.number().int().positive().max(MAX_PAGE_LIMIT).default(100),
});

/**
 * Builds the process-wide configuration from environment variables.
 * Called once by the entrypoint; everything else receives the result.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  if (e.STORE_DRIVER === 'postgres' && !e.DATABASE_URL) {
    throw new Error('Invalid configuration: DATABASE_URL is required when STORE_DRIVER=postgres');
  }

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    store: {
      driver: e.STORE_DRIVER,
      sqlitePath: e.SQLITE_PATH,
      databaseUrl: e.DATABASE_URL,
      connect: {
        attempts: e.STORE_CONNECT_ATTEMPTS ?? DEFAULT_CONNECT_ATTEMPTS[e.STORE_DRIVER],
        delayMs: e.STORE_CONNECT_DELAY_MS,
      },
    },
    presentation: e.PRESENTATION,
    export: {
      csv: e.EXPORT_CSV,
      json: e.EXPORT_JSON,
      dir: e.EXPORT_DIR,
    },
    pagination: {
      defaultLimit: e.PAGE_LIMIT,
      maxLimit: MAX_PAGE_LIMIT,
    },
  };
}
