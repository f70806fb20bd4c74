import { z } from 'zod';

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Database (PostgreSQL)
  databaseUrl: z.string().url('DATABASE_URL must be a valid PostgreSQL URL'),
  dbPoolSize: z.number().int().min(1).max(100).default(10),

  // SUNAT credentials
  sunatClientId: z.string().min(1, 'SUNAT_CLIENT_ID is required'),
  sunatClientSecret: z.string().min(1, 'SUNAT_CLIENT_SECRET is required'),
  sunatRuc: z.string().regex(/^\d{11}$/, 'SUNAT_RUC must be an 11-digit RUC'),

  // SUNAT endpoints
  apiBaseUrl: z.string().url().default('https://api.sunat.gob.pe/v1'),
  authBaseUrl: z.string().url().default('https://api-seguridad.sunat.gob.pe/v1'),

  // Batch processing
  workerBatch: z.number().int().min(1).max(5000).default(300),
  workerThreads: z.number().int().min(1).max(100).default(10),
  retryMax: z.number().int().min(1).max(10).default(3),
  httpTimeoutMs: z.number().int().min(1000).max(120000).default(25000),
  idlePollIntervalMs: z.number().int().min(100).max(600000).default(5000),

  // Health check
  healthPort: z.number().int().min(0).max(65535).default(8080),
  memoryThresholdMb: z.number().int().min(1).default(256),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

function parseIntEnv(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(): Config {
  const env = process.env;

  const raw = {
    databaseUrl: env['DATABASE_URL'],
    dbPoolSize: parseIntEnv(env['DB_POOL_SIZE'], 10),
    sunatClientId: env['SUNAT_CLIENT_ID']?.trim(),
    sunatClientSecret: env['SUNAT_CLIENT_SECRET']?.trim(),
    sunatRuc: env['SUNAT_RUC']?.trim(),
    apiBaseUrl: env['SUNAT_API_BASE_URL'] || 'https://api.sunat.gob.pe/v1',
    authBaseUrl: env['SUNAT_AUTH_BASE_URL'] || 'https://api-seguridad.sunat.gob.pe/v1',
    workerBatch: parseIntEnv(env['WORKER_BATCH'], 300),
    workerThreads: parseIntEnv(env['WORKER_THREADS'], 10),
    retryMax: parseIntEnv(env['RETRY_MAX'], 3),
    httpTimeoutMs: parseIntEnv(env['HTTP_TIMEOUT_MS'], 25000),
    idlePollIntervalMs: parseIntEnv(env['IDLE_POLL_INTERVAL_MS'], 5000),
    healthPort: parseIntEnv(env['PORT'], 8080),
    memoryThresholdMb: parseIntEnv(env['MEMORY_THRESHOLD_MB'], 256),
    nodeEnv: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
