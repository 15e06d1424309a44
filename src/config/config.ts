import dotenv from 'dotenv';

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  prettyLogs: boolean;       // pino-pretty transport, development only
  corsOrigins: string[];
  rateLimitMax: number;      // Requests per second per client on mutating routes
}

const DEFAULT_PORT = 3001;
const DEFAULT_RATE_LIMIT = 100;

function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Builds the runtime configuration from an environment record
 * Pure over `env` so tests can pass their own
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const nodeEnv = env['NODE_ENV'] || 'development';
  const hideLogs = Boolean(env['HIDE_LOGS']);
  const logLevel = env['LOG_LEVEL'] || ((hideLogs || nodeEnv === 'production') ? 'warn' : 'debug');

  return {
    port: parseInteger(env['PORT'], DEFAULT_PORT),
    host: env['HOST'] || '0.0.0.0',
    nodeEnv,
    logLevel,
    prettyLogs: nodeEnv === 'development' && !hideLogs,
    corsOrigins: (env['CORS_ORIGINS'] || 'http://localhost:5173')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
    rateLimitMax: parseInteger(env['RATE_LIMIT_MAX'], DEFAULT_RATE_LIMIT)
  };
}

/** Loads .env into process.env, then reads the configuration from it */
export function loadConfigFromEnv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
