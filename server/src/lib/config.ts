import { RetryPolicy } from './backoff';
import { QueryLimits } from './command-translator';
import { configurationError } from './gateway-errors';
import { LogLevel, isLogLevel } from './gateway-logger';

export interface GatewayConfig {
  port: number;
  operationTimeoutMs: number;
  retryPolicy: RetryPolicy;
  queryLimits: QueryLimits;
  idleTimeoutMs: number;
  monitorPollIntervalMs: number;
  logLevel: LogLevel;
  maxLogsPerAccount: number;
  logToConsole: boolean;
  providersFile?: string;
  databaseUrl?: string;
  encryptionKey?: string;
  frontendUrl: string;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw configurationError(`${name} must be an integer of at least ${min}`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw === 'true' || raw === '1';
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Reads gateway settings from the environment. Call dotenv.config() first
 * when a .env file should apply.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const logLevel = env.GATEWAY_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw configurationError('GATEWAY_LOG_LEVEL must be one of debug, info, warn, error');
  }

  const defaultMaxResults = readInt(env, 'GATEWAY_DEFAULT_MAX_RESULTS', 50, 1);
  const maxResultsLimit = readInt(env, 'GATEWAY_MAX_RESULTS_LIMIT', 500, 1);
  if (defaultMaxResults > maxResultsLimit) {
    throw configurationError('GATEWAY_DEFAULT_MAX_RESULTS must not exceed GATEWAY_MAX_RESULTS_LIMIT');
  }

  const baseDelayMs = readInt(env, 'GATEWAY_RECONNECT_BASE_DELAY_MS', 500);
  const maxDelayMs = readInt(env, 'GATEWAY_RECONNECT_MAX_DELAY_MS', 15000);
  if (baseDelayMs > maxDelayMs) {
    throw configurationError('GATEWAY_RECONNECT_BASE_DELAY_MS must not exceed GATEWAY_RECONNECT_MAX_DELAY_MS');
  }

  return {
    port: readInt(env, 'PORT', 3002, 1),
    operationTimeoutMs: readInt(env, 'GATEWAY_OPERATION_TIMEOUT_MS', 30000, 1),
    retryPolicy: {
      maxAttempts: readInt(env, 'GATEWAY_RECONNECT_MAX_ATTEMPTS', 3, 1),
      baseDelayMs,
      maxDelayMs,
      jitter: readBool(env, 'GATEWAY_RECONNECT_JITTER', true)
    },
    queryLimits: { defaultMaxResults, maxResultsLimit },
    idleTimeoutMs: readInt(env, 'GATEWAY_IDLE_TIMEOUT_MS', 300000),
    monitorPollIntervalMs: readInt(env, 'GATEWAY_MONITOR_POLL_INTERVAL_MS', 60000, 1000),
    logLevel,
    maxLogsPerAccount: readInt(env, 'GATEWAY_MAX_LOGS_PER_ACCOUNT', 1000, 1),
    logToConsole: readBool(env, 'GATEWAY_LOG_CONSOLE', false),
    providersFile: readString(env, 'PROVIDERS_FILE'),
    databaseUrl: readString(env, 'DATABASE_URL'),
    encryptionKey: readString(env, 'ENCRYPTION_KEY'),
    frontendUrl: readString(env, 'FRONTEND_URL') ?? 'http://localhost:3001'
  };
}
