import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().nonnegative(),
  logLevel: z.custom<LogLevel>((value) =>
    value === 'fatal' ||
    value === 'error' ||
    value === 'warn' ||
    value === 'info' ||
    value === 'debug' ||
    value === 'trace' ||
    value === 'silent'
  ),
  metricsEnabled: z.boolean(),
  keepAliveTimeoutMs: z.number().int().positive(),
  bodyLimitBytes: z.number().int().positive(),
  pageSizeBytes: z.number().int().positive(),
  storage: z.object({
    rootDir: z.string().min(1),
    cacheDir: z.string().min(1)
  }),
  load: z.object({
    mode: z.union([z.literal('inline'), z.literal('redis')]),
    redisUrl: z.string().min(1),
    keyPrefix: z.string().min(1),
    queueName: z.string().min(1),
    concurrency: z.number().int().positive()
  })
});

export type ServiceConfig = z.infer<typeof configSchema>;

let cachedConfig: ServiceConfig | null = null;

const DEFAULT_PAGE_SIZE_BYTES = 1024 * 1024;
const DEFAULT_LOCAL_REDIS_URL = 'redis://127.0.0.1:6379';

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function normalizeRedisUrl(value: string): string {
  return /^rediss?:\/\//i.test(value) ? value : `redis://${value}`;
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return normalized;
    default:
      return 'info';
  }
}

function resolveLoadMode(value: string | undefined, redisConfigured: boolean): 'inline' | 'redis' {
  const normalized = (value || '').trim().toLowerCase();
  if (normalized === 'inline' || normalized === 'redis') {
    return normalized;
  }
  return redisConfigured ? 'redis' : 'inline';
}

export function loadServiceConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = process.env;
  const host = env.WORKER_HTTP_HOST || env.HOST || '127.0.0.1';
  const port = parseNumber(env.WORKER_HTTP_PORT || env.PORT, 28080);
  const logLevel = resolveLogLevel(env.WORKER_HTTP_LOG_LEVEL);
  const metricsEnabled = parseBoolean(env.WORKER_HTTP_METRICS_ENABLED, true);
  const keepAliveTimeoutMs = parseNumber(env.WORKER_HTTP_KEEPALIVE_TIMEOUT_MS, 65_000);
  const bodyLimitBytes = parseNumber(env.WORKER_HTTP_BODY_LIMIT_BYTES, 64 * 1024 * 1024);
  const pageSizeBytes = parseNumber(env.WORKER_HTTP_PAGE_SIZE_BYTES, DEFAULT_PAGE_SIZE_BYTES);
  const rootDir = path.resolve(env.WORKER_HTTP_ROOT_DIR || process.cwd());
  const cacheDir = path.resolve(env.WORKER_HTTP_CACHE_DIR || path.join(os.tmpdir(), 'worker-http-cache'));

  const redisSource = (env.WORKER_HTTP_REDIS_URL || env.REDIS_URL || '').trim();
  const redisUrl = normalizeRedisUrl(redisSource || DEFAULT_LOCAL_REDIS_URL);
  const loadMode = resolveLoadMode(env.WORKER_HTTP_LOAD_QUEUE_MODE, redisSource.length > 0);
  const keyPrefix = env.WORKER_HTTP_REDIS_KEY_PREFIX || 'worker-http';
  const queueName = env.WORKER_HTTP_LOAD_QUEUE_NAME || 'worker_http_load_queue';
  const concurrency = parseNumber(env.WORKER_HTTP_LOAD_QUEUE_CONCURRENCY, 1);

  const candidateConfig: ServiceConfig = {
    host,
    port,
    logLevel,
    metricsEnabled,
    keepAliveTimeoutMs: keepAliveTimeoutMs > 0 ? Math.floor(keepAliveTimeoutMs) : 65_000,
    bodyLimitBytes: bodyLimitBytes > 0 ? Math.floor(bodyLimitBytes) : 64 * 1024 * 1024,
    pageSizeBytes: pageSizeBytes > 0 ? Math.floor(pageSizeBytes) : DEFAULT_PAGE_SIZE_BYTES,
    storage: {
      rootDir,
      cacheDir
    },
    load: {
      mode: loadMode,
      redisUrl,
      keyPrefix,
      queueName,
      concurrency: concurrency > 0 ? Math.floor(concurrency) : 1
    }
  };

  cachedConfig = configSchema.parse(candidateConfig);
  return cachedConfig;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}
