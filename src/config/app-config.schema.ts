import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_POLL_INTERVAL_SECONDS = 120;
const DEFAULT_POLL_LOOKBACK_SEC = 300;
const DEFAULT_POLL_MAX_CONCURRENCY = 4;
const DEFAULT_VYBE_TIMEOUT_MS = 10_000;
const DEFAULT_PROVIDER_MAX_ATTEMPTS = 3;
const DEFAULT_PROVIDER_BACKOFF_BASE_MS = 1000;
const DEFAULT_PROVIDER_BACKOFF_MAX_MS = 15_000;
const DEFAULT_RATE_LIMIT_VYBE_MIN_TIME_MS = 250;
const DEFAULT_RATE_LIMIT_VYBE_MAX_CONCURRENT = 2;
const DEFAULT_TOKEN_STATS_CACHE_TTL_SEC = 60;
const DEFAULT_WHALE_THRESHOLD_USD = 50_000;
const DEFAULT_DEDUP_RETENTION_SEC = 86_400;
const DEFAULT_DEDUP_EVICTION_INTERVAL_SEC = 3600;
const DEFAULT_DEDUP_MAX_ENTRIES = 200_000;

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  METRICS_ENABLED: booleanSchema.default(true),
  TELEGRAM_ENABLED: booleanSchema.default(false),
  BOT_TOKEN: optionalNonEmptyStringSchema,
  DATABASE_URL: z.url().optional(),
  WALLET_TRACKING_ENABLED: booleanSchema.default(true),
  WHALE_ALERTS_ENABLED: booleanSchema.default(true),
  WALLET_TRACKING_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_POLL_INTERVAL_SECONDS),
  WHALE_ALERT_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_POLL_INTERVAL_SECONDS),
  POLL_LOOKBACK_SEC: z.coerce.number().int().positive().default(DEFAULT_POLL_LOOKBACK_SEC),
  POLL_MAX_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_POLL_MAX_CONCURRENCY),
  VYBE_API_KEY: optionalNonEmptyStringSchema,
  VYBE_API_BASE_URL: z.url().default('https://api.vybenetwork.xyz'),
  VYBE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_VYBE_TIMEOUT_MS),
  PROVIDER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_MAX_ATTEMPTS),
  PROVIDER_BACKOFF_BASE_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_PROVIDER_BACKOFF_BASE_MS),
  PROVIDER_BACKOFF_MAX_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_PROVIDER_BACKOFF_MAX_MS),
  RATE_LIMIT_VYBE_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_VYBE_MIN_TIME_MS),
  RATE_LIMIT_VYBE_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_VYBE_MAX_CONCURRENT),
  TOKEN_STATS_CACHE_TTL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TOKEN_STATS_CACHE_TTL_SEC),
  DEFAULT_WHALE_THRESHOLD_USD: z.coerce.number().min(0).default(DEFAULT_WHALE_THRESHOLD_USD),
  DEDUP_RETENTION_SEC: z.coerce.number().int().positive().default(DEFAULT_DEDUP_RETENTION_SEC),
  DEDUP_EVICTION_INTERVAL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DEDUP_EVICTION_INTERVAL_SEC),
  DEDUP_MAX_ENTRIES: z.coerce.number().int().positive().default(DEFAULT_DEDUP_MAX_ENTRIES),
  SOLSCAN_TX_BASE_URL: z.url().default('https://solscan.io/tx/'),
});

export type ParsedEnv = z.infer<typeof envSchema>;
