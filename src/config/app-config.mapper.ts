import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapPollingConfig(parsedEnv),
  ...mapProviderConfig(parsedEnv),
  ...mapDedupConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'appVersion'
  | 'nodeEnv'
  | 'port'
  | 'logLevel'
  | 'metricsEnabled'
  | 'telegramEnabled'
  | 'botToken'
  | 'databaseUrl'
  | 'solscanTxBaseUrl'
> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
  telegramEnabled: parsedEnv.TELEGRAM_ENABLED,
  botToken: parsedEnv.BOT_TOKEN ?? null,
  databaseUrl: parsedEnv.DATABASE_URL ?? null,
  solscanTxBaseUrl: parsedEnv.SOLSCAN_TX_BASE_URL,
});

const mapPollingConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'walletTrackingEnabled'
  | 'whaleAlertsEnabled'
  | 'walletTrackingIntervalSec'
  | 'whaleAlertIntervalSec'
  | 'pollLookbackSec'
  | 'pollMaxConcurrency'
  | 'defaultWhaleThresholdUsd'
> => ({
  walletTrackingEnabled: parsedEnv.WALLET_TRACKING_ENABLED,
  whaleAlertsEnabled: parsedEnv.WHALE_ALERTS_ENABLED,
  walletTrackingIntervalSec: parsedEnv.WALLET_TRACKING_INTERVAL_SECONDS,
  whaleAlertIntervalSec: parsedEnv.WHALE_ALERT_INTERVAL_SECONDS,
  pollLookbackSec: parsedEnv.POLL_LOOKBACK_SEC,
  pollMaxConcurrency: parsedEnv.POLL_MAX_CONCURRENCY,
  defaultWhaleThresholdUsd: parsedEnv.DEFAULT_WHALE_THRESHOLD_USD,
});

const mapProviderConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'vybeApiKey'
  | 'vybeApiBaseUrl'
  | 'vybeTimeoutMs'
  | 'providerMaxAttempts'
  | 'providerBackoffBaseMs'
  | 'providerBackoffMaxMs'
  | 'rateLimitVybeMinTimeMs'
  | 'rateLimitVybeMaxConcurrent'
  | 'tokenStatsCacheTtlSec'
> => ({
  vybeApiKey: parsedEnv.VYBE_API_KEY ?? '',
  vybeApiBaseUrl: trimTrailingSlash(parsedEnv.VYBE_API_BASE_URL),
  vybeTimeoutMs: parsedEnv.VYBE_TIMEOUT_MS,
  providerMaxAttempts: parsedEnv.PROVIDER_MAX_ATTEMPTS,
  providerBackoffBaseMs: parsedEnv.PROVIDER_BACKOFF_BASE_MS,
  providerBackoffMaxMs: parsedEnv.PROVIDER_BACKOFF_MAX_MS,
  rateLimitVybeMinTimeMs: parsedEnv.RATE_LIMIT_VYBE_MIN_TIME_MS,
  rateLimitVybeMaxConcurrent: parsedEnv.RATE_LIMIT_VYBE_MAX_CONCURRENT,
  tokenStatsCacheTtlSec: parsedEnv.TOKEN_STATS_CACHE_TTL_SEC,
});

// Retention never drops below a day nor below ten intervals of the slowest cycle.
const MIN_RETENTION_SEC = 86_400;
const RETENTION_INTERVAL_MULTIPLIER = 10;

const mapDedupConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'dedupRetentionSec' | 'dedupEvictionIntervalSec' | 'dedupMaxEntries'> => ({
  dedupRetentionSec: Math.max(
    parsedEnv.DEDUP_RETENTION_SEC,
    MIN_RETENTION_SEC,
    Math.max(parsedEnv.WALLET_TRACKING_INTERVAL_SECONDS, parsedEnv.WHALE_ALERT_INTERVAL_SECONDS) *
      RETENTION_INTERVAL_MULTIPLIER,
  ),
  dedupEvictionIntervalSec: parsedEnv.DEDUP_EVICTION_INTERVAL_SEC,
  dedupMaxEntries: parsedEnv.DEDUP_MAX_ENTRIES,
});

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, '');
