export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly metricsEnabled: boolean;
  readonly telegramEnabled: boolean;
  readonly botToken: string | null;
  readonly databaseUrl: string | null;
  readonly walletTrackingEnabled: boolean;
  readonly whaleAlertsEnabled: boolean;
  readonly walletTrackingIntervalSec: number;
  readonly whaleAlertIntervalSec: number;
  readonly pollLookbackSec: number;
  readonly pollMaxConcurrency: number;
  readonly vybeApiKey: string;
  readonly vybeApiBaseUrl: string;
  readonly vybeTimeoutMs: number;
  readonly providerMaxAttempts: number;
  readonly providerBackoffBaseMs: number;
  readonly providerBackoffMaxMs: number;
  readonly rateLimitVybeMinTimeMs: number;
  readonly rateLimitVybeMaxConcurrent: number;
  readonly tokenStatsCacheTtlSec: number;
  readonly defaultWhaleThresholdUsd: number;
  readonly dedupRetentionSec: number;
  readonly dedupEvictionIntervalSec: number;
  readonly dedupMaxEntries: number;
  readonly solscanTxBaseUrl: string;
};
