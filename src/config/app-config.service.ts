import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';
import { assertAppConfig } from './app-config.validators';
import { ConfigurationError } from '../common/errors/whale-watch.errors';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = parseEnv(process.env);
    assertAppConfig(parsedEnv);
    this.config = mapAppConfig(parsedEnv);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get telegramEnabled(): boolean {
    return this.config.telegramEnabled;
  }

  public get botToken(): string | null {
    return this.config.botToken;
  }

  public get databaseUrl(): string | null {
    return this.config.databaseUrl;
  }

  public get walletTrackingEnabled(): boolean {
    return this.config.walletTrackingEnabled;
  }

  public get whaleAlertsEnabled(): boolean {
    return this.config.whaleAlertsEnabled;
  }

  public get walletTrackingIntervalSec(): number {
    return this.config.walletTrackingIntervalSec;
  }

  public get whaleAlertIntervalSec(): number {
    return this.config.whaleAlertIntervalSec;
  }

  public get pollLookbackSec(): number {
    return this.config.pollLookbackSec;
  }

  public get pollMaxConcurrency(): number {
    return this.config.pollMaxConcurrency;
  }

  public get vybeApiKey(): string {
    return this.config.vybeApiKey;
  }

  public get vybeApiBaseUrl(): string {
    return this.config.vybeApiBaseUrl;
  }

  public get vybeTimeoutMs(): number {
    return this.config.vybeTimeoutMs;
  }

  public get providerMaxAttempts(): number {
    return this.config.providerMaxAttempts;
  }

  public get providerBackoffBaseMs(): number {
    return this.config.providerBackoffBaseMs;
  }

  public get providerBackoffMaxMs(): number {
    return this.config.providerBackoffMaxMs;
  }

  public get rateLimitVybeMinTimeMs(): number {
    return this.config.rateLimitVybeMinTimeMs;
  }

  public get rateLimitVybeMaxConcurrent(): number {
    return this.config.rateLimitVybeMaxConcurrent;
  }

  public get tokenStatsCacheTtlSec(): number {
    return this.config.tokenStatsCacheTtlSec;
  }

  public get defaultWhaleThresholdUsd(): number {
    return this.config.defaultWhaleThresholdUsd;
  }

  public get dedupRetentionSec(): number {
    return this.config.dedupRetentionSec;
  }

  public get dedupEvictionIntervalSec(): number {
    return this.config.dedupEvictionIntervalSec;
  }

  public get dedupMaxEntries(): number {
    return this.config.dedupMaxEntries;
  }

  public get solscanTxBaseUrl(): string {
    return this.config.solscanTxBaseUrl;
  }
}

const parseEnv = (env: NodeJS.ProcessEnv): ParsedEnv => {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const formatted: string = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${formatted}`);
  }

  return result.data;
};
