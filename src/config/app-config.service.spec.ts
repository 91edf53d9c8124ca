import { describe, expect, it } from 'vitest';

import { AppConfigService } from './app-config.service';
import { ConfigurationError } from '../common/errors/whale-watch.errors';

const withEnv = (env: NodeJS.ProcessEnv, action: () => void): void => {
  const previousEnv: NodeJS.ProcessEnv = { ...process.env };
  process.env = env;

  try {
    action();
  } finally {
    process.env = previousEnv;
  }
};

const createBaseEnv = (): NodeJS.ProcessEnv => ({
  NODE_ENV: 'test',
  PORT: '3000',
  LOG_LEVEL: 'info',
  TELEGRAM_ENABLED: 'false',
  VYBE_API_KEY: 'test-api-key',
});

describe('AppConfigService', (): void => {
  it('applies polling defaults when intervals are not set', (): void => {
    withEnv(createBaseEnv(), (): void => {
      const config: AppConfigService = new AppConfigService();

      expect(config.walletTrackingIntervalSec).toBe(120);
      expect(config.whaleAlertIntervalSec).toBe(120);
      expect(config.walletTrackingEnabled).toBe(true);
      expect(config.whaleAlertsEnabled).toBe(true);
      expect(config.defaultWhaleThresholdUsd).toBe(50_000);
      expect(config.providerMaxAttempts).toBe(3);
      expect(config.vybeApiBaseUrl).toBe('https://api.vybenetwork.xyz');
      expect(config.databaseUrl).toBeNull();
    });
  });

  it('parses explicit intervals and flags', (): void => {
    withEnv(
      {
        ...createBaseEnv(),
        WALLET_TRACKING_INTERVAL_SECONDS: '45',
        WHALE_ALERT_INTERVAL_SECONDS: '90',
        WHALE_ALERTS_ENABLED: 'no',
        VYBE_API_BASE_URL: 'https://vybe.example.invalid/',
      },
      (): void => {
        const config: AppConfigService = new AppConfigService();

        expect(config.walletTrackingIntervalSec).toBe(45);
        expect(config.whaleAlertIntervalSec).toBe(90);
        expect(config.whaleAlertsEnabled).toBe(false);
        expect(config.vybeApiBaseUrl).toBe('https://vybe.example.invalid');
      },
    );
  });

  it('rejects a non-positive interval with a configuration error', (): void => {
    withEnv({ ...createBaseEnv(), WALLET_TRACKING_INTERVAL_SECONDS: '0' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(ConfigurationError);
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'Invalid environment: WALLET_TRACKING_INTERVAL_SECONDS',
      );
    });
  });

  it('rejects a non-numeric interval', (): void => {
    withEnv({ ...createBaseEnv(), WHALE_ALERT_INTERVAL_SECONDS: 'soon' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'Invalid environment: WHALE_ALERT_INTERVAL_SECONDS',
      );
    });
  });

  it('throws when provider credential is missing', (): void => {
    withEnv({ ...createBaseEnv(), VYBE_API_KEY: '  ' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow('VYBE_API_KEY is required');
    });
  });

  it('throws when telegram is enabled without bot token', (): void => {
    withEnv({ ...createBaseEnv(), TELEGRAM_ENABLED: 'true' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'BOT_TOKEN is required when TELEGRAM_ENABLED=true',
      );
    });
  });

  it('throws when backoff max is below backoff base', (): void => {
    withEnv(
      { ...createBaseEnv(), PROVIDER_BACKOFF_BASE_MS: '2000', PROVIDER_BACKOFF_MAX_MS: '1000' },
      (): void => {
        expect((): AppConfigService => new AppConfigService()).toThrow(
          'PROVIDER_BACKOFF_MAX_MS must be >= PROVIDER_BACKOFF_BASE_MS',
        );
      },
    );
  });

  it('throws when the lookback window is shorter than a poll interval', (): void => {
    withEnv({ ...createBaseEnv(), WALLET_TRACKING_INTERVAL_SECONDS: '600' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'POLL_LOOKBACK_SEC must be >= the longest poll interval (600)',
      );
    });
  });

  it('accepts a lookback window equal to the longest interval', (): void => {
    withEnv(
      { ...createBaseEnv(), WALLET_TRACKING_INTERVAL_SECONDS: '600', POLL_LOOKBACK_SEC: '600' },
      (): void => {
        expect(new AppConfigService().pollLookbackSec).toBe(600);
      },
    );
  });

  it('keeps dedup retention at least one day and ten slow intervals', (): void => {
    withEnv({ ...createBaseEnv(), DEDUP_RETENTION_SEC: '60' }, (): void => {
      expect(new AppConfigService().dedupRetentionSec).toBe(86_400);
    });

    withEnv(
      {
        ...createBaseEnv(),
        DEDUP_RETENTION_SEC: '60',
        WHALE_ALERT_INTERVAL_SECONDS: '10000',
        POLL_LOOKBACK_SEC: '10000',
      },
      (): void => {
        expect(new AppConfigService().dedupRetentionSec).toBe(100_000);
      },
    );
  });
});
