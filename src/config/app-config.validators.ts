import type { ParsedEnv } from './app-config.schema';
import { ConfigurationError } from '../common/errors/whale-watch.errors';

export function assertAppConfig(parsedEnv: ParsedEnv): void {
  assertProviderConfig(parsedEnv);
  assertBackoffConfig(parsedEnv);
  assertTelegramConfig(parsedEnv);
  assertPollingConfig(parsedEnv);
}

function assertProviderConfig(parsedEnv: ParsedEnv): void {
  if (!parsedEnv.VYBE_API_KEY) {
    throw new ConfigurationError('VYBE_API_KEY is required');
  }
}

function assertBackoffConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.PROVIDER_BACKOFF_MAX_MS < parsedEnv.PROVIDER_BACKOFF_BASE_MS) {
    throw new ConfigurationError('PROVIDER_BACKOFF_MAX_MS must be >= PROVIDER_BACKOFF_BASE_MS');
  }
}

function assertTelegramConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.TELEGRAM_ENABLED && !parsedEnv.BOT_TOKEN) {
    throw new ConfigurationError('BOT_TOKEN is required when TELEGRAM_ENABLED=true');
  }
}

// A first fetch must cover at least one full interval.
function assertPollingConfig(parsedEnv: ParsedEnv): void {
  const longestIntervalSec: number = Math.max(
    parsedEnv.WALLET_TRACKING_INTERVAL_SECONDS,
    parsedEnv.WHALE_ALERT_INTERVAL_SECONDS,
  );

  if (parsedEnv.POLL_LOOKBACK_SEC < longestIntervalSec) {
    throw new ConfigurationError(
      `POLL_LOOKBACK_SEC must be >= the longest poll interval (${String(longestIntervalSec)})`,
    );
  }
}
