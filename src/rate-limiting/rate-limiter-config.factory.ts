import { type IBottleneckConfig, LimiterKey } from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

export function buildLimiterConfigs(
  config: AppConfigService,
): ReadonlyMap<LimiterKey, IBottleneckConfig> {
  const map = new Map<LimiterKey, IBottleneckConfig>();

  map.set(LimiterKey.VYBE, {
    minTime: config.rateLimitVybeMinTimeMs,
    maxConcurrent: config.rateLimitVybeMaxConcurrent,
  });

  // Poll gates only bound per-tick fan-out; spacing is left to the provider limiter.
  map.set(LimiterKey.WALLET_POLL, {
    minTime: 0,
    maxConcurrent: config.pollMaxConcurrency,
  });

  map.set(LimiterKey.WHALE_POLL, {
    minTime: 0,
    maxConcurrent: config.pollMaxConcurrency,
  });

  return map;
}
