import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Histogram bucket boundaries in seconds
/* eslint-disable no-magic-numbers */
const PROVIDER_DURATION_BUCKETS: number[] = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];
const TICK_DURATION_BUCKETS: number[] = [0.1, 0.5, 1, 2.5, 5, 10, 30, 60, 120];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly providerRequestsTotal: Counter;
  public readonly providerRequestDurationSeconds: Histogram;
  public readonly pollTicksTotal: Counter;
  public readonly pollTickDurationSeconds: Histogram;
  public readonly pollEntityFailuresTotal: Counter;
  public readonly notificationIntentsTotal: Counter;
  public readonly notificationDeliveryFailuresTotal: Counter;
  public readonly seenEventsSize: Gauge;
  public readonly rateLimitQueueSize: Gauge;
  public readonly cacheKeys: Gauge;
  public readonly cacheHitsTotal: Gauge;
  public readonly cacheMissesTotal: Gauge;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.providerRequestsTotal = new Counter({
      name: 'provider_requests_total',
      help: 'Total number of data provider requests',
      labelNames: ['operation', 'status'] as const,
      registers: [this.registry],
    });

    this.providerRequestDurationSeconds = new Histogram({
      name: 'provider_request_duration_seconds',
      help: 'Data provider request duration in seconds, retries included',
      labelNames: ['operation'] as const,
      buckets: PROVIDER_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.pollTicksTotal = new Counter({
      name: 'poll_ticks_total',
      help: 'Poll ticks by cycle and outcome',
      labelNames: ['cycle', 'outcome'] as const,
      registers: [this.registry],
    });

    this.pollTickDurationSeconds = new Histogram({
      name: 'poll_tick_duration_seconds',
      help: 'Duration of completed poll ticks in seconds',
      labelNames: ['cycle'] as const,
      buckets: TICK_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.pollEntityFailuresTotal = new Counter({
      name: 'poll_entity_failures_total',
      help: 'Wallets or mints skipped in a tick because the provider failed',
      labelNames: ['cycle'] as const,
      registers: [this.registry],
    });

    this.notificationIntentsTotal = new Counter({
      name: 'notification_intents_total',
      help: 'Notification intents emitted',
      labelNames: ['kind'] as const,
      registers: [this.registry],
    });

    this.notificationDeliveryFailuresTotal = new Counter({
      name: 'notification_delivery_failures_total',
      help: 'Notification intents the sink failed to deliver',
      labelNames: ['kind', 'sink'] as const,
      registers: [this.registry],
    });

    this.seenEventsSize = new Gauge({
      name: 'seen_events_size',
      help: 'Event ids currently held by the dedup store',
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.cacheKeys = new Gauge({
      name: 'cache_keys',
      help: 'Number of keys held by a cache',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.cacheHitsTotal = new Gauge({
      name: 'cache_hits_total',
      help: 'Cache hits since start',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });

    this.cacheMissesTotal = new Gauge({
      name: 'cache_misses_total',
      help: 'Cache misses since start',
      labelNames: ['cache'] as const,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
