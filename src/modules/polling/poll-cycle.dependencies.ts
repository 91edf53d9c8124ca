import { Inject, Injectable } from '@nestjs/common';

import { DATA_SOURCE_CLIENT } from '../../common/interfaces/data-source/data-source-port.tokens';
import type { IDataSourceClient } from '../../common/interfaces/data-source/data-source-client.interfaces';
import { AppConfigService } from '../../config/app-config.service';
import { MetricsService } from '../../observability/metrics.service';
import { BottleneckRateLimiterService } from '../../rate-limiting/bottleneck-rate-limiter.service';
import { SeenEventStoreService } from '../dedup/seen-event-store.service';
import { NotificationDispatcherService } from '../notifications/notification-dispatcher.service';
import { SubscriptionRegistryService } from '../tracking/subscription-registry.service';

@Injectable()
export class PollCycleDependencies {
  @Inject(SubscriptionRegistryService)
  public readonly subscriptionRegistryService!: SubscriptionRegistryService;

  @Inject(DATA_SOURCE_CLIENT)
  public readonly dataSourceClient!: IDataSourceClient;

  @Inject(SeenEventStoreService)
  public readonly seenEventStoreService!: SeenEventStoreService;

  @Inject(NotificationDispatcherService)
  public readonly notificationDispatcherService!: NotificationDispatcherService;

  @Inject(BottleneckRateLimiterService)
  public readonly rateLimiterService!: BottleneckRateLimiterService;

  @Inject(AppConfigService)
  public readonly appConfigService!: AppConfigService;

  @Inject(MetricsService)
  public readonly metricsService!: MetricsService;
}
