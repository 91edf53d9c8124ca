import { Logger } from '@nestjs/common';

import type { PollCycleDependencies } from './poll-cycle.dependencies';
import {
  type IPollCycle,
  type ITickContext,
  type ITickReport,
  PollCycleName,
} from './polling.interfaces';
import { WatermarkBook } from './watermark-book';
import type { IDataSourceClient } from '../../common/interfaces/data-source/data-source-client.interfaces';
import type {
  NotificationIntent,
  TransactionEvent,
} from '../../common/interfaces/events/transaction-event.interfaces';
import { compareEventsByTimestamp } from '../../common/utils/events/transaction-event.util';
import type { MetricsService } from '../../observability/metrics.service';
import {
  type LimiterKey,
  RequestPriority,
} from '../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { BottleneckRateLimiterService } from '../../rate-limiting/bottleneck-rate-limiter.service';
import type { SeenEventStoreService } from '../dedup/seen-event-store.service';
import type { NotificationDispatcherService } from '../notifications/notification-dispatcher.service';
import type { RegistrySnapshot } from '../tracking/entities/subscription.interfaces';
import type { SubscriptionRegistryService } from '../tracking/subscription-registry.service';

type EntityBatch = {
  readonly entity: string;
  readonly since: number;
  readonly events: readonly TransactionEvent[];
};

type EntityFetchResult = EntityBatch | { readonly entity: string; readonly error: unknown };

/**
 * Shared tick pipeline: fetch every entity through the cycle's gate, merge, dedup,
 * fan out to subscribers, then advance watermarks. Everything after the fetch
 * phase runs without awaiting so a tick's dedup and watermark updates are atomic.
 */
export abstract class BatchPollCycle<TSubscriber> implements IPollCycle {
  public abstract readonly name: PollCycleName;

  protected readonly logger: Logger;
  protected readonly dataSourceClient: IDataSourceClient;
  private readonly subscriptionRegistryService: SubscriptionRegistryService;
  private readonly seenEventStoreService: SeenEventStoreService;
  private readonly notificationDispatcherService: NotificationDispatcherService;
  private readonly rateLimiterService: BottleneckRateLimiterService;
  private readonly metricsService: MetricsService;
  private readonly watermarks: WatermarkBook;

  protected constructor(
    dependencies: PollCycleDependencies,
    private readonly gateKey: LimiterKey,
    loggerContext: string,
  ) {
    this.logger = new Logger(loggerContext);
    this.dataSourceClient = dependencies.dataSourceClient;
    this.subscriptionRegistryService = dependencies.subscriptionRegistryService;
    this.seenEventStoreService = dependencies.seenEventStoreService;
    this.notificationDispatcherService = dependencies.notificationDispatcherService;
    this.rateLimiterService = dependencies.rateLimiterService;
    this.metricsService = dependencies.metricsService;
    this.watermarks = new WatermarkBook(dependencies.appConfigService.pollLookbackSec);
  }

  /** Polled entity (wallet address or token mint) mapped to its subscribers. */
  protected abstract groupSubscribers(
    snapshot: RegistrySnapshot,
  ): ReadonlyMap<string, readonly TSubscriber[]>;

  protected abstract fetchEntity(
    entity: string,
    subscribers: readonly TSubscriber[],
    since: number,
  ): Promise<readonly TransactionEvent[]>;

  protected abstract buildIntents(
    event: TransactionEvent,
    subscribers: readonly TSubscriber[],
    generatedAt: Date,
  ): NotificationIntent[];

  public getWatermark(entity: string): number | null {
    return this.watermarks.get(entity);
  }

  public async runTick(context: ITickContext): Promise<ITickReport> {
    const subscribersByEntity: ReadonlyMap<string, readonly TSubscriber[]> =
      this.groupSubscribers(this.subscriptionRegistryService.snapshot());
    const tickStartSec: number = Math.floor(context.startedAt.getTime() / 1000);

    const results: EntityFetchResult[] = await Promise.all(
      [...subscribersByEntity].map(
        async ([entity, subscribers]): Promise<EntityFetchResult> =>
          this.fetchGated(entity, subscribers, this.watermarks.resolveSince(entity, tickStartSec)),
      ),
    );

    const batches: EntityBatch[] = [];
    let failedEntities: number = 0;

    for (const result of results) {
      if ('error' in result) {
        failedEntities += 1;
        this.metricsService.pollEntityFailuresTotal.inc({ cycle: this.name });
        this.logger.warn(
          `poll entity failed cycle=${this.name} entity=${result.entity} reason=${describeError(result.error)}`,
        );
      } else {
        batches.push(result);
      }
    }

    const eventsFetched: number = batches.reduce(
      (total: number, batch): number => total + batch.events.length,
      0,
    );

    if (context.isStopping()) {
      this.logger.warn(
        `poll tick abandoned on shutdown cycle=${this.name} eventsFetched=${String(eventsFetched)}`,
      );
      return {
        cycle: this.name,
        entities: subscribersByEntity.size,
        failedEntities,
        eventsFetched,
        newEvents: 0,
        intents: 0,
        abandoned: true,
      };
    }

    const generatedAt: Date = new Date();
    const merged: TransactionEvent[] = batches
      .flatMap((batch): readonly TransactionEvent[] => batch.events)
      .sort(compareEventsByTimestamp);
    const intents: NotificationIntent[] = [];
    let newEvents: number = 0;

    for (const event of merged) {
      if (!this.seenEventStoreService.markAndCheck(event.eventId)) {
        continue;
      }

      newEvents += 1;
      intents.push(
        ...this.buildIntents(event, subscribersByEntity.get(event.walletOrToken) ?? [], generatedAt),
      );
    }

    // A fetch that returned nothing still pins the watermark at its lower bound.
    for (const batch of batches) {
      this.watermarks.advance(batch.entity, batch.since);

      for (const event of batch.events) {
        this.watermarks.advance(batch.entity, event.timestamp);
      }
    }

    this.watermarks.retain(new Set<string>(subscribersByEntity.keys()));

    await this.notificationDispatcherService.dispatch(intents);

    this.logger.debug(
      `poll tick done cycle=${this.name} entities=${String(subscribersByEntity.size)} failed=${String(failedEntities)} fetched=${String(eventsFetched)} new=${String(newEvents)} intents=${String(intents.length)}`,
    );

    return {
      cycle: this.name,
      entities: subscribersByEntity.size,
      failedEntities,
      eventsFetched,
      newEvents,
      intents: intents.length,
      abandoned: false,
    };
  }

  private async fetchGated(
    entity: string,
    subscribers: readonly TSubscriber[],
    since: number,
  ): Promise<EntityFetchResult> {
    try {
      const events: readonly TransactionEvent[] = await this.rateLimiterService.schedule(
        this.gateKey,
        async (): Promise<readonly TransactionEvent[]> =>
          this.fetchEntity(entity, subscribers, since),
        RequestPriority.NORMAL,
      );

      return { entity, since, events };
    } catch (error: unknown) {
      return { entity, error };
    }
  }
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
