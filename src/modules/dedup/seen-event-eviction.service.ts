import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';

import { SeenEventStoreService } from './seen-event-store.service';
import { AppConfigService } from '../../config/app-config.service';

const MS_PER_SECOND = 1000;

/** Background eviction of seen event ids past the retention horizon. */
@Injectable()
export class SeenEventEvictionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(SeenEventEvictionService.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  public constructor(
    private readonly seenEventStore: SeenEventStoreService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    const intervalMs: number = this.appConfigService.dedupEvictionIntervalSec * MS_PER_SECOND;

    this.intervalHandle = setInterval((): void => {
      this.runEviction();
    }, intervalMs);
    this.intervalHandle.unref();

    this.logger.log(
      `seen event eviction started intervalSec=${String(this.appConfigService.dedupEvictionIntervalSec)} retentionSec=${String(this.appConfigService.dedupRetentionSec)}`,
    );
  }

  public onModuleDestroy(): void {
    if (this.intervalHandle !== null) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  public runEviction(): number {
    const cutoff: Date = new Date(
      Date.now() - this.appConfigService.dedupRetentionSec * MS_PER_SECOND,
    );
    const evicted: number = this.seenEventStore.evict(cutoff);

    this.logger.debug(
      `seen event eviction evicted=${String(evicted)} remaining=${String(this.seenEventStore.size())}`,
    );

    return evicted;
  }
}
