import {
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnModuleDestroy,
} from '@nestjs/common';

import { PollCycleRunner } from './poll-cycle.runner';
import type { IPollCycleStatus } from './polling.interfaces';
import { WalletTrackingCycle } from './wallet-tracking.cycle';
import { WhaleAlertCycle } from './whale-alert.cycle';
import { AppConfigService } from '../../config/app-config.service';
import { MetricsService } from '../../observability/metrics.service';

const WHALE_ALERT_INITIAL_DELAY_MS = 10_000;
const WALLET_TRACKING_INITIAL_DELAY_MS = 30_000;
const MS_PER_SECOND = 1000;

@Injectable()
export class PollSchedulerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger: Logger = new Logger(PollSchedulerService.name);
  private readonly runners: readonly PollCycleRunner[];

  public constructor(
    walletTrackingCycle: WalletTrackingCycle,
    whaleAlertCycle: WhaleAlertCycle,
    appConfigService: AppConfigService,
    metricsService: MetricsService,
  ) {
    this.runners = [
      new PollCycleRunner(
        whaleAlertCycle,
        {
          enabled: appConfigService.whaleAlertsEnabled,
          intervalMs: appConfigService.whaleAlertIntervalSec * MS_PER_SECOND,
          initialDelayMs: WHALE_ALERT_INITIAL_DELAY_MS,
        },
        metricsService,
      ),
      new PollCycleRunner(
        walletTrackingCycle,
        {
          enabled: appConfigService.walletTrackingEnabled,
          intervalMs: appConfigService.walletTrackingIntervalSec * MS_PER_SECOND,
          initialDelayMs: WALLET_TRACKING_INITIAL_DELAY_MS,
        },
        metricsService,
      ),
    ];
  }

  public onApplicationBootstrap(): void {
    for (const runner of this.runners) {
      runner.start();
    }
  }

  public async onModuleDestroy(): Promise<void> {
    this.logger.log('stopping poll cycles');
    await Promise.all(this.runners.map(async (runner: PollCycleRunner): Promise<void> => runner.stop()));
    this.logger.log('poll cycles stopped');
  }

  public getStatus(): readonly IPollCycleStatus[] {
    return this.runners.map((runner: PollCycleRunner): IPollCycleStatus => runner.getStatus());
  }
}
