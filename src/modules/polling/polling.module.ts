import { Module } from '@nestjs/common';

import { PollCycleDependencies } from './poll-cycle.dependencies';
import { PollSchedulerService } from './poll-scheduler.service';
import { WalletTrackingCycle } from './wallet-tracking.cycle';
import { WhaleAlertCycle } from './whale-alert.cycle';
import { ObservabilityModule } from '../../observability/observability.module';
import { RateLimitingModule } from '../../rate-limiting/rate-limiting.module';
import { DedupModule } from '../dedup/dedup.module';
import { VybeModule } from '../integrations/vybe/vybe.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { TrackingModule } from '../tracking/tracking.module';

@Module({
  imports: [
    ObservabilityModule,
    RateLimitingModule,
    DedupModule,
    VybeModule,
    NotificationsModule,
    TrackingModule,
  ],
  providers: [PollCycleDependencies, WalletTrackingCycle, WhaleAlertCycle, PollSchedulerService],
  exports: [PollSchedulerService],
})
export class PollingModule {}
