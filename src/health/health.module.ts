import { Module } from '@nestjs/common';

import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { DatabaseModule } from '../database/database.module';
import { DedupModule } from '../modules/dedup/dedup.module';
import { PollingModule } from '../modules/polling/polling.module';

@Module({
  imports: [DatabaseModule, DedupModule, PollingModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
