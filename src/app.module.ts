import { Module } from '@nestjs/common';

import { ConfigModule } from './config/config.module';
import { HealthModule } from './health/health.module';
import { ApiModule } from './modules/api/api.module';
import { PollingModule } from './modules/polling/polling.module';
import { ObservabilityModule } from './observability/observability.module';

@Module({
  imports: [ConfigModule, ObservabilityModule, PollingModule, ApiModule, HealthModule],
})
export class AppModule {}
