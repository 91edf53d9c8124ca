import { Module } from '@nestjs/common';

import { VybeDataSourceAdapter } from './vybe-data-source.adapter';
import { DATA_SOURCE_CLIENT } from '../../../common/interfaces/data-source/data-source-port.tokens';
import { ObservabilityModule } from '../../../observability/observability.module';
import { RateLimitingModule } from '../../../rate-limiting/rate-limiting.module';

@Module({
  imports: [RateLimitingModule, ObservabilityModule],
  providers: [
    VybeDataSourceAdapter,
    {
      provide: DATA_SOURCE_CLIENT,
      useExisting: VybeDataSourceAdapter,
    },
  ],
  exports: [DATA_SOURCE_CLIENT],
})
export class VybeModule {}
