import { Module } from '@nestjs/common';

import { SeenEventEvictionService } from './seen-event-eviction.service';
import { SeenEventStoreService } from './seen-event-store.service';

@Module({
  providers: [SeenEventStoreService, SeenEventEvictionService],
  exports: [SeenEventStoreService],
})
export class DedupModule {}
