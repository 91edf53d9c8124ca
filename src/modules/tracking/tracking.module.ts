import { Module } from '@nestjs/common';

import { SolanaAddressCodec } from './solana-address.codec';
import { SubscriptionRegistryService } from './subscription-registry.service';
import { TrackingService } from './tracking.service';
import { DatabaseModule } from '../../database/database.module';
import { VybeModule } from '../integrations/vybe/vybe.module';

@Module({
  imports: [DatabaseModule, VybeModule],
  providers: [SolanaAddressCodec, SubscriptionRegistryService, TrackingService],
  exports: [SolanaAddressCodec, SubscriptionRegistryService, TrackingService],
})
export class TrackingModule {}
