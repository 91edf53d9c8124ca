import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { MarketDataController } from './controllers/market-data.controller';
import { WalletsController } from './controllers/wallets.controller';
import { WhaleAlertController } from './controllers/whale-alert.controller';
import { WhaleWatchExceptionFilter } from './filters/whale-watch-exception.filter';
import { TrackingModule } from '../tracking/tracking.module';

@Module({
  imports: [TrackingModule],
  controllers: [WalletsController, WhaleAlertController, MarketDataController],
  providers: [{ provide: APP_FILTER, useClass: WhaleWatchExceptionFilter }],
})
export class ApiModule {}
