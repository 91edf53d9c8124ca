import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

import type {
  IAddWalletResult,
  WalletSubscription,
} from '../../tracking/entities/subscription.interfaces';
import { TrackingService } from '../../tracking/tracking.service';
import { type TrackWalletDto, trackWalletSchema } from '../dto/track-wallet.dto';
import { userIdSchema } from '../dto/user-id.dto';
import type {
  ITrackWalletResult,
  IUntrackWalletResult,
  IWalletListResult,
  IWalletView,
} from '../interfaces/api-results.interfaces';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  TRACK_WALLET_BODY_SCHEMA,
  TRACK_WALLET_RESULT_SCHEMA,
  UNTRACK_WALLET_RESULT_SCHEMA,
  WALLET_LIST_RESULT_SCHEMA,
} from '../swagger/api-schemas';

const toWalletView = (subscription: WalletSubscription): IWalletView => ({
  address: subscription.walletAddress,
  createdAt: subscription.createdAt.toISOString(),
});

@ApiTags('Wallets')
@Controller('api/users/:userId/wallets')
export class WalletsController {
  public constructor(private readonly trackingService: TrackingService) {}

  @Get()
  @ApiOperation({ summary: 'List tracked wallets in insertion order' })
  @ApiParam({ name: 'userId', type: 'string' })
  @ApiResponse({ status: 200, description: 'Wallet list', schema: WALLET_LIST_RESULT_SCHEMA })
  public listWallets(
    @Param('userId', new ZodValidationPipe(userIdSchema)) userId: string,
  ): IWalletListResult {
    return {
      userId,
      wallets: this.trackingService.listWallets(userId).map(toWalletView),
    };
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Track a wallet; tracking it again is a no-op' })
  @ApiParam({ name: 'userId', type: 'string' })
  @ApiBody({ schema: TRACK_WALLET_BODY_SCHEMA })
  @ApiResponse({ status: 201, description: 'Wallet tracked', schema: TRACK_WALLET_RESULT_SCHEMA })
  @ApiResponse({ status: 400, description: 'Invalid Solana address' })
  public async trackWallet(
    @Param('userId', new ZodValidationPipe(userIdSchema)) userId: string,
    @Body(new ZodValidationPipe(trackWalletSchema)) body: TrackWalletDto,
  ): Promise<ITrackWalletResult> {
    const result: IAddWalletResult = await this.trackingService.trackWallet(userId, body.address);

    return { ...toWalletView(result.subscription), created: result.created };
  }

  @Delete(':address')
  @ApiOperation({ summary: 'Stop tracking a wallet' })
  @ApiParam({ name: 'userId', type: 'string' })
  @ApiParam({ name: 'address', type: 'string' })
  @ApiResponse({ status: 200, description: 'Wallet removed', schema: UNTRACK_WALLET_RESULT_SCHEMA })
  public async untrackWallet(
    @Param('userId', new ZodValidationPipe(userIdSchema)) userId: string,
    @Param('address') address: string,
  ): Promise<IUntrackWalletResult> {
    const removed: boolean = await this.trackingService.untrackWallet(userId, address);

    return { address, removed };
  }
}
