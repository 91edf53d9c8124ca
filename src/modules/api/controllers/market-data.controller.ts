import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';

import type {
  ITokenHolder,
  ITokenStats,
  IWalletSnapshot,
} from '../../../common/interfaces/data-source/data-source-client.interfaces';
import { TrackingService } from '../../tracking/tracking.service';
import { type TopHoldersQueryDto, topHoldersQuerySchema } from '../dto/top-holders-query.dto';
import {
  type HighestTransactionQueryDto,
  highestTransactionQuerySchema,
  type RecentTransactionsQueryDto,
  recentTransactionsQuerySchema,
} from '../dto/transaction-query.dto';
import type {
  IHighestTransactionResult,
  IRecentTransactionsResult,
} from '../interfaces/api-results.interfaces';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  HIGHEST_TRANSACTION_RESULT_SCHEMA,
  RECENT_TRANSACTIONS_RESULT_SCHEMA,
  TOKEN_STATS_RESULT_SCHEMA,
  TOP_HOLDERS_RESULT_SCHEMA,
  WALLET_SNAPSHOT_RESULT_SCHEMA,
} from '../swagger/api-schemas';

@ApiTags('Market data')
@Controller('api')
export class MarketDataController {
  public constructor(private readonly trackingService: TrackingService) {}

  @Get('wallets/:address/snapshot')
  @ApiOperation({ summary: 'Token balances of a wallet' })
  @ApiParam({ name: 'address', type: 'string' })
  @ApiResponse({ status: 200, description: 'Snapshot', schema: WALLET_SNAPSHOT_RESULT_SCHEMA })
  @ApiResponse({ status: 503, description: 'Data provider unavailable' })
  public async getWalletSnapshot(@Param('address') address: string): Promise<IWalletSnapshot> {
    return this.trackingService.getWalletSnapshot(address);
  }

  @Get('tokens/:mint/stats')
  @ApiOperation({ summary: 'Token price and market stats' })
  @ApiParam({ name: 'mint', type: 'string', description: 'Mint address or SOL, USDC, USDT' })
  @ApiResponse({ status: 200, description: 'Stats', schema: TOKEN_STATS_RESULT_SCHEMA })
  @ApiResponse({ status: 503, description: 'Data provider unavailable' })
  public async getTokenStats(@Param('mint') mint: string): Promise<ITokenStats> {
    return this.trackingService.getTokenStats(mint);
  }

  @Get('tokens/:mint/top-holders')
  @ApiOperation({ summary: 'Largest holders of a token' })
  @ApiParam({ name: 'mint', type: 'string', description: 'Mint address or SOL, USDC, USDT' })
  @ApiQuery({ name: 'count', required: false, type: 'integer' })
  @ApiResponse({ status: 200, description: 'Holders', schema: TOP_HOLDERS_RESULT_SCHEMA })
  public async getTopHolders(
    @Param('mint') mint: string,
    @Query(new ZodValidationPipe(topHoldersQuerySchema)) query: TopHoldersQueryDto,
  ): Promise<readonly ITokenHolder[]> {
    return this.trackingService.getTopTokenHolders(mint, query.count);
  }

  @Get('wallets/:address/transactions')
  @ApiOperation({ summary: 'Recent transfers of a wallet, newest first' })
  @ApiParam({ name: 'address', type: 'string' })
  @ApiQuery({ name: 'windowSec', required: false, type: 'integer' })
  @ApiQuery({ name: 'limit', required: false, type: 'integer' })
  @ApiResponse({ status: 200, description: 'Transfers', schema: RECENT_TRANSACTIONS_RESULT_SCHEMA })
  @ApiResponse({ status: 400, description: 'Invalid address or query' })
  @ApiResponse({ status: 503, description: 'Data provider unavailable' })
  public async getRecentTransactions(
    @Param('address') address: string,
    @Query(new ZodValidationPipe(recentTransactionsQuerySchema)) query: RecentTransactionsQueryDto,
  ): Promise<IRecentTransactionsResult> {
    const transactions = await this.trackingService.getRecentWalletTransactions(
      address,
      query.windowSec,
      query.limit,
    );

    return { address: address.trim(), windowSec: query.windowSec, transactions };
  }

  @Get('whale-transactions/highest')
  @ApiOperation({ summary: 'Largest transfer in the recent window' })
  @ApiQuery({ name: 'windowSec', required: false, type: 'integer' })
  @ApiQuery({ name: 'token', required: false, type: 'string', description: 'Mint address or SOL, USDC, USDT' })
  @ApiResponse({ status: 200, description: 'Transfer or null', schema: HIGHEST_TRANSACTION_RESULT_SCHEMA })
  @ApiResponse({ status: 503, description: 'Data provider unavailable' })
  public async getHighestTransaction(
    @Query(new ZodValidationPipe(highestTransactionQuerySchema)) query: HighestTransactionQueryDto,
  ): Promise<IHighestTransactionResult> {
    const transaction = await this.trackingService.getHighestWhaleTransaction(
      query.windowSec,
      query.token,
    );

    return { windowSec: query.windowSec, token: query.token ?? null, transaction };
  }
}
