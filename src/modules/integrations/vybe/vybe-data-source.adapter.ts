import { Injectable, Logger } from '@nestjs/common';
import type { z } from 'zod';

import {
  vybeTokenStatsSchema,
  vybeTopHoldersResponseSchema,
  type VybeTransfer,
  vybeTransferSchema,
  vybeTransfersResponseSchema,
  vybeWalletBalanceResponseSchema,
} from './vybe-api.schemas';
import { VybeHttpError, VybePayloadError } from './vybe-http.errors';
import {
  mapTokenStats,
  mapTokenTransfer,
  mapTopHolder,
  mapWalletSnapshot,
  mapWalletTransfer,
} from './vybe-transfer.mapper';
import { ProviderUnavailableError } from '../../../common/errors/whale-watch.errors';
import type {
  IDataSourceClient,
  ITokenHolder,
  ITokenStats,
  IWalletSnapshot,
} from '../../../common/interfaces/data-source/data-source-client.interfaces';
import {
  type TransactionEvent,
  TransferDirection,
} from '../../../common/interfaces/events/transaction-event.interfaces';
import type { ICacheStats } from '../../../common/utils/cache/cache.interfaces';
import { ReadThroughCache } from '../../../common/utils/cache/read-through-cache';
import { compareEventsByTimestamp } from '../../../common/utils/events/transaction-event.util';
import {
  BackoffExhaustedError,
  executeWithExponentialBackoff,
} from '../../../common/utils/network/exponential-backoff.util';
import { AppConfigService } from '../../../config/app-config.service';
import { MetricsService } from '../../../observability/metrics.service';
import {
  LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';

const WALLET_TRANSFER_PAGE_LIMIT = 100;
const TOKEN_TRANSFER_PAGE_LIMIT = 1000;
// Transfers at or below this USD value are dust and never reach users.
const DUST_VALUE_USD = 0.01;
const TOKEN_STATS_CACHE_MAX_KEYS = 500;
const TOKEN_STATS_CACHE_NAME = 'token_stats';

type QueryParams = Readonly<Record<string, string | number>>;

type VybeRequest<TSchema extends z.ZodType> = {
  readonly operation: string;
  readonly path: string;
  readonly query?: QueryParams;
  readonly schema: TSchema;
  readonly priority: RequestPriority;
};

/**
 * Data source backed by the Vybe Network REST API.
 * Every request goes through the Vybe rate limiter and the shared backoff policy.
 */
@Injectable()
export class VybeDataSourceAdapter implements IDataSourceClient {
  private readonly logger: Logger = new Logger(VybeDataSourceAdapter.name);
  private readonly tokenStatsCache: ReadThroughCache<ITokenStats>;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly metricsService: MetricsService,
  ) {
    this.tokenStatsCache = new ReadThroughCache<ITokenStats>({
      ttlSec: this.appConfigService.tokenStatsCacheTtlSec,
      maxKeys: TOKEN_STATS_CACHE_MAX_KEYS,
    });
  }

  public async getWalletTransactions(
    address: string,
    since: number,
  ): Promise<readonly TransactionEvent[]> {
    return this.fetchWalletTransfers(address, since, WALLET_TRANSFER_PAGE_LIMIT);
  }

  public async getRecentWalletTransactions(
    address: string,
    since: number,
    limit: number,
  ): Promise<readonly TransactionEvent[]> {
    const events: readonly TransactionEvent[] = await this.fetchWalletTransfers(
      address,
      since,
      limit,
    );

    return [...events].reverse().slice(0, limit);
  }

  public async getHighestTransaction(
    since: number,
    tokenMint?: string,
  ): Promise<TransactionEvent | null> {
    const query: Record<string, string | number> = {
      timeStart: since,
      limit: TOKEN_TRANSFER_PAGE_LIMIT,
    };

    if (tokenMint !== undefined) {
      query['mintAddress'] = tokenMint;
    }

    const transfers: readonly VybeTransfer[] = await this.fetchTransfers('highest_transfer', query);
    let highest: TransactionEvent | null = null;

    for (const transfer of transfers) {
      const event: TransactionEvent = mapTokenTransfer(
        transfer,
        tokenMint ?? transfer.mintAddress,
      );

      if (event.timestamp > since && (highest === null || event.amount > highest.amount)) {
        highest = event;
      }
    }

    return highest;
  }

  public async getTokenLargeTransactions(
    tokenMint: string,
    minAmount: number,
    since?: number,
  ): Promise<readonly TransactionEvent[]> {
    const query: Record<string, string | number> = {
      mintAddress: tokenMint,
      minUsdAmount: minAmount,
      limit: TOKEN_TRANSFER_PAGE_LIMIT,
    };

    if (since !== undefined) {
      query['timeStart'] = since;
    }

    const transfers: readonly VybeTransfer[] = await this.fetchTransfers(
      'token_large_transfers',
      query,
    );
    const events: Map<string, TransactionEvent> = new Map<string, TransactionEvent>();

    for (const transfer of transfers) {
      const event: TransactionEvent = mapTokenTransfer(transfer, tokenMint);

      if (event.amount >= minAmount && (since === undefined || event.timestamp > since)) {
        events.set(event.eventId, event);
      }
    }

    return [...events.values()].sort(compareEventsByTimestamp);
  }

  public async getTokenStats(tokenMint: string): Promise<ITokenStats> {
    try {
      return await this.tokenStatsCache.getOrLoad(tokenMint, async (): Promise<ITokenStats> => {
        const payload = await this.request({
          operation: 'token_stats',
          path: `/token/${encodeURIComponent(tokenMint)}`,
          schema: vybeTokenStatsSchema,
          priority: RequestPriority.HIGH,
        });

        return mapTokenStats(payload, tokenMint);
      });
    } finally {
      this.recordTokenStatsCacheStats();
    }
  }

  public async getWalletSnapshot(address: string): Promise<IWalletSnapshot> {
    const payload = await this.request({
      operation: 'wallet_balance',
      path: `/account/token-balance/${encodeURIComponent(address)}`,
      schema: vybeWalletBalanceResponseSchema,
      priority: RequestPriority.HIGH,
    });

    return mapWalletSnapshot(payload, address);
  }

  public async getTopTokenHolders(
    tokenMint: string,
    count: number,
  ): Promise<readonly ITokenHolder[]> {
    const payload = await this.request({
      operation: 'top_holders',
      path: `/token/${encodeURIComponent(tokenMint)}/top-holders`,
      schema: vybeTopHoldersResponseSchema,
      priority: RequestPriority.HIGH,
    });

    return payload.data.slice(0, count).map(mapTopHolder);
  }

  private async fetchWalletTransfers(
    address: string,
    since: number,
    limit: number,
  ): Promise<readonly TransactionEvent[]> {
    const [received, sent] = await Promise.all([
      this.fetchTransfers('wallet_transfers_in', {
        receiverAddress: address,
        timeStart: since,
        limit,
      }),
      this.fetchTransfers('wallet_transfers_out', {
        senderAddress: address,
        timeStart: since,
        limit,
      }),
    ]);

    const events: Map<string, TransactionEvent> = new Map<string, TransactionEvent>();
    const collect = (transfers: readonly VybeTransfer[], direction: TransferDirection): void => {
      for (const transfer of transfers) {
        const event: TransactionEvent = mapWalletTransfer(transfer, address, direction);

        if (event.timestamp > since && event.amount > DUST_VALUE_USD) {
          events.set(event.eventId, event);
        }
      }
    };

    collect(received, TransferDirection.IN);
    collect(sent, TransferDirection.OUT);

    return [...events.values()].sort(compareEventsByTimestamp);
  }

  private recordTokenStatsCacheStats(): void {
    const stats: ICacheStats = this.tokenStatsCache.stats();
    const labels = { cache: TOKEN_STATS_CACHE_NAME };

    this.metricsService.cacheKeys.set(labels, stats.keys);
    this.metricsService.cacheHitsTotal.set(labels, stats.hits);
    this.metricsService.cacheMissesTotal.set(labels, stats.misses);
  }

  private async fetchTransfers(
    operation: string,
    query: QueryParams,
  ): Promise<readonly VybeTransfer[]> {
    const payload = await this.request({
      operation,
      path: '/token/transfers',
      query,
      schema: vybeTransfersResponseSchema,
      priority: RequestPriority.NORMAL,
    });
    const transfers: VybeTransfer[] = [];
    let skipped: number = 0;

    for (const rawTransfer of payload.transfers) {
      const parsed = vybeTransferSchema.safeParse(rawTransfer);

      if (parsed.success) {
        transfers.push(parsed.data);
      } else {
        skipped += 1;
      }
    }

    if (skipped > 0) {
      this.logger.warn(
        `vybe_malformed_transfers operation=${operation} skipped=${String(skipped)}`,
      );
    }

    return transfers;
  }

  private async request<TSchema extends z.ZodType>(
    request: VybeRequest<TSchema>,
  ): Promise<z.infer<TSchema>> {
    const url: string = this.buildUrl(request.path, request.query);
    const stopTimer = this.metricsService.providerRequestDurationSeconds.startTimer({
      operation: request.operation,
    });
    let attempts: number = 0;

    try {
      const payload: unknown = await executeWithExponentialBackoff<unknown>(
        async (): Promise<unknown> =>
          this.rateLimiterService.schedule(
            LimiterKey.VYBE,
            async (): Promise<unknown> => {
              attempts += 1;
              return this.fetchJson(url);
            },
            request.priority,
          ),
        {
          maxAttempts: this.appConfigService.providerMaxAttempts,
          baseDelayMs: this.appConfigService.providerBackoffBaseMs,
          maxDelayMs: this.appConfigService.providerBackoffMaxMs,
          shouldRetry: (error: unknown): boolean => isRetryableVybeError(error),
          onRetry: (error: unknown, attempt: number, delayMs: number): void => {
            this.logger.warn(
              `vybe_retry operation=${request.operation} attempt=${String(attempt)} delayMs=${String(delayMs)} reason=${describeError(error)}`,
            );
          },
        },
      );
      const parsed = request.schema.safeParse(payload);

      if (!parsed.success) {
        throw new VybePayloadError(request.operation, parsed.error.issues.length);
      }

      this.metricsService.providerRequestsTotal.inc({ operation: request.operation, status: 'ok' });
      return parsed.data;
    } catch (error: unknown) {
      this.metricsService.providerRequestsTotal.inc({
        operation: request.operation,
        status: 'error',
      });
      const cause: unknown = error instanceof BackoffExhaustedError ? error.cause : error;
      this.logger.warn(
        `vybe_unavailable operation=${request.operation} attempts=${String(attempts)} reason=${describeError(cause)}`,
      );
      throw new ProviderUnavailableError(request.operation, attempts, cause);
    } finally {
      stopTimer();
    }
  }

  private async fetchJson(url: string): Promise<unknown> {
    const response: Response = await fetch(url, {
      method: 'GET',
      headers: {
        accept: 'application/json',
        'x-api-key': this.appConfigService.vybeApiKey,
      },
      signal: AbortSignal.timeout(this.appConfigService.vybeTimeoutMs),
    });

    if (!response.ok) {
      throw new VybeHttpError(response.status);
    }

    return response.json();
  }

  private buildUrl(path: string, query: QueryParams | undefined): string {
    const url: URL = new URL(`${this.appConfigService.vybeApiBaseUrl}${path}`);

    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    return url.toString();
  }
}

const isRetryableVybeError = (error: unknown): boolean => {
  if (error instanceof VybeHttpError) {
    return error.retryable;
  }

  const errorMessage: string = describeError(error).toLowerCase();
  const errorName: string = error instanceof Error ? error.name : '';

  return (
    errorName === 'TimeoutError' ||
    errorName === 'AbortError' ||
    errorMessage.includes('timeout') ||
    errorMessage.includes('fetch failed') ||
    errorMessage.includes('network') ||
    errorMessage.includes('econnreset')
  );
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
