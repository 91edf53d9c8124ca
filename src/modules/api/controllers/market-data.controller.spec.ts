import { BadRequestException } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';

import { MarketDataController } from './market-data.controller';
import {
  type TransactionEvent,
  TransferDirection,
} from '../../../common/interfaces/events/transaction-event.interfaces';
import type { TrackingService } from '../../tracking/tracking.service';
import {
  highestTransactionQuerySchema,
  recentTransactionsQuerySchema,
} from '../dto/transaction-query.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import { USDC_MINT, WALLET_A, WALLET_B } from '../../../../test/helpers/solana-addresses';

type TrackingServiceStub = {
  readonly getRecentWalletTransactions: ReturnType<typeof vi.fn>;
  readonly getHighestWhaleTransaction: ReturnType<typeof vi.fn>;
};

const transfer: TransactionEvent = {
  eventId: `sig-1:out:${USDC_MINT}`,
  walletOrToken: WALLET_A,
  signature: 'sig-1',
  amount: 250_000,
  tokenAmount: 250_000,
  tokenSymbol: 'USDC',
  tokenMint: USDC_MINT,
  timestamp: 1_700_000_000,
  direction: TransferDirection.OUT,
  counterpartyAddress: WALLET_B,
  senderAddress: WALLET_A,
  receiverAddress: WALLET_B,
};

const createStub = (): TrackingServiceStub => ({
  getRecentWalletTransactions: vi.fn().mockResolvedValue([transfer]),
  getHighestWhaleTransaction: vi.fn().mockResolvedValue(null),
});

const createController = (stub: TrackingServiceStub): MarketDataController =>
  new MarketDataController(stub as unknown as TrackingService);

describe('MarketDataController', (): void => {
  it('returns recent wallet transfers with the defaulted query', async (): Promise<void> => {
    const stub: TrackingServiceStub = createStub();
    const query = new ZodValidationPipe(recentTransactionsQuerySchema).transform({});

    const result = await createController(stub).getRecentTransactions(WALLET_A, query);

    expect(stub.getRecentWalletTransactions).toHaveBeenCalledWith(WALLET_A, 120, 10);
    expect(result).toEqual({ address: WALLET_A, windowSec: 120, transactions: [transfer] });
  });

  it('coerces numeric query strings for recent transfers', async (): Promise<void> => {
    const stub: TrackingServiceStub = createStub();
    const query = new ZodValidationPipe(recentTransactionsQuerySchema).transform({
      windowSec: '600',
      limit: '3',
    });

    await createController(stub).getRecentTransactions(WALLET_A, query);

    expect(stub.getRecentWalletTransactions).toHaveBeenCalledWith(WALLET_A, 600, 3);
  });

  it('rejects a recent transfer limit above the maximum', (): void => {
    const pipe = new ZodValidationPipe(recentTransactionsQuerySchema);

    expect((): unknown => pipe.transform({ limit: '51' })).toThrow(BadRequestException);
  });

  it('echoes the requested token and a null transfer when none matched', async (): Promise<void> => {
    const stub: TrackingServiceStub = createStub();
    const query = new ZodValidationPipe(highestTransactionQuerySchema).transform({
      windowSec: '300',
      token: ' usdc ',
    });

    const result = await createController(stub).getHighestTransaction(query);

    expect(stub.getHighestWhaleTransaction).toHaveBeenCalledWith(300, 'usdc');
    expect(result).toEqual({ windowSec: 300, token: 'usdc', transaction: null });
  });

  it('looks up the highest transfer market-wide without a token', async (): Promise<void> => {
    const stub: TrackingServiceStub = createStub();
    stub.getHighestWhaleTransaction.mockResolvedValue(transfer);
    const query = new ZodValidationPipe(highestTransactionQuerySchema).transform({});

    const result = await createController(stub).getHighestTransaction(query);

    expect(stub.getHighestWhaleTransaction).toHaveBeenCalledWith(120, undefined);
    expect(result).toEqual({ windowSec: 120, token: null, transaction: transfer });
  });
});
