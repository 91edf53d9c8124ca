import type {
  VybeTokenStats,
  VybeTopHolder,
  VybeTransfer,
  VybeWalletBalanceResponse,
} from './vybe-api.schemas';
import type {
  ITokenBalance,
  ITokenHolder,
  ITokenStats,
  IWalletSnapshot,
} from '../../../common/interfaces/data-source/data-source-client.interfaces';
import {
  type TransactionEvent,
  TransferDirection,
} from '../../../common/interfaces/events/transaction-event.interfaces';
import { buildEventId } from '../../../common/utils/events/transaction-event.util';

const PERCENT = 100;

export const mapWalletTransfer = (
  transfer: VybeTransfer,
  walletAddress: string,
  direction: TransferDirection,
): TransactionEvent => ({
  eventId: buildEventId(transfer.signature, direction, walletAddress),
  walletOrToken: walletAddress,
  signature: transfer.signature,
  amount: transfer.valueUsd ?? 0,
  tokenAmount: transfer.calculatedAmount ?? null,
  tokenSymbol: transfer.symbol ?? null,
  tokenMint: transfer.mintAddress,
  timestamp: transfer.blockTime,
  direction,
  counterpartyAddress:
    direction === TransferDirection.IN ? transfer.senderAddress : transfer.receiverAddress,
  senderAddress: transfer.senderAddress,
  receiverAddress: transfer.receiverAddress,
});

/** Token-level transfers are seen from the sender's side. */
export const mapTokenTransfer = (transfer: VybeTransfer, tokenMint: string): TransactionEvent => ({
  eventId: buildEventId(transfer.signature, TransferDirection.OUT, tokenMint),
  walletOrToken: tokenMint,
  signature: transfer.signature,
  amount: transfer.valueUsd ?? 0,
  tokenAmount: transfer.calculatedAmount ?? null,
  tokenSymbol: transfer.symbol ?? null,
  tokenMint,
  timestamp: transfer.blockTime,
  direction: TransferDirection.OUT,
  counterpartyAddress: transfer.receiverAddress,
  senderAddress: transfer.senderAddress,
  receiverAddress: transfer.receiverAddress,
});

export const mapTokenStats = (payload: VybeTokenStats, tokenMint: string): ITokenStats => {
  const priceUsd: number | null = payload.priceUsd ?? payload.price ?? null;

  return {
    mintAddress: payload.mintAddress ?? tokenMint,
    symbol: payload.symbol ?? null,
    name: payload.name ?? null,
    priceUsd,
    priceChange24hPct: payload.priceChange24h ?? derivePriceChangePct(priceUsd, payload.price1d),
    volume24hUsd: payload.volume24h ?? payload.usdValueVolume24h ?? null,
    marketCapUsd: payload.marketCap ?? null,
  };
};

export const mapWalletSnapshot = (
  payload: VybeWalletBalanceResponse,
  ownerAddress: string,
): IWalletSnapshot => {
  const tokens: ITokenBalance[] = payload.data.map(
    (balance): ITokenBalance => ({
      mintAddress: balance.mintAddress,
      symbol: balance.symbol ?? null,
      name: balance.name ?? null,
      amount: balance.amount,
      valueUsd: balance.valueUsd,
      priceUsd: balance.priceUsd ?? null,
    }),
  );

  return {
    ownerAddress,
    totalValueUsd: payload.totalTokenValueUsd,
    totalValueChange1dUsd: payload.totalTokenValueUsd1dChange ?? null,
    tokenCount: payload.totalTokenCount ?? tokens.length,
    tokens,
  };
};

export const mapTopHolder = (holder: VybeTopHolder): ITokenHolder => ({
  rank: holder.rank,
  ownerAddress: holder.ownerAddress,
  ownerName: holder.ownerName ?? null,
  balance: holder.balance,
  valueUsd: holder.valueUsd,
  percentageOfSupplyHeld: holder.percentageOfSupplyHeld,
  tokenSymbol: holder.tokenSymbol ?? null,
});

const derivePriceChangePct = (
  priceUsd: number | null,
  price1d: number | null | undefined,
): number | null => {
  if (priceUsd === null || price1d === null || price1d === undefined || price1d <= 0) {
    return null;
  }

  return ((priceUsd - price1d) / price1d) * PERCENT;
};
