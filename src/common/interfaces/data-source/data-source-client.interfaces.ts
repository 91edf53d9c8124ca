import type { TransactionEvent } from '../events/transaction-event.interfaces';

export interface ITokenStats {
  readonly mintAddress: string;
  readonly symbol: string | null;
  readonly name: string | null;
  readonly priceUsd: number | null;
  readonly priceChange24hPct: number | null;
  readonly volume24hUsd: number | null;
  readonly marketCapUsd: number | null;
}

export interface ITokenBalance {
  readonly mintAddress: string;
  readonly symbol: string | null;
  readonly name: string | null;
  readonly amount: number;
  readonly valueUsd: number;
  readonly priceUsd: number | null;
}

export interface IWalletSnapshot {
  readonly ownerAddress: string;
  readonly totalValueUsd: number;
  readonly totalValueChange1dUsd: number | null;
  readonly tokenCount: number;
  readonly tokens: readonly ITokenBalance[];
}

export interface ITokenHolder {
  readonly rank: number;
  readonly ownerAddress: string;
  readonly ownerName: string | null;
  readonly balance: number;
  readonly valueUsd: number;
  readonly percentageOfSupplyHeld: number;
  readonly tokenSymbol: string | null;
}

/**
 * Read-only view of the on-chain data provider.
 * Implementations retry transient failures and throw ProviderUnavailableError once they give up.
 */
export interface IDataSourceClient {
  /** Transfers sent or received by the wallet with timestamp strictly after `since`, oldest first. */
  getWalletTransactions(address: string, since: number): Promise<readonly TransactionEvent[]>;
  /** Transfers of the mint worth at least `minAmount` USD, oldest first. */
  getTokenLargeTransactions(
    tokenMint: string,
    minAmount: number,
    since?: number,
  ): Promise<readonly TransactionEvent[]>;
  /** Latest transfers of the wallet after `since`, newest first, at most `limit`. */
  getRecentWalletTransactions(
    address: string,
    since: number,
    limit: number,
  ): Promise<readonly TransactionEvent[]>;
  /** Largest transfer by USD value after `since`, market-wide unless a mint is given. */
  getHighestTransaction(since: number, tokenMint?: string): Promise<TransactionEvent | null>;
  getTokenStats(tokenMint: string): Promise<ITokenStats>;
  getWalletSnapshot(address: string): Promise<IWalletSnapshot>;
  getTopTokenHolders(tokenMint: string, count: number): Promise<readonly ITokenHolder[]>;
}
