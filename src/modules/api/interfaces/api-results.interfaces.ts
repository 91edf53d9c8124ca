import type { TransactionEvent } from '../../../common/interfaces/events/transaction-event.interfaces';

export interface IWalletView {
  readonly address: string;
  readonly createdAt: string;
}

export interface IWalletListResult {
  readonly userId: string;
  readonly wallets: readonly IWalletView[];
}

export interface ITrackWalletResult extends IWalletView {
  readonly created: boolean;
}

export interface IUntrackWalletResult {
  readonly address: string;
  readonly removed: boolean;
}

export interface IWhaleAlertConfigView {
  readonly userId: string;
  readonly tokenMints: readonly string[];
  readonly thresholdAmount: number;
  readonly enabled: boolean;
  readonly updatedAt: string;
}

export interface IRecentTransactionsResult {
  readonly address: string;
  readonly windowSec: number;
  readonly transactions: readonly TransactionEvent[];
}

export interface IHighestTransactionResult {
  readonly windowSec: number;
  readonly token: string | null;
  readonly transaction: TransactionEvent | null;
}
