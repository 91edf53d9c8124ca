export type WalletSubscription = {
  readonly userId: string;
  readonly walletAddress: string;
  readonly createdAt: Date;
};

export type WhaleAlertConfig = {
  readonly userId: string;
  /** Insertion ordered, no duplicates. */
  readonly tokenMints: readonly string[];
  readonly thresholdAmount: number;
  readonly enabled: boolean;
  readonly updatedAt: Date;
};

export type WhaleAlertConfigInput = {
  readonly tokenMints: readonly string[];
  /** Falls back to the configured default threshold when omitted. */
  readonly thresholdAmount?: number | null;
  readonly enabled: boolean;
};

/** Frozen point-in-time copy of every subscription and whale config. */
export type RegistrySnapshot = {
  readonly version: number;
  readonly wallets: readonly WalletSubscription[];
  readonly whaleConfigs: readonly WhaleAlertConfig[];
};

export interface IAddWalletResult {
  readonly subscription: WalletSubscription;
  readonly created: boolean;
}
