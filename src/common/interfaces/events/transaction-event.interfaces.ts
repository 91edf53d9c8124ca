export enum TransferDirection {
  IN = 'in',
  OUT = 'out',
}

/** A single token transfer as seen from a tracked wallet or a watched mint. */
export type TransactionEvent = {
  readonly eventId: string;
  readonly walletOrToken: string;
  readonly signature: string;
  /** USD value of the transfer. */
  readonly amount: number;
  readonly tokenAmount: number | null;
  readonly tokenSymbol: string | null;
  readonly tokenMint: string;
  /** Unix seconds. */
  readonly timestamp: number;
  readonly direction: TransferDirection;
  readonly counterpartyAddress: string;
  readonly senderAddress: string;
  readonly receiverAddress: string;
};

export enum NotificationKind {
  WALLET_TRANSFER = 'wallet_transfer',
  WHALE_ALERT = 'whale_alert',
}

export type NotificationIntent = {
  readonly userId: string;
  readonly kind: NotificationKind;
  readonly payload: TransactionEvent;
  readonly generatedAt: Date;
};
