export type StoredWallet = {
  readonly address: string;
  readonly createdAt: string;
};

export type StoredWhaleAlert = {
  readonly tokenMints: readonly string[];
  readonly thresholdAmount: number;
  readonly enabled: boolean;
  readonly updatedAt: string;
};

/** Persisted per-user profile; timestamps are ISO-8601 strings. */
export type UserProfileRecord = {
  readonly userId: string;
  readonly wallets: readonly StoredWallet[];
  readonly whaleAlert: StoredWhaleAlert | null;
};

export interface IUserSettingsStore {
  loadAll(): Promise<readonly UserProfileRecord[]>;
  save(profile: UserProfileRecord): Promise<void>;
  delete(userId: string): Promise<void>;
}
