import { Injectable, Logger } from '@nestjs/common';

import type {
  IAddWalletResult,
  RegistrySnapshot,
  WalletSubscription,
  WhaleAlertConfig,
  WhaleAlertConfigInput,
} from './entities/subscription.interfaces';
import { SolanaAddressCodec } from './solana-address.codec';
import {
  EmptyWhaleTokenListError,
  InvalidAddressError,
  InvalidThresholdError,
  RegistryInvariantViolationError,
} from '../../common/errors/whale-watch.errors';
import type {
  StoredWallet,
  StoredWhaleAlert,
  UserProfileRecord,
} from '../../common/interfaces/storage/user-settings-store.interfaces';
import { AppConfigService } from '../../config/app-config.service';

/**
 * In-memory index of wallet subscriptions and whale alert configs.
 * Every mutation bumps the version; snapshots are rebuilt lazily once per version.
 */
@Injectable()
export class SubscriptionRegistryService {
  private readonly logger: Logger = new Logger(SubscriptionRegistryService.name);
  private readonly walletsByUser: Map<string, Map<string, WalletSubscription>> = new Map<
    string,
    Map<string, WalletSubscription>
  >();
  private readonly whaleConfigs: Map<string, WhaleAlertConfig> = new Map<
    string,
    WhaleAlertConfig
  >();
  private version: number = 0;
  private cachedSnapshot: RegistrySnapshot | null = null;

  public constructor(
    private readonly addressCodec: SolanaAddressCodec,
    private readonly appConfigService: AppConfigService,
  ) {}

  public addWallet(userId: string, rawAddress: string): IAddWalletResult {
    const walletAddress: string = this.addressCodec.parse(rawAddress);
    const userWallets: Map<string, WalletSubscription> = this.getOrCreateUserWallets(userId);
    const existing: WalletSubscription | undefined = userWallets.get(walletAddress);

    if (existing !== undefined) {
      return { subscription: existing, created: false };
    }

    const subscription: WalletSubscription = Object.freeze({
      userId,
      walletAddress,
      createdAt: new Date(),
    });
    userWallets.set(walletAddress, subscription);
    this.bumpVersion();
    this.logger.log(`wallet subscribed userId=${userId} address=${walletAddress}`);

    return { subscription, created: true };
  }

  public removeWallet(userId: string, rawAddress: string): boolean {
    const userWallets: Map<string, WalletSubscription> | undefined = this.walletsByUser.get(userId);

    if (userWallets === undefined || !userWallets.delete(rawAddress.trim())) {
      return false;
    }

    if (userWallets.size === 0) {
      this.walletsByUser.delete(userId);
    }

    this.bumpVersion();
    this.logger.log(`wallet unsubscribed userId=${userId} address=${rawAddress.trim()}`);
    return true;
  }

  public listWallets(userId: string): readonly WalletSubscription[] {
    const userWallets: Map<string, WalletSubscription> | undefined = this.walletsByUser.get(userId);
    return userWallets === undefined ? [] : [...userWallets.values()];
  }

  public setWhaleConfig(userId: string, input: WhaleAlertConfigInput): WhaleAlertConfig {
    const thresholdAmount: number =
      input.thresholdAmount ?? this.appConfigService.defaultWhaleThresholdUsd;

    if (!Number.isFinite(thresholdAmount) || thresholdAmount < 0) {
      throw new InvalidThresholdError(thresholdAmount);
    }

    const tokenMints: readonly string[] = this.parseMints(input.tokenMints);

    if (input.enabled && tokenMints.length === 0) {
      throw new EmptyWhaleTokenListError(userId);
    }

    const config: WhaleAlertConfig = Object.freeze({
      userId,
      tokenMints: Object.freeze(tokenMints),
      thresholdAmount,
      enabled: input.enabled,
      updatedAt: new Date(),
    });

    this.whaleConfigs.set(userId, config);
    this.bumpVersion();
    this.logger.log(
      `whale config replaced userId=${userId} mints=${String(tokenMints.length)} threshold=${String(thresholdAmount)} enabled=${String(input.enabled)}`,
    );

    return config;
  }

  public getWhaleConfig(userId: string): WhaleAlertConfig | null {
    return this.whaleConfigs.get(userId) ?? null;
  }

  public snapshot(): RegistrySnapshot {
    if (this.cachedSnapshot !== null && this.cachedSnapshot.version === this.version) {
      return this.cachedSnapshot;
    }

    const wallets: WalletSubscription[] = [];

    for (const userWallets of this.walletsByUser.values()) {
      wallets.push(...userWallets.values());
    }

    this.cachedSnapshot = Object.freeze({
      version: this.version,
      wallets: Object.freeze(wallets),
      whaleConfigs: Object.freeze([...this.whaleConfigs.values()]),
    });

    return this.cachedSnapshot;
  }

  /** Restores persisted profiles; duplicates or malformed records are a broken store. */
  public hydrate(profiles: readonly UserProfileRecord[]): void {
    for (const profile of profiles) {
      for (const storedWallet of profile.wallets) {
        this.restoreWallet(profile.userId, storedWallet.address, storedWallet.createdAt);
      }

      if (profile.whaleAlert !== null) {
        this.restoreWhaleConfig(profile.userId, profile.whaleAlert);
      }
    }

    this.bumpVersion();
    this.logger.log(
      `registry hydrated users=${String(profiles.length)} wallets=${String(this.snapshot().wallets.length)}`,
    );
  }

  public exportProfile(userId: string): UserProfileRecord {
    const whaleConfig: WhaleAlertConfig | null = this.getWhaleConfig(userId);

    return {
      userId,
      wallets: this.listWallets(userId).map((subscription: WalletSubscription): StoredWallet => ({
        address: subscription.walletAddress,
        createdAt: subscription.createdAt.toISOString(),
      })),
      whaleAlert:
        whaleConfig === null
          ? null
          : {
              tokenMints: [...whaleConfig.tokenMints],
              thresholdAmount: whaleConfig.thresholdAmount,
              enabled: whaleConfig.enabled,
              updatedAt: whaleConfig.updatedAt.toISOString(),
            },
    };
  }

  public getVersion(): number {
    return this.version;
  }

  private restoreWallet(userId: string, rawAddress: string, createdAt: string): void {
    const walletAddress: string = this.parseStoredAddress(userId, rawAddress);
    const userWallets: Map<string, WalletSubscription> = this.getOrCreateUserWallets(userId);

    if (userWallets.has(walletAddress)) {
      throw new RegistryInvariantViolationError(
        `Duplicate wallet subscription userId=${userId} address=${walletAddress}`,
      );
    }

    userWallets.set(
      walletAddress,
      Object.freeze({ userId, walletAddress, createdAt: new Date(createdAt) }),
    );
  }

  private restoreWhaleConfig(userId: string, stored: StoredWhaleAlert): void {
    if (this.whaleConfigs.has(userId)) {
      throw new RegistryInvariantViolationError(`Duplicate whale config userId=${userId}`);
    }

    if (!Number.isFinite(stored.thresholdAmount) || stored.thresholdAmount < 0) {
      throw new RegistryInvariantViolationError(
        `Stored whale threshold is negative userId=${userId}`,
      );
    }

    const tokenMints: string[] = stored.tokenMints.map((mint: string): string =>
      this.parseStoredAddress(userId, mint),
    );

    this.whaleConfigs.set(
      userId,
      Object.freeze({
        userId,
        tokenMints: Object.freeze([...new Set(tokenMints)]),
        thresholdAmount: stored.thresholdAmount,
        enabled: stored.enabled,
        updatedAt: new Date(stored.updatedAt),
      }),
    );
  }

  private parseStoredAddress(userId: string, rawAddress: string): string {
    try {
      return this.addressCodec.parse(rawAddress);
    } catch (error: unknown) {
      if (error instanceof InvalidAddressError) {
        throw new RegistryInvariantViolationError(
          `Stored address is invalid userId=${userId} address=${rawAddress}`,
        );
      }

      throw error;
    }
  }

  private parseMints(rawMints: readonly string[]): string[] {
    const mints: Set<string> = new Set<string>();

    for (const rawMint of rawMints) {
      mints.add(this.addressCodec.parse(rawMint));
    }

    return [...mints];
  }

  private getOrCreateUserWallets(userId: string): Map<string, WalletSubscription> {
    let userWallets: Map<string, WalletSubscription> | undefined = this.walletsByUser.get(userId);

    if (userWallets === undefined) {
      userWallets = new Map<string, WalletSubscription>();
      this.walletsByUser.set(userId, userWallets);
    }

    return userWallets;
  }

  private bumpVersion(): void {
    this.version += 1;
  }
}
