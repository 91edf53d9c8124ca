import { Inject, Injectable, Logger, type OnModuleInit } from '@nestjs/common';

import type {
  IAddWalletResult,
  WalletSubscription,
  WhaleAlertConfig,
  WhaleAlertConfigInput,
} from './entities/subscription.interfaces';
import { SolanaAddressCodec } from './solana-address.codec';
import { SubscriptionRegistryService } from './subscription-registry.service';
import { WELL_KNOWN_TOKEN_MINTS } from './well-known-tokens';
import type {
  IDataSourceClient,
  ITokenHolder,
  ITokenStats,
  IWalletSnapshot,
} from '../../common/interfaces/data-source/data-source-client.interfaces';
import { DATA_SOURCE_CLIENT } from '../../common/interfaces/data-source/data-source-port.tokens';
import type { TransactionEvent } from '../../common/interfaces/events/transaction-event.interfaces';
import { USER_SETTINGS_STORE } from '../../common/interfaces/storage/storage-port.tokens';
import type {
  IUserSettingsStore,
  UserProfileRecord,
} from '../../common/interfaces/storage/user-settings-store.interfaces';

export const DEFAULT_TOP_HOLDERS_COUNT = 5;
export const DEFAULT_RECENT_WINDOW_SEC = 120;
export const DEFAULT_RECENT_TRANSACTIONS_LIMIT = 10;

/**
 * Inbound operations for the front end. Registry changes are written through to
 * the settings store before the call returns.
 */
@Injectable()
export class TrackingService implements OnModuleInit {
  private readonly logger: Logger = new Logger(TrackingService.name);
  // Tail of each user's write chain; a profile is exported only when its write runs.
  private readonly profileWrites: Map<string, Promise<void>> = new Map<string, Promise<void>>();

  public constructor(
    private readonly subscriptionRegistryService: SubscriptionRegistryService,
    private readonly addressCodec: SolanaAddressCodec,
    @Inject(USER_SETTINGS_STORE) private readonly userSettingsStore: IUserSettingsStore,
    @Inject(DATA_SOURCE_CLIENT) private readonly dataSourceClient: IDataSourceClient,
  ) {}

  public async onModuleInit(): Promise<void> {
    const profiles: readonly UserProfileRecord[] = await this.userSettingsStore.loadAll();
    this.subscriptionRegistryService.hydrate(profiles);
  }

  public async trackWallet(userId: string, rawAddress: string): Promise<IAddWalletResult> {
    const result: IAddWalletResult = this.subscriptionRegistryService.addWallet(userId, rawAddress);

    if (result.created) {
      await this.persistProfile(userId);
    }

    return result;
  }

  public async untrackWallet(userId: string, rawAddress: string): Promise<boolean> {
    const removed: boolean = this.subscriptionRegistryService.removeWallet(userId, rawAddress);

    if (removed) {
      await this.persistProfile(userId);
    }

    return removed;
  }

  public listWallets(userId: string): readonly WalletSubscription[] {
    return this.subscriptionRegistryService.listWallets(userId);
  }

  public async updateWhaleConfig(
    userId: string,
    input: WhaleAlertConfigInput,
  ): Promise<WhaleAlertConfig> {
    const config: WhaleAlertConfig = this.subscriptionRegistryService.setWhaleConfig(userId, input);
    await this.persistProfile(userId);
    return config;
  }

  public getWhaleConfig(userId: string): WhaleAlertConfig | null {
    return this.subscriptionRegistryService.getWhaleConfig(userId);
  }

  public async getWalletSnapshot(rawAddress: string): Promise<IWalletSnapshot> {
    return this.dataSourceClient.getWalletSnapshot(this.addressCodec.parse(rawAddress));
  }

  /** Accepts a mint address or one of the well-known symbols (SOL, USDC, USDT). */
  public async getTokenStats(mintOrSymbol: string): Promise<ITokenStats> {
    return this.dataSourceClient.getTokenStats(this.resolveMint(mintOrSymbol));
  }

  public async getTopTokenHolders(
    mintOrSymbol: string,
    count: number = DEFAULT_TOP_HOLDERS_COUNT,
  ): Promise<readonly ITokenHolder[]> {
    return this.dataSourceClient.getTopTokenHolders(this.resolveMint(mintOrSymbol), count);
  }

  public async getRecentWalletTransactions(
    rawAddress: string,
    windowSec: number = DEFAULT_RECENT_WINDOW_SEC,
    limit: number = DEFAULT_RECENT_TRANSACTIONS_LIMIT,
  ): Promise<readonly TransactionEvent[]> {
    return this.dataSourceClient.getRecentWalletTransactions(
      this.addressCodec.parse(rawAddress),
      nowSec() - windowSec,
      limit,
    );
  }

  /** Largest transfer inside the window, across all tokens unless one is named. */
  public async getHighestWhaleTransaction(
    windowSec: number = DEFAULT_RECENT_WINDOW_SEC,
    mintOrSymbol?: string,
  ): Promise<TransactionEvent | null> {
    const tokenMint: string | undefined =
      mintOrSymbol === undefined ? undefined : this.resolveMint(mintOrSymbol);

    return this.dataSourceClient.getHighestTransaction(nowSec() - windowSec, tokenMint);
  }

  private resolveMint(mintOrSymbol: string): string {
    const knownMint: string | undefined =
      WELL_KNOWN_TOKEN_MINTS[mintOrSymbol.trim().toUpperCase()];

    return knownMint ?? this.addressCodec.parse(mintOrSymbol);
  }

  private async persistProfile(userId: string): Promise<void> {
    const previous: Promise<void> = this.profileWrites.get(userId) ?? Promise.resolve();
    const writeLatest = async (): Promise<void> => this.writeProfile(userId);
    const write: Promise<void> = previous
      .then(writeLatest, writeLatest)
      .finally((): void => {
        if (this.profileWrites.get(userId) === write) {
          this.profileWrites.delete(userId);
        }
      });

    this.profileWrites.set(userId, write);
    return write;
  }

  private async writeProfile(userId: string): Promise<void> {
    const profile: UserProfileRecord = this.subscriptionRegistryService.exportProfile(userId);

    try {
      if (profile.wallets.length === 0 && profile.whaleAlert === null) {
        await this.userSettingsStore.delete(userId);
      } else {
        await this.userSettingsStore.save(profile);
      }
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`profile persist failed userId=${userId} reason=${errorMessage}`);
      throw error;
    }
  }
}

const nowSec = (): number => Math.floor(Date.now() / 1000);
