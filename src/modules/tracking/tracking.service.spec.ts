import { afterEach, describe, expect, it, vi } from 'vitest';

import { SolanaAddressCodec } from './solana-address.codec';
import { SubscriptionRegistryService } from './subscription-registry.service';
import { TrackingService } from './tracking.service';
import { InvalidAddressError } from '../../common/errors/whale-watch.errors';
import type { IDataSourceClient } from '../../common/interfaces/data-source/data-source-client.interfaces';
import type { UserProfileRecord } from '../../common/interfaces/storage/user-settings-store.interfaces';
import type { AppConfigService } from '../../config/app-config.service';
import { InMemoryUserSettingsStore } from '../../database/repositories/in-memory-user-settings.store';
import {
  USDC_MINT,
  WALLET_A,
  WALLET_B,
  WSOL_MINT,
} from '../../../test/helpers/solana-addresses';

type DataSourceStub = {
  readonly getWalletSnapshot: ReturnType<typeof vi.fn>;
  readonly getTokenStats: ReturnType<typeof vi.fn>;
  readonly getTopTokenHolders: ReturnType<typeof vi.fn>;
  readonly getRecentWalletTransactions: ReturnType<typeof vi.fn>;
  readonly getHighestTransaction: ReturnType<typeof vi.fn>;
};

interface IHarness {
  readonly service: TrackingService;
  readonly registry: SubscriptionRegistryService;
  readonly store: InMemoryUserSettingsStore;
  readonly dataSource: DataSourceStub;
}

const createHarness = (store: InMemoryUserSettingsStore = new InMemoryUserSettingsStore()): IHarness => {
  const codec: SolanaAddressCodec = new SolanaAddressCodec();
  const registry: SubscriptionRegistryService = new SubscriptionRegistryService(codec, {
    defaultWhaleThresholdUsd: 50_000,
  } as unknown as AppConfigService);
  const dataSource: DataSourceStub = {
    getWalletSnapshot: vi.fn().mockResolvedValue({ ownerAddress: WALLET_A }),
    getTokenStats: vi.fn().mockResolvedValue({ mintAddress: USDC_MINT }),
    getTopTokenHolders: vi.fn().mockResolvedValue([]),
    getRecentWalletTransactions: vi.fn().mockResolvedValue([]),
    getHighestTransaction: vi.fn().mockResolvedValue(null),
  };
  const service: TrackingService = new TrackingService(
    registry,
    codec,
    store,
    dataSource as unknown as IDataSourceClient,
  );

  return { service, registry, store, dataSource };
};

describe('TrackingService', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('writes new subscriptions through to the store', async (): Promise<void> => {
    const harness: IHarness = createHarness();

    const first = await harness.service.trackWallet('7', WALLET_A);
    const repeat = await harness.service.trackWallet('7', WALLET_A);
    const stored: readonly UserProfileRecord[] = await harness.store.loadAll();

    expect(first.created).toBe(true);
    expect(repeat.created).toBe(false);
    expect(stored).toHaveLength(1);
    expect(stored[0]?.wallets.map((wallet) => wallet.address)).toEqual([WALLET_A]);
  });

  it('drops the stored profile once the user has nothing left', async (): Promise<void> => {
    const harness: IHarness = createHarness();
    await harness.service.trackWallet('7', WALLET_A);

    await expect(harness.service.untrackWallet('7', WALLET_B)).resolves.toBe(false);
    await expect(harness.service.untrackWallet('7', WALLET_A)).resolves.toBe(true);
    await expect(harness.store.loadAll()).resolves.toEqual([]);
  });

  it('stores the latest profile when writes for one user overlap', async (): Promise<void> => {
    const store: InMemoryUserSettingsStore = new InMemoryUserSettingsStore();
    const save = store.save.bind(store);
    let calls: number = 0;
    vi.spyOn(store, 'save').mockImplementation(async (profile: UserProfileRecord): Promise<void> => {
      calls += 1;

      if (calls === 1) {
        await new Promise<void>((resolve: () => void): void => {
          setTimeout(resolve, 20);
        });
      }

      await save(profile);
    });
    const harness: IHarness = createHarness(store);

    await Promise.all([
      harness.service.trackWallet('7', WALLET_A),
      harness.service.trackWallet('7', WALLET_B),
    ]);
    const stored: readonly UserProfileRecord[] = await store.loadAll();

    expect(harness.service.listWallets('7')).toHaveLength(2);
    expect(stored[0]?.wallets.map((wallet) => wallet.address)).toEqual([WALLET_A, WALLET_B]);
  });

  it('keeps writing after an earlier write for the same user failed', async (): Promise<void> => {
    const store: InMemoryUserSettingsStore = new InMemoryUserSettingsStore();
    const save = store.save.bind(store);
    vi.spyOn(store, 'save')
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockImplementation(save);
    const harness: IHarness = createHarness(store);

    const results = await Promise.allSettled([
      harness.service.trackWallet('7', WALLET_A),
      harness.service.trackWallet('7', WALLET_B),
    ]);
    const stored: readonly UserProfileRecord[] = await store.loadAll();

    expect(results.map((result) => result.status)).toEqual(['rejected', 'fulfilled']);
    expect(stored[0]?.wallets.map((wallet) => wallet.address)).toEqual([WALLET_A, WALLET_B]);
  });

  it('restores subscriptions from the store on start', async (): Promise<void> => {
    const store: InMemoryUserSettingsStore = new InMemoryUserSettingsStore();
    await createHarness(store).service.updateWhaleConfig('9', {
      tokenMints: [USDC_MINT],
      thresholdAmount: 750,
      enabled: true,
    });
    const restarted: IHarness = createHarness(store);

    await restarted.service.onModuleInit();

    expect(restarted.service.getWhaleConfig('9')).toMatchObject({
      tokenMints: [USDC_MINT],
      thresholdAmount: 750,
    });
  });

  it('reads recent wallet transfers over the default window', async (): Promise<void> => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(1_000_000 * 1000));
    const harness: IHarness = createHarness();

    await harness.service.getRecentWalletTransactions(` ${WALLET_A} `);
    await harness.service.getRecentWalletTransactions(WALLET_B, 3600, 3);

    expect(harness.dataSource.getRecentWalletTransactions.mock.calls).toEqual([
      [WALLET_A, 999_880, 10],
      [WALLET_B, 996_400, 3],
    ]);
  });

  it('looks up the highest transfer market-wide or for a named token', async (): Promise<void> => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(1_000_000 * 1000));
    const harness: IHarness = createHarness();

    await expect(harness.service.getHighestWhaleTransaction()).resolves.toBeNull();
    await harness.service.getHighestWhaleTransaction(600, 'usdc');

    expect(harness.dataSource.getHighestTransaction.mock.calls).toEqual([
      [999_880, undefined],
      [999_400, USDC_MINT],
    ]);
  });

  it('resolves well-known symbols to mint addresses', async (): Promise<void> => {
    const harness: IHarness = createHarness();

    await harness.service.getTokenStats('sol');
    await harness.service.getTopTokenHolders('USDC');

    expect(harness.dataSource.getTokenStats).toHaveBeenCalledWith(WSOL_MINT);
    expect(harness.dataSource.getTopTokenHolders).toHaveBeenCalledWith(USDC_MINT, 5);
  });

  it('rejects unknown symbols and malformed addresses before calling the provider', async (): Promise<void> => {
    const harness: IHarness = createHarness();

    await expect(harness.service.getTokenStats('DOGE')).rejects.toBeInstanceOf(InvalidAddressError);
    await expect(harness.service.getWalletSnapshot('xyz')).rejects.toBeInstanceOf(
      InvalidAddressError,
    );
    expect(harness.dataSource.getTokenStats).not.toHaveBeenCalled();
    expect(harness.dataSource.getWalletSnapshot).not.toHaveBeenCalled();
  });
});
