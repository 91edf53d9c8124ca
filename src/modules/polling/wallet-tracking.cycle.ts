import { Injectable } from '@nestjs/common';

import { BatchPollCycle } from './batch-poll.cycle';
import { PollCycleDependencies } from './poll-cycle.dependencies';
import { PollCycleName } from './polling.interfaces';
import {
  NotificationKind,
  type NotificationIntent,
  type TransactionEvent,
} from '../../common/interfaces/events/transaction-event.interfaces';
import { LimiterKey } from '../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { RegistrySnapshot } from '../tracking/entities/subscription.interfaces';

/** Polls each distinct tracked wallet once and notifies every user tracking it. */
@Injectable()
export class WalletTrackingCycle extends BatchPollCycle<string> {
  public readonly name: PollCycleName = PollCycleName.WALLET_TRACKING;

  public constructor(dependencies: PollCycleDependencies) {
    super(dependencies, LimiterKey.WALLET_POLL, WalletTrackingCycle.name);
  }

  protected groupSubscribers(snapshot: RegistrySnapshot): ReadonlyMap<string, readonly string[]> {
    const usersByWallet: Map<string, string[]> = new Map<string, string[]>();

    for (const subscription of snapshot.wallets) {
      const userIds: string[] | undefined = usersByWallet.get(subscription.walletAddress);

      if (userIds === undefined) {
        usersByWallet.set(subscription.walletAddress, [subscription.userId]);
      } else {
        userIds.push(subscription.userId);
      }
    }

    return usersByWallet;
  }

  protected async fetchEntity(
    walletAddress: string,
    _userIds: readonly string[],
    since: number,
  ): Promise<readonly TransactionEvent[]> {
    return this.dataSourceClient.getWalletTransactions(walletAddress, since);
  }

  protected buildIntents(
    event: TransactionEvent,
    userIds: readonly string[],
    generatedAt: Date,
  ): NotificationIntent[] {
    return userIds.map(
      (userId: string): NotificationIntent => ({
        userId,
        kind: NotificationKind.WALLET_TRANSFER,
        payload: event,
        generatedAt,
      }),
    );
  }
}
