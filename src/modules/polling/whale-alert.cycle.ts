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

interface IWhaleSubscriber {
  readonly userId: string;
  readonly thresholdAmount: number;
}

/**
 * Polls each watched mint once with the lowest subscriber threshold,
 * then notifies only users whose own threshold the transfer meets.
 */
@Injectable()
export class WhaleAlertCycle extends BatchPollCycle<IWhaleSubscriber> {
  public readonly name: PollCycleName = PollCycleName.WHALE_ALERT;

  public constructor(dependencies: PollCycleDependencies) {
    super(dependencies, LimiterKey.WHALE_POLL, WhaleAlertCycle.name);
  }

  protected groupSubscribers(
    snapshot: RegistrySnapshot,
  ): ReadonlyMap<string, readonly IWhaleSubscriber[]> {
    const subscribersByMint: Map<string, IWhaleSubscriber[]> = new Map<
      string,
      IWhaleSubscriber[]
    >();

    for (const config of snapshot.whaleConfigs) {
      if (!config.enabled) {
        continue;
      }

      const subscriber: IWhaleSubscriber = {
        userId: config.userId,
        thresholdAmount: config.thresholdAmount,
      };

      for (const tokenMint of config.tokenMints) {
        const subscribers: IWhaleSubscriber[] | undefined = subscribersByMint.get(tokenMint);

        if (subscribers === undefined) {
          subscribersByMint.set(tokenMint, [subscriber]);
        } else {
          subscribers.push(subscriber);
        }
      }
    }

    return subscribersByMint;
  }

  protected async fetchEntity(
    tokenMint: string,
    subscribers: readonly IWhaleSubscriber[],
    since: number,
  ): Promise<readonly TransactionEvent[]> {
    const minThreshold: number = Math.min(
      ...subscribers.map((subscriber: IWhaleSubscriber): number => subscriber.thresholdAmount),
    );

    return this.dataSourceClient.getTokenLargeTransactions(tokenMint, minThreshold, since);
  }

  protected buildIntents(
    event: TransactionEvent,
    subscribers: readonly IWhaleSubscriber[],
    generatedAt: Date,
  ): NotificationIntent[] {
    return subscribers
      .filter((subscriber: IWhaleSubscriber): boolean => event.amount >= subscriber.thresholdAmount)
      .map(
        (subscriber: IWhaleSubscriber): NotificationIntent => ({
          userId: subscriber.userId,
          kind: NotificationKind.WHALE_ALERT,
          payload: event,
          generatedAt,
        }),
      );
  }
}
