import { describe, expect, it, vi } from 'vitest';

import { NotificationDispatcherService } from './notification-dispatcher.service';
import { LoggingNotificationSink } from './sinks/logging-notification.sink';
import { TelegramNotificationSink } from './sinks/telegram-notification.sink';
import type { AlertMessageFormatter } from './alert-message.formatter';
import {
  NotificationKind,
  type NotificationIntent,
  TransferDirection,
} from '../../common/interfaces/events/transaction-event.interfaces';
import type { INotificationSink } from '../../common/interfaces/notifications/notification-sink.interfaces';
import { MetricsService } from '../../observability/metrics.service';
import { USDC_MINT, WALLET_A, WALLET_B } from '../../../test/helpers/solana-addresses';

const createIntent = (userId: string, signature: string): NotificationIntent => ({
  userId,
  kind: NotificationKind.WALLET_TRANSFER,
  payload: {
    eventId: `${signature}:in:${WALLET_A}`,
    walletOrToken: WALLET_A,
    signature,
    amount: 10,
    tokenAmount: 10,
    tokenSymbol: 'USDC',
    tokenMint: USDC_MINT,
    timestamp: 100,
    direction: TransferDirection.IN,
    counterpartyAddress: WALLET_B,
    senderAddress: WALLET_B,
    receiverAddress: WALLET_A,
  },
  generatedAt: new Date(),
});

describe('NotificationDispatcherService', (): void => {
  it('delivers intents in order and keeps going after a failed delivery', async (): Promise<void> => {
    const delivered: string[] = [];
    const sink: INotificationSink = {
      name: 'stub',
      deliver: vi.fn(async (intent: NotificationIntent): Promise<void> => {
        if (intent.payload.signature === 'sig-2') {
          throw new Error('chat not found');
        }

        delivered.push(intent.payload.signature);
      }),
    };
    const metricsService: MetricsService = new MetricsService();
    const dispatcher: NotificationDispatcherService = new NotificationDispatcherService(
      sink,
      metricsService,
    );

    const summary = await dispatcher.dispatch([
      createIntent('1', 'sig-1'),
      createIntent('1', 'sig-2'),
      createIntent('2', 'sig-3'),
    ]);

    expect(summary).toEqual({ delivered: 2, failed: 1 });
    expect(delivered).toEqual(['sig-1', 'sig-3']);
    expect(sink.deliver).toHaveBeenCalledTimes(3);

    const exposition: string = await metricsService.getMetrics();
    expect(exposition).toContain('notification_intents_total{kind="wallet_transfer"} 3');
    expect(exposition).toContain(
      'notification_delivery_failures_total{kind="wallet_transfer",sink="stub"} 1',
    );
  });

  it('accepts intents on the logging sink', async (): Promise<void> => {
    await expect(new LoggingNotificationSink().deliver(createIntent('1', 'sig'))).resolves.toBeUndefined();
  });
});

describe('TelegramNotificationSink', (): void => {
  const formatter = { format: vi.fn((): string => 'formatted') } as unknown as AlertMessageFormatter;

  it('sends the formatted message to the user chat as HTML', async (): Promise<void> => {
    const sendMessage = vi.fn().mockResolvedValue({});
    const sink: TelegramNotificationSink = new TelegramNotificationSink({ sendMessage }, formatter);

    await sink.deliver(createIntent('12345', 'sig'));

    expect(sendMessage).toHaveBeenCalledWith(12345, 'formatted', {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
    });
  });

  it('rejects user ids that are not chat ids', async (): Promise<void> => {
    const sendMessage = vi.fn();
    const sink: TelegramNotificationSink = new TelegramNotificationSink({ sendMessage }, formatter);

    await expect(sink.deliver(createIntent('alice', 'sig'))).rejects.toThrow(
      'Invalid telegram chat id userId=alice',
    );
    expect(sendMessage).not.toHaveBeenCalled();
  });
});
