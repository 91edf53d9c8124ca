import { Logger } from '@nestjs/common';
import type { Telegram } from 'telegraf';

import type { NotificationIntent } from '../../../common/interfaces/events/transaction-event.interfaces';
import type { INotificationSink } from '../../../common/interfaces/notifications/notification-sink.interfaces';
import type { AlertMessageFormatter } from '../alert-message.formatter';

export type TelegramSendMessageOptions = Parameters<Telegram['sendMessage']>[2];

/** Delivers intents as Telegram messages; the user id is the private chat id. */
export class TelegramNotificationSink implements INotificationSink {
  public readonly name: string = 'telegram';
  private readonly logger: Logger = new Logger(TelegramNotificationSink.name);

  public constructor(
    private readonly telegram: Pick<Telegram, 'sendMessage'>,
    private readonly alertMessageFormatter: AlertMessageFormatter,
  ) {}

  public async deliver(intent: NotificationIntent): Promise<void> {
    const chatId: number = Number(intent.userId);

    if (!Number.isSafeInteger(chatId)) {
      throw new Error(`Invalid telegram chat id userId=${intent.userId}`);
    }

    const options: TelegramSendMessageOptions = {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: true },
    };

    await this.telegram.sendMessage(chatId, this.alertMessageFormatter.format(intent), options);
    this.logger.debug(
      `telegram delivered userId=${intent.userId} eventId=${intent.payload.eventId}`,
    );
  }
}
