import { Logger } from '@nestjs/common';

import type { NotificationIntent } from '../../../common/interfaces/events/transaction-event.interfaces';
import type { INotificationSink } from '../../../common/interfaces/notifications/notification-sink.interfaces';

/** Sink used when no messenger is configured: every intent becomes a log line. */
export class LoggingNotificationSink implements INotificationSink {
  public readonly name: string = 'log';
  private readonly logger: Logger = new Logger(LoggingNotificationSink.name);

  public async deliver(intent: NotificationIntent): Promise<void> {
    this.logger.log(
      `notification userId=${intent.userId} kind=${intent.kind} eventId=${intent.payload.eventId} amountUsd=${String(intent.payload.amount)} timestamp=${String(intent.payload.timestamp)}`,
    );
  }
}
