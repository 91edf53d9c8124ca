import { Module } from '@nestjs/common';
import { Telegram } from 'telegraf';

import { AlertMessageFormatter } from './alert-message.formatter';
import { NotificationDispatcherService } from './notification-dispatcher.service';
import { LoggingNotificationSink } from './sinks/logging-notification.sink';
import { TelegramNotificationSink } from './sinks/telegram-notification.sink';
import { NOTIFICATION_SINK } from '../../common/interfaces/notifications/notification-port.tokens';
import type { INotificationSink } from '../../common/interfaces/notifications/notification-sink.interfaces';
import { AppConfigService } from '../../config/app-config.service';
import { ObservabilityModule } from '../../observability/observability.module';

@Module({
  imports: [ObservabilityModule],
  providers: [
    AlertMessageFormatter,
    {
      provide: NOTIFICATION_SINK,
      inject: [AppConfigService, AlertMessageFormatter],
      useFactory: (
        appConfigService: AppConfigService,
        alertMessageFormatter: AlertMessageFormatter,
      ): INotificationSink => {
        const botToken: string | null = appConfigService.botToken;

        if (!appConfigService.telegramEnabled || botToken === null) {
          return new LoggingNotificationSink();
        }

        return new TelegramNotificationSink(new Telegram(botToken), alertMessageFormatter);
      },
    },
    NotificationDispatcherService,
  ],
  exports: [NotificationDispatcherService],
})
export class NotificationsModule {}
