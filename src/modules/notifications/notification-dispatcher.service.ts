import { Inject, Injectable, Logger } from '@nestjs/common';

import type { NotificationIntent } from '../../common/interfaces/events/transaction-event.interfaces';
import { NOTIFICATION_SINK } from '../../common/interfaces/notifications/notification-port.tokens';
import type { INotificationSink } from '../../common/interfaces/notifications/notification-sink.interfaces';
import { MetricsService } from '../../observability/metrics.service';

export interface IDispatchSummary {
  readonly delivered: number;
  readonly failed: number;
}

/**
 * Hands intents to the sink one at a time, in the order given.
 * A failed delivery is logged and counted; the intent is not retried.
 */
@Injectable()
export class NotificationDispatcherService {
  private readonly logger: Logger = new Logger(NotificationDispatcherService.name);

  public constructor(
    @Inject(NOTIFICATION_SINK) private readonly sink: INotificationSink,
    private readonly metricsService: MetricsService,
  ) {}

  public async dispatch(intents: readonly NotificationIntent[]): Promise<IDispatchSummary> {
    let delivered: number = 0;

    for (const intent of intents) {
      this.metricsService.notificationIntentsTotal.inc({ kind: intent.kind });

      try {
        await this.sink.deliver(intent);
        delivered += 1;
      } catch (error: unknown) {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        this.metricsService.notificationDeliveryFailuresTotal.inc({
          kind: intent.kind,
          sink: this.sink.name,
        });
        this.logger.warn(
          `dispatch delivery failed sink=${this.sink.name} userId=${intent.userId} eventId=${intent.payload.eventId} reason=${errorMessage}`,
        );
      }
    }

    if (intents.length > 0) {
      this.logger.debug(
        `dispatch complete sink=${this.sink.name} delivered=${String(delivered)} failed=${String(intents.length - delivered)}`,
      );
    }

    return { delivered, failed: intents.length - delivered };
  }
}
