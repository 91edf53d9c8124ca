import type { NotificationIntent } from '../events/transaction-event.interfaces';

export interface INotificationSink {
  readonly name: string;
  deliver(intent: NotificationIntent): Promise<void>;
}
