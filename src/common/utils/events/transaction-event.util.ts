import type {
  TransactionEvent,
  TransferDirection,
} from '../../interfaces/events/transaction-event.interfaces';

export const buildEventId = (
  signature: string,
  direction: TransferDirection,
  walletOrToken: string,
): string => `${signature}:${direction}:${walletOrToken}`;

/** Oldest first; ties broken by event id so merges are deterministic. */
export const compareEventsByTimestamp = (
  left: TransactionEvent,
  right: TransactionEvent,
): number => {
  if (left.timestamp !== right.timestamp) {
    return left.timestamp - right.timestamp;
  }

  if (left.eventId === right.eventId) {
    return 0;
  }

  return left.eventId < right.eventId ? -1 : 1;
};
