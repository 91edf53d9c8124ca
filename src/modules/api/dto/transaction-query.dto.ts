import { z } from 'zod';

import {
  DEFAULT_RECENT_TRANSACTIONS_LIMIT,
  DEFAULT_RECENT_WINDOW_SEC,
} from '../../tracking/tracking.service';

const MAX_WINDOW_SEC = 86_400;
const MAX_RECENT_TRANSACTIONS_LIMIT = 50;
const MAX_TOKEN_LENGTH = 64;

const windowSecSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(MAX_WINDOW_SEC)
  .default(DEFAULT_RECENT_WINDOW_SEC);

export const recentTransactionsQuerySchema = z.object({
  windowSec: windowSecSchema,
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_RECENT_TRANSACTIONS_LIMIT)
    .default(DEFAULT_RECENT_TRANSACTIONS_LIMIT),
});

export const highestTransactionQuerySchema = z.object({
  windowSec: windowSecSchema,
  token: z.string().trim().min(1).max(MAX_TOKEN_LENGTH).optional(),
});

export type RecentTransactionsQueryDto = z.infer<typeof recentTransactionsQuerySchema>;
export type HighestTransactionQueryDto = z.infer<typeof highestTransactionQuerySchema>;
