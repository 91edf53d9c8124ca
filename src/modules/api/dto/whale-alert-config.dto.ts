import { z } from 'zod';

const MAX_TOKEN_MINTS = 20;

export const whaleAlertConfigSchema = z.object({
  tokenMints: z.array(z.string().trim().min(1)).max(MAX_TOKEN_MINTS),
  thresholdAmount: z.number().nonnegative().nullish(),
  enabled: z.boolean(),
});

export type WhaleAlertConfigDto = z.infer<typeof whaleAlertConfigSchema>;
