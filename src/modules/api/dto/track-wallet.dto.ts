import { z } from 'zod';

const MAX_ADDRESS_LENGTH = 64;

export const trackWalletSchema = z.object({
  address: z.string().trim().min(1).max(MAX_ADDRESS_LENGTH),
});

export type TrackWalletDto = z.infer<typeof trackWalletSchema>;
