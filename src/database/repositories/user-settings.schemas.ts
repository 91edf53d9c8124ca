import { z } from 'zod';

export const storedUserProfileSchema = z.object({
  userId: z.string().min(1),
  wallets: z.array(
    z.object({
      address: z.string(),
      createdAt: z.string(),
    }),
  ),
  whaleAlert: z
    .object({
      tokenMints: z.array(z.string()),
      thresholdAmount: z.number(),
      enabled: z.boolean(),
      updatedAt: z.string(),
    })
    .nullable(),
});

export type StoredUserProfile = z.infer<typeof storedUserProfileSchema>;
