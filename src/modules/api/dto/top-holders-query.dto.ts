import { z } from 'zod';

import { DEFAULT_TOP_HOLDERS_COUNT } from '../../tracking/tracking.service';

const MAX_TOP_HOLDERS_COUNT = 50;

export const topHoldersQuerySchema = z.object({
  count: z.coerce.number().int().min(1).max(MAX_TOP_HOLDERS_COUNT).default(DEFAULT_TOP_HOLDERS_COUNT),
});

export type TopHoldersQueryDto = z.infer<typeof topHoldersQuerySchema>;
