import { z } from 'zod';

const MAX_USER_ID_LENGTH = 64;

export const userIdSchema = z.string().trim().min(1).max(MAX_USER_ID_LENGTH);
