/**
 * Session endpoint request validation
 */

import { z } from 'zod';

export const MIN_DURATION_MINUTES = 1;
export const MAX_DURATION_MINUTES = 480;

const sessionId = z.string().min(1, 'session_id is required');
const userId = z.string().min(1, 'user_id is required');

// Whole numbers sent as strings ("25") are taken as numbers
const integerLike = (val: unknown) =>
  typeof val === 'string' && /^\s*[+-]?\d+\s*$/.test(val) ? Number(val) : val;

/**
 * POST /api/session/start
 */
export const startSessionSchema = z.object({
  user_id: userId,
  goal: z.string(),
  duration_minutes: z.preprocess(
    integerLike,
    z
      .number()
      .int()
      .min(MIN_DURATION_MINUTES, `duration_minutes must be at least ${MIN_DURATION_MINUTES}`)
      .max(MAX_DURATION_MINUTES, `duration_minutes must be at most ${MAX_DURATION_MINUTES}`)
  ),
  categories: z
    .array(z.string())
    .nullish()
    .transform((val) => [...new Set(val ?? [])]),
  voice: z.string().nullish(),
});

/**
 * POST /api/session/activity
 */
export const activitySchema = z.object({
  session_id: sessionId,
  user_id: userId,
  app: z.string().nullish(),
  url: z.string().nullish(),
  title: z.string().nullish(),
  idle: z
    .boolean()
    .nullish()
    .transform((val) => val ?? false),
  device: z.string().min(1).optional(),
});

/**
 * POST /api/session/end
 */
export const endSessionSchema = z.object({
  session_id: sessionId,
});

/**
 * GET /api/session/:user_id/summary
 */
export const summaryParamsSchema = z.object({
  user_id: userId,
});
