/**
 * User registration request body
 * POST /api/user/register
 */

import { z } from 'zod';

export const registerUserSchema = z.object({
  name: z.string().nullish(),
  email: z.string().nullish(),
  device_id: z.string().min(1, 'device_id is required'),
  voice: z.string().nullish(),
});
