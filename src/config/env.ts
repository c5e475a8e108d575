import { z } from 'zod';
import { ConfigurationError } from '../errors';

const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyAsUnset, z.string().optional());

const integerString = (fallback: string) =>
  z
    .preprocess(emptyAsUnset, z.string().default(fallback))
    .transform((val) => Number(val))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.preprocess(
    emptyAsUnset,
    z.enum(['development', 'production', 'test']).default('development')
  ),
  PORT: integerString('8000'),
  HOST: z.preprocess(emptyAsUnset, z.string().default('0.0.0.0')),

  DATABASE_URL: optionalString,
  DATABASE_NAME: optionalString,

  LOG_LEVEL: z.preprocess(
    emptyAsUnset,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),

  RATE_LIMIT_WINDOW_MS: integerString('900000'),
  RATE_LIMIT_MAX: integerString('1000'),
  JSON_BODY_LIMIT: z.preprocess(emptyAsUnset, z.string().default('1mb')),

  REJECT_ENDED_SESSION_ACTIVITY: z
    .preprocess(emptyAsUnset, z.enum(['true', 'false']).default('false'))
    .transform((val) => val === 'true'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  host: string;
  database: {
    url?: string;
    name?: string;
  };
  logLevel: Env['LOG_LEVEL'];
  rateLimit: {
    windowMs: number;
    max: number;
  };
  jsonBodyLimit: string;
  rejectEndedSessionActivity: boolean;
}

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = parseEnv(source);

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    database: {
      url: env.DATABASE_URL,
      name: env.DATABASE_NAME,
    },
    logLevel: env.LOG_LEVEL,
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX,
    },
    jsonBodyLimit: env.JSON_BODY_LIMIT,
    rejectEndedSessionActivity: env.REJECT_ENDED_SESSION_ACTIVITY,
  };
}
