import { join, resolve } from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';
import type { LogLevel } from './logger';

const intFrom = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z
  .object({
    PORT: intFrom(3000),
    DATA_DIR: z.string().default('data'),
    MEDIA_DIR: z.string().optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    POSTING_START_HOUR: intFrom(8, 0, 23),
    POSTING_END_HOUR: intFrom(23, 1, 24),
    MIN_POST_INTERVAL_MINUTES: intFrom(30, 1),
    MAX_POSTS_PER_DAY: intFrom(10, 1),
    DEFAULT_POSTS_PER_DAY: intFrom(3, 1),

    PUBLISH_CRON: z.string().default('*/30 * * * * *'),
    STALE_AFTER_SECONDS: intFrom(3600, 1),
    LATE_TOLERANCE_SECONDS: intFrom(120, 0),
    EARLY_GRACE_SECONDS: intFrom(600, 0),
    PUBLISH_PAUSE_MS: intFrom(5000, 0),
    RATE_LIMIT_MIN_INTERVAL_MS: intFrom(2500, 0),

    PUBLISH_API_URL: z.string().url().optional(),
    PUBLISH_API_TOKEN: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  })
  .refine((env) => env.POSTING_START_HOUR < env.POSTING_END_HOUR, {
    message: 'POSTING_START_HOUR must be before POSTING_END_HOUR',
  })
  .refine((env) => env.EARLY_GRACE_SECONDS < env.STALE_AFTER_SECONDS, {
    message: 'EARLY_GRACE_SECONDS must be below STALE_AFTER_SECONDS',
  });

export interface WindowConfig {
  startHour: number;
  endHour: number;
  minIntervalMinutes: number;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  mediaDir: string;
  logLevel: LogLevel;
  window: WindowConfig;
  maxPostsPerDay: number;
  defaultPostsPerDay: number;
  publisher: {
    cron: string;
    staleAfterSeconds: number;
    lateToleranceSeconds: number;
    earlyGraceSeconds: number;
    pauseMs: number;
  };
  rateLimitMinIntervalMs: number;
  publishApi?: { url: string; token?: string };
  openai: { apiKey?: string; model: string; baseUrl: string };
}

// empty strings in .env mean "not set"
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`).join('; ');
    throw new ValidationError(`invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  const dataDir = resolve(e.DATA_DIR);

  return {
    port: e.PORT,
    dataDir,
    mediaDir: e.MEDIA_DIR ? resolve(e.MEDIA_DIR) : join(dataDir, 'media'),
    logLevel: e.LOG_LEVEL,
    window: {
      startHour: e.POSTING_START_HOUR,
      endHour: e.POSTING_END_HOUR,
      minIntervalMinutes: e.MIN_POST_INTERVAL_MINUTES,
    },
    maxPostsPerDay: e.MAX_POSTS_PER_DAY,
    defaultPostsPerDay: e.DEFAULT_POSTS_PER_DAY,
    publisher: {
      cron: e.PUBLISH_CRON,
      staleAfterSeconds: e.STALE_AFTER_SECONDS,
      lateToleranceSeconds: e.LATE_TOLERANCE_SECONDS,
      earlyGraceSeconds: e.EARLY_GRACE_SECONDS,
      pauseMs: e.PUBLISH_PAUSE_MS,
    },
    rateLimitMinIntervalMs: e.RATE_LIMIT_MIN_INTERVAL_MS,
    publishApi: e.PUBLISH_API_URL ? { url: e.PUBLISH_API_URL, token: e.PUBLISH_API_TOKEN } : undefined,
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, baseUrl: e.OPENAI_BASE_URL },
  };
}
