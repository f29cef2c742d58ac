import { z } from 'zod';
import { ValidationError } from './errors';
import { POST_FORMATS, POST_STATUSES } from './models';

// epoch ms or anything Date can parse
const timestamp = z.union([z.number(), z.string().min(1)]).transform((value, ctx) => {
  const ms = typeof value === 'number' ? value : new Date(value).getTime();
  if (!Number.isFinite(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'not a valid time' });
    return z.NEVER;
  }
  return ms;
});

const mediaList = z.array(z.string().trim().min(1)).min(1, 'a post needs at least one media file');

export const createAccountBody = z.object({
  username: z.string().trim().min(1),
});

export const createPostBody = z.object({
  accountId: z.string().min(1),
  text: z.string().default(''),
  media: mediaList,
  format: z.enum(POST_FORMATS).optional(),
});

export const updatePostBody = z
  .object({
    text: z.string(),
    media: mediaList,
    format: z.enum(POST_FORMATS),
    status: z.enum(['draft', 'scheduled']),
    scheduledAt: timestamp.nullable(),
  })
  .partial()
  .strict();

export const assignScheduleBody = z.object({
  accountId: z.string().min(1),
  postIds: z.array(z.string().min(1)).min(1),
  postsPerDay: z.number().int().positive().optional(),
  startTime: timestamp.optional(),
});

export const listPostsQuery = z.object({
  status: z.enum(POST_STATUSES).optional(),
  accountId: z.string().min(1).optional(),
});

export const logsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export const captionBody = z.object({
  prompt: z.string().trim().min(1),
});

/** Parses `input` or throws a ValidationError naming every failing field. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new ValidationError(detail.join('; '));
  }
  return parsed.data;
}
