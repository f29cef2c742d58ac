import { nanoid } from 'nanoid';
import type { Database } from '../db';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../errors';
import { createLogger } from '../logger';
import { POST_STATUSES, type PostFormat, type PostRecord, type PostStatus } from '../models';

const log = createLogger('posts');

export interface PostUpdate {
  text?: string;
  media?: string[];
  format?: PostFormat;
  // error is entered through markError only
  status?: Exclude<PostStatus, 'published' | 'error'>;
  scheduledAt?: number | null;
  lastError?: string | null;
}

export interface PostStoreOptions {
  now?: () => number;
}

function byCreatedDesc(a: PostRecord, b: PostRecord) {
  return b.createdAt - a.createdAt;
}

/**
 * Posts live in one partition per status inside the lowdb document. Every
 * mutation moves the record between partitions in a single synchronous step and
 * writes once, so a reader sees each post in exactly one partition.
 */
export class PostStore {
  private readonly now: () => number;

  constructor(
    private readonly db: Database,
    options: PostStoreOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  create(accountId: string, text: string, media: string[], format: PostFormat = 'photo'): PostRecord {
    if (!accountId) throw new ValidationError('accountId is required');
    if (media.length === 0) throw new ValidationError('a post needs at least one media file');

    const post: PostRecord = {
      id: nanoid(),
      accountId,
      text,
      media: [...media],
      format,
      status: 'draft',
      scheduledAt: null,
      createdAt: this.now(),
      publishedAt: null,
      lastError: null,
    };
    this.db.data.posts.draft[post.id] = post;
    this.db.write();
    log.info(`created post ${post.id} for account ${accountId}`);
    return { ...post };
  }

  find(id: string): PostRecord | undefined {
    const hit = this.locate(id);
    return hit ? { ...hit, media: [...hit.media] } : undefined;
  }

  get(id: string): PostRecord {
    const post = this.find(id);
    if (!post) throw new NotFoundError(`post ${id} not found`);
    return post;
  }

  listByStatus(status: PostStatus): PostRecord[] {
    return Object.values(this.db.data.posts[status])
      .map((p) => ({ ...p, media: [...p.media] }))
      .sort(byCreatedDesc);
  }

  listAll(): PostRecord[] {
    return POST_STATUSES.flatMap((s) => this.listByStatus(s)).sort(byCreatedDesc);
  }

  listByAccount(accountId: string, status?: PostStatus): PostRecord[] {
    const pool = status ? this.listByStatus(status) : this.listAll();
    return pool.filter((p) => p.accountId === accountId);
  }

  countByStatus(): Record<PostStatus, number> {
    const parts = this.db.data.posts;
    return {
      draft: Object.keys(parts.draft).length,
      scheduled: Object.keys(parts.scheduled).length,
      published: Object.keys(parts.published).length,
      error: Object.keys(parts.error).length,
    };
  }

  update(id: string, fields: PostUpdate): PostRecord {
    const current = this.get(id);
    if (current.status === 'published') {
      throw new InvalidTransitionError(`post ${id} is already published`);
    }
    if (fields.media && fields.media.length === 0) {
      throw new ValidationError('a post needs at least one media file');
    }

    const next: PostRecord = { ...current };
    if (fields.text !== undefined) next.text = fields.text;
    if (fields.media !== undefined) next.media = [...fields.media];
    if (fields.format !== undefined) next.format = fields.format;
    if (fields.status !== undefined) next.status = fields.status;
    if (fields.scheduledAt !== undefined) next.scheduledAt = fields.scheduledAt;
    if (fields.lastError !== undefined) next.lastError = fields.lastError;

    if (next.status === 'scheduled') {
      if (next.scheduledAt === null) {
        throw new ValidationError(`post ${id} cannot be scheduled without a time`);
      }
      if (current.status !== 'scheduled' && fields.lastError === undefined) next.lastError = null;
    } else {
      next.scheduledAt = null;
    }
    if (next.status === 'error' && !next.lastError) {
      throw new ValidationError(`post ${id} is in error and needs its error message`);
    }

    return this.commit(current.status, next);
  }

  schedule(id: string, at: number): PostRecord {
    const current = this.get(id);
    if (current.status === 'published') {
      throw new InvalidTransitionError(`post ${id} is already published`);
    }
    const post = this.commit(current.status, { ...current, status: 'scheduled', scheduledAt: at, lastError: null });
    log.debug(`post ${id} scheduled for ${new Date(at).toISOString()}`);
    return post;
  }

  /** SCHEDULED -> DRAFT with a note explaining why. Repeating it on a draft changes nothing. */
  demoteToDraft(id: string, note: string | null): PostRecord {
    const current = this.get(id);
    if (current.status === 'draft') return current;
    if (current.status !== 'scheduled') {
      throw new InvalidTransitionError(`post ${id} is ${current.status}, only scheduled posts go back to draft`);
    }
    return this.commit('scheduled', { ...current, status: 'draft', scheduledAt: null, lastError: note });
  }

  /**
   * `force` is the manual-publish path: it accepts drafts and errored posts too.
   * A post that is already published is always rejected so publishedAt never moves.
   */
  markPublished(id: string, options: { force?: boolean } = {}): PostRecord {
    const current = this.get(id);
    if (current.status === 'published') {
      throw new InvalidTransitionError(`post ${id} is already published`);
    }
    if (!options.force && current.status !== 'scheduled') {
      throw new InvalidTransitionError(`post ${id} is ${current.status}, expected scheduled`);
    }
    const post = this.commit(current.status, {
      ...current,
      status: 'published',
      scheduledAt: null,
      publishedAt: this.now(),
      lastError: null,
    });
    log.info(`post ${id} published`);
    return post;
  }

  markError(id: string, message: string): PostRecord {
    const current = this.get(id);
    if (current.status === 'published') {
      throw new InvalidTransitionError(`post ${id} is already published`);
    }
    const post = this.commit(current.status, { ...current, status: 'error', scheduledAt: null, lastError: message });
    log.error(`post ${id} failed: ${message}`);
    return post;
  }

  delete(id: string): boolean {
    const hit = this.locate(id);
    if (!hit) return false;
    delete this.db.data.posts[hit.status][id];
    this.db.write();
    log.info(`deleted post ${id}`);
    return true;
  }

  private locate(id: string): PostRecord | undefined {
    for (const status of POST_STATUSES) {
      const hit = this.db.data.posts[status][id];
      if (hit) return hit;
    }
    return undefined;
  }

  private commit(from: PostStatus, post: PostRecord): PostRecord {
    const parts = this.db.data.posts;
    if (from !== post.status) delete parts[from][post.id];
    parts[post.status][post.id] = post;
    this.db.write();
    return { ...post, media: [...post.media] };
  }
}
