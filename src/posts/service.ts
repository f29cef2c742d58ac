import { InvalidTransitionError, ValidationError } from '../errors';
import type { PostFormat, PostRecord, PostStatus, ScheduleEntry } from '../models';
import type { PostPublisher, PublishOutcome } from '../publisher/publish';
import type { Scheduler } from '../schedule/scheduler';
import type { AccountResolver } from '../social/types';
import type { PostStore, PostUpdate } from '../store/postStore';

export interface NewPost {
  accountId: string;
  text: string;
  media: string[];
  format?: PostFormat;
}

/**
 * The lifecycle operations callers use. Keeps the schedule index in step
 * with edits made outside the scheduler.
 */
export class PostService {
  constructor(
    private readonly store: PostStore,
    private readonly scheduler: Scheduler,
    private readonly publisher: PostPublisher,
    private readonly accounts: AccountResolver,
  ) {}

  create(input: NewPost): PostRecord {
    if (!this.accounts.getAccount(input.accountId)) {
      throw new ValidationError(`unknown account ${input.accountId}`);
    }
    return this.store.create(input.accountId, input.text, input.media, input.format);
  }

  get(id: string): PostRecord {
    return this.store.get(id);
  }

  list(filter: { status?: PostStatus; accountId?: string } = {}): PostRecord[] {
    if (filter.accountId) return this.store.listByAccount(filter.accountId, filter.status);
    return filter.status ? this.store.listByStatus(filter.status) : this.store.listAll();
  }

  update(id: string, fields: PostUpdate): PostRecord {
    if (this.publisher.isPublishing(id)) {
      throw new InvalidTransitionError(`post ${id} is being published right now`);
    }
    const post = this.store.update(id, fields);
    if (post.status === 'scheduled' && post.scheduledAt !== null) {
      this.scheduler.upsertEntry(post.accountId, post.id, post.scheduledAt);
    } else {
      this.scheduler.removeFromSchedule(post.id);
    }
    return post;
  }

  delete(id: string) {
    if (this.publisher.isPublishing(id)) {
      throw new InvalidTransitionError(`post ${id} is being published right now`);
    }
    this.store.delete(id);
    this.scheduler.removeFromSchedule(id);
  }

  assign(accountId: string, postIds: string[], postsPerDay: number, startTime?: number): PostRecord[] {
    if (!this.accounts.getAccount(accountId)) {
      throw new ValidationError(`unknown account ${accountId}`);
    }
    return this.scheduler.assign(accountId, postIds, postsPerDay, startTime);
  }

  calendar(accountId: string): ScheduleEntry[] {
    return this.scheduler.entriesFor(accountId);
  }

  publishNow(id: string): Promise<PublishOutcome> {
    return this.publisher.publishNow(id);
  }
}
