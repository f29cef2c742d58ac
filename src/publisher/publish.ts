import {
  HardPublishFailure,
  InvalidTransitionError,
  TimingViolationError,
  errorMessage,
  isTimingViolation,
} from '../errors';
import { createLogger } from '../logger';
import type { AccountRecord, PostRecord } from '../models';
import type { Scheduler } from '../schedule/scheduler';
import type { AccountResolver, MediaHandle, PublishingClient } from '../social/types';
import type { PostStore } from '../store/postStore';
import { MINUTE_MS, startOfDay } from '../utils/time';
import type { MediaLocator, ResolvedMedia } from './media';

const log = createLogger('publisher');

export interface PostingLimits {
  maxPostsPerDay: number;
  minIntervalMinutes: number;
}

export type PublishOutcome =
  | { status: 'published'; post: PostRecord; media: MediaHandle }
  | { status: 'deferred'; post: PostRecord; reason: string }
  | { status: 'failed'; post: PostRecord; reason: string }
  | { status: 'skipped'; post: PostRecord; reason: string };

export interface PostPublisherDeps {
  store: PostStore;
  scheduler: Scheduler;
  accounts: AccountResolver;
  media: MediaLocator;
  limits: PostingLimits;
  now?: () => number;
}

/**
 * Publishes one post end to end: session, account pacing, media lookup,
 * dispatch and the resulting state change. Pacing rejections leave the post
 * alone so a later attempt can retry; everything else is recorded as an error.
 */
export class PostPublisher {
  private readonly now: () => number;
  private readonly publishing = new Set<string>();

  constructor(private readonly deps: PostPublisherDeps) {
    this.now = deps.now ?? Date.now;
  }

  isPublishing(id: string): boolean {
    return this.publishing.has(id);
  }

  async publish(post: PostRecord, options: { manual?: boolean } = {}): Promise<PublishOutcome> {
    if (this.publishing.has(post.id)) {
      throw new InvalidTransitionError(`post ${post.id} is already being published`);
    }
    const manual = options.manual ?? false;
    // `post` may be a copy listed a while ago; the store decides what goes out
    const current = this.deps.store.find(post.id);
    if (!current) return this.skip(post, `post ${post.id} no longer exists`);
    if (!manual && (current.status !== 'scheduled' || current.scheduledAt !== post.scheduledAt)) {
      return this.skip(current, `post ${post.id} changed since it was listed (now ${current.status})`);
    }

    this.publishing.add(post.id);
    try {
      return await this.attempt(current, manual);
    } finally {
      this.publishing.delete(post.id);
    }
  }

  private async attempt(post: PostRecord, manual: boolean): Promise<PublishOutcome> {
    const { store, scheduler } = this.deps;
    try {
      const account = this.account(post.accountId);
      log.info(`publishing post ${post.id} as @${account.username}`);
      const client = await this.client(account);
      this.checkLimits(post.accountId);
      const files = this.deps.media.resolveAll(post.media);
      const handle = await this.dispatch(client, post, files);

      const published = store.markPublished(post.id, { force: manual });
      scheduler.markPublished(post.id);
      log.info(`post ${post.id} is live as @${account.username} (media ${handle.id})`);
      return { status: 'published', post: published, media: handle };
    } catch (err) {
      const reason = errorMessage(err);
      if (isTimingViolation(err)) {
        log.info(`post ${post.id} deferred: ${reason}`);
        return { status: 'deferred', post: store.find(post.id) ?? post, reason };
      }
      if (err instanceof InvalidTransitionError) throw err;
      return { status: 'failed', post: store.markError(post.id, reason), reason };
    }
  }

  /** Manual publish: any post that is not yet published, regardless of its schedule. */
  async publishNow(id: string): Promise<PublishOutcome> {
    const post = this.deps.store.get(id);
    if (post.status === 'published') {
      throw new InvalidTransitionError(`post ${id} is already published`);
    }
    log.info(`manual publish of post ${id} (status ${post.status})`);
    return this.publish(post, { manual: true });
  }

  private skip(post: PostRecord, reason: string): PublishOutcome {
    log.info(`${reason}, not publishing`);
    return { status: 'skipped', post, reason };
  }

  private account(accountId: string): AccountRecord {
    const account = this.deps.accounts.getAccount(accountId);
    if (!account) throw new HardPublishFailure(`Account ${accountId} not found`);
    return account;
  }

  private async client(account: AccountRecord): Promise<PublishingClient> {
    const { accounts } = this.deps;
    const existing = accounts.getClient(account.id);
    if (existing) return existing;

    log.info(`no session for @${account.username}, logging in`);
    if (!(await accounts.login(account.id))) {
      throw new HardPublishFailure(`Could not log in to @${account.username}`);
    }
    const client = accounts.getClient(account.id);
    if (!client) throw new HardPublishFailure(`No publishing client for @${account.username}`);
    return client;
  }

  private checkLimits(accountId: string) {
    const { maxPostsPerDay, minIntervalMinutes } = this.deps.limits;
    const now = this.now();
    const today = startOfDay(now);
    const publishedToday = this.deps.store
      .listByAccount(accountId, 'published')
      .map((p) => p.publishedAt ?? 0)
      .filter((t) => t >= today);

    if (publishedToday.length >= maxPostsPerDay) {
      throw new HardPublishFailure(`Daily limit reached: at most ${maxPostsPerDay} posts per day`);
    }
    if (publishedToday.length > 0) {
      const sinceLast = (now - Math.max(...publishedToday)) / MINUTE_MS;
      if (sinceLast < minIntervalMinutes) {
        throw new TimingViolationError(
          `Too soon: wait ${Math.ceil(minIntervalMinutes - sinceLast)} more minutes before the next post`,
        );
      }
    }
  }

  // The files decide the upload kind, not post.format.
  private dispatch(client: PublishingClient, post: PostRecord, files: ResolvedMedia[]): Promise<MediaHandle> {
    if (files.length > 1) {
      log.info(`uploading album of ${files.length} files`);
      return client.publishAlbum(files.map((f) => f.path), post.text);
    }
    const [file] = files;
    if (file.kind === 'video') {
      log.info(`uploading video ${file.name}`);
      return client.publishVideo(file.path, post.text);
    }
    if (post.format === 'video') {
      log.warn(`post ${post.id} is marked video but ${file.name} is not a video file, uploading as photo`);
    }
    log.info(`uploading photo ${file.name}`);
    return client.publishSingle(file.path, post.text);
  }
}
