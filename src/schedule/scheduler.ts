import type { WindowConfig } from '../config';
import type { Database } from '../db';
import { ValidationError } from '../errors';
import { createLogger } from '../logger';
import type { PostRecord, ScheduleEntry } from '../models';
import type { PostStore } from '../store/postStore';
import { formatStamp } from '../utils/time';
import { campaignStart, planSlots } from './distribute';

const log = createLogger('scheduler');

export interface SchedulerOptions {
  window: WindowConfig;
  now?: () => number;
}

/**
 * Assigns publish times to batches of drafts and keeps the per-account
 * calendar index. The index is derived data: PostStore stays authoritative.
 */
export class Scheduler {
  private readonly window: WindowConfig;
  private readonly now: () => number;

  constructor(
    private readonly db: Database,
    private readonly store: PostStore,
    options: SchedulerOptions,
  ) {
    this.window = options.window;
    this.now = options.now ?? Date.now;
  }

  assign(accountId: string, postIds: string[], postsPerDay: number, startTime?: number): PostRecord[] {
    if (!Number.isInteger(postsPerDay) || postsPerDay < 1) {
      throw new ValidationError('postsPerDay must be a positive integer');
    }
    const windowMinutes = (this.window.endHour - this.window.startHour) * 60;
    if (postsPerDay * this.window.minIntervalMinutes > windowMinutes) {
      throw new ValidationError(
        `${postsPerDay} posts per day do not fit a ${this.window.startHour}:00-${this.window.endHour}:00 window ` +
          `at ${this.window.minIntervalMinutes} minutes apart`,
      );
    }

    const eligible = this.eligible(accountId, postIds);
    if (eligible.length === 0) return [];

    const now = this.now();
    const start = campaignStart(now, this.window, startTime);
    const plans = planSlots(eligible.length, postsPerDay, start, now, this.window);

    const scheduled: PostRecord[] = [];
    let next = 0;
    for (const plan of plans) {
      if (plan.deferred) log.info(`day bucket did not fit, moved to day ${plan.day}`);
      for (const at of plan.slots) {
        const post = this.store.schedule(eligible[next], at);
        this.putEntry(accountId, post.id, at);
        scheduled.push(post);
        next += 1;
      }
    }
    this.db.write();

    if (scheduled.length < eligible.length) {
      log.warn(`only ${scheduled.length}/${eligible.length} posts for account ${accountId} got a slot`);
    }
    if (scheduled.length > 0) {
      const first = scheduled[0].scheduledAt ?? start;
      log.info(`scheduled ${scheduled.length} posts for account ${accountId}, first at ${formatStamp(first)}`);
    }
    return scheduled;
  }

  /** Calendar entries for an account, corrected against the posts themselves. */
  entriesFor(accountId: string): ScheduleEntry[] {
    const entries = this.db.data.schedule[accountId] ?? [];
    const out: ScheduleEntry[] = [];
    for (const entry of entries) {
      const post = this.store.find(entry.postId);
      if (!post || post.accountId !== accountId) continue;
      if (post.status === 'scheduled' && post.scheduledAt !== null) {
        out.push({ postId: post.id, scheduledAt: post.scheduledAt, status: 'scheduled' });
      } else if (post.status === 'published') {
        out.push({ ...entry, status: 'published' });
      }
    }
    return out.sort((a, b) => a.scheduledAt - b.scheduledAt);
  }

  upsertEntry(accountId: string, postId: string, at: number) {
    this.putEntry(accountId, postId, at);
    this.db.write();
  }

  removeFromSchedule(postId: string) {
    const schedule = this.db.data.schedule;
    for (const accountId of Object.keys(schedule)) {
      schedule[accountId] = schedule[accountId].filter((e) => e.postId !== postId);
      if (schedule[accountId].length === 0) delete schedule[accountId];
    }
    this.db.write();
  }

  markPublished(postId: string) {
    for (const entries of Object.values(this.db.data.schedule)) {
      for (const entry of entries) {
        if (entry.postId === postId) entry.status = 'published';
      }
    }
    this.db.write();
  }

  /** Rebuilds the whole index by scanning the store. */
  rebuild(): number {
    const schedule: Record<string, ScheduleEntry[]> = {};
    const add = (accountId: string, entry: ScheduleEntry) => {
      (schedule[accountId] ??= []).push(entry);
    };
    for (const post of this.store.listByStatus('scheduled')) {
      if (post.scheduledAt !== null) add(post.accountId, { postId: post.id, scheduledAt: post.scheduledAt, status: 'scheduled' });
    }
    for (const post of this.store.listByStatus('published')) {
      if (post.publishedAt !== null) add(post.accountId, { postId: post.id, scheduledAt: post.publishedAt, status: 'published' });
    }
    this.db.data.schedule = schedule;
    this.db.write();
    const total = Object.values(schedule).reduce((n, e) => n + e.length, 0);
    log.info(`schedule index rebuilt with ${total} entries`);
    return total;
  }

  private eligible(accountId: string, postIds: string[]): string[] {
    const seen = new Set<string>();
    const ids: string[] = [];
    for (const id of postIds) {
      if (seen.has(id)) continue;
      seen.add(id);
      const post = this.store.find(id);
      if (!post) {
        log.warn(`post ${id} not found, skipped`);
      } else if (post.status !== 'draft') {
        log.warn(`post ${id} is ${post.status}, only drafts can be scheduled; skipped`);
      } else if (post.accountId !== accountId) {
        log.warn(`post ${id} belongs to account ${post.accountId}, skipped`);
      } else {
        ids.push(id);
      }
    }
    return ids;
  }

  private putEntry(accountId: string, postId: string, at: number) {
    const schedule = this.db.data.schedule;
    for (const key of Object.keys(schedule)) {
      schedule[key] = schedule[key].filter((e) => e.postId !== postId);
    }
    (schedule[accountId] ??= []).push({ postId, scheduledAt: at, status: 'scheduled' });
  }
}
