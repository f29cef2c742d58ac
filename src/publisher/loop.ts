import { CronJob } from 'cron';
import { errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { PostRecord } from '../models';
import type { Scheduler } from '../schedule/scheduler';
import type { PostStore } from '../store/postStore';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep';
import { formatStamp } from '../utils/time';
import type { PostPublisher } from './publish';

const log = createLogger('publish-loop');

export const MISSED_PUBLICATION_NOTE = 'Missed scheduled publication (publisher was not running)';

export interface LoopThresholds {
  staleAfterSeconds: number;
  lateToleranceSeconds: number;
  earlyGraceSeconds: number;
}

export type Classification =
  | { kind: 'stale'; diffSeconds: number }
  | { kind: 'due'; diffSeconds: number; late: boolean }
  | { kind: 'pending'; diffSeconds: number };

/**
 * diff = now - scheduledAt. Beyond the stale threshold the slot is lost;
 * from `lateTolerance` before the slot up to the threshold the post goes out
 * (past `earlyGrace` it is flagged late); earlier than that it waits.
 */
export function classify(scheduledAt: number, now: number, t: LoopThresholds): Classification {
  const diffSeconds = (now - scheduledAt) / 1000;
  if (diffSeconds > t.staleAfterSeconds) return { kind: 'stale', diffSeconds };
  if (diffSeconds >= -t.lateToleranceSeconds) {
    return { kind: 'due', diffSeconds, late: diffSeconds > t.earlyGraceSeconds };
  }
  return { kind: 'pending', diffSeconds };
}

export interface TickReport {
  startedAt: number;
  checked: number;
  pending: number;
  demoted: string[];
  published: string[];
  deferred: string[];
  failed: string[];
  skipped: string[];
}

export interface PublishLoopOptions extends LoopThresholds {
  cron: string;
  pauseMs: number;
  now?: () => number;
  sleep?: Sleeper;
}

export interface LoopStatus {
  running: boolean;
  ticking: boolean;
  scheduledCount: number;
  lastTickAt: number | null;
  lastReport: TickReport | null;
}

/**
 * Background publisher. A cron job fires the tick; a tick that is still
 * running when the next fire comes makes that fire a no-op, so ticks never
 * overlap.
 */
export class PublishLoop {
  private job: CronJob | null = null;
  private inFlight: Promise<TickReport> | null = null;
  private abort = new AbortController();
  private lastReport: TickReport | null = null;
  private readonly now: () => number;
  private readonly sleep: Sleeper;

  constructor(
    private readonly store: PostStore,
    private readonly scheduler: Scheduler,
    private readonly publisher: PostPublisher,
    private readonly options: PublishLoopOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  start() {
    if (this.job) {
      log.info('publish loop already running');
      return;
    }
    this.abort = new AbortController();
    this.job = new CronJob(this.options.cron, () => {
      void this.runGuarded();
    });
    this.job.start();
    log.info(`publish loop started (${this.options.cron})`);
    void this.runGuarded();
  }

  /**
   * Stops firing, interrupts the pause between publishes and waits for the
   * in-flight tick, at most `timeoutMs`. A publish call already sent to the
   * client is not cancelled.
   */
  async stop(timeoutMs = 5000): Promise<void> {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    this.abort.abort();

    const pending = this.inFlight;
    if (pending) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), timeoutMs);
      });
      const result = await Promise.race([pending.then(() => 'done' as const), timeout]);
      clearTimeout(timer);
      if (result === 'timeout') log.warn(`in-flight tick still running after ${timeoutMs}ms`);
    }
    log.info('publish loop stopped');
  }

  status(): LoopStatus {
    return {
      running: this.job !== null,
      ticking: this.inFlight !== null,
      scheduledCount: this.store.countByStatus().scheduled,
      lastTickAt: this.lastReport?.startedAt ?? null,
      lastReport: this.lastReport,
    };
  }

  /** One pass over the scheduled posts. Never throws. */
  async tick(): Promise<TickReport> {
    const startedAt = this.now();
    const report: TickReport = {
      startedAt,
      checked: 0,
      pending: 0,
      demoted: [],
      published: [],
      deferred: [],
      failed: [],
      skipped: [],
    };

    let scheduled: PostRecord[];
    try {
      scheduled = this.store.listByStatus('scheduled');
    } catch (err) {
      log.error('could not list scheduled posts', err);
      return this.finish(report);
    }
    if (scheduled.length === 0) return this.finish(report);
    report.checked = scheduled.length;
    log.debug(`checking ${scheduled.length} scheduled posts`);

    const stale: PostRecord[] = [];
    const due: PostRecord[] = [];
    for (const post of scheduled) {
      if (post.scheduledAt === null) {
        log.warn(`post ${post.id} is scheduled without a time, skipped`);
        continue;
      }
      const c = classify(post.scheduledAt, startedAt, this.options);
      const minutes = Math.round(Math.abs(c.diffSeconds) / 60);
      if (c.kind === 'stale') {
        log.warn(`post ${post.id} missed its slot by ${minutes} min, returning it to drafts`);
        stale.push(post);
      } else if (c.kind === 'due') {
        if (c.late) log.warn(`post ${post.id} is ${minutes} min late, publishing anyway`);
        due.push(post);
      } else {
        report.pending += 1;
        log.debug(`post ${post.id} due at ${formatStamp(post.scheduledAt)}`);
      }
    }

    for (const post of stale) {
      try {
        this.store.demoteToDraft(post.id, MISSED_PUBLICATION_NOTE);
        this.scheduler.removeFromSchedule(post.id);
        report.demoted.push(post.id);
      } catch (err) {
        log.error(`could not return post ${post.id} to drafts`, err);
      }
    }

    const signal = this.abort.signal;
    for (const [i, post] of due.entries()) {
      if (signal.aborted) {
        log.info(`stop requested, ${due.length - i} due posts left for a later tick`);
        break;
      }
      if (i > 0) await this.sleep(this.options.pauseMs, signal);
      if (signal.aborted) continue;
      await this.publishOne(post, report);
    }

    if (report.published.length + report.failed.length + report.deferred.length + report.skipped.length > 0) {
      log.info(
        `tick done: ${report.published.length} published, ${report.deferred.length} deferred, ` +
          `${report.failed.length} failed, ${report.skipped.length} changed meanwhile, ` +
          `${report.demoted.length} returned to drafts`,
      );
    }
    return this.finish(report);
  }

  private async publishOne(post: PostRecord, report: TickReport) {
    try {
      const outcome = await this.publisher.publish(post);
      if (outcome.status === 'published') report.published.push(post.id);
      else if (outcome.status === 'deferred') report.deferred.push(post.id);
      else if (outcome.status === 'skipped') report.skipped.push(post.id);
      else report.failed.push(post.id);
    } catch (err) {
      report.failed.push(post.id);
      log.error(`publishing post ${post.id} blew up`, err);
      try {
        this.store.markError(post.id, errorMessage(err));
      } catch (markErr) {
        log.error(`could not record the failure on post ${post.id}`, markErr);
      }
    }
  }

  private async runGuarded() {
    if (this.inFlight) {
      log.debug('previous tick still running, skipping this one');
      return;
    }
    this.inFlight = this.tick();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private finish(report: TickReport): TickReport {
    this.lastReport = report;
    return report;
  }
}
