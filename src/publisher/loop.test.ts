import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { WindowConfig } from '../config';
import { openMemoryDatabase, type Database } from '../db';
import { Scheduler } from '../schedule/scheduler';
import { PostStore } from '../store/postStore';
import { FakeAccounts, FakeClient, fakeAccount, tempMediaDir } from '../testing/fakes';
import type { Sleeper } from '../utils/sleep';
import { MISSED_PUBLICATION_NOTE, PublishLoop, classify, type PublishLoopOptions } from './loop';
import { MediaLocator } from './media';
import { PostPublisher } from './publish';

const WINDOW: WindowConfig = { startHour: 8, endHour: 23, minIntervalMinutes: 30 };
const NOW = new Date(2026, 6, 14, 12, 0).getTime();
const THRESHOLDS = { staleAfterSeconds: 3600, lateToleranceSeconds: 120, earlyGraceSeconds: 600 };

const media = tempMediaDir({ photos: ['a.jpg'] });
afterAll(() => media.cleanup());

describe('classify', () => {
  it('publishes a post 90 seconds past its slot on time', () => {
    expect(classify(NOW - 90_000, NOW, THRESHOLDS)).toEqual({ kind: 'due', diffSeconds: 90, late: false });
  });

  it('flags a post past the early grace as late', () => {
    expect(classify(NOW - 900_000, NOW, THRESHOLDS)).toEqual({ kind: 'due', diffSeconds: 900, late: true });
  });

  it('treats a post more than an hour behind as stale', () => {
    expect(classify(NOW - 3_700_000, NOW, THRESHOLDS)).toEqual({ kind: 'stale', diffSeconds: 3700 });
  });

  it('keeps stale and due apart at the threshold', () => {
    expect(classify(NOW - 3_600_000, NOW, THRESHOLDS).kind).toBe('due');
    expect(classify(NOW - 3_601_000, NOW, THRESHOLDS).kind).toBe('stale');
  });

  it('publishes slightly early within the tolerance', () => {
    expect(classify(NOW + 100_000, NOW, THRESHOLDS).kind).toBe('due');
    expect(classify(NOW + 120_000, NOW, THRESHOLDS).kind).toBe('due');
  });

  it('leaves future posts pending', () => {
    expect(classify(NOW + 500_000, NOW, THRESHOLDS)).toEqual({ kind: 'pending', diffSeconds: -500 });
  });
});

describe('PublishLoop', () => {
  let db: Database;
  let store: PostStore;
  let scheduler: Scheduler;
  let client: FakeClient;
  let publisher: PostPublisher;
  let clock: number;
  let loop: PublishLoop | null;

  beforeEach(() => {
    db = openMemoryDatabase();
    clock = NOW;
    store = new PostStore(db, { now: () => clock });
    scheduler = new Scheduler(db, store, { window: WINDOW, now: () => clock });
    const accounts = new FakeAccounts();
    client = new FakeClient();
    accounts.add(fakeAccount('acc-1'), client);
    publisher = new PostPublisher({
      store,
      scheduler,
      accounts,
      media: new MediaLocator(media.root),
      limits: { maxPostsPerDay: 10, minIntervalMinutes: 30 },
      now: () => clock,
    });
    loop = null;
  });

  afterEach(async () => {
    await loop?.stop(100);
  });

  const makeLoop = (sleep: Sleeper, overrides: Partial<PublishLoopOptions> = {}) =>
    new PublishLoop(store, scheduler, publisher, {
      ...THRESHOLDS,
      // effectively never; tests drive ticks themselves
      cron: '0 0 1 1 *',
      pauseMs: 5000,
      now: () => clock,
      sleep,
      ...overrides,
    });

  const scheduleAt = (at: number, files = ['a.jpg']) => {
    const post = store.create('acc-1', 'caption', files);
    const scheduled = store.schedule(post.id, at);
    scheduler.upsertEntry('acc-1', post.id, at);
    return scheduled;
  };

  it('demotes stale posts, publishes due ones and leaves the rest', async () => {
    const due = scheduleAt(NOW - 90_000);
    const stale = scheduleAt(NOW - 3_700_000);
    const later = scheduleAt(NOW + 500_000);

    const report = await makeLoop(vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>()).tick();

    expect(report).toMatchObject({
      startedAt: NOW,
      checked: 3,
      pending: 1,
      demoted: [stale.id],
      published: [due.id],
      deferred: [],
      failed: [],
    });
    expect(store.get(stale.id)).toMatchObject({ status: 'draft', scheduledAt: null, lastError: MISSED_PUBLICATION_NOTE });
    expect(store.get(due.id).status).toBe('published');
    expect(store.get(later.id).status).toBe('scheduled');
    expect(scheduler.entriesFor('acc-1').map((e) => e.postId)).toEqual([due.id, later.id]);
  });

  it('pauses between publishes but not before the first', async () => {
    clock = NOW;
    const first = scheduleAt(NOW - 60_000);
    clock = NOW + 1;
    const second = scheduleAt(NOW - 30_000);
    clock = NOW;

    const sleep = vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>(async () => {
      // the pause spans the account interval
      clock += 31 * 60_000;
    });
    const report = await makeLoop(sleep).tick();

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep.mock.calls[0][0]).toBe(5000);
    expect(report.published).toEqual([second.id, first.id]);
  });

  it('skips posts reverted to drafts during the pause', async () => {
    const first = scheduleAt(NOW - 60_000);
    clock = NOW + 1;
    const second = scheduleAt(NOW - 30_000);
    clock = NOW;

    const sleep = vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>(async () => {
      clock += 31 * 60_000;
      store.update(first.id, { status: 'draft' });
    });
    const report = await makeLoop(sleep).tick();

    expect(report).toMatchObject({ published: [second.id], skipped: [first.id], failed: [] });
    expect(client.calls).toHaveLength(1);
    expect(store.get(first.id)).toMatchObject({ status: 'draft', scheduledAt: null, lastError: null });
  });

  it('skips posts deleted or moved during the pause', async () => {
    const first = scheduleAt(NOW - 60_000);
    clock = NOW + 1;
    const second = scheduleAt(NOW - 30_000);
    clock = NOW + 2;
    const third = scheduleAt(NOW - 15_000);
    clock = NOW;
    const later = NOW + 3 * 3_600_000;

    const sleep = vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>(async () => {
      clock += 31 * 60_000;
      if (store.find(second.id)) store.delete(second.id);
      if (store.get(first.id).scheduledAt !== later) store.schedule(first.id, later);
    });
    const report = await makeLoop(sleep).tick();

    expect(report).toMatchObject({ published: [third.id], skipped: [second.id, first.id], failed: [] });
    expect(client.calls).toHaveLength(1);
    expect(store.find(second.id)).toBeUndefined();
    expect(store.get(first.id)).toMatchObject({ status: 'scheduled', scheduledAt: later });
  });

  it('keeps posts rejected for pacing scheduled and fails the rest', async () => {
    const a = scheduleAt(NOW - 60_000);
    clock = NOW + 1;
    const b = scheduleAt(NOW - 30_000, ['missing.jpg']);
    clock = NOW;
    // a publish five minutes ago puts the account inside its interval
    const recent = store.create('acc-1', 'earlier', ['a.jpg']);
    clock = NOW - 5 * 60_000;
    store.markPublished(recent.id, { force: true });
    clock = NOW;

    const report = await makeLoop(vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>(async () => {})).tick();

    // b is newer and goes first; its media lookup comes after the pacing check
    expect(report.deferred).toEqual([b.id, a.id]);
    expect(store.get(a.id).status).toBe('scheduled');
    expect(store.get(b.id).status).toBe('scheduled');
  });

  it('records hard failures on the post', async () => {
    const post = scheduleAt(NOW - 60_000, ['missing.jpg']);
    const report = await makeLoop(vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>()).tick();
    expect(report.failed).toEqual([post.id]);
    expect(store.get(post.id)).toMatchObject({ status: 'error', lastError: 'Media file not found: missing.jpg' });
  });

  it('does nothing without scheduled posts', async () => {
    const current = makeLoop(vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>());
    const report = await current.tick();
    expect(report.checked).toBe(0);
    expect(current.status()).toMatchObject({ running: false, scheduledCount: 0, lastTickAt: NOW });
  });

  it('stops during the pause between publishes', async () => {
    const first = scheduleAt(NOW - 60_000);
    clock = NOW + 1;
    const second = scheduleAt(NOW - 30_000);
    clock = NOW;

    const pausing = vi.fn<Parameters<Sleeper>, ReturnType<Sleeper>>(
      (ms, signal) =>
        new Promise<void>((resolve) => {
          signal?.addEventListener('abort', () => resolve(), { once: true });
        }),
    );
    loop = makeLoop(pausing, { pauseMs: 60_000 });
    loop.start();
    await vi.waitFor(() => expect(pausing).toHaveBeenCalledTimes(1));

    await loop.stop(1000);

    const status = loop.status();
    expect(status.running).toBe(false);
    expect(status.ticking).toBe(false);
    expect(status.lastReport?.published).toEqual([second.id]);
    expect(store.get(first.id).status).toBe('scheduled');
  });
});
