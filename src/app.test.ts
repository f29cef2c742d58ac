import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp, createServices, type Services } from './app';
import { loadConfig } from './config';
import { openMemoryDatabase } from './db';
import { FakeFactory, tempMediaDir } from './testing/fakes';

const NOW = new Date(2026, 6, 14, 9, 0).getTime();
const media = tempMediaDir({ photos: ['a.jpg'] });

const withAccount = z.object({ account: z.object({ id: z.string() }) });
const withPost = z.object({ post: z.object({ id: z.string() }) });

describe('HTTP API', () => {
  let server: Server;
  let base: string;
  let services: Services;

  beforeAll(async () => {
    const config = loadConfig({ DATA_DIR: media.root, MEDIA_DIR: media.root });
    services = createServices(config, openMemoryDatabase(), { clientFactory: new FakeFactory(), now: () => NOW });
    server = createApp(services).listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    base = `http://127.0.0.1:${address.port}/api`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    media.cleanup();
  });

  async function call(method: string, path: string, body?: unknown) {
    const res = await fetch(`${base}${path}`, {
      method,
      headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const json: unknown = await res.json();
    return { status: res.status, body: json };
  }

  async function createDraft(accountId: string) {
    const res = await call('POST', '/posts', { accountId, text: 'hello', media: ['a.jpg'] });
    return withPost.parse(res.body).post.id;
  }

  let accountId: string;

  it('creates an account', async () => {
    const res = await call('POST', '/accounts', { username: '@studio' });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ success: true, account: { username: 'studio', status: 'inactive' } });
    accountId = withAccount.parse(res.body).account.id;
  });

  it('creates and lists drafts', async () => {
    const id = await createDraft(accountId);
    const res = await call('GET', `/posts?status=draft&accountId=${accountId}`);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ success: true, posts: [{ id, status: 'draft', createdAt: NOW }] });
    await call('DELETE', `/posts/${id}`);
  });

  it('answers bad input with a validation failure', async () => {
    const res = await call('POST', '/posts', { accountId, text: 'no media' });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, kind: 'validation', error: 'media: Required' });
  });

  it('answers malformed JSON with a validation failure', async () => {
    const res = await fetch(`${base}/posts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"accountId":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, kind: 'validation' });
  });

  it('rejects statuses an update cannot set', async () => {
    const id = await createDraft(accountId);
    for (const status of ['published', 'error']) {
      const res = await call('PUT', `/posts/${id}`, { status });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ success: false, kind: 'validation' });
    }
    const res = await call('GET', `/posts/${id}`);
    expect(res.body).toMatchObject({ success: true, post: { id, status: 'draft', lastError: null } });
    await call('DELETE', `/posts/${id}`);
  });

  it('reports missing posts as not found', async () => {
    const res = await call('GET', '/posts/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, kind: 'not_found', error: 'post nope not found' });
  });

  it('schedules drafts and shows them on the calendar', async () => {
    const id = await createDraft(accountId);
    const res = await call('POST', '/schedule', { accountId, postIds: [id], postsPerDay: 3 });
    expect(res.body).toMatchObject({ success: true, scheduled: 1 });

    const calendar = await call('GET', `/accounts/${accountId}/schedule`);
    expect(calendar.body).toEqual({
      success: true,
      entries: [{ postId: id, scheduledAt: new Date(2026, 6, 14, 9, 30).getTime(), status: 'scheduled' }],
    });
    await call('DELETE', `/posts/${id}`);
  });

  it('publishes a post on demand, logging the account in first', async () => {
    const id = await createDraft(accountId);
    const res = await call('POST', `/posts/${id}/publish-now`);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ success: true, post: { id, status: 'published', publishedAt: NOW } });
    expect(services.accounts.getAccount(accountId)?.status).toBe('active');

    const again = await call('POST', `/posts/${id}/publish-now`);
    expect(again.status).toBe(409);
    expect(again.body).toMatchObject({ success: false, kind: 'invalid_transition' });
  });

  it('suggests a caption offline', async () => {
    const res = await call('POST', '/captions/suggest', { prompt: 'Harbour at dawn #sea' });
    expect(res.body).toEqual({
      success: true,
      suggestion: { text: 'Harbour at dawn #sea', hashtags: ['#sea'], mocked: true },
    });
  });

  it('exposes runtime state', async () => {
    const status = await call('GET', '/publisher/status');
    expect(status.body).toMatchObject({ success: true, running: false, ticking: false, scheduledCount: 0 });

    const stats = await call('GET', '/limiter/stats');
    expect(stats.body).toMatchObject({ success: true, count: 0 });

    const logs = await call('GET', '/logs?limit=3');
    expect(logs.body).toMatchObject({ success: true });
    expect(z.object({ lines: z.array(z.string()) }).parse(logs.body).lines.length).toBeLessThanOrEqual(3);
  });
});
