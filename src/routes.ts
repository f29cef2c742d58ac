import express, { type Request, type Response } from 'express';
import type { Services } from './app';
import { NotFoundError, toFailure } from './errors';
import { createLogger, recentLogs } from './logger';
import {
  assignScheduleBody,
  captionBody,
  createAccountBody,
  createPostBody,
  listPostsQuery,
  logsQuery,
  parseInput,
  updatePostBody,
} from './schemas';

const log = createLogger('api');

type Handler = (req: Request, res: Response) => unknown;

// every handler answers { success: true, ... } or the mapped failure
function handle(fn: Handler) {
  return async (req: Request, res: Response) => {
    try {
      await fn(req, res);
    } catch (err) {
      const { status, body } = toFailure(err);
      if (status >= 500) log.error(`${req.method} ${req.originalUrl} failed`, err);
      res.status(status).send(body);
    }
  };
}

export function createRouter(services: Services) {
  const { accounts, posts, loop, limiter, planner, config } = services;
  const router = express.Router();

  // accounts
  router.get(
    '/accounts',
    handle((req, res) => res.send({ success: true, accounts: accounts.list() })),
  );

  router.post(
    '/accounts',
    handle((req, res) => {
      const { username } = parseInput(createAccountBody, req.body);
      res.status(201).send({ success: true, account: accounts.create(username) });
    }),
  );

  router.post(
    '/accounts/:id/login',
    handle(async (req, res) => {
      const id = req.params.id;
      if (!accounts.getAccount(id)) throw new NotFoundError(`account ${id} not found`);
      const ok = await accounts.login(id);
      res.send({ success: ok, account: accounts.getAccount(id) });
    }),
  );

  router.post(
    '/accounts/:id/logout',
    handle((req, res) => {
      accounts.logout(req.params.id);
      res.send({ success: true, account: accounts.getAccount(req.params.id) });
    }),
  );

  router.delete(
    '/accounts/:id',
    handle((req, res) => {
      if (!accounts.getAccount(req.params.id)) throw new NotFoundError(`account ${req.params.id} not found`);
      accounts.remove(req.params.id);
      res.send({ success: true });
    }),
  );

  router.get(
    '/accounts/:id/schedule',
    handle((req, res) => {
      if (!accounts.getAccount(req.params.id)) throw new NotFoundError(`account ${req.params.id} not found`);
      res.send({ success: true, entries: posts.calendar(req.params.id) });
    }),
  );

  // posts
  router.get(
    '/posts',
    handle((req, res) => {
      const filter = parseInput(listPostsQuery, req.query);
      res.send({ success: true, posts: posts.list(filter) });
    }),
  );

  router.post(
    '/posts',
    handle((req, res) => {
      const input = parseInput(createPostBody, req.body);
      res.status(201).send({ success: true, post: posts.create(input) });
    }),
  );

  router.get(
    '/posts/:id',
    handle((req, res) => res.send({ success: true, post: posts.get(req.params.id) })),
  );

  router.put(
    '/posts/:id',
    handle((req, res) => {
      const fields = parseInput(updatePostBody, req.body);
      res.send({ success: true, post: posts.update(req.params.id, fields) });
    }),
  );

  router.delete(
    '/posts/:id',
    handle((req, res) => {
      posts.delete(req.params.id);
      res.send({ success: true });
    }),
  );

  router.post(
    '/posts/:id/publish-now',
    handle(async (req, res) => {
      const outcome = await posts.publishNow(req.params.id);
      if (outcome.status === 'published') {
        res.send({ success: true, post: outcome.post, media: outcome.media });
      } else if (outcome.status === 'skipped') {
        res.status(409).send({ success: false, kind: 'invalid_transition', error: outcome.reason });
      } else {
        // deferred keeps its state, failed is already recorded on the post
        const deferred = outcome.status === 'deferred';
        res.status(deferred ? 409 : 502).send({
          success: false,
          kind: deferred ? 'timing_violation' : 'hard_publish_failure',
          error: outcome.reason,
          post: outcome.post,
        });
      }
    }),
  );

  // scheduling
  router.post(
    '/schedule',
    handle((req, res) => {
      const body = parseInput(assignScheduleBody, req.body);
      const scheduled = posts.assign(
        body.accountId,
        body.postIds,
        body.postsPerDay ?? config.defaultPostsPerDay,
        body.startTime,
      );
      res.send({ success: true, scheduled: scheduled.length, posts: scheduled });
    }),
  );

  // runtime
  router.get(
    '/publisher/status',
    handle((req, res) => res.send({ success: true, ...loop.status() })),
  );

  router.get(
    '/limiter/stats',
    handle((req, res) => res.send({ success: true, ...limiter.stats() })),
  );

  router.get(
    '/logs',
    handle((req, res) => {
      const { limit } = parseInput(logsQuery, req.query);
      res.send({ success: true, lines: recentLogs(limit) });
    }),
  );

  router.post(
    '/captions/suggest',
    handle(async (req, res) => {
      const { prompt } = parseInput(captionBody, req.body);
      res.send({ success: true, suggestion: await planner.suggest(prompt) });
    }),
  );

  return router;
}
