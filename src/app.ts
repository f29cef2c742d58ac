import express, { type ErrorRequestHandler } from 'express';
import { CaptionPlanner } from './agent/planner';
import type { AppConfig } from './config';
import type { Database } from './db';
import { ValidationError, toFailure } from './errors';
import { RateLimiter } from './limiter/rateLimiter';
import { PostService } from './posts/service';
import { PublishLoop } from './publisher/loop';
import { MediaLocator } from './publisher/media';
import { PostPublisher } from './publisher/publish';
import { createRouter } from './routes';
import { Scheduler } from './schedule/scheduler';
import { AccountRegistry } from './social/accounts';
import { createClientFactory } from './social/providers';
import type { ClientFactory } from './social/types';
import { PostStore } from './store/postStore';
import type { Sleeper } from './utils/sleep';

export interface Services {
  config: AppConfig;
  store: PostStore;
  scheduler: Scheduler;
  accounts: AccountRegistry;
  publisher: PostPublisher;
  loop: PublishLoop;
  limiter: RateLimiter;
  planner: CaptionPlanner;
  posts: PostService;
}

export interface ServiceOverrides {
  clientFactory?: ClientFactory;
  now?: () => number;
  sleep?: Sleeper;
}

export function createServices(config: AppConfig, db: Database, overrides: ServiceOverrides = {}): Services {
  const { now, sleep } = overrides;
  const store = new PostStore(db, { now });
  const scheduler = new Scheduler(db, store, { window: config.window, now });
  const accounts = new AccountRegistry(db, overrides.clientFactory ?? createClientFactory(config.publishApi), now);
  const publisher = new PostPublisher({
    store,
    scheduler,
    accounts,
    media: new MediaLocator(config.mediaDir),
    limits: { maxPostsPerDay: config.maxPostsPerDay, minIntervalMinutes: config.window.minIntervalMinutes },
    now,
  });
  const loop = new PublishLoop(store, scheduler, publisher, { ...config.publisher, now, sleep });
  const limiter = new RateLimiter({ minIntervalMs: config.rateLimitMinIntervalMs }, sleep);
  const planner = new CaptionPlanner(limiter, { ...config.openai, sleep });
  const posts = new PostService(store, scheduler, publisher, accounts);

  return { config, store, scheduler, accounts, publisher, loop, limiter, planner, posts };
}

// body-parser rejects malformed JSON before any route runs
const bodyErrors: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) return next(err);
  const failure = err instanceof SyntaxError ? toFailure(new ValidationError(`malformed JSON body: ${err.message}`)) : toFailure(err);
  res.status(failure.status).send(failure.body);
};

export function createApp(services: Services) {
  const app = express();
  app.use(express.json());
  app.use('/api', createRouter(services));
  app.use(bodyErrors);
  return app;
}
