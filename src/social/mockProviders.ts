import { nanoid } from 'nanoid';
import { basename } from 'path';
import { createLogger } from '../logger';
import type { AccountRecord } from '../models';
import { sleep } from '../utils/sleep';
import type { ClientFactory, MediaHandle, PublishingClient } from './types';

const log = createLogger('mock-client');

// Simple mock: pretend to upload and return a handle after a short delay.
export class MockPublishingClient implements PublishingClient {
  constructor(
    private readonly username: string,
    private readonly latencyMs = 400,
  ) {}

  async publishSingle(path: string, caption: string): Promise<MediaHandle> {
    return this.upload('photo', [path], caption);
  }

  async publishAlbum(paths: string[], caption: string): Promise<MediaHandle> {
    return this.upload('album', paths, caption);
  }

  async publishVideo(path: string, caption: string): Promise<MediaHandle> {
    return this.upload('video', [path], caption);
  }

  private async upload(kind: string, paths: string[], caption: string): Promise<MediaHandle> {
    log.info(`MOCK ${kind} upload as @${this.username}: ${paths.map((p) => basename(p)).join(', ')} "${caption.slice(0, 60)}"`);
    // simulate network latency
    await sleep(this.latencyMs);
    return { id: `mock-${kind}-${nanoid(10)}` };
  }
}

export class MockClientFactory implements ClientFactory {
  constructor(private readonly latencyMs = 400) {}

  async connect(account: AccountRecord): Promise<PublishingClient> {
    await sleep(Math.min(this.latencyMs, 200));
    return new MockPublishingClient(account.username, this.latencyMs);
  }
}
