import axios, { type AxiosInstance } from 'axios';
import { readFileSync } from 'fs';
import { basename } from 'path';
import { createLogger } from '../logger';
import type { AccountRecord } from '../models';
import { MockClientFactory } from './mockProviders';
import type { ClientFactory, MediaHandle, PublishingClient } from './types';

const log = createLogger('gateway');

interface GatewayMediaResponse {
  id?: string;
  url?: string;
}

/**
 * Axios failures carry the gateway's own explanation in the body. Pacing
 * rejections ("too soon", "please wait") must survive in the message because
 * the publisher classifies failures by it.
 */
export function describeGatewayError(err: unknown): Error {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    let detail = err.message;
    if (typeof data === 'string' && data.trim()) detail = data.trim();
    else if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') detail = data.message;
    const status = err.response?.status;
    return new Error(status ? `gateway ${status}: ${detail}` : detail);
  }
  return err instanceof Error ? err : new Error(String(err));
}

/** Publishes through an HTTP gateway that holds the account's platform session. */
export class HttpPublishingClient implements PublishingClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly username: string,
  ) {}

  publishSingle(path: string, caption: string): Promise<MediaHandle> {
    return this.upload('photo', [path], caption);
  }

  publishAlbum(paths: string[], caption: string): Promise<MediaHandle> {
    return this.upload('album', paths, caption);
  }

  publishVideo(path: string, caption: string): Promise<MediaHandle> {
    return this.upload('video', [path], caption);
  }

  private async upload(kind: 'photo' | 'album' | 'video', paths: string[], caption: string): Promise<MediaHandle> {
    const form = new FormData();
    form.append('kind', kind);
    form.append('caption', caption);
    for (const path of paths) {
      form.append('files', new Blob([readFileSync(path)]), basename(path));
    }

    try {
      const resp = await this.http.post<GatewayMediaResponse>(`/accounts/${encodeURIComponent(this.username)}/media`, form);
      const id = resp.data?.id || `${kind}-${Date.now()}`;
      return { id, url: resp.data?.url };
    } catch (err) {
      throw describeGatewayError(err);
    }
  }
}

export class HttpClientFactory implements ClientFactory {
  private readonly http: AxiosInstance;

  constructor(baseURL: string, token?: string) {
    this.http = axios.create({
      baseURL,
      timeout: 120_000,
      headers: token ? { Authorization: `Bearer ${token}` } : {},
    });
  }

  // The gateway answers 2xx only for an account with a live session.
  async connect(account: AccountRecord): Promise<PublishingClient> {
    try {
      await this.http.post(`/accounts/${encodeURIComponent(account.username)}/session`);
    } catch (err) {
      throw describeGatewayError(err);
    }
    return new HttpPublishingClient(this.http, account.username);
  }
}

export function createClientFactory(publishApi?: { url: string; token?: string }): ClientFactory {
  if (publishApi) {
    log.info(`publishing through gateway ${publishApi.url}`);
    return new HttpClientFactory(publishApi.url, publishApi.token);
  }
  // No gateway configured -> fallback to mock provider
  log.warn('PUBLISH_API_URL not set, using the mock publishing client');
  return new MockClientFactory();
}
