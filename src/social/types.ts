import type { AccountRecord } from '../models';

export interface MediaHandle {
  id: string;
  url?: string;
}

/** A logged-in session able to publish on behalf of one account. */
export interface PublishingClient {
  publishSingle(path: string, caption: string): Promise<MediaHandle>;
  publishAlbum(paths: string[], caption: string): Promise<MediaHandle>;
  publishVideo(path: string, caption: string): Promise<MediaHandle>;
}

export interface AccountResolver {
  getAccount(id: string): AccountRecord | undefined;
  getClient(id: string): PublishingClient | undefined;
  login(id: string): Promise<boolean>;
}

export interface ClientFactory {
  connect(account: AccountRecord): Promise<PublishingClient>;
}
