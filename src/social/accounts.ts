import { nanoid } from 'nanoid';
import type { Database } from '../db';
import { NotFoundError, ValidationError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { AccountRecord, AccountStatus } from '../models';
import type { AccountResolver, ClientFactory, PublishingClient } from './types';

const log = createLogger('accounts');

/**
 * Known accounts are persisted; their publishing clients only live in memory
 * and are re-established by `login` after a restart.
 */
export class AccountRegistry implements AccountResolver {
  private readonly clients = new Map<string, PublishingClient>();

  constructor(
    private readonly db: Database,
    private readonly factory: ClientFactory,
    private readonly now: () => number = Date.now,
  ) {}

  create(username: string): AccountRecord {
    const name = username.trim().replace(/^@/, '');
    if (!name) throw new ValidationError('username is required');
    if (this.db.data.accounts.some((a) => a.username === name)) {
      throw new ValidationError(`account @${name} already exists`);
    }
    const account: AccountRecord = {
      id: nanoid(),
      username: name,
      status: 'inactive',
      lastLogin: null,
      lastError: null,
      createdAt: this.now(),
    };
    this.db.data.accounts.push(account);
    this.db.write();
    log.info(`created account @${name} (${account.id})`);
    return { ...account };
  }

  list(): AccountRecord[] {
    return this.db.data.accounts.map((a) => ({ ...a }));
  }

  getAccount(id: string): AccountRecord | undefined {
    const account = this.db.data.accounts.find((a) => a.id === id);
    return account ? { ...account } : undefined;
  }

  getClient(id: string): PublishingClient | undefined {
    return this.clients.get(id);
  }

  async login(id: string): Promise<boolean> {
    const account = this.db.data.accounts.find((a) => a.id === id);
    if (!account) return false;

    this.setStatus(account, 'logging_in');
    try {
      const client = await this.factory.connect({ ...account });
      this.clients.set(id, client);
      account.lastLogin = this.now();
      account.lastError = null;
      this.setStatus(account, 'active');
      log.info(`@${account.username} logged in`);
      return true;
    } catch (err) {
      this.clients.delete(id);
      account.lastError = errorMessage(err);
      this.setStatus(account, 'error');
      log.error(`@${account.username} login failed`, err);
      return false;
    }
  }

  logout(id: string) {
    const account = this.db.data.accounts.find((a) => a.id === id);
    if (!account) throw new NotFoundError(`account ${id} not found`);
    this.clients.delete(id);
    this.setStatus(account, 'inactive');
    log.info(`@${account.username} logged out`);
  }

  remove(id: string) {
    const account = this.db.data.accounts.find((a) => a.id === id);
    if (!account) return;
    this.clients.delete(id);
    this.db.data.accounts = this.db.data.accounts.filter((a) => a.id !== id);
    this.db.write();
    log.info(`removed account @${account.username}`);
  }

  /** Logs every account in concurrently and reports how many came up. */
  async loginAll(): Promise<{ active: number; total: number }> {
    const ids = this.db.data.accounts.map((a) => a.id);
    log.info(`logging in ${ids.length} accounts`);
    const results = await Promise.allSettled(ids.map((id) => this.login(id)));
    const active = results.filter((r) => r.status === 'fulfilled' && r.value).length;
    log.info(`auto-login finished: ${active}/${ids.length} accounts active`);
    return { active, total: ids.length };
  }

  private setStatus(account: AccountRecord, status: AccountStatus) {
    account.status = status;
    this.db.write();
  }
}
