import { join, resolve } from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ValidationError } from './errors';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    const config = loadConfig({});
    expect(config.port).toBe(3000);
    expect(config.dataDir).toBe(resolve('data'));
    expect(config.mediaDir).toBe(join(resolve('data'), 'media'));
    expect(config.window).toEqual({ startHour: 8, endHour: 23, minIntervalMinutes: 30 });
    expect(config.publisher).toEqual({
      cron: '*/30 * * * * *',
      staleAfterSeconds: 3600,
      lateToleranceSeconds: 120,
      earlyGraceSeconds: 600,
      pauseMs: 5000,
    });
    expect(config.maxPostsPerDay).toBe(10);
    expect(config.publishApi).toBeUndefined();
    expect(config.openai).toEqual({ apiKey: undefined, model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1' });
  });

  it('reads overrides and ignores empty values', () => {
    const config = loadConfig({
      PORT: '8080',
      POSTING_START_HOUR: '9',
      POSTING_END_HOUR: '',
      PUBLISH_API_URL: 'http://localhost:9000',
      PUBLISH_API_TOKEN: 'test-secret',
      LOG_LEVEL: 'debug',
    });
    expect(config.port).toBe(8080);
    expect(config.window.startHour).toBe(9);
    expect(config.window.endHour).toBe(23);
    expect(config.publishApi).toEqual({ url: 'http://localhost:9000', token: 'test-secret' });
    expect(config.logLevel).toBe('debug');
  });

  it('rejects a window that closes before it opens', () => {
    expect(() => loadConfig({ POSTING_START_HOUR: '20', POSTING_END_HOUR: '10' })).toThrow(
      'invalid configuration: env: POSTING_START_HOUR must be before POSTING_END_HOUR',
    );
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ValidationError);
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/PORT/);
  });

  it('rejects an early grace past the stale threshold', () => {
    expect(() => loadConfig({ EARLY_GRACE_SECONDS: '4000' })).toThrow(/EARLY_GRACE_SECONDS/);
  });
});
