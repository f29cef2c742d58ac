import axios from 'axios';
import { ValidationError } from '../errors';
import { BATCH_RETRY, INTERACTIVE_RETRY, withQuotaRetry, type RetryPolicy } from '../limiter/backoff';
import type { RateLimiter } from '../limiter/rateLimiter';
import { createLogger } from '../logger';
import type { Sleeper } from '../utils/sleep';

const log = createLogger('planner');

export const MAX_CAPTION_LENGTH = 2200;

export interface CaptionSuggestion {
  text: string;
  hashtags: string[];
  mocked: boolean;
}

export interface PlannerOptions {
  apiKey?: string;
  model: string;
  baseUrl: string;
  sleep?: Sleeper;
}

interface ChatCompletion {
  choices?: Array<{ message?: { content?: string } }>;
}

export function validateCaption(text: string): string[] {
  const errors: string[] = [];
  if (!text || text.trim().length === 0) errors.push('text-empty');
  if (text.length > MAX_CAPTION_LENGTH) errors.push('text-too-long');
  return errors;
}

function extractHashtags(text: string): string[] {
  return Array.from(new Set(text.match(/#[\p{L}\p{N}_]+/gu) ?? []));
}

// Keeps the model's reply when it is a JSON object, otherwise the raw text.
function parseSuggestion(content: string): { text: string; hashtags: string[] } {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (jsonMatch) {
    try {
      const parsed: unknown = JSON.parse(jsonMatch[0]);
      if (parsed && typeof parsed === 'object' && 'text' in parsed && typeof parsed.text === 'string') {
        const tags =
          'hashtags' in parsed && Array.isArray(parsed.hashtags)
            ? parsed.hashtags.filter((t): t is string => typeof t === 'string')
            : extractHashtags(parsed.text);
        return { text: parsed.text.trim(), hashtags: tags };
      }
    } catch {
      // not JSON after all; fall through to plain text
    }
  }
  const text = content.trim();
  return { text, hashtags: extractHashtags(text) };
}

/**
 * Suggests captions through an OpenAI-compatible chat endpoint. Every request
 * goes through the shared rate limiter; quota errors are waited out per the
 * retry policy of the calling path.
 */
export class CaptionPlanner {
  constructor(
    private readonly limiter: RateLimiter,
    private readonly options: PlannerOptions,
  ) {}

  /** Interactive path: bounded retries, the quota error reaches the caller. */
  suggest(prompt: string): Promise<CaptionSuggestion> {
    return this.generate(prompt, INTERACTIVE_RETRY);
  }

  /** Batch path: waits out quota resets for as long as it takes, unless `signal` aborts. */
  async suggestMany(prompts: string[], signal?: AbortSignal): Promise<CaptionSuggestion[]> {
    const out: CaptionSuggestion[] = [];
    for (const [i, prompt] of prompts.entries()) {
      log.info(`caption ${i + 1}/${prompts.length}`);
      out.push(await this.generate(prompt, BATCH_RETRY, signal));
    }
    return out;
  }

  private async generate(prompt: string, policy: RetryPolicy, signal?: AbortSignal): Promise<CaptionSuggestion> {
    const topic = prompt.trim();
    if (!topic) throw new ValidationError('prompt is required');

    // If no API key configured, return a deterministic mock so the app still works offline.
    if (!this.options.apiKey) {
      const text = topic.slice(0, MAX_CAPTION_LENGTH);
      return { text, hashtags: extractHashtags(text), mocked: true };
    }

    const content = await withQuotaRetry(
      async () => {
        await this.limiter.waitIfNeeded();
        return this.complete(topic);
      },
      policy,
      { signal, sleep: this.options.sleep, label: 'caption request' },
    );

    const suggestion = parseSuggestion(content);
    const errors = validateCaption(suggestion.text);
    if (errors.length) throw new ValidationError(`generated caption rejected: ${errors.join(', ')}`);
    return { ...suggestion, mocked: false };
  }

  private async complete(topic: string): Promise<string> {
    const system =
      'You write captions for image and video posts. Reply with a JSON object only: ' +
      '{"text": string, "hashtags": string[]}. Keep the caption under 2200 characters and put the hashtags at its end.';
    try {
      const resp = await axios.post<ChatCompletion>(
        `${this.options.baseUrl}/chat/completions`,
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: `Write a caption for: ${topic}` },
          ],
          temperature: 0.7,
          max_tokens: 600,
        },
        { headers: { Authorization: `Bearer ${this.options.apiKey}`, 'Content-Type': 'application/json' } },
      );
      const content = resp.data?.choices?.[0]?.message?.content;
      if (!content) throw new Error('empty completion');
      return content;
    } catch (err) {
      // the status and the provider's detail carry the quota signal and the retry hint
      if (axios.isAxiosError(err) && err.response) {
        const body = typeof err.response.data === 'string' ? err.response.data : JSON.stringify(err.response.data);
        throw new Error(`HTTP ${err.response.status}: ${body}`);
      }
      throw err;
    }
  }
}
