/**
 * Client-side budget for model calls: requests per minute, tokens per minute, a daily
 * request cap and a concurrency limit. Calls wait for budget rather than fail, except
 * when a single call could never fit or the day's cap is spent.
 */
import Bottleneck from 'bottleneck';
import type { LlmRateLimits } from '../config.js';
import { GenerationError, abortReason } from '../errors.js';
import { untilAborted } from '../utils/abort.js';
import { logger } from '../utils/logger.js';
import type { CompletionRequest, TextCompletion } from './llm.js';

/** Rough token count for a call: ~4 chars per prompt token plus the whole output budget. */
export function estimateTokens(prompt: string, maxOutputTokens: number): number {
  return Math.max(1, Math.floor(prompt.length / 4)) + maxOutputTokens;
}

const utcDay = (ms: number) => new Date(ms).toISOString().slice(0, 10);

export interface RateLimitedCompletionOptions {
  now?: () => number;
}

export class RateLimitedCompletion implements TextCompletion {
  readonly model: string;

  private readonly requests: Bottleneck;
  private readonly tokens: Bottleneck;
  private readonly now: () => number;
  private day: string;
  private requestsToday = 0;

  constructor(
    private readonly inner: TextCompletion,
    private readonly limits: LlmRateLimits,
    options: RateLimitedCompletionOptions = {},
  ) {
    this.model = inner.model;
    this.now = options.now ?? Date.now;
    this.day = utcDay(this.now());

    const rpm = limits.requestsPerMinute;
    this.requests = new Bottleneck({
      maxConcurrent: limits.maxConcurrent,
      reservoir: rpm,
      reservoirIncreaseAmount: 1,
      reservoirIncreaseInterval: Math.ceil(60_000 / rpm),
      reservoirIncreaseMaximum: rpm,
    });
    const tpm = limits.tokensPerMinute;
    this.tokens = new Bottleneck({
      reservoir: tpm,
      reservoirIncreaseAmount: Math.ceil(tpm / 60),
      reservoirIncreaseInterval: 1_000,
      reservoirIncreaseMaximum: tpm,
    });
    this.requests.on('depleted', () => logger.info('LLM: request budget spent, waiting for refill', { rpm }));
    this.tokens.on('depleted', () => logger.info('LLM: token budget spent, waiting for refill', { tpm }));
  }

  complete(request: CompletionRequest): Promise<string> {
    const estimate = estimateTokens(request.prompt, request.maxTokens);
    if (estimate > this.limits.tokensPerMinute) {
      return Promise.reject(new GenerationError(
        'InvalidPrompt',
        `Estimated ${estimate} tokens exceed the ${this.limits.tokensPerMinute} tokens-per-minute limit; `
          + 'reduce LLM_MAX_OUTPUT_TOKENS or the prompt size',
      ));
    }
    const { signal } = request;
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    const work = this.requests.schedule(() =>
      this.tokens.schedule({ weight: estimate }, async () => {
        if (signal?.aborted) throw abortReason(signal);
        this.takeDailySlot();
        return this.inner.complete(request);
      }));
    return untilAborted(work, signal);
  }

  private takeDailySlot(): void {
    const today = utcDay(this.now());
    if (today !== this.day) {
      this.day = today;
      this.requestsToday = 0;
    }
    const cap = this.limits.requestsPerDay;
    if (cap > 0 && this.requestsToday >= cap) {
      throw new GenerationError('QuotaExceeded', `Daily model request limit of ${cap} reached (LLM_RPD_LIMIT)`);
    }
    this.requestsToday += 1;
  }

  /** Drops queued calls and stops the refill timers. */
  async close(): Promise<void> {
    await Promise.all([
      this.requests.stop({ dropWaitingJobs: true }),
      this.tokens.stop({ dropWaitingJobs: true }),
    ]);
    await Promise.all([this.requests.disconnect(), this.tokens.disconnect()]);
  }
}
