import { afterEach, describe, expect, it, vi } from 'vitest';
import { RateLimitedCompletion, estimateTokens } from '../../src/ai/limiter.js';
import type { CompletionRequest, TextCompletion } from '../../src/ai/llm.js';
import type { LlmRateLimits } from '../../src/config.js';
import { GenerationError } from '../../src/errors.js';

class FakeCompletion implements TextCompletion {
  readonly model = 'test-model';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: (request: CompletionRequest) => Promise<string> = async () => 'ok') {}

  complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.reply(request);
  }
}

const limits = (overrides: Partial<LlmRateLimits> = {}): LlmRateLimits => ({
  requestsPerMinute: 10, tokensPerMinute: 1_000, requestsPerDay: 0, maxConcurrent: 1, ...overrides,
});

const request = (overrides: Partial<CompletionRequest> = {}): CompletionRequest => ({
  prompt: 'hello', maxTokens: 10, temperature: 0.7, ...overrides,
});

const open: RateLimitedCompletion[] = [];
function limited(inner: TextCompletion, l: LlmRateLimits, now?: () => number): RateLimitedCompletion {
  const completion = new RateLimitedCompletion(inner, l, { now });
  open.push(completion);
  return completion;
}
afterEach(async () => {
  await Promise.all(open.splice(0).map((c) => c.close()));
});

async function generationFailure(promise: Promise<unknown>): Promise<GenerationError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof GenerationError) return err;
    throw err;
  }
  throw new Error('expected the call to fail');
}

describe('estimateTokens', () => {
  it('counts four prompt chars per token plus the output budget', () => {
    expect(estimateTokens('abcdefgh', 100)).toBe(102);
    expect(estimateTokens('abc', 100)).toBe(101);
    expect(estimateTokens('', 5)).toBe(6);
  });
});

describe('RateLimitedCompletion', () => {
  it('passes calls through under the same model name', async () => {
    const inner = new FakeCompletion(async () => 'a script');
    const completion = limited(inner, limits());

    expect(completion.model).toBe('test-model');
    await expect(completion.complete(request())).resolves.toBe('a script');
    expect(inner.requests).toEqual([request()]);
  });

  it('refuses a call whose estimate can never fit the token budget', async () => {
    const inner = new FakeCompletion();
    const completion = limited(inner, limits({ tokensPerMinute: 100 }));

    const err = await generationFailure(completion.complete(request({ prompt: 'x'.repeat(40), maxTokens: 95 })));

    expect(err.kind).toBe('InvalidPrompt');
    expect(err.retryable).toBe(false);
    expect(err.message).toBe(
      'Estimated 105 tokens exceed the 100 tokens-per-minute limit; reduce LLM_MAX_OUTPUT_TOKENS or the prompt size',
    );
    expect(inner.requests).toHaveLength(0);
  });

  it('runs no more calls at once than the concurrency limit', async () => {
    let release: (text: string) => void = () => undefined;
    const first = new Promise<string>((resolve) => { release = resolve; });
    const inner = new FakeCompletion((r) => (r.prompt === 'first' ? first : Promise.resolve('second done')));
    const completion = limited(inner, limits({ maxConcurrent: 1 }));

    const a = completion.complete(request({ prompt: 'first' }));
    const b = completion.complete(request({ prompt: 'second' }));
    await vi.waitFor(() => expect(inner.requests).toHaveLength(1));
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(inner.requests).toHaveLength(1);

    release('first done');
    await expect(Promise.all([a, b])).resolves.toEqual(['first done', 'second done']);
    expect(inner.requests.map((r) => r.prompt)).toEqual(['first', 'second']);
  });

  it('stops at the daily cap and starts counting again the next UTC day', async () => {
    let now = Date.parse('2026-03-01T10:00:00Z');
    const inner = new FakeCompletion();
    const completion = limited(inner, limits({ requestsPerDay: 1 }), () => now);

    await expect(completion.complete(request())).resolves.toBe('ok');
    const err = await generationFailure(completion.complete(request()));
    expect(err.kind).toBe('QuotaExceeded');
    expect(err.message).toBe('Daily model request limit of 1 reached (LLM_RPD_LIMIT)');
    expect(inner.requests).toHaveLength(1);

    now = Date.parse('2026-03-02T00:00:01Z');
    await expect(completion.complete(request())).resolves.toBe('ok');
    expect(inner.requests).toHaveLength(2);
  });

  it('gives up on a call waiting for request budget when the caller aborts', async () => {
    const inner = new FakeCompletion();
    const completion = limited(inner, limits({ requestsPerMinute: 1 }));
    await completion.complete(request());

    const controller = new AbortController();
    const queued = completion.complete(request({ signal: controller.signal }));
    controller.abort();

    await expect(queued).rejects.toMatchObject({ name: 'AbortError' });
    expect(inner.requests).toHaveLength(1);
  });

  it('does not queue a call that is already aborted', async () => {
    const inner = new FakeCompletion();
    const completion = limited(inner, limits());
    await expect(completion.complete(request({ signal: AbortSignal.abort() })))
      .rejects.toMatchObject({ name: 'AbortError' });
    expect(inner.requests).toHaveLength(0);
  });
});
