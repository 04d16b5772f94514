/**
 * Script generation: Anthropic Claude primary, OpenAI fallback.
 * SDK retries are off: the orchestrator's stage policy owns retrying.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { Env } from '../config.js';
import { ConfigError, GenerationError, abortReason, errorMessage } from '../errors.js';
import type { ScriptGenerator, ScriptSection, ScriptText } from '../pipeline/types.js';
import { hashJson } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import type { ResponseCache } from './cache.js';

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export interface TextCompletion {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

const QUOTA_PATTERN = /insufficient[_ ]quota|credit balance|quota exceeded/i;

export function generationErrorFromStatus(
  status: number | undefined,
  code: string | null | undefined,
  message: string,
  cause?: unknown,
): GenerationError {
  const opts = { cause };
  if (code === 'insufficient_quota' || QUOTA_PATTERN.test(message)) {
    return new GenerationError('QuotaExceeded', `Model quota exhausted: ${message}`, opts);
  }
  if (status === undefined) return new GenerationError('TransientFailure', `Model request failed: ${message}`, opts);
  if (status === 401 || status === 403) {
    return new GenerationError('AuthFailure', `Model rejected credentials (HTTP ${status})`, opts);
  }
  if (status === 429 || status >= 500) {
    return new GenerationError('TransientFailure', `Model unavailable (HTTP ${status}): ${message}`, opts);
  }
  return new GenerationError('InvalidPrompt', `Model rejected the prompt (HTTP ${status}): ${message}`, opts);
}

function fromAnthropic(err: unknown): GenerationError {
  if (err instanceof Anthropic.APIError) return generationErrorFromStatus(err.status, undefined, err.message, err);
  return new GenerationError('TransientFailure', `Anthropic request failed: ${errorMessage(err)}`, { cause: err });
}

function fromOpenAI(err: unknown): GenerationError {
  if (err instanceof OpenAI.APIError) return generationErrorFromStatus(err.status, err.code, err.message, err);
  return new GenerationError('TransientFailure', `OpenAI request failed: ${errorMessage(err)}`, { cause: err });
}

export class OpenAICompletion implements TextCompletion {
  constructor(private readonly client: OpenAI, readonly model: string) {}

  async complete({ prompt, maxTokens, temperature, signal }: CompletionRequest): Promise<string> {
    try {
      const res = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: maxTokens,
        temperature,
        messages: [{ role: 'user', content: prompt }],
      }, { signal });
      return res.choices[0]?.message?.content ?? '';
    } catch (err) {
      throw fromOpenAI(err);
    }
  }
}

export class AnthropicCompletion implements TextCompletion {
  constructor(
    private readonly client: Anthropic,
    readonly model: string,
    private readonly fallback?: TextCompletion,
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const res = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }],
      }, { signal: request.signal });
      return res.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
    } catch (err) {
      if (this.fallback && err instanceof Anthropic.APIError && err.status !== undefined && err.status >= 500) {
        logger.warn(`Anthropic unavailable, falling back to ${this.fallback.model}`, { status: err.status });
        return this.fallback.complete(request);
      }
      throw fromAnthropic(err);
    }
  }
}

export function createTextCompletion(e: Env): TextCompletion {
  const openai = e.OPENAI_API_KEY
    ? new OpenAICompletion(new OpenAI({ apiKey: e.OPENAI_API_KEY, maxRetries: 0 }), e.OPENAI_MODEL)
    : undefined;
  if (e.ANTHROPIC_API_KEY) {
    return new AnthropicCompletion(new Anthropic({ apiKey: e.ANTHROPIC_API_KEY, maxRetries: 0 }), e.ANTHROPIC_MODEL, openai);
  }
  if (openai) return openai;
  throw new ConfigError('MissingApiKey', 'Script generation needs ANTHROPIC_API_KEY or OPENAI_API_KEY');
}

export function buildPrompt(channel: string, topic: string, language: string): string {
  return [
    `Write a short, engaging narration script for the video channel "${channel}" about: ${topic}.`,
    `Write it in the language with code ${language}.`,
    'Use plain paragraphs separated by blank lines. No headings, markdown or stage directions.',
  ].join('\n');
}

/** Over-long prompts keep their head and tail around a `...` marker. */
export function truncatePrompt(prompt: string, maxChars: number): string {
  if (prompt.length <= maxChars) return prompt;
  const half = Math.floor(maxChars / 2);
  const tail = half > 0 ? prompt.slice(-half) : '';
  return `${prompt.slice(0, half)}\n...\n${tail}`;
}

export function splitSections(text: string): ScriptSection[] {
  return text
    .split(/\n\s*\n/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part, index) => ({ index, text: part }));
}

export interface LlmScriptGeneratorOptions {
  maxTokens: number;
  temperature: number;
  maxPromptChars: number;
  cache: ResponseCache;
}

export class LlmScriptGenerator implements ScriptGenerator {
  constructor(private readonly completion: TextCompletion, private readonly options: LlmScriptGeneratorOptions) {}

  async generate(topic: string, language: string, context: { channel: string; signal?: AbortSignal }): Promise<ScriptText> {
    const raw = buildPrompt(context.channel, topic, language);
    const prompt = truncatePrompt(raw, this.options.maxPromptChars);
    if (prompt !== raw) logger.info('LLM: prompt truncated', { chars: raw.length, max: this.options.maxPromptChars });

    const { maxTokens, temperature } = this.options;
    const key = hashJson({ prompt, model: this.completion.model, maxTokens, temperature });
    let text = this.options.cache.get(key);
    if (text !== undefined) {
      logger.info('LLM: cache hit', { model: this.completion.model });
    } else {
      logger.info('LLM: generating script', { model: this.completion.model, maxTokens });
      try {
        text = (await this.completion.complete({ prompt, maxTokens, temperature, signal: context.signal })).trim();
      } catch (err) {
        if (context.signal?.aborted) throw abortReason(context.signal);
        throw err;
      }
      if (text) this.options.cache.set(key, text);
    }

    const sections = splitSections(text);
    if (sections.length === 0) throw new GenerationError('InvalidPrompt', 'Model returned an empty script');
    return { text, sections };
  }
}
