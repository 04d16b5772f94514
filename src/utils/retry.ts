import { logger } from './logger.js';
import { abortReason } from '../errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  label?: string;
}

function field(err: unknown, key: 'retryable' | 'retryAfterMs'): unknown {
  return typeof err === 'object' && err !== null ? Reflect.get(err, key) : undefined;
}

const defaultRetryable = (err: unknown) => field(err, 'retryable') === true;

function retryAfterOf(err: unknown): number {
  const value = field(err, 'retryAfterMs');
  return typeof value === 'number' && value > 0 ? value : 0;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) { reject(abortReason(signal)); return; }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` up to `maxAttempts` times. Only errors accepted by `isRetryable` (by default
 * those exposing `retryable: true`) are retried; a `retryAfterMs` on the error raises the
 * wait to at least that long.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 500, backoffFactor = 2,
    isRetryable = defaultRetryable, onRetry, signal, label = 'operation' } = opts;
  const wait = opts.sleep ?? sleep;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try { return await fn(attempt); }
    catch (err) {
      lastErr = err;
      if (!isRetryable(err) || attempt === maxAttempts) throw err;
      const delay = Math.max(baseDelayMs * Math.pow(backoffFactor, attempt - 1), retryAfterOf(err));
      logger.warn(`Retry ${attempt}/${maxAttempts} for ${label} in ${delay}ms`, { error: String(err) });
      onRetry?.(attempt, err, delay);
      await wait(delay, signal);
    }
  }
  throw lastErr;
}

/** Converts a Retry-After header (delta seconds or HTTP-date) to milliseconds. */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Math.round(Number(trimmed) * 1000);
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}
