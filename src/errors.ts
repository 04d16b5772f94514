/**
 * Typed failures for every stage of a run. Each carries a `kind` that ends up in the
 * PipelineResult and a `retryable` flag read by withRetry.
 */

export type ConfigErrorKind =
  | 'UnknownChannel' | 'UnknownProvider' | 'MissingVoiceId' | 'MissingApiKey' | 'InvalidConfig';
export type GenerationErrorKind = 'QuotaExceeded' | 'InvalidPrompt' | 'TransientFailure' | 'AuthFailure';
export type SynthesisErrorKind =
  | 'AuthFailure' | 'RateLimited' | 'InvalidVoiceId' | 'TransientNetworkError' | 'UnexpectedResponse';
export type AssetErrorKind = 'NotFound' | 'FetchFailed';
export type RenderErrorKind = 'EncoderUnavailable' | 'InvalidInput' | 'EncodingFailed';

export type ErrorKind =
  | ConfigErrorKind | GenerationErrorKind | SynthesisErrorKind | AssetErrorKind | RenderErrorKind;

export const SYNTHESIS_ERROR_KINDS = [
  'AuthFailure', 'RateLimited', 'InvalidVoiceId', 'TransientNetworkError', 'UnexpectedResponse',
] as const satisfies readonly SynthesisErrorKind[];

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ConfigError extends PipelineError {
  readonly retryable = false;

  constructor(readonly kind: ConfigErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class GenerationError extends PipelineError {
  readonly retryable: boolean;

  constructor(readonly kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
    this.retryable = kind === 'TransientFailure';
  }
}

export class SynthesisError extends PipelineError {
  readonly retryable: boolean;
  readonly retryAfterMs: number | undefined;

  constructor(
    readonly kind: SynthesisErrorKind,
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number },
  ) {
    super(message, options);
    this.name = 'SynthesisError';
    this.retryable = kind === 'RateLimited' || kind === 'TransientNetworkError';
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class AssetError extends PipelineError {
  readonly retryable = false;

  constructor(readonly kind: AssetErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssetError';
  }
}

export class RenderError extends PipelineError {
  readonly retryable = false;

  constructor(readonly kind: RenderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RenderError';
  }
}

export function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}

export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
