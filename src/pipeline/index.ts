/**
 * Run trigger: the one entry point callers use. Always resolves with a PipelineResult.
 */
import { randomUUID } from 'node:crypto';
import { env } from '../config.js';
import { ConfigError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { createRuntime, type PipelineRuntime } from './runtime.js';
import type { PipelineFailure, PipelineResult } from './types.js';

let runtime: PipelineRuntime | undefined;

function preflightFailure(channel: string, topic: string, err: unknown): PipelineFailure {
  return {
    status: 'failure',
    runId: randomUUID(),
    channel,
    topic,
    stage: 'Preflight',
    kind: err instanceof ConfigError ? err.kind : 'InvalidConfig',
    message: errorMessage(err),
    durationMs: 0,
    attempts: { ScriptGenerating: 0, Synthesizing: 0, AssetResolving: 0, Composing: 0 },
    partial: {},
  };
}

export async function runPipeline(
  channel: string,
  topic: string,
  options: { signal?: AbortSignal } = {},
): Promise<PipelineResult> {
  try {
    runtime ??= createRuntime(env);
  } catch (err) {
    logger.error('Pipeline: runtime could not be built', { error: errorMessage(err) });
    return preflightFailure(channel, topic, err);
  }
  return runtime.runPipeline(channel, topic, options.signal);
}

export async function shutdown(): Promise<void> {
  const current = runtime;
  runtime = undefined;
  if (current) await current.close();
}

export { createRuntime } from './runtime.js';
export type { PipelineRuntime, RuntimeOverrides } from './runtime.js';
export type { PipelineFailure, PipelineResult, PipelineSuccess } from './types.js';
