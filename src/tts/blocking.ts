/**
 * Adapter that gives a blocking provider the same awaitable contract as the cooperative
 * one: each call becomes a job on the shared pool and the caller awaits its promise.
 */
import { SynthesisError, errorMessage, isAbortError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { BlockingPool } from '../workers/pool.js';
import type { BlockingSynthesisJob, BlockingSynthesisOutcome, ElevenLabsSettings } from './elevenlabs.js';
import type { AudioArtifact, ProviderId, SpeechSynthesizer, SynthesisOptions } from './types.js';

export type BlockingSynthesisPool = BlockingPool<BlockingSynthesisJob, BlockingSynthesisOutcome>;

export class BlockingSpeechSynthesizer implements SpeechSynthesizer {
  constructor(
    readonly provider: ProviderId,
    private readonly pool: BlockingSynthesisPool,
    private readonly settings: ElevenLabsSettings,
  ) {}

  async synthesize(text: string, voiceId: string, options: SynthesisOptions): Promise<AudioArtifact> {
    logger.info('Blocking TTS: dispatching to worker pool', { provider: this.provider, voiceId, chars: text.length });
    let outcome: BlockingSynthesisOutcome;
    try {
      outcome = await this.pool.run(
        { text, voiceId, outputPath: options.outputPath, settings: this.settings },
        options.signal,
      );
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw new SynthesisError('UnexpectedResponse', `Blocking worker failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!outcome.ok) {
      throw new SynthesisError(outcome.kind, outcome.message, { retryAfterMs: outcome.retryAfterMs });
    }
    logger.info('Blocking TTS: audio saved', { path: outcome.artifact.path, durationSeconds: outcome.artifact.durationSeconds });
    return outcome.artifact;
  }
}
