/**
 * TTS provider factory: one synthesizer per provider, created on first use.
 * The ElevenLabs worker pool is process-wide and shared by every run.
 */
import { ConfigError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { WorkerPool, workerScript } from '../workers/pool.js';
import { BlockingSpeechSynthesizer, type BlockingSynthesisPool } from './blocking.js';
import { EdgeSpeechSynthesizer } from './edge.js';
import { BlockingSynthesisOutcomeSchema, type ElevenLabsSettings } from './elevenlabs.js';
import type { ProviderId, SpeechSynthesizer } from './types.js';

export type SynthesizerLookup = (provider: ProviderId) => SpeechSynthesizer;

export interface SynthesizerFactorySettings {
  edgeTimeoutMs: number;
  elevenLabs: Omit<ElevenLabsSettings, 'apiKey'> & { apiKey: string | undefined };
  poolSize: number;
  /** Overrides the worker-thread pool, e.g. with an in-process stand-in. */
  createPool?: (size: number) => BlockingSynthesisPool;
}

export interface SynthesizerFactory {
  get: SynthesizerLookup;
  close(): Promise<void>;
}

function defaultPool(size: number): BlockingSynthesisPool {
  return new WorkerPool({
    size,
    name: 'elevenlabs',
    script: workerScript('elevenlabs.worker', import.meta.url),
    decode: (value) => BlockingSynthesisOutcomeSchema.parse(value),
  });
}

export function createSynthesizerFactory(settings: SynthesizerFactorySettings): SynthesizerFactory {
  const cache = new Map<ProviderId, SpeechSynthesizer>();
  let pool: BlockingSynthesisPool | undefined;

  const create = (provider: ProviderId): SpeechSynthesizer => {
    switch (provider) {
      case 'edge':
        return new EdgeSpeechSynthesizer({ timeoutMs: settings.edgeTimeoutMs });
      case 'elevenlabs': {
        const { apiKey, ...rest } = settings.elevenLabs;
        if (!apiKey) {
          throw new ConfigError('MissingApiKey', 'ELEVENLABS_API_KEY is required when the active TTS provider is elevenlabs');
        }
        pool ??= (settings.createPool ?? defaultPool)(settings.poolSize);
        return new BlockingSpeechSynthesizer('elevenlabs', pool, { ...rest, apiKey });
      }
    }
  };

  return {
    get(provider) {
      const cached = cache.get(provider);
      if (cached) return cached;
      logger.info('TTS: creating synthesizer', { provider });
      const synthesizer = create(provider);
      cache.set(provider, synthesizer);
      return synthesizer;
    },
    async close() {
      cache.clear();
      if (pool) await pool.close();
      pool = undefined;
    },
  };
}
