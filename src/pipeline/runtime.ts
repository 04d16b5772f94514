/**
 * Process-level wiring. Everything built here is shared by concurrent runs; each run gets
 * its own orchestrator and workspace.
 */
import { createResponseCache } from '../ai/cache.js';
import { RateLimitedCompletion } from '../ai/limiter.js';
import { LlmScriptGenerator, createTextCompletion } from '../ai/llm.js';
import { createAssetLibrary } from '../assets/library.js';
import { createPexelsClient } from '../assets/pexels.js';
import { LibraryAssetResolver, type AutoFetchOptions } from '../assets/resolver.js';
import { loadChannelsFile, type ChannelRegistry } from '../channels/registry.js';
import { llmRateLimitsFrom, retryPolicyFrom, type Env } from '../config.js';
import { FfmpegVideoComposer } from '../media/ffmpeg.js';
import type { BlockingSynthesisPool } from '../tts/blocking.js';
import { createSynthesizerFactory, type SynthesizerFactory } from '../tts/factory.js';
import { ProviderSelector } from '../tts/selector.js';
import { logger } from '../utils/logger.js';
import { PipelineOrchestrator, type OrchestratorDeps } from './orchestrator.js';
import type {
  AssetResolver, PipelineResult, RunWorkspaceFactory, ScriptGenerator, VideoComposer,
} from './types.js';

/** Replaces individual collaborators; anything omitted is built from the environment. */
export interface RuntimeOverrides {
  registry?: ChannelRegistry;
  scripts?: ScriptGenerator;
  assets?: AssetResolver;
  composer?: VideoComposer;
  workspaces?: RunWorkspaceFactory;
  createPool?: (size: number) => BlockingSynthesisPool;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PipelineRuntime {
  readonly registry: ChannelRegistry;
  readonly selector: ProviderSelector;
  runPipeline(channel: string, topic: string, signal?: AbortSignal): Promise<PipelineResult>;
  close(): Promise<void>;
}

function buildScripts(e: Env): { scripts: ScriptGenerator; close(): Promise<void> } {
  const completion = new RateLimitedCompletion(createTextCompletion(e), llmRateLimitsFrom(e));
  const scripts = new LlmScriptGenerator(completion, {
    maxTokens: e.LLM_MAX_OUTPUT_TOKENS,
    temperature: e.LLM_TEMPERATURE,
    maxPromptChars: e.LLM_MAX_PROMPT_CHARS,
    cache: createResponseCache({ ttlSeconds: e.LLM_CACHE_TTL_SECONDS, diskPath: e.LLM_CACHE_PATH }),
  });
  return { scripts, close: () => completion.close() };
}

function buildAutoFetch(e: Env): AutoFetchOptions | undefined {
  if (!e.ASSETS_AUTO_FETCH) return undefined;
  if (!e.PEXELS_API_KEY) {
    logger.warn('Assets: auto-fetch enabled but PEXELS_API_KEY is missing; using local images only');
    return undefined;
  }
  return { client: createPexelsClient({ apiKey: e.PEXELS_API_KEY }), theme: e.ASSETS_THEME, perPage: e.PEXELS_PER_PAGE };
}

export function createRuntime(e: Env, overrides: RuntimeOverrides = {}): PipelineRuntime {
  const registry = overrides.registry ?? loadChannelsFile(e.CHANNELS_FILE);
  const library = createAssetLibrary({ assetsDir: e.ASSETS_DIR, outputDir: e.OUTPUT_DIR, tempDir: e.TEMP_DIR });

  const synthesizers: SynthesizerFactory = createSynthesizerFactory({
    edgeTimeoutMs: e.EDGE_TTS_TIMEOUT_MS,
    elevenLabs: {
      apiKey: e.ELEVENLABS_API_KEY,
      baseUrl: e.ELEVENLABS_BASE_URL,
      modelId: e.ELEVENLABS_MODEL_ID,
      timeoutMs: e.ELEVENLABS_TIMEOUT_MS,
    },
    poolSize: e.TTS_WORKER_POOL_SIZE,
    createPool: overrides.createPool,
  });
  const selector = new ProviderSelector(registry, e.TTS_PROVIDER_ACTIVE, synthesizers.get);

  const scripts = overrides.scripts
    ? { scripts: overrides.scripts, close: () => Promise.resolve() }
    : buildScripts(e);
  const deps: OrchestratorDeps = {
    selector,
    scripts: scripts.scripts,
    assets: overrides.assets ?? new LibraryAssetResolver(library, buildAutoFetch(e)),
    composer: overrides.composer ?? new FfmpegVideoComposer({
      ffmpegPath: e.FFMPEG_PATH, resolution: e.VIDEO_RESOLUTION, fps: e.VIDEO_FPS,
    }),
    workspaces: overrides.workspaces ?? library,
  };
  const retry = retryPolicyFrom(e);

  logger.info('Runtime: ready', { channels: registry.size, provider: e.TTS_PROVIDER_ACTIVE });

  return {
    registry,
    selector,
    runPipeline(channel, topic, signal) {
      const orchestrator = new PipelineOrchestrator(deps, {
        retry, keepFailedRuns: e.KEEP_FAILED_RUNS, sleep: overrides.sleep,
      });
      return orchestrator.run(channel, topic, signal);
    },
    async close() {
      await synthesizers.close();
      await scripts.close();
    },
  };
}
