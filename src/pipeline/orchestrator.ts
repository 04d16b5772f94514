/**
 * Pipeline orchestrator: drives one run through
 *   Idle → ScriptGenerating → Synthesizing → AssetResolving → Composing → Done
 * with Failed reachable from every non-terminal state. Stages run strictly one after
 * another; the first unrecoverable error stops the run and cancels anything in flight.
 */
import { randomUUID } from 'node:crypto';
import type { RetryPolicy } from '../config.js';
import { PipelineError, errorMessage, isAbortError } from '../errors.js';
import type { BoundSynthesis, ProviderSelector } from '../tts/selector.js';
import { logger, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type {
  AssetResolver,
  FailureKind,
  FailureStage,
  PartialArtifacts,
  PipelineResult,
  RunState,
  RunWorkspace,
  RunWorkspaceFactory,
  ScriptGenerator,
  Stage,
  StageAttempts,
  VideoComposer,
} from './types.js';

export interface OrchestratorDeps {
  selector: ProviderSelector;
  scripts: ScriptGenerator;
  assets: AssetResolver;
  composer: VideoComposer;
  workspaces: RunWorkspaceFactory;
}

export interface OrchestratorOptions {
  retry: RetryPolicy;
  runId?: string;
  keepFailedRuns?: boolean;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  Idle:             ['ScriptGenerating', 'Failed'],
  ScriptGenerating: ['Synthesizing', 'Failed'],
  Synthesizing:     ['AssetResolving', 'Failed'],
  AssetResolving:   ['Composing', 'Failed'],
  Composing:        ['Done', 'Failed'],
  Done:             [],
  Failed:           [],
};

const isRetryable = (err: unknown) => err instanceof PipelineError && err.retryable;

const CANCELLED = { kind: 'Cancelled', message: 'Run was cancelled' } as const;

function describe(err: unknown): { kind: FailureKind; message: string } {
  if (err instanceof PipelineError) return { kind: err.kind, message: err.message };
  if (isAbortError(err)) return CANCELLED;
  return { kind: 'InternalError', message: errorMessage(err) };
}

export class PipelineOrchestrator {
  readonly runId: string;

  private current: RunState = 'Idle';
  private readonly trail: RunState[] = ['Idle'];
  private readonly attempts: StageAttempts = { ScriptGenerating: 0, Synthesizing: 0, AssetResolving: 0, Composing: 0 };
  private readonly partial: PartialArtifacts = {};
  private readonly controller = new AbortController();
  private started = false;
  private log: Logger = logger;

  constructor(private readonly deps: OrchestratorDeps, private readonly options: OrchestratorOptions) {
    this.runId = options.runId ?? randomUUID();
  }

  get state(): RunState {
    return this.current;
  }

  get history(): readonly RunState[] {
    return [...this.trail];
  }

  async run(channelName: string, topic: string, signal?: AbortSignal): Promise<PipelineResult> {
    if (this.started) throw new Error('PipelineOrchestrator drives a single run; create a new instance');
    this.started = true;
    this.log = logger.scoped({ runId: this.runId, channel: channelName });
    const startedAt = Date.now();

    const onExternalAbort = () => this.controller.abort(signal?.reason);
    if (signal?.aborted) onExternalAbort();
    else signal?.addEventListener('abort', onExternalAbort, { once: true });

    let workspace: RunWorkspace | undefined;
    let failed = false;
    try {
      this.controller.signal.throwIfAborted();
      const binding: BoundSynthesis = this.deps.selector.bind(channelName);
      const { provider, voiceId, channel } = binding.selection;
      this.log.info('Pipeline: starting run', { topic, provider, voiceId, language: channel.language });

      const ws = await this.deps.workspaces.create(this.runId, channelName);
      workspace = ws;

      const script = await this.stage('ScriptGenerating', (s) =>
        this.deps.scripts.generate(topic, channel.language, { channel: channelName, signal: s }));
      this.partial.script = script;

      const audio = await this.stage('Synthesizing', (s) =>
        binding.synthesize(script.text, { outputPath: ws.tempPath('narration.mp3'), signal: s }));
      this.partial.audio = audio;

      const assets = await this.stage('AssetResolving', (s) =>
        this.deps.assets.resolve(script.sections, { topic, signal: s }));
      this.partial.assets = assets;

      const videoPath = await this.stage('Composing', (s) =>
        this.deps.composer.compose(audio, assets, { outputPath: ws.outputPath, signal: s }));

      this.transition('Done');
      const durationMs = Date.now() - startedAt;
      this.log.info('Pipeline: complete', { videoPath, durationMs });
      return {
        status: 'success', runId: this.runId, channel: channelName, topic,
        videoPath, durationMs, attempts: { ...this.attempts },
      };
    } catch (err) {
      failed = true;
      return this.fail(channelName, topic, err, startedAt);
    } finally {
      signal?.removeEventListener('abort', onExternalAbort);
      if (workspace && !(failed && this.options.keepFailedRuns)) await this.dispose(workspace);
    }
  }

  private async stage<T>(stage: Stage, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    this.transition(stage);
    const signal = this.controller.signal;
    const { maxAttempts, baseDelayMs, backoffFactor } = this.options.retry;
    return withRetry(async () => {
      this.attempts[stage] += 1;
      return work(signal);
    }, {
      maxAttempts, baseDelayMs, backoffFactor, signal, isRetryable,
      sleep: this.options.sleep,
      label: stage,
      onRetry: (attempt, err) => this.log.warn(`Pipeline: ${stage} attempt ${attempt} failed`, { error: errorMessage(err) }),
    });
  }

  private fail(channel: string, topic: string, err: unknown, startedAt: number): PipelineResult {
    const stage: FailureStage = this.current === 'Idle' || this.current === 'Done' || this.current === 'Failed'
      ? 'Preflight'
      : this.current;
    // abort reasons can be any value, so the signal decides whether this was a cancellation
    const cancelled = this.controller.signal.aborted;
    this.transition('Failed');
    this.controller.abort();
    const { kind, message } = cancelled ? CANCELLED : describe(err);
    this.log.error('Pipeline: run failed', { stage, kind, error: message });
    return {
      status: 'failure', runId: this.runId, channel, topic,
      stage, kind, message,
      durationMs: Date.now() - startedAt,
      attempts: { ...this.attempts },
      partial: { ...this.partial },
    };
  }

  private transition(next: RunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal pipeline transition ${this.current} → ${next}`);
    }
    this.log.debug('Pipeline: state', { from: this.current, to: next });
    this.current = next;
    this.trail.push(next);
  }

  private async dispose(workspace: RunWorkspace): Promise<void> {
    try {
      await workspace.dispose();
    } catch (err) {
      this.log.warn('Pipeline: failed to clean run workspace', { dir: workspace.dir, error: errorMessage(err) });
    }
  }
}
