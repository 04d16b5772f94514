import type { ErrorKind } from '../errors.js';
import type { AudioArtifact } from '../tts/types.js';

export interface ScriptSection {
  index: number;
  text: string;
}

export interface ScriptText {
  text: string;
  sections: readonly ScriptSection[];
}

/** One slide; render order is array order. `weight` sets its share of the narration. */
export interface AssetItem {
  index: number;
  path: string;
  sectionIndex: number;
  weight: number;
}

export interface ScriptGenerator {
  generate(topic: string, language: string, context: { channel: string; signal?: AbortSignal }): Promise<ScriptText>;
}

export interface AssetResolver {
  resolve(sections: readonly ScriptSection[], context: { topic: string; signal?: AbortSignal }): Promise<AssetItem[]>;
}

export interface VideoComposer {
  compose(
    audio: AudioArtifact,
    assets: readonly AssetItem[],
    context: { outputPath: string; signal?: AbortSignal },
  ): Promise<string>;
}

export interface RunWorkspace {
  readonly dir: string;
  readonly outputPath: string;
  tempPath(name: string): string;
  dispose(): Promise<void>;
}

export interface RunWorkspaceFactory {
  create(runId: string, channel: string): Promise<RunWorkspace>;
}

export type Stage = 'ScriptGenerating' | 'Synthesizing' | 'AssetResolving' | 'Composing';

export type RunState = 'Idle' | Stage | 'Done' | 'Failed';

export type FailureStage = 'Preflight' | Stage;

export type FailureKind = ErrorKind | 'Cancelled' | 'InternalError';

export type StageAttempts = Record<Stage, number>;

export interface PartialArtifacts {
  script?: ScriptText;
  audio?: AudioArtifact;
  assets?: readonly AssetItem[];
}

export interface PipelineSuccess {
  status: 'success';
  runId: string;
  channel: string;
  topic: string;
  videoPath: string;
  durationMs: number;
  attempts: StageAttempts;
}

export interface PipelineFailure {
  status: 'failure';
  runId: string;
  channel: string;
  topic: string;
  stage: FailureStage;
  kind: FailureKind;
  message: string;
  durationMs: number;
  attempts: StageAttempts;
  partial: PartialArtifacts;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;
