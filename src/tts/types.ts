/**
 * Speech synthesis contract shared by every provider. Callers await `synthesize` the same
 * way whether the provider streams over a socket or runs a blocking call on a worker.
 */

export const PROVIDER_IDS = ['edge', 'elevenlabs'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

export interface AudioFormat {
  readonly container: 'mp3';
  readonly sampleRateHz: number;
  readonly bitrateKbps: number;
  readonly channels: number;
}

export interface AudioArtifact {
  readonly path: string;
  readonly durationSeconds: number;
  readonly bytes: number;
  readonly format: AudioFormat;
  readonly provider: ProviderId;
  readonly voiceId: string;
}

export interface SynthesisOptions {
  outputPath: string;
  signal?: AbortSignal;
}

export interface SpeechSynthesizer {
  readonly provider: ProviderId;
  synthesize(text: string, voiceId: string, options: SynthesisOptions): Promise<AudioArtifact>;
}

// Constant bitrate MP3, so duration follows from the payload size.
export function mp3DurationSeconds(bytes: number, bitrateKbps: number): number {
  return Math.round((bytes * 8) / (bitrateKbps * 1000) * 1000) / 1000;
}
