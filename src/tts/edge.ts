/**
 * Edge read-aloud TTS via node-edge-tts. Cooperative: synthesize() awaits the service's
 * socket and never holds the event loop while audio renders.
 */
import { mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { EdgeTTS } from 'node-edge-tts';
import { SynthesisError, abortReason, errorMessage } from '../errors.js';
import { untilAborted, withTimeout } from '../utils/abort.js';
import { logger } from '../utils/logger.js';
import {
  mp3DurationSeconds,
  type AudioArtifact,
  type AudioFormat,
  type SpeechSynthesizer,
  type SynthesisOptions,
} from './types.js';

const OUTPUT_FORMAT = 'audio-24khz-96kbitrate-mono-mp3';

export const EDGE_AUDIO_FORMAT: AudioFormat = {
  container: 'mp3', sampleRateHz: 24_000, bitrateKbps: 96, channels: 1,
};

// e.g. pt-BR-AntonioNeural, en-US-AvaMultilingualNeural
const VOICE_PATTERN = /^[a-z]{2,3}-[A-Z]{2}(-[A-Za-z]+)?-[A-Za-z]+Neural$/;

// ws reports a refused handshake as "Unexpected server response: 403"
const HANDSHAKE_STATUS = /Unexpected server response: (\d{3})/;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function localeOf(voiceId: string): string {
  return voiceId.split('-').slice(0, 2).join('-');
}

const timedOut = (timeoutMs: number) =>
  new SynthesisError('TransientNetworkError', `Edge TTS timed out after ${timeoutMs}ms`);

export function toSynthesisError(err: unknown, timeoutMs: number): SynthesisError {
  if (err instanceof SynthesisError) return err;
  const message = errorMessage(err);
  if (message === 'Timed out') return timedOut(timeoutMs);

  const match = HANDSHAKE_STATUS.exec(message);
  if (!match) return new SynthesisError('TransientNetworkError', `Edge TTS connection failed: ${message}`, { cause: err });
  const status = Number(match[1]);
  const detail = `Edge TTS handshake rejected with HTTP ${status}`;
  if (status === 401 || status === 403) return new SynthesisError('AuthFailure', detail, { cause: err });
  if (status === 429) return new SynthesisError('RateLimited', detail, { cause: err });
  if (status >= 500) return new SynthesisError('TransientNetworkError', detail, { cause: err });
  return new SynthesisError('UnexpectedResponse', detail, { cause: err });
}

async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 0;
    throw err;
  }
}

export interface EdgeSynthesizerOptions {
  timeoutMs?: number;
}

export class EdgeSpeechSynthesizer implements SpeechSynthesizer {
  readonly provider = 'edge' as const;

  private readonly timeoutMs: number;

  constructor(options: EdgeSynthesizerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  async synthesize(text: string, voiceId: string, options: SynthesisOptions): Promise<AudioArtifact> {
    if (!VOICE_PATTERN.test(voiceId)) {
      throw new SynthesisError('InvalidVoiceId', `Not an Edge neural voice: ${voiceId}`);
    }
    const { outputPath, signal } = options;
    if (signal?.aborted) throw abortReason(signal);
    logger.info('Edge TTS: synthesizing', { voiceId, chars: text.length });

    await mkdir(dirname(outputPath), { recursive: true });
    const tts = new EdgeTTS({
      voice: voiceId,
      lang: localeOf(voiceId),
      outputFormat: OUTPUT_FORMAT,
      timeout: this.timeoutMs,
    });
    const deadline = withTimeout(signal, this.timeoutMs);
    try {
      await untilAborted(tts.ttsPromise(escapeXml(text), outputPath).then(() => undefined), deadline);
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      if (deadline.aborted) throw timedOut(this.timeoutMs);
      throw toSynthesisError(err, this.timeoutMs);
    }

    const bytes = await fileSize(outputPath);
    if (bytes === 0) {
      throw new SynthesisError('InvalidVoiceId', `Edge TTS returned no audio for voice ${voiceId}`);
    }
    const artifact: AudioArtifact = {
      path: outputPath,
      durationSeconds: mp3DurationSeconds(bytes, EDGE_AUDIO_FORMAT.bitrateKbps),
      bytes,
      format: EDGE_AUDIO_FORMAT,
      provider: this.provider,
      voiceId,
    };
    logger.info('Edge TTS: audio saved', { path: artifact.path, durationSeconds: artifact.durationSeconds });
    return artifact;
  }
}
