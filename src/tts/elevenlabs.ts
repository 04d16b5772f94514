/**
 * ElevenLabs TTS client. Jobs run inside the ElevenLabs worker threads (see
 * elevenlabs.worker.ts / blocking.ts), never on the pipeline's event loop.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { SYNTHESIS_ERROR_KINDS, SynthesisError, errorMessage } from '../errors.js';
import { isTimeoutError, withTimeout } from '../utils/abort.js';
import { parseRetryAfter } from '../utils/retry.js';
import type { PoolReplyMessage } from '../workers/pool.js';
import { PROVIDER_IDS, mp3DurationSeconds, type AudioFormat } from './types.js';

export const ELEVENLABS_OUTPUT_FORMAT = 'mp3_44100_96';

export const ELEVENLABS_AUDIO_FORMAT: AudioFormat = {
  container: 'mp3', sampleRateHz: 44_100, bitrateKbps: 96, channels: 1,
};

const ErrorBodySchema = z.object({
  detail: z.union([
    z.string(),
    z.object({ status: z.string().optional(), message: z.string().optional() }),
  ]).optional(),
});

function describeErrorBody(text: string): { status: string; message: string } {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const { detail } = parsed.data;
      if (typeof detail === 'string') return { status: '', message: detail };
      if (detail) return { status: detail.status ?? '', message: detail.message ?? text.slice(0, 300) };
    }
  } catch {
    // not JSON; fall through to the raw text
  }
  return { status: '', message: text.slice(0, 300) };
}

export async function synthesisErrorFromResponse(res: Response, voiceId: string): Promise<SynthesisError> {
  const errText = await res.text().catch(() => '');
  const { status, message } = describeErrorBody(errText);
  const detail = `ElevenLabs HTTP ${res.status}${status ? ` (${status})` : ''}: ${message}`;
  if (res.status === 401 || res.status === 403) return new SynthesisError('AuthFailure', detail);
  if (res.status === 429) {
    return new SynthesisError('RateLimited', detail, {
      retryAfterMs: parseRetryAfter(res.headers.get('retry-after')),
    });
  }
  const mentionsVoice = /voice/i.test(status) || /voice/i.test(message);
  if (res.status === 404 || ((res.status === 400 || res.status === 422) && mentionsVoice)) {
    return new SynthesisError('InvalidVoiceId', `Unknown ElevenLabs voice ${voiceId}. ${detail}`);
  }
  if (res.status >= 500) return new SynthesisError('TransientNetworkError', detail);
  return new SynthesisError('UnexpectedResponse', detail);
}

export interface ElevenLabsSettings {
  apiKey: string;
  baseUrl: string;
  modelId: string;
  timeoutMs: number;
}

export class ElevenLabsClient {
  constructor(
    private readonly settings: ElevenLabsSettings,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async convert(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer> {
    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}/text-to-speech/${encodeURIComponent(voiceId)}`
      + `?output_format=${ELEVENLABS_OUTPUT_FORMAT}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'xi-api-key': this.settings.apiKey,
          'Content-Type': 'application/json',
          'Accept': 'audio/mpeg',
        },
        body: JSON.stringify({ text, model_id: this.settings.modelId }),
        signal: withTimeout(signal, this.settings.timeoutMs),
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      if (isTimeoutError(err)) {
        throw new SynthesisError('TransientNetworkError', `ElevenLabs timed out after ${this.settings.timeoutMs}ms`, { cause: err });
      }
      throw new SynthesisError('TransientNetworkError', `ElevenLabs request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!res.ok) throw await synthesisErrorFromResponse(res, voiceId);
    const contentType = res.headers.get('content-type') ?? '';
    const audio = Buffer.from(await res.arrayBuffer());
    if (!contentType.startsWith('audio/') || audio.length === 0) {
      throw new SynthesisError(
        'UnexpectedResponse',
        `ElevenLabs returned ${audio.length} bytes of ${contentType || 'unknown content'}`,
      );
    }
    return audio;
  }
}

export const BlockingSynthesisJobSchema = z.object({
  text:       z.string(),
  voiceId:    z.string(),
  outputPath: z.string(),
  settings:   z.object({
    apiKey:    z.string(),
    baseUrl:   z.string(),
    modelId:   z.string(),
    timeoutMs: z.number(),
  }),
});

export type BlockingSynthesisJob = z.infer<typeof BlockingSynthesisJobSchema>;

export const BlockingSynthesisOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    artifact: z.object({
      path:            z.string(),
      durationSeconds: z.number(),
      bytes:           z.number(),
      format: z.object({
        container:    z.literal('mp3'),
        sampleRateHz: z.number(),
        bitrateKbps:  z.number(),
        channels:     z.number(),
      }),
      provider: z.enum(PROVIDER_IDS),
      voiceId:  z.string(),
    }),
  }),
  z.object({
    ok:           z.literal(false),
    kind:         z.enum(SYNTHESIS_ERROR_KINDS),
    message:      z.string(),
    retryAfterMs: z.number().optional(),
  }),
]);

export type BlockingSynthesisOutcome = z.infer<typeof BlockingSynthesisOutcomeSchema>;

/** The whole job: HTTP call, file write, artifact. Errors come back as data. */
export async function runBlockingSynthesis(
  job: BlockingSynthesisJob,
  fetchImpl: typeof fetch = fetch,
): Promise<BlockingSynthesisOutcome> {
  try {
    const audio = await new ElevenLabsClient(job.settings, fetchImpl).convert(job.text, job.voiceId);
    await mkdir(dirname(job.outputPath), { recursive: true });
    await writeFile(job.outputPath, audio);
    return {
      ok: true,
      artifact: {
        path: job.outputPath,
        durationSeconds: mp3DurationSeconds(audio.length, ELEVENLABS_AUDIO_FORMAT.bitrateKbps),
        bytes: audio.length,
        format: ELEVENLABS_AUDIO_FORMAT,
        provider: 'elevenlabs',
        voiceId: job.voiceId,
      },
    };
  } catch (err) {
    if (err instanceof SynthesisError) {
      return { ok: false, kind: err.kind, message: err.message, retryAfterMs: err.retryAfterMs };
    }
    return { ok: false, kind: 'UnexpectedResponse', message: `ElevenLabs job failed: ${errorMessage(err)}` };
  }
}

const WorkerMessageSchema = z.object({ id: z.number(), request: BlockingSynthesisJobSchema });

/** Turns one pool message into the reply the worker posts back. */
export async function handleWorkerMessage(msg: unknown, fetchImpl: typeof fetch = fetch): Promise<PoolReplyMessage> {
  const parsed = WorkerMessageSchema.safeParse(msg);
  if (!parsed.success) {
    const id = z.object({ id: z.number() }).safeParse(msg);
    return { id: id.success ? id.data.id : -1, ok: false, error: `invalid job: ${errorMessage(parsed.error)}` };
  }
  return { id: parsed.data.id, ok: true, value: await runBlockingSynthesis(parsed.data.request, fetchImpl) };
}
