import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SynthesisError } from '../../src/errors.js';
import { EdgeSpeechSynthesizer, escapeXml, localeOf } from '../../src/tts/edge.js';
import { edge, writeAudio } from '../helpers/edge.js';

vi.mock('node-edge-tts', async () => {
  const { FakeEdgeTTS } = await import('../helpers/edge.js');
  return { EdgeTTS: FakeEdgeTTS };
});

let dir: string;
beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'vf-edge-'));
  edge.reset();
});
afterEach(() => { rmSync(dir, { recursive: true, force: true }); });

async function failure(promise: Promise<unknown>): Promise<SynthesisError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof SynthesisError) return err;
    throw err;
  }
  throw new Error('expected synthesis to fail');
}

const speak = (tts = new EdgeSpeechSynthesizer()) =>
  tts.synthesize('hi', 'en-US-ChristopherNeural', { outputPath: join(dir, 'a.mp3') });

describe('EdgeSpeechSynthesizer', () => {
  it('saves the narration where asked and reports its duration', async () => {
    const outputPath = join(dir, 'nested', 'narration.mp3');

    const artifact = await new EdgeSpeechSynthesizer()
      .synthesize('Tom & Jerry <3', 'pt-BR-AntonioNeural', { outputPath });

    expect(artifact).toMatchObject({
      path: outputPath, bytes: 12_000, durationSeconds: 1, provider: 'edge', voiceId: 'pt-BR-AntonioNeural',
    });
    expect(readFileSync(outputPath).length).toBe(12_000);
    expect(edge.calls).toEqual([{
      options: {
        voice: 'pt-BR-AntonioNeural', lang: 'pt-BR', outputFormat: 'audio-24khz-96kbitrate-mono-mp3', timeout: 60_000,
      },
      text: 'Tom &amp; Jerry &lt;3',
      audioPath: outputPath,
    }]);
  });

  it('rejects a voice id that is not an Edge neural voice without calling the service', async () => {
    const err = await failure(new EdgeSpeechSynthesizer()
      .synthesize('hi', 'Jofre_Voice_ID_Hash', { outputPath: join(dir, 'a.mp3') }));
    expect(err.kind).toBe('InvalidVoiceId');
    expect(edge.calls).toHaveLength(0);
  });

  it('treats a turn without audio as an unknown voice', async () => {
    edge.reset(writeAudio(0));
    const err = await failure(new EdgeSpeechSynthesizer()
      .synthesize('hi', 'xx-XX-NobodyNeural', { outputPath: join(dir, 'a.mp3') }));
    expect(err.kind).toBe('InvalidVoiceId');
    expect(err.message).toBe('Edge TTS returned no audio for voice xx-XX-NobodyNeural');
    expect(err.retryable).toBe(false);
  });

  const handshakeCases: Array<[number, string, boolean]> = [
    [401, 'AuthFailure', false],
    [403, 'AuthFailure', false],
    [429, 'RateLimited', true],
    [503, 'TransientNetworkError', true],
    [400, 'UnexpectedResponse', false],
  ];

  it.each(handshakeCases)('maps handshake status %i to %s', async (status, kind, retryable) => {
    edge.reset(async () => { throw new Error(`Unexpected server response: ${status}`); });
    const err = await failure(speak());
    expect(err.kind).toBe(kind);
    expect(err.retryable).toBe(retryable);
    expect(err.message).toBe(`Edge TTS handshake rejected with HTTP ${status}`);
  });

  it('maps a refused connection to a retryable network error', async () => {
    edge.reset(async () => { throw new Error('connect ECONNREFUSED'); });
    const err = await failure(speak());
    expect(err.kind).toBe('TransientNetworkError');
    expect(err.message).toBe('Edge TTS connection failed: connect ECONNREFUSED');
  });

  it('maps the client timing out to a retryable network error', async () => {
    edge.reset(() => Promise.reject('Timed out'));
    const err = await failure(speak(new EdgeSpeechSynthesizer({ timeoutMs: 5_000 })));
    expect(err.kind).toBe('TransientNetworkError');
    expect(err.message).toBe('Edge TTS timed out after 5000ms');
  });

  it('gives up on a service that never answers', async () => {
    edge.reset(() => new Promise<void>(() => undefined));
    const err = await failure(speak(new EdgeSpeechSynthesizer({ timeoutMs: 20 })));
    expect(err.kind).toBe('TransientNetworkError');
    expect(err.message).toBe('Edge TTS timed out after 20ms');
  });

  it('stops waiting when the caller aborts', async () => {
    const controller = new AbortController();
    edge.reset(() => {
      controller.abort();
      return new Promise<void>(() => undefined);
    });
    const pending = new EdgeSpeechSynthesizer()
      .synthesize('hi', 'en-US-ChristopherNeural', { outputPath: join(dir, 'a.mp3'), signal: controller.signal });
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });

  it('does not call the service for an already aborted run', async () => {
    await expect(new EdgeSpeechSynthesizer()
      .synthesize('hi', 'en-US-ChristopherNeural', { outputPath: join(dir, 'a.mp3'), signal: AbortSignal.abort() }))
      .rejects.toMatchObject({ name: 'AbortError' });
    expect(edge.calls).toHaveLength(0);
  });
});

describe('edge text helpers', () => {
  it('escapes XML metacharacters', () => {
    expect(escapeXml(`a & b < c > d "e" 'f'`)).toBe('a &amp; b &lt; c &gt; d &quot;e&quot; &apos;f&apos;');
  });

  it('derives the locale from the voice id', () => {
    expect(localeOf('pt-BR-AntonioNeural')).toBe('pt-BR');
    expect(localeOf('en-US-AvaMultilingualNeural')).toBe('en-US');
  });
});
