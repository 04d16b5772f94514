import { existsSync, mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAssetLibrary, type AssetLibrary } from '../../src/assets/library.js';
import { parseEnv } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';
import { createRuntime, type RuntimeOverrides } from '../../src/pipeline/runtime.js';
import { runBlockingSynthesis, type BlockingSynthesisJob, type BlockingSynthesisOutcome } from '../../src/tts/elevenlabs.js';
import { edge, writeAudio } from '../helpers/edge.js';
import { audio, stubFetch } from '../helpers/fetch.js';
import { InlinePool } from '../helpers/inline-pool.js';
import { FakeAssets, FakeComposer, FakeScripts, noSleep, registry } from '../helpers/pipeline.js';

vi.mock('node-edge-tts', async () => {
  const { FakeEdgeTTS } = await import('../helpers/edge.js');
  return { EdgeTTS: FakeEdgeTTS };
});

let root: string;
let library: AssetLibrary;
beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'vf-runtime-'));
  library = createAssetLibrary({ assetsDir: join(root, 'assets'), outputDir: join(root, 'output'), tempDir: join(root, 'temp') });
});
afterEach(() => { rmSync(root, { recursive: true, force: true }); });

function overrides(extra: Partial<RuntimeOverrides> = {}): RuntimeOverrides {
  return {
    registry: registry(),
    scripts: new FakeScripts(),
    assets: new FakeAssets(),
    composer: new FakeComposer(),
    workspaces: library,
    sleep: noSleep,
    ...extra,
  };
}

describe('createRuntime', () => {
  it('runs concurrent blocking-provider pipelines over one shared pool', async () => {
    const pools: InlinePool<BlockingSynthesisJob, BlockingSynthesisOutcome>[] = [];
    const stub = stubFetch(() => audio(12_000));
    const runtime = createRuntime(
      parseEnv({ TTS_PROVIDER_ACTIVE: 'elevenlabs', ELEVENLABS_API_KEY: 'test-secret', TTS_WORKER_POOL_SIZE: '2' }),
      overrides({
        createPool: (size) => {
          const pool = new InlinePool((job: BlockingSynthesisJob) => runBlockingSynthesis(job, stub.fetch), size);
          pools.push(pool);
          return pool;
        },
      }),
    );

    const [a, b] = await Promise.all([
      runtime.runPipeline('Fatos_Curiosos_BR', 'octopus hearts'),
      runtime.runPipeline('Fatos_Curiosos_BR', 'pulsars'),
    ]);

    expect(a.status).toBe('success');
    expect(b.status).toBe('success');
    expect(a.runId).not.toBe(b.runId);
    expect(pools).toHaveLength(1);
    expect(pools[0]?.size).toBe(2);
    expect(pools[0]?.requests.map((r) => r.voiceId)).toEqual(['Jofre_Voice_ID_Hash', 'Jofre_Voice_ID_Hash']);
    expect(stub.requests[0]?.headers.get('xi-api-key')).toBe('test-secret');
    expect(readdirSync(join(root, 'temp'))).toEqual([]);

    await runtime.close();
    expect(pools[0]?.closed).toBe(true);
  });

  it('runs the cooperative provider without any pool', async () => {
    edge.reset(writeAudio(24_000));
    const runtime = createRuntime(parseEnv({}), overrides());

    const result = await runtime.runPipeline('Deep_Space_Notes', 'pulsars');

    expect(result.status).toBe('success');
    expect(edge.calls[0]?.options.voice).toBe('en-US-ChristopherNeural');
    if (result.status === 'success') {
      expect(result.videoPath).toBe(join(root, 'output', `deep-space-notes-${result.runId}.mp4`));
      expect(existsSync(join(root, 'temp', result.runId))).toBe(false);
    }
  });

  it('reports a missing provider key as a Preflight failure', async () => {
    const runtime = createRuntime(parseEnv({ TTS_PROVIDER_ACTIVE: 'elevenlabs' }), overrides());
    const result = await runtime.runPipeline('Fatos_Curiosos_BR', 'octopus hearts');
    expect(result).toMatchObject({ status: 'failure', stage: 'Preflight', kind: 'MissingApiKey' });
  });

  it('refuses to build without a script model credential', () => {
    const { scripts: _unused, ...rest } = overrides();
    expect(() => createRuntime(parseEnv({}), rest)).toThrow(ConfigError);
  });
});
