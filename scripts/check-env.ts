#!/usr/bin/env tsx
/**
 * Pre-flight environment check: validates env vars via config.ts and loads the channels file.
 * Run: npm run check-env
 */
import { loadChannelsFile } from '../src/channels/registry.js';
import { env } from '../src/config.js';
import { isProviderId } from '../src/tts/types.js';

const mark = (value: string | undefined) => (value ? 'set' : 'MISSING');

// config.ts import throws on malformed values
console.log('✓ Environment parsed');
console.log(`  TTS_PROVIDER_ACTIVE: ${env.TTS_PROVIDER_ACTIVE}${isProviderId(env.TTS_PROVIDER_ACTIVE.trim().toLowerCase()) ? '' : '  (unknown provider)'}`);
console.log(`  ANTHROPIC_API_KEY:   ${mark(env.ANTHROPIC_API_KEY)}`);
console.log(`  OPENAI_API_KEY:      ${mark(env.OPENAI_API_KEY)}`);
console.log(`  ELEVENLABS_API_KEY:  ${mark(env.ELEVENLABS_API_KEY)}`);
console.log(`  PEXELS_API_KEY:      ${mark(env.PEXELS_API_KEY)}${env.ASSETS_AUTO_FETCH ? '' : '  (auto-fetch off)'}`);
console.log(`  TELEGRAM_BOT:        ${mark(env.TELEGRAM_BOT_TOKEN)}`);
console.log(`  FFMPEG_PATH:         ${env.FFMPEG_PATH}`);

const registry = loadChannelsFile(env.CHANNELS_FILE);
console.log(`✓ ${registry.size} channel(s) in ${env.CHANNELS_FILE}`);
for (const name of registry.names()) {
  const channel = registry.lookup(name);
  const provider = env.TTS_PROVIDER_ACTIVE.trim().toLowerCase();
  const voice = channel && isProviderId(provider) ? channel.voiceIds[provider] : undefined;
  console.log(`  ${name}: ${voice ?? 'no voice for active provider'}`);
}
