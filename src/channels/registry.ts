/**
 * Channel registry: name → language + per-provider voice ids.
 * Built once from the channels file; entries are frozen and never change afterwards.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { isProviderId, type ProviderId } from '../tts/types.js';
import { logger } from '../utils/logger.js';

export interface ChannelConfig {
  readonly name: string;
  readonly language: string;
  readonly voiceIds: Readonly<Partial<Record<ProviderId, string>>>;
}

export class ChannelRegistry {
  private readonly channels = new Map<string, ChannelConfig>();

  constructor(entries: Iterable<ChannelConfig>) {
    for (const entry of entries) {
      if (this.channels.has(entry.name)) {
        throw new ConfigError('InvalidConfig', `Duplicate channel name: ${entry.name}`);
      }
      this.channels.set(entry.name, Object.freeze({
        name: entry.name,
        language: entry.language,
        voiceIds: Object.freeze({ ...entry.voiceIds }),
      }));
    }
  }

  lookup(name: string): ChannelConfig | undefined {
    return this.channels.get(name);
  }

  names(): string[] {
    return [...this.channels.keys()];
  }

  get size(): number {
    return this.channels.size;
  }
}

const ChannelFileSchema = z.array(z.object({
  name:      z.string().min(1),
  language:  z.string().min(2),
  voice_ids: z.record(z.string(), z.string()).default({}),
}));

export function parseChannels(raw: unknown): ChannelConfig[] {
  const parsed = ChannelFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError('InvalidConfig', `Invalid channels configuration: ${issues}`);
  }
  return parsed.data.map((entry) => {
    const voiceIds: Partial<Record<ProviderId, string>> = {};
    for (const [provider, voiceId] of Object.entries(entry.voice_ids)) {
      const key = provider.toLowerCase();
      if (!isProviderId(key)) {
        logger.warn('Channels: ignoring voice id for unknown provider', { channel: entry.name, provider });
        continue;
      }
      // empty slot means "not configured", never a default voice
      if (voiceId.trim()) voiceIds[key] = voiceId.trim();
    }
    return { name: entry.name, language: entry.language, voiceIds };
  });
}

export function loadChannelsFile(path: string): ChannelRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError('InvalidConfig', `Cannot read channels file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const registry = new ChannelRegistry(parseChannels(raw));
  logger.info('Channels: loaded', { path, count: registry.size });
  return registry;
}
