/**
 * Provider selector: turns (active provider, channel) into a provider + voice id pair and
 * binds it to a synthesizer. Everything here fails before any synthesis call is made.
 */
import type { ChannelConfig, ChannelRegistry } from '../channels/registry.js';
import { ConfigError } from '../errors.js';
import type { SynthesizerLookup } from './factory.js';
import {
  PROVIDER_IDS,
  isProviderId,
  type AudioArtifact,
  type ProviderId,
  type SynthesisOptions,
} from './types.js';

export interface ProviderSelection {
  readonly provider: ProviderId;
  readonly voiceId: string;
  readonly channel: ChannelConfig;
}

export interface BoundSynthesis {
  readonly selection: ProviderSelection;
  synthesize(text: string, options: SynthesisOptions): Promise<AudioArtifact>;
}

export class ProviderSelector {
  constructor(
    private readonly registry: ChannelRegistry,
    readonly activeProvider: string,
    private readonly synthesizers: SynthesizerLookup,
  ) {}

  resolve(channelName: string): ProviderSelection {
    const provider = this.activeProvider.trim().toLowerCase();
    if (!isProviderId(provider)) {
      throw new ConfigError(
        'UnknownProvider',
        `Unknown TTS provider "${this.activeProvider}" (expected one of: ${PROVIDER_IDS.join(', ')})`,
      );
    }
    const channel = this.registry.lookup(channelName);
    if (!channel) {
      throw new ConfigError('UnknownChannel', `Channel "${channelName}" is not configured`);
    }
    const voiceId = channel.voiceIds[provider];
    if (!voiceId) {
      throw new ConfigError('MissingVoiceId', `Channel "${channelName}" has no voice id for provider "${provider}"`);
    }
    return { provider, voiceId, channel };
  }

  bind(channelName: string): BoundSynthesis {
    const selection = this.resolve(channelName);
    const synthesizer = this.synthesizers(selection.provider);
    return {
      selection,
      synthesize: (text, options) => synthesizer.synthesize(text, selection.voiceId, options),
    };
  }

  withActiveProvider(activeProvider: string): ProviderSelector {
    return new ProviderSelector(this.registry, activeProvider, this.synthesizers);
  }
}
