#!/usr/bin/env node
/**
 * CLI entry point: routes commands to pipeline handlers.
 *   run <channel> <topic...>   produce one video
 *   channels                   list configured channels and their voices
 */
import { loadChannelsFile } from './channels/registry.js';
import { env } from './config.js';
import { errorMessage } from './errors.js';
import { createTelegramNotifier } from './monitoring/telegram.js';
import { runPipeline, shutdown } from './pipeline/index.js';
import type { PipelineResult } from './pipeline/types.js';
import { logger } from './utils/logger.js';

const USAGE = 'Usage: video-factory run <channel> <topic...> | channels';

function exitCodeFor(result: PipelineResult): number {
  if (result.status === 'success') return 0;
  return result.stage === 'Preflight' ? 2 : 1;
}

function printResult(result: PipelineResult): void {
  if (result.status === 'success') {
    console.log(`✓ ${result.channel}: ${result.videoPath} (${(result.durationMs / 1000).toFixed(1)}s)`);
    return;
  }
  console.log(`✗ ${result.channel}: ${result.stage} failed with ${result.kind}`);
  console.log(`  ${result.message}`);
}

async function runCommand(args: string[]): Promise<number> {
  const [channel, ...words] = args;
  const topic = words.join(' ').trim();
  if (!channel || !topic) {
    logger.error(USAGE);
    return 2;
  }

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted, cancelling run');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    const result = await runPipeline(channel, topic, { signal: controller.signal });
    printResult(result);
    if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
      await createTelegramNotifier({ botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID }).runReport(result);
    }
    return exitCodeFor(result);
  } finally {
    process.off('SIGINT', onSigint);
    await shutdown();
  }
}

function listChannels(): number {
  const registry = loadChannelsFile(env.CHANNELS_FILE);
  for (const name of registry.names()) {
    const channel = registry.lookup(name);
    if (!channel) continue;
    const voices = Object.entries(channel.voiceIds).map(([provider, voice]) => `${provider}=${voice}`).join(', ');
    console.log(`${name}\t${channel.language}\t${voices || '(no voices)'}`);
  }
  return 0;
}

async function main(): Promise<number> {
  const [,, command, ...args] = process.argv;
  switch (command) {
    case 'run':
      return runCommand(args);
    case 'channels':
      return listChannels();
    default:
      logger.error(`Unknown command: ${command ?? '(none)'}. ${USAGE}`);
      return 2;
  }
}

main().then(
  (code) => { process.exitCode = code; },
  async (err: unknown) => {
    logger.error('Fatal', { error: errorMessage(err) });
    if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
      await createTelegramNotifier({ botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID })
        .alert(`video-factory crashed: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  },
);
