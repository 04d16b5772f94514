import type { PipelineResult } from '../pipeline/types.js';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface TelegramSettings {
  botToken: string;
  chatId: string;
  fetch?: typeof fetch;
}

export interface Notifier {
  alert(msg: string): Promise<void>;
  runReport(result: PipelineResult): Promise<void>;
}

const escapeHtml = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export function formatRunReport(result: PipelineResult): string {
  const seconds = (result.durationMs / 1000).toFixed(1);
  const head = `Channel: ${escapeHtml(result.channel)}\nTopic: ${escapeHtml(result.topic)}\nRun: <code>${result.runId}</code>\n`;
  if (result.status === 'success') {
    return `🎬 <b>Video ready</b>\n${head}File: <code>${escapeHtml(result.videoPath)}</code>\nTook: ${seconds}s`;
  }
  return `🚨 <b>Run failed</b>\n${head}Stage: ${result.stage}\nKind: ${result.kind}\n${escapeHtml(result.message)}`;
}

/** Delivery failures are logged and never surface to the caller. */
export function createTelegramNotifier(settings: TelegramSettings): Notifier {
  const base = `https://api.telegram.org/bot${settings.botToken}`;
  const fetchImpl = settings.fetch ?? fetch;

  async function send(text: string): Promise<void> {
    try {
      const res = await fetchImpl(`${base}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: settings.chatId, text, parse_mode: 'HTML' }),
      });
      if (!res.ok) logger.warn('Telegram send failed', { status: res.status });
    } catch (err) {
      logger.warn('Telegram unreachable', { error: errorMessage(err) });
    }
  }

  return {
    alert: (msg) => send(`⚠️ ${msg}`),
    runReport: (result) => send(formatRunReport(result)),
  };
}
