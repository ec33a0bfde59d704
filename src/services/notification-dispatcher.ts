import TelegramBot from 'node-telegram-bot-api';
import { PipelineState, RunStatistics } from './run-stats';
import { logger } from '../utils/logger';

/**
 * Receives the summary of every finished run
 */
export interface RunNotifier {
  notifyRunSummary(stats: RunStatistics): Promise<void>;
}

export interface MessageSender {
  sendMessage(chatId: string, text: string, options: TelegramBot.SendMessageOptions): Promise<unknown>;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Formats a run summary as a Telegram HTML message
 */
export function formatRunSummary(stats: RunStatistics): string {
  const headline = stats.state === PipelineState.Done
    ? '✅ <b>Job ingestion run completed</b>'
    : `❌ <b>Job ingestion run failed</b>${stats.cancelled ? ' (cancelled)' : ''}`;

  const lines = [
    headline,
    `📥 Fetched: ${stats.fetched} (rejected ${stats.rejected}, retries ${stats.retries})`,
    `🧹 Unique: ${stats.unique} (duplicates ${stats.duplicates})`,
    stats.sponsorshipDataAvailable
      ? `🛂 Likely sponsorship: ${stats.likelySponsorship}, no record: ${stats.noRecordFound}`
      : `🛂 No sponsorship data, ${stats.unclassified} unclassified`,
    `💾 Inserted: ${stats.inserted}, updated: ${stats.updated}, skipped: ${stats.skipped}`,
  ];

  for (const source of stats.sources) {
    lines.push(
      source.failed
        ? `• ${escapeHtml(source.source)}: failed (${escapeHtml(source.error ?? 'unknown error')})`
        : `• ${escapeHtml(source.source)}: ${source.fetched} jobs`
    );
  }

  for (const error of stats.errors) {
    lines.push(`⚠️ ${error.stage}: ${escapeHtml(error.message)}`);
  }

  lines.push(`⏱ ${stats.durationMs}ms`);
  return lines.join('\n');
}

/**
 * Sends run summaries to one Telegram chat
 */
export class TelegramRunNotifier implements RunNotifier {
  private sender: MessageSender;

  constructor(
    private readonly chatId: string,
    botTokenOrSender: string | MessageSender
  ) {
    this.sender = typeof botTokenOrSender === 'string'
      ? new TelegramBot(botTokenOrSender, { polling: false })
      : botTokenOrSender;
  }

  async notifyRunSummary(stats: RunStatistics): Promise<void> {
    await this.sender.sendMessage(this.chatId, formatRunSummary(stats), {
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
    logger.info('Run summary sent', { chatId: this.chatId });
  }
}

/**
 * Notifier for the configured chat, or null when Telegram is not configured
 */
export function createRunNotifier(telegram: { botToken: string | null; chatId: string | null }): RunNotifier | null {
  if (!telegram.botToken || !telegram.chatId) {
    return null;
  }
  return new TelegramRunNotifier(telegram.chatId, telegram.botToken);
}
