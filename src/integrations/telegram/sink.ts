/**
 * Telegram delivery sink
 *
 * Outbound alert delivery through the grammY Bot API client. The bot in
 * src/plugins/telegram-bot/ handles commands; this is only the sending
 * half the dispatcher talks to.
 */

import { GrammyError, HttpError } from 'grammy';

import type { DeliveryResult, DeliverySink } from '../../autonomous/alert-dispatcher.js';
import { createLogger } from '../../kernel/logger.js';
import { splitMessage } from '../../utils/format.js';

const log = createLogger('telegram-sink');

/** The part of grammY's `Api` the sink needs. */
export interface TelegramMessageApi {
  sendMessage(chatId: string, text: string, other?: { parse_mode: 'HTML' }): Promise<unknown>;
}

export class TelegramSink implements DeliverySink {
  readonly name = 'telegram';

  constructor(private readonly api: TelegramMessageApi) {}

  async send(recipientId: string, payload: string): Promise<DeliveryResult> {
    const chunks = splitMessage(payload);
    let sent = 0;

    try {
      for (const chunk of chunks) {
        await this.api.sendMessage(recipientId, chunk, { parse_mode: 'HTML' });
        sent++;
      }
      return { delivered: true };
    } catch (error) {
      const failure = classify(error);
      log.warn({ recipientId, sent, chunks: chunks.length, ...failure }, 'Telegram send failed');
      // Resending would repeat the chunks that already went out.
      return sent > 0 ? { ...failure, retryable: false } : failure;
    }
  }
}

function classify(error: unknown): { delivered: false; reason: string; retryable: boolean } {
  if (error instanceof GrammyError) {
    const retryable = error.error_code === 429 || error.error_code >= 500;
    return { delivered: false, reason: `${error.error_code} ${error.description}`, retryable };
  }
  if (error instanceof HttpError) {
    return { delivered: false, reason: `network: ${error.message}`, retryable: true };
  }
  return { delivered: false, reason: error instanceof Error ? error.message : String(error), retryable: true };
}
