/**
 * Telegram integration: outbound alert delivery.
 * For the command bot, see src/plugins/telegram-bot/.
 */

export { TelegramSink, type TelegramMessageApi } from './sink.js';
