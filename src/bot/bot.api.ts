/**
 * Outgoing bot calls used by the webhook handler
 */

import type { TelegramClient } from '@/services/telegram.client.js';
import { SEND_METHODS } from '@/services/telegram.transport.js';
import type { FileKind } from '@/types/index.js';

export interface InlineButton {
  text: string;
  callback_data: string;
}

export type InlineKeyboard = InlineButton[][];

export interface BotApi {
  sendMessage(
    chatId: number,
    text: string,
    keyboard?: InlineKeyboard
  ): Promise<void>;
  sendFile(
    chatId: number,
    kind: FileKind,
    blobRef: string,
    caption: string,
    keyboard?: InlineKeyboard
  ): Promise<void>;
  /** Edits the text of a text message, or the caption of a media message */
  editMessage(
    chatId: number,
    messageId: number,
    text: string,
    options: { keyboard?: InlineKeyboard; isCaption: boolean }
  ): Promise<void>;
  answerCallbackQuery(
    callbackQueryId: string,
    text?: string,
    showAlert?: boolean
  ): Promise<void>;
}

function replyMarkup(keyboard: InlineKeyboard | undefined) {
  return keyboard !== undefined ? { inline_keyboard: keyboard } : undefined;
}

/**
 * Create the bot API on top of the shared Telegram client.
 * Texts are sent as HTML; callers escape user-supplied parts.
 */
export function createBotApi(client: TelegramClient): BotApi {
  return {
    async sendMessage(chatId, text, keyboard) {
      await client.call('sendMessage', {
        chat_id: chatId,
        text,
        parse_mode: 'HTML',
        disable_web_page_preview: true,
        reply_markup: replyMarkup(keyboard),
      });
    },

    async sendFile(chatId, kind, blobRef, caption, keyboard) {
      const { method, field } = SEND_METHODS[kind];
      await client.call(method, {
        chat_id: chatId,
        [field]: blobRef,
        caption,
        parse_mode: 'HTML',
        reply_markup: replyMarkup(keyboard),
      });
    },

    async editMessage(chatId, messageId, text, options) {
      await client.call(
        options.isCaption ? 'editMessageCaption' : 'editMessageText',
        {
          chat_id: chatId,
          message_id: messageId,
          [options.isCaption ? 'caption' : 'text']: text,
          parse_mode: 'HTML',
          reply_markup: replyMarkup(options.keyboard),
        }
      );
    },

    async answerCallbackQuery(callbackQueryId, text, showAlert = false) {
      await client.call('answerCallbackQuery', {
        callback_query_id: callbackQueryId,
        text,
        show_alert: showAlert,
      });
    },
  };
}
