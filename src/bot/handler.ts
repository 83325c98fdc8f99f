/**
 * Telegram Bot Handler
 *
 * SCOPE: Commands, uploads and inline-button callbacks arriving through the
 * webhook. Every operation goes through CustodyService and UserService.
 */

import type { Logger } from '@/lib/logger.js';
import type { CustodyService } from '@/services/custody.service.js';
import type { UserService } from '@/services/user.service.js';
import type { FileRecord, IncomingUpload, UserRecord } from '@/types/index.js';

import type { BotApi } from './bot.api.js';
import { extensionOf, kindFromFileName } from './format.js';
import {
  BACK_TO_FILES_KEYBOARD,
  BANNED_TEXT,
  HINT_TEXT,
  INVALID_LINK_TEXT,
  MY_FILES_KEYBOARD,
  UPLOAD_FAILED_TEXT,
  WELCOME_TEXT,
  deletedText,
  downloadCaption,
  downloadKeyboard,
  fileCaption,
  fileKeyboard,
  fileTooLargeText,
  helpText,
  myFilesText,
} from './messages.js';
import type {
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from './telegram.schema.js';

const MY_FILES_LIMIT = 30;

export interface BotHandler {
  handleUpdate(update: TelegramUpdate): Promise<void>;
}

interface BotHandlerDeps {
  custodyService: CustodyService;
  userService: Pick<UserService, 'getOrCreateUser' | 'adjustStorage'>;
  api: BotApi;
  botUsername: string;
  maxFileSizeBytes: number;
  logger: Logger;
}

type CommandHandler = (
  args: string,
  message: TelegramMessage,
  user: UserRecord
) => Promise<void>;

/**
 * Reply to a callback query: an optional toast or alert
 */
interface CallbackReply {
  text?: string;
  showAlert?: boolean;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * Split `/cmd@bot args` into the lowercase command and its arguments
 */
export function parseCommand(
  text: string
): { command: string; args: string } | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (match === null) {
    return null;
  }
  return {
    command: (match[1] ?? '').toLowerCase(),
    args: (match[2] ?? '').trim(),
  };
}

/**
 * Describe the payload carried by a message, if any.
 * Documents keep a document-type kind: the Bot API will not re-send a
 * document handle through sendPhoto or sendVideo.
 */
export function extractUpload(message: TelegramMessage): IncomingUpload | null {
  if (message.document) {
    const doc = message.document;
    const name = doc.file_name ?? 'unnamed';
    const guessed = kindFromFileName(name);
    return {
      rawHandle: doc.file_id,
      name,
      mimeType: doc.mime_type ?? null,
      extension: extensionOf(name, doc.mime_type),
      kind: guessed === 'archive' || guessed === 'other' ? guessed : 'document',
      sizeBytes: doc.file_size ?? 0,
    };
  }

  const photo = message.photo?.[message.photo.length - 1];
  if (photo !== undefined) {
    return {
      rawHandle: photo.file_id,
      name: 'photo.jpg',
      mimeType: 'image/jpeg',
      extension: 'jpg',
      kind: 'photo',
      sizeBytes: photo.file_size ?? 0,
      width: photo.width,
      height: photo.height,
    };
  }

  if (message.video) {
    const video = message.video;
    return {
      rawHandle: video.file_id,
      name: video.file_name ?? 'video.mp4',
      mimeType: video.mime_type ?? null,
      extension: extensionOf(video.file_name, video.mime_type),
      kind: 'video',
      sizeBytes: video.file_size ?? 0,
      durationSeconds: video.duration ?? null,
      width: video.width ?? null,
      height: video.height ?? null,
    };
  }

  if (message.audio) {
    const audio = message.audio;
    return {
      rawHandle: audio.file_id,
      name: audio.file_name ?? 'audio.mp3',
      mimeType: audio.mime_type ?? null,
      extension: extensionOf(audio.file_name, audio.mime_type),
      kind: 'audio',
      sizeBytes: audio.file_size ?? 0,
      durationSeconds: audio.duration ?? null,
    };
  }

  if (message.voice) {
    const voice = message.voice;
    return {
      rawHandle: voice.file_id,
      name: 'voice.ogg',
      mimeType: voice.mime_type ?? null,
      extension: 'ogg',
      kind: 'voice',
      sizeBytes: voice.file_size ?? 0,
      durationSeconds: voice.duration ?? null,
    };
  }

  return null;
}

/**
 * Parse `share_<id>_<seconds>` callback data
 */
export function parseShareCallback(
  data: string
): { fileId: string; seconds: number } | null {
  const match = /^share_([^_]+)_(\d+)$/.exec(data);
  if (match === null || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { fileId: match[1], seconds: Number(match[2]) };
}

// ─────────────────────────────────────────────────────────────
// HANDLER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create the webhook bot handler
 */
export function createBotHandler(deps: BotHandlerDeps): BotHandler {
  const { custodyService, userService, api, botUsername, logger } = deps;
  const maxFileSizeMb = Math.floor(deps.maxFileSizeBytes / (1024 * 1024));

  const shareUrl = (fileId: string) =>
    `https://t.me/${botUsername}?start=${fileId}`;

  const commandMap = new Map<string, CommandHandler>();

  function registerAliases(aliases: string[], handler: CommandHandler) {
    for (const alias of aliases) {
      commandMap.set(alias.toLowerCase(), handler);
    }
  }

  async function ensureUser(from: TelegramUser): Promise<UserRecord | null> {
    const result = await userService.getOrCreateUser(
      String(from.id),
      from.username ?? null,
      from.first_name ?? null
    );
    if (!result.success) {
      logger.error(`Could not load user ${from.id}`, result.error);
      return null;
    }
    return result.data;
  }

  function displayNameOf(user: UserRecord): string | null {
    return user.username ?? user.displayName;
  }

  async function adjustStorage(userId: string, deltaBytes: number) {
    const result = await userService.adjustStorage(userId, deltaBytes);
    if (!result.success) {
      logger.warn(
        `Storage adjustment of ${deltaBytes} for ${userId} failed`,
        result.error
      );
    }
  }

  async function sendStoredFile(chatId: number, file: FileRecord) {
    await api.sendFile(
      chatId,
      file.kind,
      file.blobRef,
      fileCaption(file, shareUrl(file.id)),
      fileKeyboard(file.id)
    );
  }

  async function sendMyFiles(
    chatId: number,
    userId: string,
    edit?: { messageId: number }
  ) {
    const result = await custodyService.listOwned(userId, MY_FILES_LIMIT);
    if (!result.success) {
      await api.sendMessage(chatId, '❌ Could not load your files');
      return;
    }

    const text = myFilesText(result.data, shareUrl);
    if (edit !== undefined) {
      await api.editMessage(chatId, edit.messageId, text, { isCaption: false });
    } else {
      await api.sendMessage(chatId, text);
    }
  }

  /**
   * Open a share link: count a view, clone for non-owners, send the file
   */
  async function openShareLink(
    chatId: number,
    code: string,
    user: UserRecord
  ) {
    const resolved = await custodyService.resolve(code);
    if (!resolved.success) {
      await api.sendMessage(chatId, INVALID_LINK_TEXT);
      return;
    }
    const source = resolved.data;

    const viewed = await custodyService.recordView(source.id);
    if (!viewed.success) {
      await api.sendMessage(chatId, INVALID_LINK_TEXT);
      return;
    }

    const transferred = await custodyService.transferOnAccess(
      source.id,
      user.id,
      displayNameOf(user)
    );
    if (!transferred.success) {
      await api.sendMessage(chatId, '❌ Could not save the file');
      return;
    }

    let file = source;
    if (transferred.data !== source.id) {
      const clone = await custodyService.resolve(transferred.data);
      if (!clone.success) {
        await api.sendMessage(chatId, '❌ Could not save the file');
        return;
      }
      file = clone.data;
      logger.info(`User ${user.id} saved file ${source.id} as ${file.id}`);
    }

    await sendStoredFile(chatId, file);
  }

  // ─── Commands ───────────────────────────────────────────────

  registerAliases(['start'], async (args, message, user) => {
    if (args !== '') {
      await openShareLink(message.chat.id, args, user);
      return;
    }
    await api.sendMessage(message.chat.id, WELCOME_TEXT, MY_FILES_KEYBOARD);
  });

  registerAliases(['help'], async (_args, message) => {
    await api.sendMessage(
      message.chat.id,
      helpText(maxFileSizeMb),
      MY_FILES_KEYBOARD
    );
  });

  registerAliases(['myfiles', 'files'], async (_args, message, user) => {
    await sendMyFiles(message.chat.id, user.id);
  });

  // ─── Uploads ────────────────────────────────────────────────

  async function handleUpload(message: TelegramMessage, user: UserRecord) {
    const chatId = message.chat.id;
    const upload = extractUpload(message);
    if (upload === null) {
      await api.sendMessage(chatId, HINT_TEXT);
      return;
    }

    if (upload.sizeBytes > deps.maxFileSizeBytes) {
      await api.sendMessage(chatId, fileTooLargeText(maxFileSizeMb));
      return;
    }

    const ingested = await custodyService.ingestUpload(
      upload,
      user.id,
      displayNameOf(user)
    );
    if (!ingested.success) {
      logger.warn(`Upload from ${user.id} failed`, ingested.error);
      await api.sendMessage(chatId, UPLOAD_FAILED_TEXT);
      return;
    }

    await adjustStorage(user.id, upload.sizeBytes);

    const stored = await custodyService.resolve(ingested.data);
    if (!stored.success) {
      await api.sendMessage(chatId, UPLOAD_FAILED_TEXT);
      return;
    }
    await sendStoredFile(chatId, stored.data);
  }

  async function handleMessage(message: TelegramMessage) {
    if (message.from === undefined) {
      return;
    }
    const user = await ensureUser(message.from);
    if (user === null) {
      await api.sendMessage(message.chat.id, '❌ Something went wrong');
      return;
    }
    if (user.isBanned) {
      await api.sendMessage(message.chat.id, BANNED_TEXT);
      return;
    }

    const parsed =
      message.text !== undefined ? parseCommand(message.text) : null;
    if (parsed === null) {
      await handleUpload(message, user);
      return;
    }

    const handler = commandMap.get(parsed.command);
    if (handler === undefined) {
      await api.sendMessage(message.chat.id, HINT_TEXT);
      return;
    }
    await handler(parsed.args, message, user);
  }

  // ─── Callbacks ──────────────────────────────────────────────

  async function downloadCallback(
    query: TelegramCallbackQuery,
    user: UserRecord,
    fileId: string
  ): Promise<CallbackReply> {
    const resolved = await custodyService.resolve(fileId);
    if (!resolved.success) {
      return { text: '❌ File not found', showAlert: true };
    }
    const file = resolved.data;

    // A legacy code resolution has already counted this download
    let downloads = file.downloadCount;
    if (file.id === fileId) {
      const counted = await custodyService.recordDownload(file.id);
      if (!counted.success) {
        return { text: '❌ File not found', showAlert: true };
      }
      downloads += 1;
    }

    await api.sendFile(
      query.from.id,
      file.kind,
      file.blobRef,
      downloadCaption(file, downloads, shareUrl(file.id)),
      downloadKeyboard(file.id, file.ownerId === user.id)
    );
    return { text: '✅ Sent' };
  }

  async function deleteCallback(
    query: TelegramCallbackQuery,
    user: UserRecord,
    fileId: string
  ): Promise<CallbackReply> {
    const result = await custodyService.deleteFile(fileId, user.id);
    if (!result.success) {
      switch (result.error.code) {
        case 'NOT_FOUND':
          return { text: '❌ File not found', showAlert: true };
        case 'PERMISSION_DENIED':
          return { text: 'Not allowed to delete this file', showAlert: true };
        default:
          return { text: '❌ Delete failed', showAlert: true };
      }
    }

    await adjustStorage(result.data.ownerId, -result.data.sizeBytes);
    await api.sendMessage(
      query.from.id,
      deletedText(result.data.name),
      BACK_TO_FILES_KEYBOARD
    );
    return {};
  }

  async function shareCallback(
    query: TelegramCallbackQuery,
    user: UserRecord,
    fileId: string,
    seconds: number
  ): Promise<CallbackReply> {
    const result = await custodyService.setShareExpiry(fileId, user.id, seconds);
    if (!result.success) {
      switch (result.error.code) {
        case 'NOT_FOUND':
          return { text: '❌ File not found', showAlert: true };
        case 'PERMISSION_DENIED':
          return { text: 'Not allowed to change this file', showAlert: true };
        default:
          return { text: '❌ Could not update the share', showAlert: true };
      }
    }

    const resolved = await custodyService.resolve(fileId);
    if (resolved.success && query.message !== undefined) {
      await api.editMessage(
        query.message.chat.id,
        query.message.message_id,
        fileCaption(resolved.data, shareUrl(fileId), result.data.expiresAt),
        {
          keyboard: fileKeyboard(fileId),
          isCaption: query.message.text === undefined,
        }
      );
    }
    return { text: '✅ Share updated' };
  }

  async function dispatchCallback(
    query: TelegramCallbackQuery,
    user: UserRecord
  ): Promise<CallbackReply> {
    const data = query.data ?? '';

    if (data === 'myfiles') {
      const message = query.message;
      await sendMyFiles(
        query.from.id,
        user.id,
        message !== undefined && message.text !== undefined
          ? { messageId: message.message_id }
          : undefined
      );
      return {};
    }
    if (data === 'back') {
      await api.sendMessage(query.from.id, WELCOME_TEXT, MY_FILES_KEYBOARD);
      return {};
    }
    if (data.startsWith('dl_')) {
      return downloadCallback(query, user, data.slice(3));
    }
    if (data.startsWith('del_')) {
      return deleteCallback(query, user, data.slice(4));
    }
    const share = parseShareCallback(data);
    if (share !== null) {
      return shareCallback(query, user, share.fileId, share.seconds);
    }

    logger.debug(`Ignoring callback data "${data}"`);
    return {};
  }

  async function handleCallback(query: TelegramCallbackQuery) {
    const user = await ensureUser(query.from);
    let reply: CallbackReply;
    if (user === null) {
      reply = { text: '❌ Something went wrong', showAlert: true };
    } else if (user.isBanned) {
      reply = { text: BANNED_TEXT, showAlert: true };
    } else {
      try {
        reply = await dispatchCallback(query, user);
      } catch (error) {
        logger.error(`Callback "${query.data ?? ''}" from ${user.id} failed`, error);
        reply = { text: '❌ Sending failed', showAlert: true };
      }
    }
    await api.answerCallbackQuery(query.id, reply.text, reply.showAlert);
  }

  return {
    async handleUpdate(update: TelegramUpdate): Promise<void> {
      if (update.message !== undefined) {
        await handleMessage(update.message);
        return;
      }
      if (update.callback_query !== undefined) {
        await handleCallback(update.callback_query);
      }
    },
  };
}
