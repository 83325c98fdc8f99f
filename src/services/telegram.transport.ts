/**
 * Telegram Blob Transport
 * Re-posts a user's upload into the storage channel and keeps the channel
 * message as the durable copy. Deleting that message deletes the blob.
 */

import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import type {
  BlobTransport,
  FileKind,
  StoreBlobRequest,
  StoredBlob,
  TransportLocation,
} from '@/types/index.js';

import type { TelegramClient } from './telegram.client.js';
import { TransportError } from './transport.errors.js';

/**
 * Bot API method and payload field per kind
 */
export const SEND_METHODS: Record<FileKind, { method: string; field: string }> = {
  photo: { method: 'sendPhoto', field: 'photo' },
  video: { method: 'sendVideo', field: 'video' },
  audio: { method: 'sendAudio', field: 'audio' },
  voice: { method: 'sendVoice', field: 'voice' },
  document: { method: 'sendDocument', field: 'document' },
  archive: { method: 'sendDocument', field: 'document' },
  other: { method: 'sendDocument', field: 'document' },
};

const mediaSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
});

const sentMessageSchema = z.object({
  message_id: z.number(),
  document: mediaSchema.optional(),
  photo: z.array(mediaSchema).optional(),
  video: mediaSchema.optional(),
  audio: mediaSchema.optional(),
  voice: mediaSchema.optional(),
});

type SentMessage = z.infer<typeof sentMessageSchema>;

/**
 * Pick the stored media out of the channel message. Photos come in several
 * sizes; the last one is the largest.
 */
function extractMedia(message: SentMessage): z.infer<typeof mediaSchema> | null {
  const photo = message.photo?.[message.photo.length - 1];
  return (
    message.document ??
    photo ??
    message.video ??
    message.audio ??
    message.voice ??
    null
  );
}

/**
 * Create the Telegram-backed blob transport
 */
export function createTelegramTransport(deps: {
  client: TelegramClient;
  storageChannelId: string;
  logger: Logger;
}): BlobTransport {
  const { client, storageChannelId, logger } = deps;

  return {
    async store(
      request: StoreBlobRequest,
      signal: AbortSignal
    ): Promise<StoredBlob> {
      const { method, field } = SEND_METHODS[request.kind];

      const result = await client.call(
        method,
        {
          chat_id: storageChannelId,
          [field]: request.rawHandle,
          caption: request.caption,
        },
        signal
      );

      const parsed = sentMessageSchema.safeParse(result);
      if (!parsed.success) {
        throw new TransportError(`Telegram ${method} returned an unexpected message`);
      }

      const media = extractMedia(parsed.data);
      if (media === null) {
        logger.warn(
          `Telegram ${method} reply carried no media; keeping the original handle`
        );
      }

      return {
        blobRef: media?.file_id ?? request.rawHandle,
        blobUniqueRef: media?.file_unique_id ?? '',
        transportLocation: {
          channelId: storageChannelId,
          messageId: String(parsed.data.message_id),
        },
      };
    },

    async delete(
      location: TransportLocation,
      signal: AbortSignal
    ): Promise<boolean> {
      if (location.messageId === null) {
        return false;
      }
      try {
        await client.call(
          'deleteMessage',
          {
            chat_id: location.channelId,
            message_id: Number(location.messageId),
          },
          signal
        );
        return true;
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        logger.warn(
          `Failed to delete message ${location.messageId} in ${location.channelId}`,
          error
        );
        return false;
      }
    },
  };
}
