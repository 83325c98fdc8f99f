/**
 * Telegram update schemas
 * Only the fields the bot reads are declared; the rest is stripped.
 */

import { z } from 'zod';

const userSchema = z.object({
  id: z.number().int(),
  username: z.string().optional(),
  first_name: z.string().optional(),
});

const chatSchema = z.object({
  id: z.number().int(),
});

const fileFields = {
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  file_size: z.number().int().nonnegative().optional(),
};

const documentSchema = z.object({
  ...fileFields,
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
});

const photoSizeSchema = z.object({
  ...fileFields,
  width: z.number().int(),
  height: z.number().int(),
});

const videoSchema = z.object({
  ...fileFields,
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  duration: z.number().int().optional(),
  width: z.number().int().optional(),
  height: z.number().int().optional(),
});

const audioSchema = z.object({
  ...fileFields,
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  duration: z.number().int().optional(),
});

const voiceSchema = z.object({
  ...fileFields,
  mime_type: z.string().optional(),
  duration: z.number().int().optional(),
});

export const messageSchema = z.object({
  message_id: z.number().int(),
  from: userSchema.optional(),
  chat: chatSchema,
  text: z.string().optional(),
  caption: z.string().optional(),
  document: documentSchema.optional(),
  photo: z.array(photoSizeSchema).optional(),
  video: videoSchema.optional(),
  audio: audioSchema.optional(),
  voice: voiceSchema.optional(),
});

export const callbackQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  data: z.string().optional(),
  message: messageSchema.optional(),
});

export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
  callback_query: callbackQuerySchema.optional(),
});

export type TelegramUser = z.infer<typeof userSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramCallbackQuery = z.infer<typeof callbackQuerySchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;
