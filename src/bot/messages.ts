/**
 * Bot message texts and keyboards
 */

import type { FileKind, FileSummary } from '@/types/index.js';

import type { InlineKeyboard } from './bot.api.js';
import { escapeHtml, fileIcon, formatSize, formatTimestamp } from './format.js';

/**
 * Share durations offered under every stored file. 0 = permanent.
 */
export const SHARE_DURATIONS = [
  { label: '📆 1 day', seconds: 86400 },
  { label: '📆 7 days', seconds: 604800 },
  { label: '📆 30 days', seconds: 2592000 },
  { label: '♾️ Permanent', seconds: 0 },
] as const;

export const WELCOME_TEXT = [
  '🎉 Welcome to your Telegram drive!',
  '',
  '📤 Send any file to save it',
  '📂 /myfiles lists your files',
  '',
  '💡 Send /help for help',
].join('\n');

export const HINT_TEXT = '💡 Send /help for help';
export const INVALID_LINK_TEXT = '❌ Link is invalid or expired';
export const UPLOAD_FAILED_TEXT = '❌ Upload failed';
export const BANNED_TEXT = '⛔ You are not allowed to use this bot';

export function helpText(maxFileSizeMb: number): string {
  return [
    '📖 <b>Help</b>',
    '• 📤 Send a file to save it to your drive',
    '• /start - Start',
    '• /myfiles - List your files',
    '• /help - Show this help',
    '',
    `Files up to ${maxFileSizeMb}MB are kept on Telegram servers.`,
    'Open a share link to save a copy of the file to your own drive.',
  ].join('\n');
}

export function fileTooLargeText(maxFileSizeMb: number): string {
  return `❌ File too large, maximum is ${maxFileSizeMb}MB`;
}

export const MY_FILES_KEYBOARD: InlineKeyboard = [
  [{ text: '📂 My files', callback_data: 'myfiles' }],
];

/**
 * Delete button plus one button per share duration, two per row
 */
export function fileKeyboard(fileId: string): InlineKeyboard {
  const shareButtons = SHARE_DURATIONS.map((duration) => ({
    text: duration.label,
    callback_data: `share_${fileId}_${duration.seconds}`,
  }));

  const rows: InlineKeyboard = [
    [{ text: '🗑️ Delete', callback_data: `del_${fileId}` }],
  ];
  for (let i = 0; i < shareButtons.length; i += 2) {
    rows.push(shareButtons.slice(i, i + 2));
  }
  return rows;
}

export function downloadKeyboard(fileId: string, isOwner: boolean): InlineKeyboard {
  const back = [{ text: '🔙 Back', callback_data: 'back' }];
  return isOwner
    ? [[{ text: '🗑️ Delete', callback_data: `del_${fileId}` }], back]
    : [back];
}

interface CaptionFile {
  name: string;
  kind: FileKind;
  sizeBytes: number;
}

/**
 * Caption under a stored file. `expiresAt` is shown only when given;
 * null means permanent.
 */
export function fileCaption(
  file: CaptionFile,
  shareUrl: string,
  expiresAt?: Date | null
): string {
  const lines = [
    `${fileIcon(file.kind)} ${escapeHtml(file.name)}`,
    `Share link: ${shareUrl}`,
  ];
  if (expiresAt !== undefined) {
    const until =
      expiresAt === null ? 'Permanent' : `${formatTimestamp(expiresAt)} UTC`;
    lines.push(`⏰ Valid until: ${until}`, '');
  }
  lines.push(`📦 Size: ${formatSize(file.sizeBytes)}`);
  return lines.join('\n');
}

export function downloadCaption(
  file: CaptionFile & { createdAt: Date },
  downloadCount: number,
  shareUrl: string
): string {
  return [
    `${fileIcon(file.kind)} ${escapeHtml(file.name)}`,
    `${formatSize(file.sizeBytes)} | ${formatTimestamp(file.createdAt)} | ${downloadCount} downloads`,
    '',
    `Share link: ${shareUrl}`,
  ].join('\n');
}

/**
 * Numbered list of an owner's files, each linking to its share URL
 */
export function myFilesText(
  files: FileSummary[],
  shareUrl: (fileId: string) => string
): string {
  if (files.length === 0) {
    return "📂 My files\n\nYou haven't uploaded any files yet";
  }

  const latest = files.reduce(
    (max, file) => (file.createdAt > max ? file.createdAt : max),
    files[0]?.createdAt ?? new Date(0)
  );
  const lines = files.map(
    (file, index) =>
      `(${index + 1}) <a href="${shareUrl(file.id)}">${escapeHtml(file.name)}</a>`
  );

  return [
    '📂 My files',
    '',
    `Last update: ${formatTimestamp(latest)} UTC`,
    '',
    ...lines,
  ].join('\n');
}

export function deletedText(name: string): string {
  return `🗑️ Deleted\n\n📁 ${escapeHtml(name)}`;
}

export const BACK_TO_FILES_KEYBOARD: InlineKeyboard = [
  [{ text: '🔙 Back', callback_data: 'myfiles' }],
];
