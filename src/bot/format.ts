/**
 * Display helpers for bot messages
 */

import type { FileKind } from '@/types/index.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

const EXTENSION_KINDS: Record<string, FileKind> = {
  mp4: 'video', avi: 'video', mkv: 'video', mov: 'video',
  wmv: 'video', flv: 'video', webm: 'video', m4v: 'video',
  mp3: 'audio', wav: 'audio', ogg: 'audio', flac: 'audio',
  aac: 'audio', m4a: 'audio', wma: 'audio',
  jpg: 'photo', jpeg: 'photo', png: 'photo', gif: 'photo',
  bmp: 'photo', webp: 'photo', svg: 'photo',
  pdf: 'document', doc: 'document', docx: 'document', xls: 'document',
  xlsx: 'document', ppt: 'document', pptx: 'document', txt: 'document',
  zip: 'archive', rar: 'archive', '7z': 'archive', tar: 'archive', gz: 'archive',
};

const MIME_EXTENSIONS: Record<string, string> = {
  'application/pdf': 'pdf',
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'video/mp4': 'mp4',
  'audio/mpeg': 'mp3',
};

const KIND_ICONS: Record<FileKind, string> = {
  video: '🎬',
  audio: '🎵',
  photo: '🖼️',
  document: '📄',
  archive: '📦',
  voice: '🎙️',
  other: '📁',
};

/**
 * Human readable size with one decimal, e.g. `12.3KB`
 */
export function formatSize(sizeBytes: number): string {
  let value = sizeBytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)}${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)}PB`;
}

function lastExtension(fileName: string): string | null {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) {
    return null;
  }
  return fileName.slice(dot + 1).toLowerCase();
}

/**
 * Kind guessed from the file name extension
 */
export function kindFromFileName(fileName: string | null | undefined): FileKind {
  if (!fileName) {
    return 'other';
  }
  const extension = lastExtension(fileName);
  return (extension !== null ? EXTENSION_KINDS[extension] : undefined) ?? 'other';
}

/**
 * Extension from the name, falling back to a few well-known MIME types
 */
export function extensionOf(
  fileName: string | null | undefined,
  mimeType: string | null | undefined
): string | null {
  if (fileName) {
    const extension = lastExtension(fileName);
    if (extension !== null) {
      return extension;
    }
  }
  if (mimeType) {
    return MIME_EXTENSIONS[mimeType] ?? null;
  }
  return null;
}

export function fileIcon(kind: FileKind): string {
  return KIND_ICONS[kind];
}

/**
 * `YYYY.MM.DD HH:mm` in UTC
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
