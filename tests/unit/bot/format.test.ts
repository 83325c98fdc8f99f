/**
 * Bot display helper tests
 */

import { describe, expect, it } from 'vitest';

import {
  escapeHtml,
  extensionOf,
  fileIcon,
  formatSize,
  formatTimestamp,
  kindFromFileName,
} from '@/bot/format.js';

describe('formatSize', () => {
  it('should keep bytes below one kilobyte', () => {
    expect(formatSize(0)).toBe('0.0B');
    expect(formatSize(1023)).toBe('1023.0B');
  });

  it('should step up through the units', () => {
    expect(formatSize(1024)).toBe('1.0KB');
    expect(formatSize(12595)).toBe('12.3KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.0MB');
    expect(formatSize(3 * 1024 ** 3)).toBe('3.0GB');
  });
});

describe('kindFromFileName', () => {
  it('should map known extensions case-insensitively', () => {
    expect(kindFromFileName('Holiday.MP4')).toBe('video');
    expect(kindFromFileName('song.flac')).toBe('audio');
    expect(kindFromFileName('scan.jpeg')).toBe('photo');
    expect(kindFromFileName('notes.docx')).toBe('document');
    expect(kindFromFileName('backup.tar.gz')).toBe('archive');
  });

  it('should fall back to other', () => {
    expect(kindFromFileName('Makefile')).toBe('other');
    expect(kindFromFileName('data.bin')).toBe('other');
    expect(kindFromFileName(null)).toBe('other');
    expect(kindFromFileName('')).toBe('other');
  });
});

describe('extensionOf', () => {
  it('should prefer the file name', () => {
    expect(extensionOf('Report.PDF', 'image/png')).toBe('pdf');
  });

  it('should fall back to the MIME type', () => {
    expect(extensionOf('README', 'application/pdf')).toBe('pdf');
    expect(extensionOf(undefined, 'audio/mpeg')).toBe('mp3');
  });

  it('should return null when neither helps', () => {
    expect(extensionOf('README', 'application/x-unknown')).toBeNull();
    expect(extensionOf(null, null)).toBeNull();
  });
});

describe('fileIcon', () => {
  it('should pick an icon per kind', () => {
    expect(fileIcon('video')).toBe('🎬');
    expect(fileIcon('archive')).toBe('📦');
    expect(fileIcon('other')).toBe('📁');
  });
});

describe('formatTimestamp', () => {
  it('should format in UTC with zero padding', () => {
    expect(formatTimestamp(new Date('2025-03-01T04:05:00Z'))).toBe(
      '2025.03.01 04:05'
    );
  });
});

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml('<b>"Tom & Jerry"</b>')).toBe(
      '&lt;b&gt;&quot;Tom &amp; Jerry&quot;&lt;/b&gt;'
    );
  });
});
