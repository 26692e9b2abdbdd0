import { describe, it, expect } from 'vitest';
import { escapeHtml, formatDuration, splitMessage } from '../../../src/utils/format.js';

describe('escapeHtml', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml('<b>"Fish & Chips"</b>')).toBe('&lt;b&gt;&quot;Fish &amp; Chips&quot;&lt;/b&gt;');
  });

  it('should leave plain text alone', () => {
    expect(escapeHtml('Recycling')).toBe('Recycling');
  });
});

describe('splitMessage', () => {
  it('should return short text as one chunk', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello']);
  });

  it('should prefer line breaks', () => {
    expect(splitMessage('aaaa\nbbbb\ncccc', 10)).toEqual(['aaaa\nbbbb', 'cccc']);
  });

  it('should fall back to spaces, then a hard cut', () => {
    expect(splitMessage('aaaa bbbb cccc', 10)).toEqual(['aaaa bbbb', 'cccc']);
    expect(splitMessage('abcdefghijkl', 5)).toEqual(['abcde', 'fghij', 'kl']);
  });

  it('should return nothing for empty text', () => {
    expect(splitMessage('')).toEqual([]);
  });
});

describe('formatDuration', () => {
  it('should pick the two largest units', () => {
    expect(formatDuration((3 * 24 + 4) * 3_600_000 + 59_000)).toBe('3d 4h');
    expect(formatDuration(2 * 3_600_000 + 5 * 60_000)).toBe('2h 5m');
    expect(formatDuration(45 * 60_000)).toBe('45m');
    expect(formatDuration(45_000)).toBe('45s');
  });

  it('should treat negative durations as zero', () => {
    expect(formatDuration(-5000)).toBe('0s');
  });
});
