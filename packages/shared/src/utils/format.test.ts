import { describe, it, expect } from 'vitest';
import { formatDateTime, formatFileSize, formatProgress, truncate } from './format';

describe('formatFileSize', () => {
  it('returns 0 B for empty files', () => {
    expect(formatFileSize(0)).toBe('0 B');
  });

  it('keeps bytes unscaled', () => {
    expect(formatFileSize(512)).toBe('512 B');
  });

  it('scales to the largest whole unit', () => {
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(20 * 1024 * 1024 * 1024)).toBe('20.0 GB');
  });
});

describe('formatDateTime', () => {
  it('formats ISO dates in UTC', () => {
    expect(formatDateTime('2024-03-05T09:07:00.000Z')).toBe('2024-03-05 09:07');
  });

  it('returns Unknown for empty or unparseable input', () => {
    expect(formatDateTime('')).toBe('Unknown');
    expect(formatDateTime('not-a-date')).toBe('Unknown');
  });
});

describe('formatProgress', () => {
  it('reports percentage, sizes and message count', () => {
    expect(formatProgress({ bytesRead: 512, totalBytes: 2048, messageCount: 3 })).toBe(
      '25% (512 B of 2.0 KB, 3 messages)'
    );
  });

  it('treats an empty file as fully read', () => {
    expect(formatProgress({ bytesRead: 0, totalBytes: 0, messageCount: 0 })).toBe(
      '100% (0 B of 0 B, 0 messages)'
    );
  });
});

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('Invoice', 10)).toBe('Invoice');
  });

  it('cuts long strings with an ellipsis', () => {
    expect(truncate('invoice copy', 8)).toBe('invoice…');
  });
});
