import { describe, it, expect } from 'vitest';
import { formatDuration, formatFileSize, formatSpeed } from '../utils/format.js';

describe('format', () => {
  it('formats file sizes with two decimals', () => {
    expect(formatFileSize(0)).toBe('0.00 B');
    expect(formatFileSize(1536)).toBe('1.50 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(formatFileSize(3 * 1024 ** 5)).toBe('3.00 PB');
  });

  it('formats durations by magnitude', () => {
    expect(formatDuration(42.34)).toBe('42.3s');
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(3725)).toBe('1h 2m 5s');
  });

  it('formats speeds as size per second', () => {
    expect(formatSpeed(2048)).toBe('2.00 KB/s');
  });
});
