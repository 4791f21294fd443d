import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration } from './format';

describe('formatBytes', () => {
  it('formats bytes below one kilobyte', () => {
    expect(formatBytes(0)).toBe('0.00 B');
    expect(formatBytes(1023)).toBe('1023.00 B');
  });

  it('scales through binary units', () => {
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(formatBytes(3 * 1024 ** 3)).toBe('3.00 GB');
  });

  it('stops at terabytes', () => {
    expect(formatBytes(2048 * 1024 ** 4)).toBe('2048.00 TB');
  });
});

describe('formatDuration', () => {
  it('formats short durations in seconds', () => {
    expect(formatDuration(1300)).toBe('1.3s');
  });

  it('formats long durations in minutes and seconds', () => {
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});
