import { describe, it, expect } from 'vitest';
import { formatClock, formatRfc822 } from './time.js';
import { formatSize, toMegabytes } from './size.js';

describe('formatClock', () => {
  it('renders hours without padding and minutes/seconds with two digits', () => {
    expect(formatClock(0)).toBe('0:00:00');
    expect(formatClock(-5)).toBe('0:00:00');
    expect(formatClock(59)).toBe('0:00:59');
    expect(formatClock(3725)).toBe('1:02:05');
  });
});

describe('formatRfc822', () => {
  it('formats in UTC with a +0000 offset', () => {
    expect(formatRfc822(new Date('2024-03-05T07:08:09Z'))).toBe('Tue, 05 Mar 2024 07:08:09 +0000');
  });
});

describe('formatSize', () => {
  it('picks the largest unit below the value', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(1536)).toBe('1.50 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(formatSize(3 * 1024 * 1024 * 1024)).toBe('3.00 GB');
    expect(toMegabytes(1024 * 1024 * 1.5)).toBe('1.50');
  });
});
