import { describe, it, expect } from 'vitest';
import { ByteFormatter } from './ByteFormatter';

describe('ByteFormatter', () => {
  it('should keep small values in bytes', () => {
    expect(ByteFormatter.toHumanReadable(0)).toBe('0 B');
    expect(ByteFormatter.toHumanReadable(1023)).toBe('1023 B');
  });

  it('should use binary prefixes with two decimals', () => {
    expect(ByteFormatter.toHumanReadable(1536)).toBe('1.50 KB');
    expect(ByteFormatter.toHumanReadable(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(ByteFormatter.toHumanReadable(3 * 1024 ** 3)).toBe('3.00 GB');
  });

  it('should format speeds per second', () => {
    expect(ByteFormatter.toSpeed(2048)).toBe('2.00 KB/s');
    expect(ByteFormatter.toSpeed(0)).toBe('0 B/s');
  });

  it('should return 0 percent for an empty total', () => {
    expect(ByteFormatter.toPercentage(5, 0)).toBe(0);
    expect(ByteFormatter.toPercentage(25, 100)).toBe(25);
  });
});
