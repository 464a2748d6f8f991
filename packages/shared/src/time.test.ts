import { describe, it, expect } from 'vitest';
import { compactUtcStamp } from './time';

describe('compactUtcStamp', () => {
  it('drops separators and milliseconds', () => {
    expect(compactUtcStamp(new Date('2026-03-01T10:15:00.123Z'))).toBe('20260301T101500Z');
  });
});
