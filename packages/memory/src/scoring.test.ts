import { describe, it, expect } from 'vitest';
import { keywordMatch, recencyFactor, scoreMemory, tokenize } from './scoring';
import type { MemoryEntry } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

const entry = (overrides: Partial<MemoryEntry>): MemoryEntry => ({
  id: 'm1',
  content: '',
  category: 'pattern',
  keywords: [],
  importance: 5,
  usageCount: 0,
  feedbackCount: 0,
  createdAt: '2026-03-01T00:00:00.000Z',
  ...overrides,
});

describe('tokenize', () => {
  it('keeps alphanumeric runs longer than two characters', () => {
    expect([...tokenize('Use an ORM, v2 or sqlite3!')]).toEqual(['use', 'orm', 'sqlite3']);
  });

  it('drops a trailing plural s but not a double s', () => {
    expect([...tokenize('atomic writes pass tests')]).toEqual(['atomic', 'write', 'pass', 'test']);
    expect([...tokenize('its bus')]).toEqual(['its', 'bus']);
  });
});

describe('keywordMatch', () => {
  it('is the share of query tokens found in content or keywords', () => {
    const memory = entry({ content: 'prefer atomic renames', keywords: ['filesystem'] });
    expect(keywordMatch(memory, tokenize('atomic filesystem locking'))).toBeCloseTo(2 / 3);
  });

  it('does not match substrings of longer tokens', () => {
    const memory = entry({ content: 'category listings' });
    expect(keywordMatch(memory, tokenize('cat list'))).toBe(0);
  });

  it('is zero for an empty query', () => {
    expect(keywordMatch(entry({ content: 'anything' }), new Set())).toBe(0);
  });
});

describe('recencyFactor', () => {
  it('loses ten percent per thirty days', () => {
    expect(recencyFactor(0)).toBe(1);
    expect(recencyFactor(30 * DAY_MS)).toBeCloseTo(0.9);
    expect(recencyFactor(60 * DAY_MS)).toBeCloseTo(0.81);
  });

  it('decreases monotonically and stays positive', () => {
    const ages = [1, 10, 100, 1000, 10000].map((days) => recencyFactor(days * DAY_MS));
    for (let i = 1; i < ages.length; i++) {
      expect(ages[i]).toBeLessThan(ages[i - 1]);
      expect(ages[i]).toBeGreaterThan(0);
    }
  });

  it('treats future timestamps as brand new', () => {
    expect(recencyFactor(-5 * DAY_MS)).toBe(1);
  });
});

describe('scoreMemory', () => {
  it('multiplies match, recency and importance', () => {
    const now = new Date('2026-03-31T00:00:00.000Z');
    const memory = entry({ content: 'atomic write', importance: 8 });
    expect(scoreMemory(memory, tokenize('atomic write'), now)).toBeCloseTo(0.72);
  });
});
