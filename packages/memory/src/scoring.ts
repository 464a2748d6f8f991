import type { MemoryEntry } from './types';

const MONTH_MS = 30 * 24 * 60 * 60 * 1000;

export const DEFAULT_DECAY_PER_MONTH = 0.9;

function singular(token: string): string {
  return token.length > 3 && token.endsWith('s') && !token.endsWith('ss') ? token.slice(0, -1) : token;
}

/**
 * Lower-cased alphanumeric runs longer than two characters, with a trailing
 * plural `s` removed.
 */
export function tokenize(text: string): Set<string> {
  const runs = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return new Set(runs.filter((run) => run.length > 2).map(singular));
}

export function entryTokens(entry: Pick<MemoryEntry, 'content' | 'keywords'>): Set<string> {
  const tokens = tokenize(entry.content);
  for (const keyword of entry.keywords) {
    tokenize(keyword).forEach((token) => tokens.add(token));
  }
  return tokens;
}

/**
 * Share of query tokens found in the entry's content or keywords, in [0, 1].
 */
export function keywordMatch(entry: Pick<MemoryEntry, 'content' | 'keywords'>, query: ReadonlySet<string>): number {
  if (query.size === 0) {
    return 0;
  }
  const tokens = entryTokens(entry);
  let overlap = 0;
  query.forEach((token) => {
    if (tokens.has(token)) {
      overlap++;
    }
  });
  return overlap / query.size;
}

/**
 * `decayPerMonth ^ (age / 30 days)`. Future timestamps count as age zero, so
 * the factor stays in (0, 1].
 */
export function recencyFactor(ageMs: number, decayPerMonth = DEFAULT_DECAY_PER_MONTH): number {
  return decayPerMonth ** (Math.max(0, ageMs) / MONTH_MS);
}

export function scoreMemory(
  entry: MemoryEntry,
  query: ReadonlySet<string>,
  now: Date,
  decayPerMonth = DEFAULT_DECAY_PER_MONTH,
): number {
  const created = Date.parse(entry.createdAt);
  const age = Number.isNaN(created) ? 0 : now.getTime() - created;
  return keywordMatch(entry, query) * recencyFactor(age, decayPerMonth) * (entry.importance / 10);
}
