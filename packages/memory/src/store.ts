import { randomUUID } from 'node:crypto';
import {
  AppError,
  InvalidInputError,
  JsonlStore,
  QualityGateError,
  logger as rootLogger,
  type Logger,
} from '@waveplan/shared';
import { z } from 'zod';
import { DEFAULT_DECAY_PER_MONTH, entryTokens, scoreMemory, tokenize } from './scoring';
import {
  FeedbackOutcomeSchema,
  MemoryCategorySchema,
  MemoryEntrySchema,
  MemoryInputSchema,
  type FeedbackCounts,
  type MemoryEntry,
  type ScoredMemory,
} from './types';

export interface MemoryStoreOptions {
  decayPerMonth?: number;
  defaultImportance?: number;
  logger?: Logger;
}

export interface MemoryListOptions {
  category?: string;
  keyword?: string;
}

const MIN_IMPORTANCE = 1;
const MAX_IMPORTANCE = 10;

const clamp = (value: number) => Math.min(MAX_IMPORTANCE, Math.max(MIN_IMPORTANCE, value));

function normalizeContent(content: string): string {
  return content.toLowerCase().replace(/\s+/g, ' ').trim();
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function splitKeywords(keywords: string | string[] | undefined): string[] {
  const list = typeof keywords === 'string' ? keywords.split(',') : keywords ?? [];
  return list.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
}

function byImportanceThenRecency(a: MemoryEntry, b: MemoryEntry): number {
  return b.importance - a.importance || Date.parse(b.createdAt) - Date.parse(a.createdAt);
}

/**
 * Curated cross-run learnings, one JSON entry per line. Updates rewrite the
 * whole file atomically; lines that do not parse are carried over as they are.
 */
export class MemoryStore {
  private readonly store: JsonlStore<MemoryEntry>;
  private readonly decayPerMonth: number;
  private readonly defaultImportance: number;
  private readonly log: Logger;

  constructor(
    readonly filePath: string,
    options: MemoryStoreOptions = {},
  ) {
    this.store = new JsonlStore(filePath, MemoryEntrySchema);
    this.decayPerMonth = options.decayPerMonth ?? DEFAULT_DECAY_PER_MONTH;
    this.defaultImportance = options.defaultImportance ?? 5;
    this.log = (options.logger ?? rootLogger).child({ store: 'memory' });
  }

  /**
   * Top `limit` entries with a positive score. Ties go to higher importance,
   * then newer entries, then id. Every returned entry has its usage counted.
   */
  async search(query: string, options: { limit?: number; now?: Date } = {}): Promise<ScoredMemory[]> {
    const tokens = tokenize(query);
    if (tokens.size === 0) {
      return [];
    }
    const now = options.now ?? new Date();
    const { entries, unparsed } = await this.readEntries();

    const ranked = entries
      .map((entry) => ({ entry, score: scoreMemory(entry, tokens, now, this.decayPerMonth) }))
      .filter(({ score }) => score > 0)
      .sort(
        (a, b) =>
          b.score - a.score ||
          byImportanceThenRecency(a.entry, b.entry) ||
          a.entry.id.localeCompare(b.entry.id),
      )
      .slice(0, options.limit ?? 5);

    if (ranked.length === 0) {
      return [];
    }
    for (const { entry } of ranked) {
      entry.usageCount++;
    }
    await this.store.rewrite(entries, unparsed);
    return ranked.map(({ entry, score }) => ({ ...entry, score: Math.round(score * 1000) / 1000 }));
  }

  /**
   * Runs the quality gate and appends the entry.
   */
  async add(raw: unknown, now: Date = new Date()): Promise<MemoryEntry> {
    const parsed = MemoryInputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new QualityGateError(`Invalid memory: ${describeIssues(parsed.error)}`);
    }
    const input = parsed.data;

    const content = input.content?.trim() ?? '';
    if (!content) {
      throw new QualityGateError('Content is required');
    }
    if (input.category === undefined) {
      throw new QualityGateError('Category is required');
    }
    const category = MemoryCategorySchema.safeParse(input.category);
    if (!category.success) {
      throw new QualityGateError(
        `Invalid category '${input.category}'. Must be one of: ${MemoryCategorySchema.options.join(', ')}`,
      );
    }
    const importance = input.importance ?? this.defaultImportance;
    if (!Number.isInteger(importance) || importance < MIN_IMPORTANCE || importance > MAX_IMPORTANCE) {
      throw new QualityGateError('Importance must be an integer between 1 and 10');
    }

    const { entries: existing } = await this.readEntries();
    const normalized = normalizeContent(content);
    const duplicate = existing.find((entry) => normalizeContent(entry.content) === normalized);
    if (duplicate) {
      throw new QualityGateError(`Duplicate of memory ${duplicate.id}`, {
        code: 'duplicate',
        details: { existingId: duplicate.id },
      });
    }

    const entry: MemoryEntry = {
      id: randomUUID(),
      content,
      category: category.data,
      keywords: splitKeywords(input.keywords),
      importance,
      usageCount: 0,
      feedbackCount: 0,
      createdAt: now.toISOString(),
    };
    if (input.source) {
      entry.source = input.source;
    }
    if (input.goalContext) {
      entry.goalContext = input.goalContext;
    }
    await this.store.append(entry);
    return entry;
  }

  boost(id: string): Promise<{ id: string; importance: number }> {
    return this.adjust(id, 1);
  }

  decay(id: string): Promise<{ id: string; importance: number }> {
    return this.adjust(id, -1);
  }

  /**
   * Applies run outcomes to the memories that were injected into them: a
   * first-attempt success boosts, a failure decays, a success after retries
   * leaves importance alone. Unknown ids are ignored.
   */
  async feedback(raw: unknown): Promise<FeedbackCounts> {
    const parsed = z.array(FeedbackOutcomeSchema).safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError(`Invalid feedback: ${describeIssues(parsed.error)}`);
    }

    const counts: FeedbackCounts = { boosted: 0, decayed: 0, unchanged: 0 };
    const { entries, unparsed } = await this.readEntries();
    const byId = new Map(entries.map((entry) => [entry.id, entry]));

    for (const outcome of parsed.data) {
      for (const id of outcome.memoryIds) {
        const entry = byId.get(id);
        if (!entry) {
          continue;
        }
        entry.feedbackCount++;
        if (outcome.succeeded && outcome.firstAttempt) {
          entry.importance = clamp(entry.importance + 1);
          counts.boosted++;
        } else if (!outcome.succeeded) {
          entry.importance = clamp(entry.importance - 1);
          counts.decayed++;
        } else {
          counts.unchanged++;
        }
      }
    }

    if (counts.boosted + counts.decayed + counts.unchanged > 0) {
      await this.store.rewrite(entries, unparsed);
    }
    return counts;
  }

  /**
   * Entries by importance, then newest first.
   */
  async list(options: MemoryListOptions = {}): Promise<{ total: number; memories: MemoryEntry[] }> {
    const { entries } = await this.readEntries();
    const keywordTokens = options.keyword ? tokenize(options.keyword) : undefined;

    const memories = entries
      .filter((entry) => !options.category || entry.category === options.category)
      .filter((entry) => {
        if (!keywordTokens) {
          return true;
        }
        const tokens = entryTokens(entry);
        return [...keywordTokens].some((token) => tokens.has(token));
      })
      .sort(byImportanceThenRecency);
    return { total: entries.length, memories };
  }

  private async adjust(id: string, delta: 1 | -1): Promise<{ id: string; importance: number }> {
    const { entries, unparsed } = await this.readEntries();
    const entry = entries.find((candidate) => candidate.id === id);
    if (!entry) {
      throw new AppError('not_found', `Memory '${id}' not found`, { details: { id } });
    }
    entry.importance = clamp(entry.importance + delta);
    await this.store.rewrite(entries, unparsed);
    return { id, importance: entry.importance };
  }

  private async readEntries(): Promise<{ entries: MemoryEntry[]; unparsed: string[] }> {
    const { records, malformed, unparsed } = await this.store.read();
    if (malformed > 0) {
      this.log.warn(`${malformed} malformed line(s) in ${this.filePath} are skipped and kept unchanged`);
    }
    return { entries: records, unparsed };
  }
}
