import { z } from 'zod';

export const MEMORY_CATEGORIES = [
  'pattern',
  'procedure',
  'gotcha',
  'preference',
  'convention',
  'mistake',
  'approach',
  'failure',
] as const;

export const MemoryCategorySchema = z.enum(MEMORY_CATEGORIES);

export const MemoryEntrySchema = z.object({
  id: z.string(),
  content: z.string(),
  category: MemoryCategorySchema,
  keywords: z.array(z.string()).default([]),
  importance: z.number().int().min(1).max(10).default(5),
  /** Times the entry was returned by a search */
  usageCount: z.number().int().nonnegative().default(0),
  /** Times a run outcome was reported for the entry */
  feedbackCount: z.number().int().nonnegative().default(0),
  createdAt: z.string(),
  source: z.string().optional(),
  goalContext: z.string().optional(),
});

/** Loose shape of a `memory-add` payload; the store applies the quality gate */
export const MemoryInputSchema = z.object({
  content: z.string().optional(),
  category: z.string().optional(),
  keywords: z.union([z.array(z.string()), z.string()]).optional(),
  importance: z.number().optional(),
  source: z.string().optional(),
  goalContext: z.string().optional(),
});

export const FeedbackOutcomeSchema = z.object({
  memoryIds: z.array(z.string()).default([]),
  succeeded: z.boolean(),
  firstAttempt: z.boolean().default(true),
});

export type MemoryCategory = z.infer<typeof MemoryCategorySchema>;
export type MemoryEntry = z.infer<typeof MemoryEntrySchema>;
export type MemoryInput = z.infer<typeof MemoryInputSchema>;
export type FeedbackOutcome = z.input<typeof FeedbackOutcomeSchema>;

export interface ScoredMemory extends MemoryEntry {
  score: number;
}

export interface FeedbackCounts {
  boosted: number;
  decayed: number;
  unchanged: number;
}
