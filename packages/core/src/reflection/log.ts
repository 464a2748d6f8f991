import { randomUUID } from 'node:crypto';
import { JsonlStore, QualityGateError, type BestEffortResult } from '@waveplan/shared';
import { validateEvaluation } from './validate';
import {
  OutcomeSchema,
  ReflectionEntrySchema,
  SkillSchema,
  type ReflectionEntry,
  type Skill,
} from './types';

export interface NewReflection {
  skill: string;
  goal: string;
  outcome: string;
  goalAchieved: boolean;
  evaluation: unknown;
}

export interface ReflectionAddResult {
  entry: ReflectionEntry;
  warnings: string[];
  written: BestEffortResult<void>;
}

function byTimestampDesc(a: ReflectionEntry, b: ReflectionEntry): number {
  return Date.parse(b.timestamp) - Date.parse(a.timestamp);
}

/**
 * Append-only log of post-run evaluations. Entries are checked before they
 * are written; the write itself is best-effort.
 */
export class ReflectionLog {
  private readonly store: JsonlStore<ReflectionEntry>;

  constructor(readonly filePath: string) {
    this.store = new JsonlStore(filePath, ReflectionEntrySchema);
  }

  async add(input: NewReflection, now: Date = new Date()): Promise<ReflectionAddResult> {
    const skill = SkillSchema.safeParse(input.skill);
    if (!skill.success) {
      throw new QualityGateError(
        `Invalid skill '${input.skill}'. Must be one of: ${SkillSchema.options.join(', ')}`,
      );
    }
    const outcome = OutcomeSchema.safeParse(input.outcome);
    if (!outcome.success) {
      throw new QualityGateError(
        `Invalid outcome '${input.outcome}'. Must be one of: ${OutcomeSchema.options.join(', ')}`,
      );
    }
    if (!input.goal.trim()) {
      throw new QualityGateError('Goal is required');
    }

    const { evaluation, warnings } = validateEvaluation(input.evaluation);
    const entry: ReflectionEntry = {
      id: randomUUID(),
      timestamp: now.toISOString(),
      skill: skill.data,
      goal: input.goal,
      outcome: outcome.data,
      goalAchieved: input.goalAchieved,
      evaluation,
    };

    const written = await this.store.appendBestEffort(entry);
    return { entry, warnings, written };
  }

  /**
   * Most recent reflections first, optionally for one skill.
   */
  async search(options: { skill?: Skill; limit?: number } = {}): Promise<ReflectionEntry[]> {
    const { records } = await this.store.read({
      filter: options.skill ? (entry) => entry.skill === options.skill : undefined,
    });
    const sorted = [...records].reverse().sort(byTimestampDesc);
    return options.limit === undefined ? sorted : sorted.slice(0, options.limit);
  }

  async readAll() {
    return this.store.read();
  }
}
