import { AppError } from '@waveplan/shared';
import { PlanStore } from '../plan/store';
import type { WorkspaceHandle } from '../workspace';
import { ReflectionLog } from './log';
import type { ReflectionEntry } from './types';

export interface RecentRun {
  summary: string;
  goal: string;
  timestamp: string;
  doNextTime: string[];
  whatFailed: string[];
  promptFixCount: number;
}

export interface Improvement {
  skill: string;
  type: 'promptFix' | 'doNextTime';
  text: string;
  failureClass: string;
  fromFailedRun: boolean;
}

export interface HealthSummary {
  recentRuns: RecentRun[];
  unresolvedImprovements: Improvement[];
  /** Share of recent runs that achieved their goal; null without reflections */
  goalAchievementRate: number | null;
  /** One-line progress of the current plan, empty when there is none */
  plan: string;
}

export interface HealthSummaryOptions {
  window?: number;
  limit?: number;
}

const DEDUPE_PREFIX = 60;

function toRun(entry: ReflectionEntry): RecentRun {
  const status = entry.goalAchieved ? 'succeeded' : 'failed';
  return {
    summary: `${entry.skill}: ${entry.outcome} (${status})`,
    goal: entry.goal,
    timestamp: entry.timestamp,
    doNextTime: entry.evaluation.doNextTime,
    whatFailed: entry.evaluation.whatFailed,
    promptFixCount: entry.evaluation.promptFixes.length,
  };
}

/**
 * Prompt fixes and next-time notes from recent runs, de-duplicated on their
 * leading text. Items from failed runs come first, then prompt fixes before
 * notes.
 */
export function extractImprovements(entries: readonly ReflectionEntry[]): Improvement[] {
  const raw: Improvement[] = [];
  for (const entry of entries) {
    const fromFailedRun = !entry.goalAchieved;
    for (const fix of entry.evaluation.promptFixes) {
      raw.push({
        skill: entry.skill,
        type: 'promptFix',
        text: fix.fix,
        failureClass: fix.failureClass,
        fromFailedRun,
      });
    }
    for (const note of entry.evaluation.doNextTime) {
      raw.push({ skill: entry.skill, type: 'doNextTime', text: note, failureClass: '', fromFailedRun });
    }
  }

  const seen = new Set<string>();
  const deduped = raw.filter((item) => {
    const key = item.text.slice(0, DEDUPE_PREFIX).toLowerCase().trim();
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });

  const rank = (item: Improvement) => (item.fromFailedRun ? 0 : 2) + (item.type === 'promptFix' ? 0 : 1);
  return deduped.sort((a, b) => rank(a) - rank(b));
}

async function planProgress(planPath: string): Promise<string> {
  try {
    const doc = await new PlanStore(planPath).read();
    const completed = doc.nodes.filter((node) => node.status === 'completed').length;
    return `Current plan: ${completed}/${doc.nodes.length} nodes completed`;
  } catch (error) {
    if (error instanceof AppError && error.code === 'not_found') {
      return '';
    }
    if (error instanceof AppError) {
      return 'Plan file exists but cannot be read';
    }
    throw error;
  }
}

export async function healthSummary(
  workspace: WorkspaceHandle,
  options: HealthSummaryOptions = {},
): Promise<HealthSummary> {
  const window = options.window ?? 5;
  const limit = options.limit ?? 10;
  const recent = await new ReflectionLog(workspace.reflectionPath).search({ limit: window });

  const achieved = recent.filter((entry) => entry.goalAchieved).length;
  return {
    recentRuns: recent.map(toRun),
    unresolvedImprovements: extractImprovements(recent).slice(0, limit),
    goalAchievementRate: recent.length === 0 ? null : Math.round((achieved / recent.length) * 100) / 100,
    plan: await planProgress(workspace.planPath),
  };
}
