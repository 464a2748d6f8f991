import { criticalPathDepth, topoWaves } from './graph';
import { statusCounts, type PlanDocument, type StatusCounts } from './types';

export interface PlanSummary {
  goal: string;
  nodeCount: number;
  maxDepth: number;
  /** Node labels grouped by wave number */
  waves: Record<string, string[]>;
  /** e.g. "2 haiku, 1 sonnet" */
  modelDistribution: string;
  counts: StatusCounts;
}

export function summarizePlan(doc: PlanDocument): PlanSummary {
  const waves = topoWaves(doc.nodes);
  const byWave: Record<string, string[]> = {};
  const models = new Map<string, number>();

  doc.nodes.forEach((node, index) => {
    const model = node.agent.model || 'unknown';
    const key = String(waves[index]);
    (byWave[key] ??= []).push(`Node ${index}: ${node.subject} (${model})`);
    models.set(model, (models.get(model) ?? 0) + 1);
  });

  const modelDistribution = [...models.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([model, count]) => `${count} ${model}`)
    .join(', ');

  return {
    goal: doc.goal,
    nodeCount: doc.nodes.length,
    maxDepth: criticalPathDepth(waves),
    waves: byWave,
    modelDistribution,
    counts: statusCounts(doc.nodes),
  };
}
