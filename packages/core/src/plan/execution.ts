import { z } from 'zod';
import { InvalidInputError, InvalidTransitionError } from '@waveplan/shared';
import { dependencyLists, dependentLists, descendantsOf } from './graph';
import {
  NodeStatusSchema,
  isTrimmed,
  statusCounts,
  type NodeStatus,
  type PlanDocument,
  type PlanNode,
  type StatusCounts,
} from './types';

export const DEFAULT_MAX_ATTEMPTS = 3;

/** Statuses a node may move to from each status. */
export const STATUS_TRANSITIONS: Readonly<Record<NodeStatus, readonly NodeStatus[]>> = {
  pending: ['in_progress', 'blocked', 'skipped'],
  in_progress: ['completed', 'failed', 'blocked', 'pending'],
  failed: ['pending'],
  blocked: ['pending'],
  completed: [],
  skipped: [],
};

const FAILURE_STATUSES: readonly NodeStatus[] = ['failed', 'blocked'];

export const StatusUpdateSchema = z.object({
  index: z.number().int().nonnegative(),
  status: NodeStatusSchema,
  result: z.string().nullable().optional(),
});

export const StatusUpdateBatchSchema = z.array(StatusUpdateSchema);

export type StatusUpdate = z.infer<typeof StatusUpdateSchema>;

export interface ExecutionOptions {
  maxAttempts?: number;
}

export interface ApplyResultsOutcome {
  document: PlanDocument;
  updated: number[];
  /** Pending nodes skipped because a dependency failed or was blocked */
  cascaded: number[];
  /** Nodes whose agent brief was trimmed by this batch */
  trimmed: number[];
  /** Cascaded skips lifted because their failed dependency was retried */
  revived: number[];
}

export interface CircuitBreakerReport {
  shouldAbort: boolean;
  ratio: number;
  exempt: boolean;
  total: number;
  /** Pending nodes downstream of a failed or blocked node */
  wouldBeSkipped: number;
  counts: StatusCounts;
  reason: string;
}

export interface ResumeResetOutcome {
  document: PlanDocument;
  reset: number[];
  /** Files modified by interrupted nodes, to be restored before re-running */
  filesToRevert: string[];
  /** Files created by interrupted nodes, to be removed before re-running */
  filesToDelete: string[];
  noWorkRemaining: boolean;
}

export function canTransition(
  node: Pick<PlanNode, 'status' | 'attempts'>,
  to: NodeStatus,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): boolean {
  if (!STATUS_TRANSITIONS[node.status].includes(to)) {
    return false;
  }
  return !(FAILURE_STATUSES.includes(node.status) && to === 'pending' && node.attempts >= maxAttempts);
}

export function retryEligible(
  node: Pick<PlanNode, 'status' | 'attempts'>,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): boolean {
  return node.status === 'failed' && node.attempts < maxAttempts;
}

function trimNode(node: PlanNode): boolean {
  if (isTrimmed(node.agent)) {
    return false;
  }
  node.agent = { trimmed: true, role: node.agent.role, model: node.agent.model };
  return true;
}

function cascadeInPlace(nodes: PlanNode[]): number[] {
  const dependents = dependentLists(nodes);
  const queue = nodes.flatMap((node, index) => (FAILURE_STATUSES.includes(node.status) ? [index] : []));
  const visited = new Set(queue);
  const cascaded: number[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) {
      break;
    }
    for (const dependent of dependents[current]) {
      if (visited.has(dependent)) {
        continue;
      }
      const node = nodes[dependent];
      if (node.status === 'pending') {
        node.status = 'skipped';
        node.cascadedFrom = current;
        cascaded.push(dependent);
      }
      if (node.status === 'skipped') {
        visited.add(dependent);
        queue.push(dependent);
      }
    }
  }
  return cascaded.sort((a, b) => a - b);
}

// A cascaded skip is lifted once no ancestor is failed or blocked any more.
function reviveInPlace(nodes: PlanNode[]): number[] {
  const deps = dependencyLists(nodes);
  const blocked = new Map<number, boolean>();

  const hasFailedAncestor = (index: number, path: Set<number>): boolean => {
    const cached = blocked.get(index);
    if (cached !== undefined) {
      return cached;
    }
    path.add(index);
    const result = deps[index].some(
      (dep) =>
        !path.has(dep) &&
        (FAILURE_STATUSES.includes(nodes[dep].status) || hasFailedAncestor(dep, path)),
    );
    path.delete(index);
    blocked.set(index, result);
    return result;
  };

  const revived: number[] = [];
  nodes.forEach((node, index) => {
    if (node.status === 'skipped' && node.cascadedFrom !== undefined && !hasFailedAncestor(index, new Set())) {
      node.status = 'pending';
      delete node.cascadedFrom;
      revived.push(index);
    }
  });
  return revived;
}

/**
 * Marks every pending node downstream of a failed or blocked node as skipped.
 * Running it again on its own output changes nothing.
 */
export function cascadeFailures(doc: PlanDocument): { document: PlanDocument; cascaded: number[] } {
  const document = structuredClone(doc);
  const cascaded = cascadeInPlace(document.nodes);
  return { document, cascaded };
}

/**
 * Applies a batch of status updates. The whole batch is rejected if any
 * update is out of range or not an allowed transition; the input document is
 * never modified.
 */
export function applyResults(
  doc: PlanDocument,
  updates: readonly StatusUpdate[],
  options: ExecutionOptions = {},
): ApplyResultsOutcome {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const document = structuredClone(doc);
  const { nodes, progress } = document;
  const updated: number[] = [];
  const trimmed: number[] = [];
  let retried = false;

  for (const update of updates) {
    const node = nodes[update.index];
    if (node === undefined) {
      throw new InvalidInputError(`Node ${update.index} does not exist`, {
        details: { index: update.index, nodeCount: nodes.length },
      });
    }
    if (!canTransition(node, update.status, maxAttempts)) {
      throw new InvalidTransitionError(update.index, node.status, update.status, {
        details: { attempts: node.attempts, allowed: STATUS_TRANSITIONS[node.status] },
      });
    }

    const previous = node.status;
    if (FAILURE_STATUSES.includes(previous) && update.status === 'pending') {
      retried = true;
    }
    node.status = update.status;
    if (update.result !== undefined) {
      node.result = update.result;
    }
    if (update.status === 'failed' || (update.status === 'blocked' && previous === 'in_progress')) {
      node.attempts++;
    }
    if (update.status === 'completed') {
      if (trimNode(node)) {
        trimmed.push(update.index);
      }
      if (!progress.completedNodes.includes(update.index)) {
        progress.completedNodes.push(update.index);
      }
    }
    if (!updated.includes(update.index)) {
      updated.push(update.index);
    }
  }

  const revived = retried ? reviveInPlace(nodes) : [];
  const cascaded = cascadeInPlace(nodes);

  return { document, updated, cascaded, trimmed, revived };
}

export function retryCandidates(
  doc: PlanDocument,
  maxAttempts = DEFAULT_MAX_ATTEMPTS,
): { candidates: number[]; exhausted: number[] } {
  const candidates: number[] = [];
  const exhausted: number[] = [];
  doc.nodes.forEach((node, index) => {
    if (node.status !== 'failed') {
      return;
    }
    (retryEligible(node, maxAttempts) ? candidates : exhausted).push(index);
  });
  return { candidates, exhausted };
}

/**
 * Whole-run abort signal. The ratio is failed, blocked and skipped nodes over
 * every node that has not completed.
 */
export function circuitBreaker(
  doc: PlanDocument,
  options: { threshold?: number; exemptMaxNodes?: number } = {},
): CircuitBreakerReport {
  const threshold = options.threshold ?? 0.5;
  const exemptMaxNodes = options.exemptMaxNodes ?? 3;
  const { nodes } = doc;
  const counts = statusCounts(nodes);
  const total = nodes.length;
  const unresolved = counts.failed + counts.blocked + counts.skipped;
  const remaining = total - counts.completed;
  const ratio = remaining === 0 ? 0 : unresolved / remaining;
  const exempt = total <= exemptMaxNodes;

  const downstream = new Set<number>();
  nodes.forEach((node, index) => {
    if (FAILURE_STATUSES.includes(node.status)) {
      for (const d of descendantsOf(nodes, index)) {
        downstream.add(d);
      }
    }
  });
  const wouldBeSkipped = [...downstream].filter((index) => nodes[index].status === 'pending').length;

  const shouldAbort = !exempt && ratio > threshold;
  let reason = '';
  if (shouldAbort) {
    reason = `${unresolved}/${remaining} unfinished nodes are failed, blocked or skipped`;
  } else if (exempt && ratio > threshold) {
    reason = `plan has ${total} nodes; breaker applies above ${exemptMaxNodes}`;
  }

  return {
    shouldAbort,
    ratio: Math.round(ratio * 1000) / 1000,
    exempt,
    total,
    wouldBeSkipped,
    counts,
    reason,
  };
}

/**
 * Returns interrupted nodes to pending, counting the interruption as an
 * attempt.
 */
export function resumeReset(doc: PlanDocument): ResumeResetOutcome {
  const document = structuredClone(doc);
  const reset: number[] = [];
  const revert = new Set<string>();
  const remove = new Set<string>();

  document.nodes.forEach((node, index) => {
    if (node.status !== 'in_progress') {
      return;
    }
    node.status = 'pending';
    node.attempts++;
    reset.push(index);
    node.metadata.files.modify.forEach((path) => revert.add(path));
    node.metadata.files.create.forEach((path) => remove.add(path));
  });

  return {
    document,
    reset,
    filesToRevert: [...revert].sort(),
    filesToDelete: [...remove].sort(),
    noWorkRemaining: document.nodes.every((node) => node.status !== 'pending'),
  };
}

/**
 * Pending nodes whose dependencies have all completed, in index order.
 */
export function readySet(doc: PlanDocument): number[] {
  return doc.nodes.flatMap((node, index) =>
    node.status === 'pending' &&
    node.blockedBy.every((dep) => doc.nodes[dep]?.status === 'completed')
      ? [index]
      : [],
  );
}
