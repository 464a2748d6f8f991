import { ancestorSets, criticalPathDepth, tryTopoWaves } from './graph';
import { overlapMatrix, overlapsByNode, sharedFiles } from './overlap';
import {
  PLAN_SCHEMA_VERSION,
  PlanDocumentSchema,
  isTrimmed,
  writeSet,
  type PlanDocument,
  type PlanNode,
} from './types';

export type IssueCode =
  | 'schema_version'
  | 'empty_nodes'
  | 'write_conflict'
  | 'read_write_conflict'
  | 'invalid_dependency'
  | 'cycle'
  | 'wave_mismatch'
  | 'missing_assumptions'
  | 'missing_rollback_triggers'
  | 'too_many_nodes'
  | 'critical_path_depth';

export type IssueSeverity = 'error' | 'repairable' | 'warning';

export interface ValidationIssue {
  code: IssueCode;
  severity: IssueSeverity;
  message: string;
  /** Offending node indices */
  nodes?: number[];
  files?: string[];
}

export interface ValidationReport {
  /** True when there is nothing to fix: no errors and no repairable issues */
  ok: boolean;
  errors: ValidationIssue[];
  repairable: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ValidationOptions {
  maxNodes?: number;
  maxDepth?: number;
}

export interface RepairResult {
  document: PlanDocument;
  /** Number of stored values rewritten */
  repaired: number;
  passes: number;
  /** Repairable issues still present after the last pass */
  remaining: ValidationIssue[];
}

export interface FinalizeOptions extends ValidationOptions {
  maxRepairPasses?: number;
}

export type FinalizeResult =
  | {
      ok: true;
      document: PlanDocument;
      issuesFound: number;
      issuesRepaired: number;
      validationIssues: ValidationIssue[];
      overlapPairs: number;
    }
  | {
      ok: false;
      issuesFound: number;
      errors: ValidationIssue[];
    };

function storedWaves(nodes: readonly PlanNode[]): number[] {
  return nodes.map((node) => node.wave ?? 1);
}

/**
 * Checks a plan and collects every issue. Waves used for the conflict checks
 * are the recomputed ones, or the stored ones when the graph has a cycle.
 */
export function validatePlan(doc: PlanDocument, options: ValidationOptions = {}): ValidationReport {
  const maxNodes = options.maxNodes ?? 12;
  const maxDepth = options.maxDepth ?? 8;
  const issues: ValidationIssue[] = [];
  const { nodes } = doc;

  if (doc.schemaVersion !== PLAN_SCHEMA_VERSION) {
    issues.push({
      code: 'schema_version',
      severity: 'error',
      message: `schemaVersion is ${doc.schemaVersion}, expected ${PLAN_SCHEMA_VERSION}`,
    });
  }

  if (nodes.length === 0) {
    issues.push({ code: 'empty_nodes', severity: 'error', message: 'plan has no nodes' });
  }

  const topo = tryTopoWaves(nodes);
  const waves = topo.ok ? topo.waves : storedWaves(nodes);
  const ancestors = ancestorSets(nodes);

  for (let i = 0; i < nodes.length; i++) {
    for (let j = i + 1; j < nodes.length; j++) {
      if (waves[i] !== waves[j]) {
        continue;
      }
      const files = sharedFiles(writeSet(nodes[i]), writeSet(nodes[j]));
      if (files.length > 0) {
        issues.push({
          code: 'write_conflict',
          severity: 'error',
          message: `nodes ${i} and ${j} both write ${files.join(', ')} in wave ${waves[i]}`,
          nodes: [i, j],
          files,
        });
      }
    }
  }

  nodes.forEach((reader, r) => {
    nodes.forEach((writer, w) => {
      if (w === r || waves[w] > waves[r] || ancestors[r].has(w)) {
        return;
      }
      const files = sharedFiles(reader.metadata.reads, writeSet(writer));
      if (files.length > 0) {
        issues.push({
          code: 'read_write_conflict',
          severity: 'error',
          message: `node ${r} reads ${files.join(', ')} written by node ${w} without depending on it`,
          nodes: [r, w],
          files,
        });
      }
    });
  });

  nodes.forEach((node, index) => {
    const invalid = node.blockedBy.filter((dep) => dep < 0 || dep >= nodes.length);
    if (invalid.length > 0) {
      issues.push({
        code: 'invalid_dependency',
        severity: 'error',
        message: `node ${index} is blocked by missing node(s) ${invalid.join(', ')}`,
        nodes: [index],
      });
    }
  });

  if (!topo.ok) {
    issues.push({
      code: 'cycle',
      severity: 'error',
      message: `dependency cycle: ${topo.cycle.join(' -> ')} -> ${topo.cycle[0]}`,
      nodes: topo.cycle,
    });
  } else {
    nodes.forEach((node, index) => {
      if (node.wave !== topo.waves[index]) {
        issues.push({
          code: 'wave_mismatch',
          severity: 'repairable',
          message:
            node.wave === undefined
              ? `node ${index} has no wave, expected ${topo.waves[index]}`
              : `node ${index} has wave ${node.wave}, expected ${topo.waves[index]}`,
          nodes: [index],
        });
      }
    });
  }

  nodes.forEach((node, index) => {
    if (isTrimmed(node.agent)) {
      return;
    }
    if (node.agent.assumptions.length === 0) {
      issues.push({
        code: 'missing_assumptions',
        severity: 'warning',
        message: `node ${index} lists no assumptions`,
        nodes: [index],
      });
    }
    if (node.agent.rollbackTriggers.length === 0) {
      issues.push({
        code: 'missing_rollback_triggers',
        severity: 'warning',
        message: `node ${index} lists no rollback triggers`,
        nodes: [index],
      });
    }
  });

  if (nodes.length > maxNodes) {
    issues.push({
      code: 'too_many_nodes',
      severity: 'warning',
      message: `plan has ${nodes.length} nodes, ceiling is ${maxNodes}`,
    });
  }

  if (topo.ok) {
    const depth = criticalPathDepth(topo.waves);
    if (depth > maxDepth) {
      issues.push({
        code: 'critical_path_depth',
        severity: 'warning',
        message: `critical path is ${depth} waves deep, ceiling is ${maxDepth}`,
      });
    }
  }

  const errors = issues.filter((issue) => issue.severity === 'error');
  const repairable = issues.filter((issue) => issue.severity === 'repairable');
  const warnings = issues.filter((issue) => issue.severity === 'warning');
  return { ok: errors.length === 0 && repairable.length === 0, errors, repairable, warnings };
}

/**
 * Rewrites stale or missing waves, re-validating after each pass.
 */
export function repairPlan(doc: PlanDocument, maxPasses = 2): RepairResult {
  let document = structuredClone(doc);
  let repaired = 0;
  let passes = 0;
  let remaining = validatePlan(document).repairable;

  while (remaining.length > 0 && passes < maxPasses) {
    passes++;
    const topo = tryTopoWaves(document.nodes);
    if (!topo.ok) {
      break;
    }
    document = {
      ...document,
      nodes: document.nodes.map((node, index) => {
        if (node.wave === topo.waves[index]) {
          return node;
        }
        repaired++;
        return { ...node, wave: topo.waves[index] };
      }),
    };
    remaining = validatePlan(document).repairable;
  }

  return { document, repaired, passes, remaining };
}

/**
 * Validates, repairs waves, records file overlaps and returns the document to
 * write. Hard errors stop before anything is changed.
 */
export function finalizePlan(doc: PlanDocument, options: FinalizeOptions = {}): FinalizeResult {
  const report = validatePlan(doc, options);
  const issuesFound = report.errors.length + report.repairable.length + report.warnings.length;
  if (report.errors.length > 0) {
    return { ok: false, issuesFound, errors: report.errors };
  }

  const { document, repaired, remaining } = repairPlan(doc, options.maxRepairPasses ?? 2);
  const pairs = overlapMatrix(document.nodes);
  const overlaps = overlapsByNode(document.nodes, pairs);

  const nodes = document.nodes.map((node, index) => {
    const { fileOverlaps: _previous, ...rest } = node;
    return overlaps[index].length > 0 ? { ...rest, fileOverlaps: overlaps[index] } : rest;
  });

  return {
    ok: true,
    // Re-parsing puts keys back in schema order so the output is stable.
    document: PlanDocumentSchema.parse({ ...document, nodes }),
    issuesFound,
    issuesRepaired: repaired,
    validationIssues: [...remaining, ...report.warnings],
    overlapPairs: pairs.length,
  };
}
