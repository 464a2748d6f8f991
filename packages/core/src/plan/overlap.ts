import { ancestorSets } from './graph';
import { writeSet, type PlanNode } from './types';

export interface OverlapPair {
  /** Earlier node; always less than `j` */
  i: number;
  /** Later node, which should gain `blockedBy: [i]` */
  j: number;
  files: string[];
}

export function normalizePath(path: string): string {
  let out = path.trim().replace(/\\/g, '/');
  while (out.startsWith('./')) {
    out = out.slice(2);
  }
  return out.replace(/\/+$/, '');
}

function contains(parent: string, child: string): boolean {
  return child === parent || child.startsWith(`${parent}/`);
}

function globBase(pattern: string): string {
  return pattern.split('*')[0].replace(/\/+$/, '');
}

/**
 * Paths two entries have in common, or undefined when they are disjoint.
 * Entries overlap when equal, when one directory contains the other, or when
 * a `**` glob's base directory nests with the other entry's.
 */
export function sharedPath(a: string, b: string): string[] | undefined {
  const left = normalizePath(a);
  const right = normalizePath(b);
  if (!left || !right) {
    return undefined;
  }
  if (left === right) {
    return [left];
  }
  if (contains(left, right)) {
    return [right];
  }
  if (contains(right, left)) {
    return [left];
  }
  if (!left.includes('**') && !right.includes('**')) {
    return undefined;
  }
  const leftBase = globBase(left);
  const rightBase = globBase(right);
  if (!leftBase || !rightBase) {
    return undefined;
  }
  if (contains(leftBase, rightBase) || contains(rightBase, leftBase)) {
    return [left, right].sort();
  }
  return undefined;
}

export function pathsOverlap(a: string, b: string): boolean {
  return sharedPath(a, b) !== undefined;
}

/**
 * Sorted, de-duplicated paths shared by two path lists.
 */
export function sharedFiles(left: readonly string[], right: readonly string[]): string[] {
  const out = new Set<string>();
  for (const a of left) {
    for (const b of right) {
      for (const path of sharedPath(a, b) ?? []) {
        out.add(path);
      }
    }
  }
  return [...out].sort();
}

/**
 * Files two nodes both touch where at least one side writes.
 */
export function conflictingFiles(a: PlanNode, b: PlanNode): string[] {
  const writesA = writeSet(a);
  const writesB = writeSet(b);
  const files = [
    ...sharedFiles(writesA, writesB),
    ...sharedFiles(writesA, b.metadata.reads),
    ...sharedFiles(a.metadata.reads, writesB),
  ];
  return [...new Set(files)].sort();
}

/**
 * Pairs of nodes that touch the same files but are not ordered by any
 * dependency path. Only `j > i` pairs are produced; the suggested edge is
 * always "j waits on i".
 */
export function overlapMatrix(nodes: readonly PlanNode[]): OverlapPair[] {
  const ancestors = ancestorSets(nodes);
  const pairs: OverlapPair[] = [];
  for (let i = 0; i < nodes.length; i++) {
    for (let j = i + 1; j < nodes.length; j++) {
      if (ancestors[j].has(i) || ancestors[i].has(j)) {
        continue;
      }
      const files = conflictingFiles(nodes[i], nodes[j]);
      if (files.length > 0) {
        pairs.push({ i, j, files });
      }
    }
  }
  return pairs;
}

/**
 * For each node, the later nodes it overlaps with.
 */
export function overlapsByNode(nodes: readonly PlanNode[], pairs: readonly OverlapPair[]): number[][] {
  const byNode: number[][] = nodes.map(() => []);
  for (const pair of pairs) {
    byNode[pair.i].push(pair.j);
  }
  return byNode;
}
