import { CycleError } from '@waveplan/shared';

/** The part of a node the dependency engine looks at */
export interface GraphNode {
  blockedBy: readonly number[];
}

/**
 * Dependency indices of each node, de-duplicated, with out-of-range
 * references dropped. Range errors are reported by validation.
 */
export function dependencyLists(nodes: readonly GraphNode[]): number[][] {
  return nodes.map((node) =>
    [...new Set(node.blockedBy)].filter((dep) => Number.isInteger(dep) && dep >= 0 && dep < nodes.length),
  );
}

/**
 * Reverse edges: for each node, the nodes that list it in `blockedBy`.
 */
export function dependentLists(nodes: readonly GraphNode[]): number[][] {
  const dependents: number[][] = nodes.map(() => []);
  dependencyLists(nodes).forEach((deps, index) => {
    for (const dep of deps) {
      dependents[dep].push(index);
    }
  });
  return dependents;
}

/**
 * Wave of every node: 1 when it has no dependencies, otherwise one more than
 * its deepest dependency. Throws CycleError naming the members of a cycle.
 */
export function topoWaves(nodes: readonly GraphNode[]): number[] {
  const deps = dependencyLists(nodes);
  const dependents = dependentLists(nodes);
  const indegree = deps.map((list) => list.length);
  const waves = nodes.map(() => 1);

  const queue: number[] = [];
  indegree.forEach((count, index) => {
    if (count === 0) {
      queue.push(index);
    }
  });

  let released = 0;
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    released++;
    for (const dependent of dependents[current]) {
      waves[dependent] = Math.max(waves[dependent], waves[current] + 1);
      indegree[dependent]--;
      if (indegree[dependent] === 0) {
        queue.push(dependent);
      }
    }
  }

  if (released < nodes.length) {
    const stuck = new Set(indegree.flatMap((count, index) => (count > 0 ? [index] : [])));
    throw new CycleError(findCycle(deps, stuck));
  }
  return waves;
}

/**
 * Like topoWaves, but returns the cycle instead of throwing.
 */
export function tryTopoWaves(
  nodes: readonly GraphNode[],
): { ok: true; waves: number[] } | { ok: false; cycle: number[] } {
  try {
    return { ok: true, waves: topoWaves(nodes) };
  } catch (error) {
    if (error instanceof CycleError) {
      return { ok: false, cycle: error.cycle };
    }
    throw error;
  }
}

// DFS colouring restricted to nodes Kahn could not release. Every such node
// reaches a cycle, so the search always finds one.
function findCycle(deps: number[][], candidates: Set<number>): number[] {
  const state = new Map<number, 'active' | 'done'>();
  const stack: number[] = [];

  const visit = (index: number): number[] | undefined => {
    state.set(index, 'active');
    stack.push(index);
    for (const dep of deps[index]) {
      if (!candidates.has(dep)) {
        continue;
      }
      const seen = state.get(dep);
      if (seen === 'active') {
        return stack.slice(stack.indexOf(dep));
      }
      if (seen === undefined) {
        const found = visit(dep);
        if (found) {
          return found;
        }
      }
    }
    stack.pop();
    state.set(index, 'done');
    return undefined;
  };

  for (const index of [...candidates].sort((a, b) => a - b)) {
    if (state.has(index)) {
      continue;
    }
    const found = visit(index);
    if (found) {
      return found;
    }
  }
  return [...candidates].sort((a, b) => a - b);
}

function closure(edges: number[][], start: number): Set<number> {
  const seen = new Set<number>();
  const queue = [...edges[start]];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) {
      continue;
    }
    seen.add(next);
    queue.push(...edges[next]);
  }
  return seen;
}

/**
 * Every node `index` transitively waits on.
 */
export function ancestorsOf(nodes: readonly GraphNode[], index: number): Set<number> {
  return closure(dependencyLists(nodes), index);
}

/**
 * Every node that transitively waits on `index`.
 */
export function descendantsOf(nodes: readonly GraphNode[], index: number): Set<number> {
  return closure(dependentLists(nodes), index);
}

/**
 * Transitive ancestor sets for all nodes at once.
 */
export function ancestorSets(nodes: readonly GraphNode[]): Set<number>[] {
  const deps = dependencyLists(nodes);
  return nodes.map((_, index) => closure(deps, index));
}

export function criticalPathDepth(waves: readonly number[]): number {
  return waves.reduce((max, wave) => Math.max(max, wave), 0);
}
