import path from 'path';

export const PLAN_FILE = 'plan.json';
export const MEMORY_FILE = 'memory.jsonl';
export const TRACE_FILE = 'trace.jsonl';
export const REFLECTION_FILE = 'reflection.jsonl';
export const HISTORY_DIR = 'history';

/** Files and directories that survive archiving */
export const PERSISTENT_ENTRIES: readonly string[] = [MEMORY_FILE, TRACE_FILE, REFLECTION_FILE, HISTORY_DIR];

/**
 * Resolved locations of everything a planning cycle reads or writes.
 * Passed explicitly to every directory-level operation.
 */
export interface WorkspaceHandle {
  root: string;
  planPath: string;
  memoryPath: string;
  tracePath: string;
  reflectionPath: string;
  historyDir: string;
}

export function openWorkspace(root: string): WorkspaceHandle {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    planPath: path.join(resolved, PLAN_FILE),
    memoryPath: path.join(resolved, MEMORY_FILE),
    tracePath: path.join(resolved, TRACE_FILE),
    reflectionPath: path.join(resolved, REFLECTION_FILE),
    historyDir: path.join(resolved, HISTORY_DIR),
  };
}
