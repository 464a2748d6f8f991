import { promises as fs } from 'fs';
import path from 'path';
import { ensureDir, move, pathExists } from 'fs-extra';
import { StorageError, compactUtcStamp, isNotFound } from '@waveplan/shared';
import { PERSISTENT_ENTRIES, type WorkspaceHandle } from './handle';

export interface ArchiveResult {
  /** Directory the cycle's files were moved to, null when nothing moved */
  archivedTo: string | null;
  moved: string[];
}

async function freeArchiveDir(historyDir: string, stamp: string): Promise<string> {
  let candidate = path.join(historyDir, stamp);
  for (let suffix = 2; await pathExists(candidate); suffix++) {
    candidate = path.join(historyDir, `${stamp}-${suffix}`);
  }
  return candidate;
}

/**
 * Moves the finished cycle's files into `history/<stamp>/`. The cross-cycle
 * logs and the history directory stay where they are.
 */
export async function archiveWorkspace(workspace: WorkspaceHandle, now: Date = new Date()): Promise<ArchiveResult> {
  let entries: string[];
  try {
    entries = await fs.readdir(workspace.root);
  } catch (error) {
    if (isNotFound(error)) {
      return { archivedTo: null, moved: [] };
    }
    throw new StorageError('read_failed', workspace.root, { cause: error });
  }

  const moved = entries.filter((entry) => !PERSISTENT_ENTRIES.includes(entry)).sort();
  if (moved.length === 0) {
    return { archivedTo: null, moved };
  }

  const archivedTo = await freeArchiveDir(workspace.historyDir, compactUtcStamp(now));
  try {
    await ensureDir(archivedTo);
    for (const entry of moved) {
      await move(path.join(workspace.root, entry), path.join(archivedTo, entry));
    }
  } catch (error) {
    throw new StorageError('write_failed', archivedTo, { cause: error });
  }
  return { archivedTo, moved };
}
