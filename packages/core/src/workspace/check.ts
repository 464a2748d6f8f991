import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { AppError, InvalidInputError, JsonlStore, isNotFound } from '@waveplan/shared';
import { z } from 'zod';
import { PlanStore } from '../plan/store';
import { TRACE_REQUIRED_FIELDS } from '../trace/types';
import type { WorkspaceHandle } from './handle';

export interface WorkspaceHealth {
  healthy: boolean;
  /** Problems that make a command fail */
  issues: string[];
  /** Problems commands work around, such as skipped log lines */
  warnings: string[];
}

const MEMORY_REQUIRED_FIELDS = ['id', 'content', 'category', 'createdAt'];
const REFLECTION_REQUIRED_FIELDS = ['id', 'timestamp', 'skill', 'goal', 'outcome'];

// inspect() works on raw lines and never consults the schema.
const AnyLine = z.unknown();

async function checkPlan(workspace: WorkspaceHandle, health: WorkspaceHealth): Promise<void> {
  try {
    await new PlanStore(workspace.planPath).load();
  } catch (error) {
    if (!(error instanceof AppError)) {
      throw error;
    }
    if (error.code === 'not_found') {
      health.warnings.push('plan.json not found');
    } else {
      health.issues.push(`plan.json: ${error.message}`);
    }
  }
}

async function checkLog(filePath: string, requiredFields: readonly string[], health: WorkspaceHealth): Promise<void> {
  try {
    const inspection = await new JsonlStore(filePath, AnyLine).inspect(requiredFields);
    health.warnings.push(...inspection.warnings);
  } catch (error) {
    if (!(error instanceof AppError)) {
      throw error;
    }
    health.issues.push(error.message);
  }
}

async function checkSymlinks(workspace: WorkspaceHandle, health: WorkspaceHealth): Promise<void> {
  for (const entry of await fs.readdir(workspace.root, { withFileTypes: true })) {
    if (!entry.isSymbolicLink()) {
      continue;
    }
    const linkPath = path.join(workspace.root, entry.name);
    try {
      await fs.stat(linkPath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      health.issues.push(`Broken symlink: ${entry.name} -> ${await fs.readlink(linkPath)}`);
    }
  }
}

/**
 * Integrity check of a workspace directory: the plan document, every JSONL
 * log and any symlinks.
 */
export async function checkWorkspaceHealth(workspace: WorkspaceHandle): Promise<WorkspaceHealth> {
  let stats: Stats;
  try {
    stats = await fs.stat(workspace.root);
  } catch (error) {
    if (isNotFound(error)) {
      throw new AppError('not_found', `Workspace directory not found: ${workspace.root}`);
    }
    throw error;
  }
  if (!stats.isDirectory()) {
    throw new InvalidInputError(`${workspace.root} is not a directory`);
  }

  const health: WorkspaceHealth = { healthy: true, issues: [], warnings: [] };
  await checkPlan(workspace, health);
  await checkLog(workspace.memoryPath, MEMORY_REQUIRED_FIELDS, health);
  await checkLog(workspace.reflectionPath, REFLECTION_REQUIRED_FIELDS, health);
  await checkLog(workspace.tracePath, TRACE_REQUIRED_FIELDS, health);
  await checkSymlinks(workspace, health);
  health.healthy = health.issues.length === 0;
  return health;
}
