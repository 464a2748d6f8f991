import path from 'path';
import { Command } from 'commander';
import { archiveWorkspace, checkWorkspaceHealth, healthSummary, openWorkspace, type WorkspaceHandle } from '@waveplan/core';
import type { CommandContext } from '../context';
import { parsePositiveInt } from '../utils/options';
import type { CommandRunner } from './runner';

function workspaceAt(ctx: CommandContext, dirArg: string | undefined): WorkspaceHandle {
  return dirArg ? openWorkspace(path.resolve(ctx.io.cwd, dirArg)) : ctx.workspace;
}

export function registerWorkspaceCommands(program: Command, runner: CommandRunner): void {
  program
    .command('plan-health-summary')
    .description('Recent runs, open improvements and plan progress')
    .argument('[dir]', 'workspace directory')
    .option('--window <n>', 'Number of recent reflections to read', parsePositiveInt)
    .option('--limit <n>', 'Maximum improvements to list', parsePositiveInt)
    .action((dirArg: string | undefined, options: { window?: number; limit?: number }) =>
      runner.run('plan-health-summary', async (ctx) => {
        const summary = await healthSummary(workspaceAt(ctx, dirArg), {
          window: options.window ?? ctx.config.reflection.healthWindow,
          limit: options.limit ?? ctx.config.reflection.maxImprovements,
        });
        return { ok: true, reflections: summary.recentRuns.map((run) => run.summary), ...summary };
      }),
    );

  program
    .command('health-check')
    .description('Integrity check of the plan and logs')
    .argument('[dir]', 'workspace directory')
    .action((dirArg: string | undefined) =>
      runner.run('health-check', async (ctx) => ({
        ok: true,
        ...(await checkWorkspaceHealth(workspaceAt(ctx, dirArg))),
      })),
    );

  program
    .command('archive')
    .description('Move the finished cycle into history/')
    .argument('<dir>', 'workspace directory')
    .action((dirArg: string) =>
      runner.run('archive', async (ctx) => {
        const result = await archiveWorkspace(workspaceAt(ctx, dirArg));
        return result.archivedTo === null ? { ok: true, ...result, message: 'nothing to archive' } : { ok: true, ...result };
      }),
    );
}
