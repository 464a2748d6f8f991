import { Command } from 'commander';
import { MemoryStore } from '@waveplan/memory';
import type { CommandContext } from '../context';
import { parsePositiveInt } from '../utils/options';
import { readJsonInput } from '../utils/stdin';
import type { CommandRunner } from './runner';

function memoryStore(ctx: CommandContext, memoryArg: string | undefined): MemoryStore {
  return new MemoryStore(ctx.resolvePath(memoryArg, ctx.workspace.memoryPath), {
    decayPerMonth: ctx.config.memory.recencyDecayPerMonth,
    defaultImportance: ctx.config.memory.defaultImportance,
    logger: ctx.logger,
  });
}

interface SearchOptions {
  goal?: string;
  keywords?: string;
  stack?: string;
  limit?: number;
}

export function registerMemoryCommands(program: Command, runner: CommandRunner): void {
  program
    .command('memory-search')
    .description('Rank memories against a goal and keywords')
    .argument('[memory]', 'memory.jsonl path')
    .option('--goal <text>', 'Goal of the current run')
    .option('--keywords <text>', 'Extra query keywords')
    .option('--stack <text>', 'Technology stack of the project')
    .option('--limit <n>', 'Maximum results', parsePositiveInt)
    .action((memoryArg: string | undefined, options: SearchOptions) =>
      runner.run('memory-search', async (ctx) => {
        const query = [options.goal, options.stack, options.keywords].filter(Boolean).join(' ');
        const memories = await memoryStore(ctx, memoryArg).search(query, {
          limit: options.limit ?? ctx.config.memory.topK,
        });
        return { ok: true, memories };
      }),
    );

  program
    .command('memory-add')
    .description('Add a memory read as a JSON object from stdin')
    .argument('[memory]', 'memory.jsonl path')
    .action((memoryArg: string | undefined) =>
      runner.run('memory-add', async (ctx) => {
        const input = await readJsonInput(ctx.io, 'memory object');
        const entry = await memoryStore(ctx, memoryArg).add(input);
        return {
          ok: true,
          id: entry.id,
          category: entry.category,
          keywords: entry.keywords,
          importance: entry.importance,
        };
      }),
    );

  program
    .command('memory-boost')
    .description('Raise the importance of a memory by one')
    .argument('[memory]', 'memory.jsonl path')
    .requiredOption('--id <id>', 'Memory id')
    .action((memoryArg: string | undefined, options: { id: string }) =>
      runner.run('memory-boost', async (ctx) => ({
        ok: true,
        ...(await memoryStore(ctx, memoryArg).boost(options.id)),
        action: 'boosted',
      })),
    );

  program
    .command('memory-decay')
    .description('Lower the importance of a memory by one')
    .argument('[memory]', 'memory.jsonl path')
    .requiredOption('--id <id>', 'Memory id')
    .action((memoryArg: string | undefined, options: { id: string }) =>
      runner.run('memory-decay', async (ctx) => ({
        ok: true,
        ...(await memoryStore(ctx, memoryArg).decay(options.id)),
        action: 'decayed',
      })),
    );

  program
    .command('memory-feedback')
    .description('Apply run outcomes [{memoryIds, succeeded, firstAttempt}] from stdin')
    .argument('[memory]', 'memory.jsonl path')
    .action((memoryArg: string | undefined) =>
      runner.run('memory-feedback', async (ctx) => {
        const outcomes = await readJsonInput(ctx.io, 'array of run outcomes');
        return { ok: true, ...(await memoryStore(ctx, memoryArg).feedback(outcomes)) };
      }),
    );

  program
    .command('memory-list')
    .description('List memories by importance')
    .argument('[memory]', 'memory.jsonl path')
    .option('--category <name>', 'Only this category')
    .option('--keyword <word>', 'Only memories mentioning this word')
    .action((memoryArg: string | undefined, options: { category?: string; keyword?: string }) =>
      runner.run('memory-list', async (ctx) => {
        const { total, memories } = await memoryStore(ctx, memoryArg).list(options);
        return { ok: true, total, count: memories.length, memories };
      }),
    );
}
