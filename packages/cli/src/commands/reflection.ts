import { Command } from 'commander';
import { ReflectionLog, SkillSchema, validateEvaluation } from '@waveplan/core';
import { InvalidInputError } from '@waveplan/shared';
import { parseFlag, parsePositiveInt } from '../utils/options';
import { readJsonInput } from '../utils/stdin';
import type { CommandRunner } from './runner';

interface AddOptions {
  skill: string;
  goal: string;
  outcome: string;
  goalAchieved: boolean;
}

export function registerReflectionCommands(program: Command, runner: CommandRunner): void {
  program
    .command('reflection-add')
    .description('Record a post-run evaluation read from stdin')
    .argument('[reflection]', 'reflection.jsonl path')
    .requiredOption('--skill <skill>', 'design, execute, research or simplify')
    .requiredOption('--goal <text>', 'Goal that was pursued')
    .requiredOption('--outcome <outcome>', 'completed, partial, failed or aborted')
    .option('--goal-achieved <bool>', 'Whether the goal was achieved', parseFlag, false)
    .action((reflectionArg: string | undefined, options: AddOptions) =>
      runner.run('reflection-add', async (ctx) => {
        const evaluation = await readJsonInput(ctx.io, 'evaluation object');
        const log = new ReflectionLog(ctx.resolvePath(reflectionArg, ctx.workspace.reflectionPath));
        const { entry, warnings, written } = await log.add({ ...options, evaluation });
        if (!written.ok) {
          ctx.logger.debug(`reflection not recorded: ${written.error.message}`);
          return { ok: false, error: written.error.code, detail: written.error.message, id: entry.id };
        }
        return { ok: true, id: entry.id, warnings };
      }),
    );

  program
    .command('reflection-validate')
    .description('Check an evaluation read from stdin without recording it')
    .action(() =>
      runner.run('reflection-validate', async (ctx) => {
        const { warnings } = validateEvaluation(await readJsonInput(ctx.io, 'evaluation object'));
        return { ok: true, warnings };
      }),
    );

  program
    .command('reflection-search')
    .description('Most recent reflections first')
    .argument('[reflection]', 'reflection.jsonl path')
    .option('--skill <skill>', 'Only this skill')
    .option('--limit <n>', 'Maximum results', parsePositiveInt, 10)
    .action((reflectionArg: string | undefined, options: { skill?: string; limit: number }) =>
      runner.run('reflection-search', async (ctx) => {
        const skill = options.skill === undefined ? undefined : SkillSchema.safeParse(options.skill);
        if (skill && !skill.success) {
          throw new InvalidInputError(
            `Invalid skill '${options.skill}'. Must be one of: ${SkillSchema.options.join(', ')}`,
          );
        }
        const log = new ReflectionLog(ctx.resolvePath(reflectionArg, ctx.workspace.reflectionPath));
        const reflections = await log.search({ skill: skill?.data, limit: options.limit });
        return { ok: true, reflections };
      }),
    );
}
