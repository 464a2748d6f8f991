import { Command } from 'commander';
import {
  PlanStore,
  StatusUpdateBatchSchema,
  applyResults,
  circuitBreaker,
  finalizePlan,
  overlapMatrix,
  readySet,
  resumeReset,
  retryCandidates,
  summarizePlan,
  validatePlan,
} from '@waveplan/core';
import { InvalidInputError } from '@waveplan/shared';
import type { CommandContext } from '../context';
import { readJsonInput } from '../utils/stdin';
import type { CommandRunner } from './runner';

function planStore(ctx: CommandContext, planArg: string | undefined): PlanStore {
  return new PlanStore(ctx.resolvePath(planArg, ctx.workspace.planPath));
}

export function registerPlanCommands(program: Command, runner: CommandRunner): void {
  program
    .command('status')
    .description('Pre-flight check of the plan document')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('status', async (ctx) => ({ ok: true, ...(await planStore(ctx, planArg).status()) })),
    );

  program
    .command('summary')
    .description('Waves and model distribution of the plan')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('summary', async (ctx) => ({
        ok: true,
        ...summarizePlan(await planStore(ctx, planArg).load()),
      })),
    );

  program
    .command('validate')
    .description('Report every validation issue without changing the plan')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('validate', async (ctx) => {
        const doc = await planStore(ctx, planArg).read();
        return { ...validatePlan(doc, ctx.config.plan) };
      }),
    );

  program
    .command('finalize')
    .description('Validate, repair waves, compute overlaps and write the plan')
    .argument('[plan]', 'plan.json path')
    .option('--validate-only', 'Stop before writing')
    .action((planArg: string | undefined, options: { validateOnly?: boolean }) =>
      runner.run('finalize', async (ctx) => {
        const store = planStore(ctx, planArg);
        const doc = await store.read();
        const result = finalizePlan(doc, ctx.config.plan);
        if (!result.ok) {
          return {
            ok: false,
            error: 'validation_failed',
            detail: `${result.errors.length} blocking issue(s) found`,
            issuesFound: result.issuesFound,
            errors: result.errors,
          };
        }
        if (!options.validateOnly) {
          await store.save(result.document);
        }
        ctx.logger.debug(`finalized ${result.document.nodes.length} nodes, ${result.issuesRepaired} repaired`);
        return {
          ok: true,
          validateOnly: options.validateOnly === true,
          issuesFound: result.issuesFound,
          issuesRepaired: result.issuesRepaired,
          validationIssues: result.validationIssues,
          nodeCount: result.document.nodes.length,
          overlapPairs: result.overlapPairs,
        };
      }),
    );

  program
    .command('overlap-matrix')
    .description('Unordered node pairs that touch the same files')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('overlap-matrix', async (ctx) => {
        const pairs = overlapMatrix((await planStore(ctx, planArg).load()).nodes);
        return { ok: true, pairs, count: pairs.length };
      }),
    );

  program
    .command('ready-set')
    .description('Pending nodes whose dependencies have completed')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('ready-set', async (ctx) => {
        const doc = await planStore(ctx, planArg).load();
        const ready = readySet(doc).map((index) => ({
          index,
          subject: doc.nodes[index].subject,
          wave: doc.nodes[index].wave ?? null,
        }));
        return { ok: true, ready };
      }),
    );

  program
    .command('update-status')
    .description('Apply a JSON array of {index, status, result} from stdin')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('update-status', async (ctx) => {
        const parsed = StatusUpdateBatchSchema.safeParse(
          await readJsonInput(ctx.io, 'array of {index, status, result}'),
        );
        if (!parsed.success) {
          const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
          throw new InvalidInputError(`Invalid status updates: ${issues.join('; ')}`, { details: { issues } });
        }
        const store = planStore(ctx, planArg);
        const outcome = applyResults(await store.load(), parsed.data, {
          maxAttempts: ctx.config.plan.maxAttempts,
        });
        await store.save(outcome.document);
        return {
          ok: true,
          updated: outcome.updated,
          cascaded: outcome.cascaded,
          trimmed: outcome.trimmed,
          revived: outcome.revived,
        };
      }),
    );

  program
    .command('resume-reset')
    .description('Return interrupted nodes to pending')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('resume-reset', async (ctx) => {
        const store = planStore(ctx, planArg);
        const { document, ...outcome } = resumeReset(await store.load());
        if (outcome.reset.length > 0) {
          await store.save(document);
        }
        return { ok: true, ...outcome };
      }),
    );

  program
    .command('circuit-breaker')
    .description('Whether the run should abort')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('circuit-breaker', async (ctx) => ({
        ok: true,
        ...circuitBreaker(await planStore(ctx, planArg).load(), ctx.config.breaker),
      })),
    );

  program
    .command('retry-candidates')
    .description('Failed nodes that still have attempts left')
    .argument('[plan]', 'plan.json path')
    .action((planArg: string | undefined) =>
      runner.run('retry-candidates', async (ctx) => {
        const doc = await planStore(ctx, planArg).load();
        const { candidates, exhausted } = retryCandidates(doc, ctx.config.plan.maxAttempts);
        return {
          ok: true,
          retryable: candidates.length > 0,
          candidates: candidates.map((index) => ({
            index,
            subject: doc.nodes[index].subject,
            attempts: doc.nodes[index].attempts,
            result: doc.nodes[index].result,
          })),
          exhausted,
        };
      }),
    );
}
