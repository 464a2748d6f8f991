import { Command } from 'commander';
import { TraceLog, parseTracePayload } from '@waveplan/core';
import type { CommandContext } from '../context';
import { parsePositiveInt } from '../utils/options';
import type { CommandRunner } from './runner';

interface AddOptions {
  sessionId?: string;
  event?: string;
  skill?: string;
  agent?: string;
  role?: string;
  payload?: string;
}

interface SearchOptions {
  sessionId?: string;
  skill?: string;
  event?: string;
  agent?: string;
  limit?: number;
}

function traceLog(ctx: CommandContext, traceArg: string | undefined): TraceLog {
  return new TraceLog(ctx.resolvePath(traceArg, ctx.workspace.tracePath));
}

export function registerTraceCommands(program: Command, runner: CommandRunner): void {
  // Required values are checked by TraceLog rather than commander.
  program
    .command('trace-add')
    .description('Append one lifecycle event; never exits non-zero')
    .argument('[trace]', 'trace.jsonl path')
    .option('--session-id <id>', 'Session the event belongs to')
    .option('--event <event>', 'skill-start, skill-complete, spawn, completion, failure or respawn')
    .option('--skill <skill>', 'Skill that emitted the event')
    .option('--agent <name>', 'Agent the event is about')
    .option('--role <role>', 'Role of the agent')
    .option('--payload <json>', 'JSON object with event details')
    .action((traceArg: string | undefined, options: AddOptions) =>
      runner.run('trace-add', async (ctx) => {
        const { entry, written } = await traceLog(ctx, traceArg).add({
          sessionId: options.sessionId ?? '',
          skill: options.skill ?? '',
          event: options.event ?? '',
          agent: options.agent,
          role: options.role,
          payload: parseTracePayload(options.payload),
        });
        if (!written.ok) {
          ctx.logger.debug(`trace not recorded: ${written.error.message}`);
          return { ok: false, error: written.error.code, detail: `Trace write failed: ${written.error.message}` };
        }
        return { ok: true, id: entry.id };
      }),
    );

  program
    .command('trace-search')
    .description('Events matching every filter, in file order')
    .argument('[trace]', 'trace.jsonl path')
    .option('--session-id <id>', 'Only this session')
    .option('--skill <skill>', 'Only this skill')
    .option('--event <event>', 'Only this event type')
    .option('--agent <name>', 'Only this agent')
    .option('--limit <n>', 'Maximum results', parsePositiveInt)
    .action((traceArg: string | undefined, options: SearchOptions) =>
      runner.run('trace-search', async (ctx) => {
        const { limit, ...filters } = options;
        const events = await traceLog(ctx, traceArg).search(filters, limit);
        return { ok: true, events, count: events.length };
      }),
    );

  program
    .command('trace-summary')
    .description('Event counts per type and session, and the latest session')
    .argument('[trace]', 'trace.jsonl path')
    .option('--session-id <id>', 'Only this session')
    .action((traceArg: string | undefined, options: { sessionId?: string }) =>
      runner.run('trace-summary', async (ctx) => ({
        ok: true,
        ...(await traceLog(ctx, traceArg).summary(options.sessionId)),
      })),
    );

  program
    .command('trace-validate')
    .description('Check every line of the trace log')
    .argument('[trace]', 'trace.jsonl path')
    .action((traceArg: string | undefined) =>
      runner.run('trace-validate', async (ctx) => ({ ok: true, ...(await traceLog(ctx, traceArg).validate()) })),
    );
}
