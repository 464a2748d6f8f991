import { Command, CommanderError } from 'commander';
import { UsageError, exitCodeFor, logger, toAppError } from '@waveplan/shared';
import { version } from '../package.json';
import { createContext, type GlobalOptions } from './context';
import { registerMemoryCommands } from './commands/memory';
import { registerPlanCommands } from './commands/plan';
import { registerReflectionCommands } from './commands/reflection';
import type { CommandRunner } from './commands/runner';
import { registerSelfTestCommand } from './commands/self-test';
import { registerTraceCommands } from './commands/trace';
import { registerWorkspaceCommands } from './commands/workspace';
import { failureResult, formatResult, type CommandResult } from './output/emit';
import type { CliIO } from './utils/io';

export const name = '@waveplan/cli';

/** Commands whose exit code is always 0, so callers' pipelines never break on them */
const LENIENT_COMMANDS = ['trace-add'];

export function buildProgram(io: CliIO, onResult: (result: CommandResult) => void): Command {
  const program = new Command();

  program
    .name('waveplan')
    .description('Deterministic plan, memory and trace operations for agent workflows')
    .version(version)
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable debug logging on stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stderr(text),
      writeErr: (text) => io.stderr(text),
      outputError: () => undefined,
    });

  const runner: CommandRunner = {
    run: async (command, handler) => {
      const ctx = createContext(command, program.opts<GlobalOptions>(), io);
      onResult(await handler(ctx));
    },
  };

  registerPlanCommands(program, runner);
  registerMemoryCommands(program, runner);
  registerReflectionCommands(program, runner);
  registerTraceCommands(program, runner);
  registerWorkspaceCommands(program, runner);
  registerSelfTestCommand(program, runner, runCli);
  return program;
}

function usageErrorFrom(error: CommanderError): UsageError {
  if (error.code === 'commander.help') {
    return new UsageError('A command is required; run with --help to list them');
  }
  return new UsageError(error.message.replace(/^error: /, ''), { details: { reason: error.code } });
}

/**
 * Parses argv (without the node and script entries), runs one command and
 * prints exactly one JSON object. Returns the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let result: CommandResult | undefined;
  const program = buildProgram(io, (value) => {
    result = value;
  });
  const lenient = argv.some((arg) => LENIENT_COMMANDS.includes(arg));

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (caught) {
    if (caught instanceof CommanderError && caught.exitCode === 0) {
      const shown = caught.code === 'commander.version' ? { version } : { help: true };
      io.stdout(formatResult({ ok: true, ...shown }));
      return 0;
    }
    const error = toAppError(caught instanceof CommanderError ? usageErrorFrom(caught) : caught);
    if (error.code === 'internal_error') {
      logger.error(error, 'unexpected failure');
    }
    io.stdout(formatResult(failureResult(error)));
    return lenient ? 0 : exitCodeFor(error);
  }

  if (result === undefined) {
    io.stdout(formatResult(failureResult(new UsageError('A command is required; run with --help to list them'))));
    return lenient ? 0 : 2;
  }
  io.stdout(formatResult(result));
  return 0;
}
