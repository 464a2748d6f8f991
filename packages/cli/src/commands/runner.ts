import type { CommandContext } from '../context';
import type { CommandResult } from '../output/emit';

export type CommandHandler = (ctx: CommandContext) => Promise<CommandResult>;

/**
 * Builds the context for a command and records its result for the emitter.
 */
export interface CommandRunner {
  run(command: string, handler: CommandHandler): Promise<void>;
}
