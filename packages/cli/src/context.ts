import path from 'path';
import { ConfigLoader, openWorkspace, type WorkspaceHandle } from '@waveplan/core';
import { logger, type Config, type Logger } from '@waveplan/shared';
import type { CliIO } from './utils/io';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export interface CommandContext {
  config: Config;
  io: CliIO;
  logger: Logger;
  /** Default workspace from `workspace.dir` */
  workspace: WorkspaceHandle;
  /** Resolves a positional path against the working directory, or returns the default */
  resolvePath(arg: string | undefined, fallback: string): string;
}

export function createContext(command: string, options: GlobalOptions, io: CliIO): CommandContext {
  const config = ConfigLoader.load({
    cwd: io.cwd,
    env: io.env,
    homeDir: io.homeDir,
    configPath: options.config ? path.resolve(io.cwd, options.config) : undefined,
    flags: options.verbose ? { logLevel: 'debug' } : {},
  });
  logger.setLevel(config.logLevel);

  return {
    config,
    io,
    logger: logger.child({ command }),
    workspace: openWorkspace(path.resolve(io.cwd, config.workspace.dir)),
    resolvePath: (arg, fallback) => (arg ? path.resolve(io.cwd, arg) : fallback),
  };
}
