import type { AppError } from '@waveplan/shared';

/** The single JSON object every command prints */
export type CommandResult = { ok: boolean } & Record<string, unknown>;

export function failureResult(error: AppError): CommandResult {
  return { ok: false, error: error.code, detail: error.message, ...error.details };
}

export function formatResult(result: CommandResult): string {
  return JSON.stringify(result, null, 2);
}
