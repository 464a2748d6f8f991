import { toAppError, type AppError } from './errors';

export type BestEffortResult<T> = { ok: true; value: T } | { ok: false; error: AppError };

/**
 * Runs an operation whose failure must not abort the calling workflow.
 * This is the one place where errors are converted into values instead of
 * propagating; authoritative writes never go through it.
 */
export async function bestEffort<T>(
  operation: () => Promise<T>,
  onError?: (error: AppError) => void,
): Promise<BestEffortResult<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (err) {
    const error = toAppError(err);
    onError?.(error);
    return { ok: false, error };
  }
}
