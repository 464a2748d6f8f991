import { describe, it, expect, vi } from 'vitest';
import { bestEffort } from './best-effort';
import { StorageError } from './errors';

describe('bestEffort', () => {
  it('returns the value when the operation succeeds', async () => {
    await expect(bestEffort(async () => 7)).resolves.toEqual({ ok: true, value: 7 });
  });

  it('turns a thrown AppError into a failed result', async () => {
    const failure = new StorageError('write_failed', '/tmp/trace.jsonl');
    const result = await bestEffort(async () => {
      throw failure;
    });
    expect(result).toEqual({ ok: false, error: failure });
  });

  it('wraps foreign errors and reports them to the callback', async () => {
    const onError = vi.fn();
    const result = await bestEffort(async () => {
      throw new Error('disk gone');
    }, onError);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('internal_error');
      expect(result.error.message).toBe('disk gone');
    }
    expect(onError).toHaveBeenCalledTimes(1);
  });
});
