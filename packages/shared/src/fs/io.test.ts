import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import { join } from 'path';
import { atomicWrite, readTextIfExists, toJsonDocument, writeJsonAtomic } from './io';
import { StorageError } from '../errors';

describe('atomicWrite', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), 'waveplan-io-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates parent directories and writes the content', async () => {
    const target = join(dir, 'nested', 'deeper', 'plan.json');
    await atomicWrite(target, 'hello');
    await expect(fs.readFile(target, 'utf8')).resolves.toBe('hello');
  });

  it('leaves the previous file intact when the rename fails', async () => {
    const target = join(dir, 'plan.json');
    await fs.writeFile(target, '{"schemaVersion":3}\n');
    vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('killed'));

    await expect(atomicWrite(target, '{"trunc')).rejects.toBeInstanceOf(StorageError);

    await expect(fs.readFile(target, 'utf8')).resolves.toBe('{"schemaVersion":3}\n');
    expect(await fs.readdir(dir)).toEqual(['plan.json']);
  });

  it('reports write failures with the write_failed code', async () => {
    const target = join(dir, 'plan.json');
    vi.spyOn(fs, 'writeFile').mockRejectedValueOnce(new Error('EACCES'));

    await expect(atomicWrite(target, 'x')).rejects.toMatchObject({
      code: 'write_failed',
      message: `Failed to write ${target}: EACCES`,
    });
  });
});

describe('json documents', () => {
  it('formats with two spaces and a trailing newline', () => {
    expect(toJsonDocument({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });

  it('round-trips through the file system', async () => {
    const dir = await fs.mkdtemp(join(os.tmpdir(), 'waveplan-json-'));
    const target = join(dir, 'doc.json');
    await writeJsonAtomic(target, { ok: true });
    await expect(readTextIfExists(target)).resolves.toBe('{\n  "ok": true\n}\n');
    await expect(readTextIfExists(join(dir, 'missing.json'))).resolves.toBeUndefined();
    await fs.rm(dir, { recursive: true, force: true });
  });
});
