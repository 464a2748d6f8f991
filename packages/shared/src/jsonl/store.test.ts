import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import { join } from 'path';
import { z } from 'zod';
import { JsonlStore } from './store';

const RecordSchema = z.object({ n: z.number(), tag: z.string() });
type Rec = z.infer<typeof RecordSchema>;

describe('JsonlStore', () => {
  let dir: string;
  let store: JsonlStore<Rec>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), 'waveplan-jsonl-'));
    store = new JsonlStore(join(dir, 'logs', 'events.jsonl'), RecordSchema);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads an empty result when the file is missing', async () => {
    await expect(store.read()).resolves.toEqual({ records: [], malformed: 0, total: 0, unparsed: [] });
  });

  it('appends one line per record and creates parent directories', async () => {
    await store.append({ n: 1, tag: 'a' });
    await store.append({ n: 2, tag: 'b' });

    const text = await fs.readFile(store.filePath, 'utf8');
    expect(text).toBe('{"n":1,"tag":"a"}\n{"n":2,"tag":"b"}\n');
  });

  it('skips and counts malformed lines without aborting the read', async () => {
    await fs.mkdir(join(dir, 'logs'));
    await fs.writeFile(
      store.filePath,
      ['{"n":1,"tag":"a"}', 'not json', '', '{"n":"x","tag":"b"}', '{"n":3,"tag":"c"}'].join('\n'),
    );

    const result = await store.read();
    expect(result.records).toEqual([
      { n: 1, tag: 'a' },
      { n: 3, tag: 'c' },
    ]);
    expect(result.malformed).toBe(2);
    expect(result.total).toBe(4);
    expect(result.unparsed).toEqual(['not json', '{"n":"x","tag":"b"}']);
  });

  it('applies filter and limit in file order', async () => {
    for (let n = 1; n <= 5; n++) {
      await store.append({ n, tag: n % 2 === 0 ? 'even' : 'odd' });
    }
    const result = await store.read({ filter: (r) => r.tag === 'odd', limit: 2 });
    expect(result.records.map((r) => r.n)).toEqual([1, 3]);
  });

  it('returns the newest matches first when asked for recent order', async () => {
    for (let n = 1; n <= 5; n++) {
      await store.append({ n, tag: 'x' });
    }
    const recent = await store.read({ order: 'recent', limit: 2 });
    expect(recent.records.map((r) => r.n)).toEqual([5, 4]);

    const all = await store.read({ order: 'recent' });
    expect(all.records.map((r) => r.n)).toEqual([5, 4, 3, 2, 1]);
  });

  it('rewrites the whole file', async () => {
    await store.append({ n: 1, tag: 'a' });
    await store.rewrite([{ n: 9, tag: 'z' }]);
    expect((await store.read()).records).toEqual([{ n: 9, tag: 'z' }]);
  });

  it('writes unparsed lines back verbatim', async () => {
    await fs.mkdir(join(dir, 'logs'));
    await fs.writeFile(store.filePath, '{"n":1,"tag":"a"}\n{"n":1.5}\nnot json\n');

    const { records, unparsed } = await store.read();
    await store.rewrite(
      records.map((r) => ({ ...r, tag: 'b' })),
      unparsed,
    );
    await expect(fs.readFile(store.filePath, 'utf8')).resolves.toBe('{"n":1,"tag":"b"}\n{"n":1.5}\nnot json\n');
  });

  it('propagates strict append failures and swallows best-effort ones', async () => {
    vi.spyOn(fs, 'appendFile').mockRejectedValue(new Error('EROFS'));

    await expect(store.append({ n: 1, tag: 'a' })).rejects.toMatchObject({ code: 'write_failed' });

    const result = await store.appendBestEffort({ n: 1, tag: 'a' });
    expect(result.ok).toBe(false);
  });

  it('inspects raw lines for invalid JSON and missing fields', async () => {
    await fs.mkdir(join(dir, 'logs'));
    await fs.writeFile(store.filePath, '{"n":1,"tag":"a"}\n\nnot json\n{"n":2}\n[1]\n');

    await expect(store.inspect(['n', 'tag'])).resolves.toEqual({
      exists: true,
      entryCount: 3,
      invalidLines: 1,
      warnings: [
        'events.jsonl line 3: invalid JSON',
        'events.jsonl line 4: missing fields tag',
        'events.jsonl line 5: missing fields n, tag',
      ],
    });
  });

  it('inspects a missing file as empty', async () => {
    await expect(store.inspect(['n'])).resolves.toEqual({
      exists: false,
      entryCount: 0,
      invalidLines: 0,
      warnings: [],
    });
  });
});
