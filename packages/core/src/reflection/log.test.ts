import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import { join } from 'path';
import { ReflectionLog } from './log';

describe('ReflectionLog', () => {
  let dir: string;
  let log: ReflectionLog;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), 'waveplan-reflection-'));
    log = new ReflectionLog(join(dir, 'reflection.jsonl'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const reflection = (overrides: Partial<Parameters<ReflectionLog['add']>[0]> = {}) => ({
    skill: 'execute',
    goal: 'ship the parser',
    outcome: 'completed',
    goalAchieved: true,
    evaluation: { whatWorked: ['small waves'] },
    ...overrides,
  });

  it('appends a validated entry', async () => {
    const result = await log.add(reflection(), new Date('2026-03-01T10:00:00.000Z'));

    expect(result.written.ok).toBe(true);
    expect(result.entry.timestamp).toBe('2026-03-01T10:00:00.000Z');
    const lines = (await fs.readFile(log.filePath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ id: result.entry.id, skill: 'execute', goalAchieved: true });
  });

  it('rejects unknown skills and outcomes', async () => {
    await expect(log.add(reflection({ skill: 'deploy' }))).rejects.toThrow(
      "Invalid skill 'deploy'. Must be one of: design, execute, research, simplify",
    );
    await expect(log.add(reflection({ outcome: 'meh' }))).rejects.toThrow(
      "Invalid outcome 'meh'. Must be one of: completed, partial, failed, aborted",
    );
    await expect(log.add(reflection({ goal: '  ' }))).rejects.toThrow('Goal is required');
  });

  it('writes nothing when the evaluation fails the gate', async () => {
    await expect(
      log.add(reflection({ evaluation: { whatFailed: ['x'], promptFixes: [] } })),
    ).rejects.toMatchObject({ code: 'quality_gate' });
    await expect(fs.access(log.filePath)).rejects.toThrow();
  });

  it('reports a failed append without throwing', async () => {
    await fs.mkdir(log.filePath);
    const result = await log.add(reflection());
    expect(result.written.ok).toBe(false);
    if (!result.written.ok) {
      expect(result.written.error.code).toBe('write_failed');
    }
  });

  it('searches newest first and filters by skill', async () => {
    await log.add(reflection({ goal: 'first' }), new Date('2026-03-01T00:00:00.000Z'));
    await log.add(reflection({ goal: 'second', skill: 'design' }), new Date('2026-03-02T00:00:00.000Z'));
    await log.add(reflection({ goal: 'third' }), new Date('2026-03-03T00:00:00.000Z'));

    expect((await log.search()).map((entry) => entry.goal)).toEqual(['third', 'second', 'first']);
    expect((await log.search({ skill: 'execute', limit: 1 })).map((entry) => entry.goal)).toEqual(['third']);
  });
});
