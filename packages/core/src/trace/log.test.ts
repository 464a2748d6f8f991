import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import { join } from 'path';
import { InvalidInputError } from '@waveplan/shared';
import { TraceLog, parseTracePayload } from './log';

describe('TraceLog', () => {
  let dir: string;
  let log: TraceLog;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), 'waveplan-trace-'));
    log = new TraceLog(join(dir, 'trace.jsonl'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const at = (minute: number) => new Date(Date.UTC(2026, 2, 1, 10, minute));

  async function seed(): Promise<void> {
    await log.add({ sessionId: 's1', skill: 'design', event: 'skill-start' }, at(0));
    await log.add({ sessionId: 's1', skill: 'design', event: 'spawn', agent: 'planner', role: 'architect' }, at(1));
    await log.add({ sessionId: 's1', skill: 'design', event: 'skill-complete' }, at(5));
    await log.add({ sessionId: 's2', skill: 'execute', event: 'skill-start' }, at(10));
    await log.add({ sessionId: 's2', skill: 'execute', event: 'spawn', agent: 'builder' }, at(11));
    await log.add(
      { sessionId: 's2', skill: 'execute', event: 'failure', agent: 'builder', payload: { reason: 'timeout' } },
      at(12),
    );
  }

  describe('add', () => {
    it('writes an entry with generated id and timestamp', async () => {
      const { entry, written } = await log.add(
        { sessionId: 's1', skill: 'design', event: 'spawn', agent: 'planner' },
        at(0),
      );
      expect(written.ok).toBe(true);
      expect(entry).toMatchObject({
        timestamp: '2026-03-01T10:00:00.000Z',
        sessionId: 's1',
        event: 'spawn',
        agent: 'planner',
        payload: {},
      });
      expect(entry.role).toBeUndefined();
    });

    it('requires an agent except for skill boundaries', async () => {
      await expect(log.add({ sessionId: 's1', skill: 'design', event: 'spawn' })).rejects.toThrow(
        "Agent is required for event 'spawn'",
      );
      const { written } = await log.add({ sessionId: 's1', skill: 'design', event: 'skill-complete' });
      expect(written.ok).toBe(true);
    });

    it('rejects unknown events and non-object payloads', async () => {
      await expect(log.add({ sessionId: 's1', skill: 'design', event: 'pause' })).rejects.toThrow(
        "Invalid event 'pause'. Must be one of: skill-start, skill-complete, spawn, completion, failure, respawn",
      );
      await expect(
        log.add({ sessionId: 's1', skill: 'design', event: 'skill-start', payload: [1, 2] }),
      ).rejects.toThrow('Payload must be a JSON object');
    });

    it('reports a failed write instead of throwing', async () => {
      await fs.mkdir(log.filePath);
      const { written } = await log.add({ sessionId: 's1', skill: 'design', event: 'skill-start' });
      expect(written.ok).toBe(false);
    });
  });

  it('searches with AND filters in file order', async () => {
    await seed();
    const spawns = await log.search({ event: 'spawn' });
    expect(spawns.map((entry) => entry.agent)).toEqual(['planner', 'builder']);

    const builderInS2 = await log.search({ sessionId: 's2', agent: 'builder' });
    expect(builderInS2.map((entry) => entry.event)).toEqual(['spawn', 'failure']);

    expect(await log.search({ skill: 'design' }, 2)).toHaveLength(2);
  });

  it('summarises events by type and session', async () => {
    await seed();
    await expect(log.summary()).resolves.toEqual({
      eventsByType: { 'skill-start': 2, spawn: 2, 'skill-complete': 1, failure: 1 },
      eventsBySession: { s1: 3, s2: 3 },
      sessionCount: 2,
      agentCount: 2,
      latestSession: {
        sessionId: 's2',
        skill: 'execute',
        startTime: '2026-03-01T10:10:00.000Z',
        endTime: '2026-03-01T10:12:00.000Z',
        eventCount: 3,
      },
    });
  });

  it('limits the summary to one session', async () => {
    await seed();
    const summary = await log.summary('s1');
    expect(summary.sessionCount).toBe(1);
    expect(summary.agentCount).toBe(1);
    expect(summary.latestSession).toMatchObject({ sessionId: 's1', eventCount: 3 });
  });

  it('summarises a missing log as empty', async () => {
    await expect(log.summary()).resolves.toEqual({
      eventsByType: {},
      eventsBySession: {},
      sessionCount: 0,
      agentCount: 0,
      latestSession: null,
    });
  });

  it('validates raw lines', async () => {
    await seed();
    await fs.appendFile(log.filePath, 'garbage\n{"id":"x","timestamp":"t"}\n');
    await expect(log.validate()).resolves.toEqual({
      entryCount: 7,
      malformed: 1,
      warnings: [
        'trace.jsonl line 7: invalid JSON',
        'trace.jsonl line 8: missing fields sessionId, skill, event, payload',
      ],
    });
  });
});

describe('parseTracePayload', () => {
  it('defaults to an empty object', () => {
    expect(parseTracePayload(undefined)).toEqual({});
  });

  it('accepts JSON objects only', () => {
    expect(parseTracePayload('{"files":2}')).toEqual({ files: 2 });
    expect(() => parseTracePayload('[1]')).toThrow(InvalidInputError);
    expect(() => parseTracePayload('{oops')).toThrow('Payload is not valid JSON');
  });
});
