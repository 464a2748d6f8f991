import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import type { CliIO } from '../utils/io';
import type { CommandRunner } from './runner';

export type CliEntry = (argv: readonly string[], io: CliIO) => Promise<number>;

interface SelfTestCase {
  name: string;
  argv: string[];
  stdin?: unknown;
  expect: z.ZodTypeAny;
}

export interface SelfTestResult {
  name: string;
  passed: boolean;
  exitCode: number;
  detail?: string;
}

const ok = <T extends z.ZodRawShape>(shape: T) => z.object({ ok: z.literal(true), ...shape });

const FIXTURE_PLAN = {
  schemaVersion: 3,
  goal: 'self-test',
  context: { stack: 'typescript' },
  nodes: [
    {
      subject: 'write parser',
      metadata: { files: { create: ['src/parser.ts'], modify: [] }, reads: [] },
      agent: { role: 'builder', model: 'sonnet', assumptions: [{ claim: 'src exists' }], rollbackTriggers: ['tests fail'] },
    },
    {
      subject: 'wire parser',
      blockedBy: [0],
      metadata: { files: { create: [], modify: ['src/index.ts'] }, reads: ['src/parser.ts'] },
      agent: { role: 'builder', model: 'sonnet', assumptions: [{ claim: 'parser exported' }], rollbackTriggers: ['build breaks'] },
    },
    {
      subject: 'document usage',
      metadata: { files: { create: ['docs/usage.md'], modify: [] }, reads: [] },
      agent: { role: 'writer', model: 'haiku', assumptions: [{ claim: 'docs folder' }], rollbackTriggers: ['none'] },
    },
  ],
};

const CASES: SelfTestCase[] = [
  { name: 'finalize', argv: ['finalize'], expect: ok({ nodeCount: z.literal(3) }) },
  { name: 'finalize is stable', argv: ['finalize'], expect: ok({ issuesRepaired: z.literal(0) }) },
  { name: 'status', argv: ['status'], expect: ok({ isResume: z.literal(false), nodeCount: z.literal(3) }) },
  { name: 'validate', argv: ['validate'], expect: ok({}) },
  { name: 'ready-set', argv: ['ready-set'], expect: ok({ ready: z.array(z.object({ index: z.number() })).length(2) }) },
  {
    name: 'update-status start',
    argv: ['update-status'],
    stdin: [{ index: 0, status: 'in_progress' }],
    expect: ok({ updated: z.tuple([z.literal(0)]) }),
  },
  {
    name: 'update-status failure cascades',
    argv: ['update-status'],
    stdin: [{ index: 0, status: 'failed', result: 'self-test failure' }],
    expect: ok({ cascaded: z.tuple([z.literal(1)]) }),
  },
  { name: 'retry-candidates', argv: ['retry-candidates'], expect: ok({ retryable: z.literal(true) }) },
  { name: 'circuit-breaker', argv: ['circuit-breaker'], expect: ok({ exempt: z.literal(true), shouldAbort: z.literal(false) }) },
  {
    name: 'invalid transition is rejected',
    argv: ['update-status'],
    stdin: [{ index: 1, status: 'completed' }],
    expect: z.object({ ok: z.literal(false), error: z.literal('invalid_transition') }),
  },
  {
    name: 'memory-add',
    argv: ['memory-add'],
    stdin: { content: 'Self-test memory about parsers', category: 'pattern', keywords: ['parser'] },
    expect: ok({ importance: z.literal(5) }),
  },
  {
    name: 'memory-add rejects duplicates',
    argv: ['memory-add'],
    stdin: { content: 'self-test memory about parsers', category: 'pattern' },
    expect: z.object({ ok: z.literal(false), error: z.literal('duplicate') }),
  },
  {
    name: 'memory-search',
    argv: ['memory-search', '--goal', 'parser memory'],
    expect: ok({ memories: z.array(z.object({ usageCount: z.literal(1) })).length(1) }),
  },
  {
    name: 'reflection-add',
    argv: ['reflection-add', '--skill', 'execute', '--goal', 'self-test', '--outcome', 'partial'],
    stdin: {
      whatFailed: ['parser node failed'],
      promptFixes: [{ fix: 'Check inputs first', failureClass: 'no-verification' }],
    },
    expect: ok({ id: z.string() }),
  },
  {
    name: 'reflection-validate rejects unfixed failures',
    argv: ['reflection-validate'],
    stdin: { whatFailed: ['x'], promptFixes: [] },
    expect: z.object({ ok: z.literal(false), error: z.literal('quality_gate') }),
  },
  {
    name: 'trace-add',
    argv: ['trace-add', '--session-id', 'self-test', '--event', 'skill-start', '--skill', 'execute'],
    expect: ok({ id: z.string() }),
  },
  {
    name: 'trace-add without agent',
    argv: ['trace-add', '--session-id', 'self-test', '--event', 'spawn', '--skill', 'execute'],
    expect: z.object({ ok: z.literal(false), error: z.literal('invalid_input') }),
  },
  { name: 'trace-summary', argv: ['trace-summary'], expect: ok({ sessionCount: z.literal(1) }) },
  {
    name: 'plan-health-summary',
    argv: ['plan-health-summary'],
    expect: ok({ plan: z.literal('Current plan: 0/3 nodes completed') }),
  },
  { name: 'health-check', argv: ['health-check'], expect: ok({ healthy: z.literal(true) }) },
  { name: 'archive', argv: ['archive', '.design'], expect: ok({ archivedTo: z.string() }) },
  {
    name: 'status after archive',
    argv: ['status'],
    expect: z.object({ ok: z.literal(false), error: z.literal('not_found') }),
  },
];

async function runCase(cli: CliEntry, cwd: string, testCase: SelfTestCase): Promise<SelfTestResult> {
  const lines: string[] = [];
  const io: CliIO = {
    cwd,
    env: {},
    homeDir: cwd,
    stdout: (text) => lines.push(text),
    stderr: () => undefined,
    readStdin: async () => (testCase.stdin === undefined ? '' : JSON.stringify(testCase.stdin)),
  };
  const exitCode = await cli(testCase.argv, io);

  let output: unknown;
  try {
    output = JSON.parse(lines.join('\n'));
  } catch {
    return { name: testCase.name, passed: false, exitCode, detail: 'output is not a single JSON object' };
  }
  const check = testCase.expect.safeParse(output);
  if (!check.success) {
    return { name: testCase.name, passed: false, exitCode, detail: JSON.stringify(output) };
  }
  return { name: testCase.name, passed: lines.length === 1 && exitCode === 0, exitCode };
}

/**
 * Runs the command handlers against a synthetic workspace in a scratch
 * directory.
 */
export async function selfTest(cli: CliEntry): Promise<SelfTestResult[]> {
  const cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'waveplan-self-test-'));
  try {
    await fs.mkdir(path.join(cwd, '.design'));
    await fs.writeFile(path.join(cwd, '.design', 'plan.json'), JSON.stringify(FIXTURE_PLAN));
    const results: SelfTestResult[] = [];
    for (const testCase of CASES) {
      results.push(await runCase(cli, cwd, testCase));
    }
    return results;
  } finally {
    await fs.rm(cwd, { recursive: true, force: true });
  }
}

export function registerSelfTestCommand(program: Command, runner: CommandRunner, cli: CliEntry): void {
  program
    .command('self-test')
    .description('Exercise every command against synthetic fixtures')
    .action(() =>
      runner.run('self-test', async () => {
        const results = await selfTest(cli);
        const failed = results.filter((result) => !result.passed).length;
        return { ok: failed === 0, passed: results.length - failed, failed, results };
      }),
    );
}
