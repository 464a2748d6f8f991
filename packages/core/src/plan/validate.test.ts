import { describe, it, expect } from 'vitest';
import { files, node, plan } from '../__fixtures__/plans';
import { randomDag, seededRandom } from '../__fixtures__/random';
import { finalizePlan, repairPlan, validatePlan } from './validate';
import { PlanDocumentSchema } from './types';

const codes = (issues: { code: string }[]) => issues.map((issue) => issue.code);

describe('validatePlan', () => {
  it('accepts a well-formed plan with correct waves', () => {
    const doc = plan([
      node('a', { wave: 1 }),
      node('b', { blockedBy: [0], wave: 2 }),
      node('c', { blockedBy: [0], wave: 2 }),
    ]);
    expect(validatePlan(doc)).toEqual({ ok: true, errors: [], repairable: [], warnings: [] });
  });

  it('rejects a schema version mismatch and an empty node list', () => {
    const doc = plan([], { schemaVersion: 2 });
    const report = validatePlan(doc);
    expect(report.ok).toBe(false);
    expect(codes(report.errors)).toEqual(['schema_version', 'empty_nodes']);
    expect(report.errors[0].message).toBe('schemaVersion is 2, expected 3');
  });

  it('reports same-wave write conflicts with the shared files', () => {
    const doc = plan([
      node('a', { ...files(['src/a.ts']), wave: 1 }),
      node('b', { ...files([], ['src/a.ts']), wave: 1 }),
    ]);
    const report = validatePlan(doc);
    expect(report.errors).toEqual([
      {
        code: 'write_conflict',
        severity: 'error',
        message: 'nodes 0 and 1 both write src/a.ts in wave 1',
        nodes: [0, 1],
        files: ['src/a.ts'],
      },
    ]);
  });

  it('does not flag writes to the same file in ordered waves', () => {
    const doc = plan([
      node('a', { ...files(['src/a.ts']), wave: 1 }),
      node('b', { ...files([], ['src/a.ts']), blockedBy: [0], wave: 2 }),
    ]);
    expect(validatePlan(doc).errors).toEqual([]);
  });

  it('flags a read of a file written by an unrelated earlier-wave node', () => {
    const doc = plan([
      node('writer', { ...files(['gen/schema.json']), wave: 1 }),
      node('setup', { wave: 1 }),
      node('reader', { ...files([], [], ['gen/schema.json']), blockedBy: [1], wave: 2 }),
    ]);
    const report = validatePlan(doc);
    expect(codes(report.errors)).toEqual(['read_write_conflict']);
    expect(report.errors[0].nodes).toEqual([2, 0]);
  });

  it('allows reading what an ancestor writes', () => {
    const doc = plan([
      node('writer', { ...files(['gen/schema.json']), wave: 1 }),
      node('reader', { ...files([], [], ['gen/schema.json']), blockedBy: [0], wave: 2 }),
    ]);
    expect(validatePlan(doc).errors).toEqual([]);
  });

  it('reports cycles with their members and never returns ok', () => {
    const doc = plan([node('a', { blockedBy: [2] }), node('b', { blockedBy: [0] }), node('c', { blockedBy: [1] })]);
    const report = validatePlan(doc);
    expect(report.ok).toBe(false);
    const cycle = report.errors.find((issue) => issue.code === 'cycle');
    expect(cycle?.nodes).toEqual([0, 2, 1]);
    expect(cycle?.message).toBe('dependency cycle: 0 -> 2 -> 1 -> 0');
  });

  it('reports out-of-range dependencies', () => {
    const doc = plan([node('a', { blockedBy: [4], wave: 1 })]);
    expect(validatePlan(doc).errors).toEqual([
      {
        code: 'invalid_dependency',
        severity: 'error',
        message: 'node 0 is blocked by missing node(s) 4',
        nodes: [0],
      },
    ]);
  });

  it('marks missing and stale waves as repairable', () => {
    const doc = plan([node('a'), node('b', { blockedBy: [0], wave: 1 })]);
    const report = validatePlan(doc);
    expect(report.errors).toEqual([]);
    expect(report.repairable.map((issue) => issue.message)).toEqual([
      'node 0 has no wave, expected 1',
      'node 1 has wave 1, expected 2',
    ]);
    expect(report.ok).toBe(false);
  });

  it('warns about missing assumptions and rollback triggers', () => {
    const doc = plan([{ subject: 'bare', wave: 1 }]);
    const report = validatePlan(doc);
    expect(report.ok).toBe(true);
    expect(codes(report.warnings)).toEqual(['missing_assumptions', 'missing_rollback_triggers']);
  });

  it('warns when node count or depth exceed the ceilings', () => {
    const nodes = [node('n0', { wave: 1 }), node('n1', { blockedBy: [0], wave: 2 }), node('n2', { blockedBy: [1], wave: 3 })];
    const report = validatePlan(plan(nodes), { maxNodes: 2, maxDepth: 2 });
    expect(report.warnings.map((issue) => issue.message)).toEqual([
      'plan has 3 nodes, ceiling is 2',
      'critical path is 3 waves deep, ceiling is 2',
    ]);
  });

  it('is a pure function of the document', () => {
    const doc = plan([node('a'), node('b', { blockedBy: [0] })]);
    const before = JSON.stringify(doc);
    expect(validatePlan(doc)).toEqual(validatePlan(doc));
    expect(JSON.stringify(doc)).toBe(before);
  });
});

describe('repairPlan', () => {
  it('rewrites waves in one pass and leaves the input alone', () => {
    const doc = plan([node('a', { wave: 3 }), node('b', { blockedBy: [0] })]);
    const result = repairPlan(doc);
    expect(result.document.nodes.map((n) => n.wave)).toEqual([1, 2]);
    expect(result.repaired).toBe(2);
    expect(result.passes).toBe(1);
    expect(result.remaining).toEqual([]);
    expect(doc.nodes[0].wave).toBe(3);
  });

  it('cannot repair a cyclic graph', () => {
    const doc = plan([node('a', { blockedBy: [1] }), node('b', { blockedBy: [0] })]);
    const result = repairPlan(doc);
    expect(result.repaired).toBe(0);
  });
});

describe('finalizePlan', () => {
  it('refuses plans with hard errors', () => {
    const doc = plan([node('a', { blockedBy: [1] }), node('b', { blockedBy: [0] })]);
    const result = finalizePlan(doc);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(codes(result.errors)).toEqual(['cycle']);
    }
  });

  it('repairs waves, records overlaps and reports warnings', () => {
    const doc = plan([
      node('a', files(['src/a.ts'])),
      node('b', { ...files(['src/b.ts'], [], ['src/a.ts']), blockedBy: [0] }),
      node('c', files(['docs/readme.md'])),
      { subject: 'd', ...files([], ['scripts/build.sh']) },
    ]);
    const result = finalizePlan(doc);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.document.nodes.map((n) => n.wave)).toEqual([1, 2, 1, 1]);
    expect(result.issuesRepaired).toBe(4);
    expect(result.overlapPairs).toBe(0);
    expect(result.validationIssues.map((issue) => issue.code)).toEqual([
      'missing_assumptions',
      'missing_rollback_triggers',
    ]);
  });

  it('stores later overlapping nodes on the earlier one', () => {
    const crossing = plan([
      node('a', files(['src/x.ts'])),
      node('b', { blockedBy: [0] }),
      node('c', { ...files([], ['lib/y.ts']), blockedBy: [1] }),
      node('d', { ...files([], [], ['lib/y.ts']), blockedBy: [0] }),
    ]);
    const result = finalizePlan(crossing);
    if (!result.ok) throw new Error('expected finalize to succeed');
    expect(result.overlapPairs).toBe(1);
    expect(result.document.nodes.map((n) => n.fileOverlaps)).toEqual([undefined, undefined, [3], undefined]);
  });

  it('produces byte-identical output when run on its own result', () => {
    const doc = plan([
      node('a', files(['src/a.ts'])),
      node('b', { ...files(['src/b.ts']), blockedBy: [0] }),
      node('c', { ...files([], ['src/a.ts']), blockedBy: [1] }),
    ]);
    const first = finalizePlan(doc);
    if (!first.ok) throw new Error('expected finalize to succeed');
    const firstText = JSON.stringify(first.document, null, 2);

    const reloaded = PlanDocumentSchema.parse(JSON.parse(firstText));
    const second = finalizePlan(reloaded);
    if (!second.ok) throw new Error('expected finalize to succeed');
    expect(JSON.stringify(second.document, null, 2)).toBe(firstText);
    expect(second.issuesRepaired).toBe(0);
  });

  it('leaves every wave equal to one more than its deepest dependency', () => {
    const random = seededRandom(2024);
    for (let round = 0; round < 30; round++) {
      const dag = randomDag(random, 1 + Math.floor(random() * 10));
      const doc = plan(dag.map((d, index) => node(`n${index}`, { blockedBy: d.blockedBy, wave: 1 })));
      const result = finalizePlan(doc, { maxNodes: 50 });
      if (!result.ok) throw new Error('generated DAG failed to finalize');
      const waves = result.document.nodes.map((n) => n.wave ?? 0);
      result.document.nodes.forEach((n, index) => {
        const expected = n.blockedBy.length === 0 ? 1 : 1 + Math.max(...n.blockedBy.map((d) => waves[d]));
        expect(waves[index]).toBe(expected);
      });
    }
  });
});
