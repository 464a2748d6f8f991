import { describe, it, expect } from 'vitest';
import { CycleError } from '@waveplan/shared';
import { node, plan } from '../__fixtures__/plans';
import { summarizePlan } from './summary';

describe('summarizePlan', () => {
  it('groups nodes by wave and counts models', () => {
    const doc = plan([
      node('scaffold'),
      node('api', { blockedBy: [0], agent: { role: 'backend', model: 'opus' } }),
      node('docs', { blockedBy: [0] }),
    ]);
    expect(summarizePlan(doc)).toEqual({
      goal: 'test goal',
      nodeCount: 3,
      maxDepth: 2,
      waves: {
        '1': ['Node 0: scaffold (sonnet)'],
        '2': ['Node 1: api (opus)', 'Node 2: docs (sonnet)'],
      },
      modelDistribution: '1 opus, 2 sonnet',
      counts: { pending: 3, in_progress: 0, completed: 0, failed: 0, blocked: 0, skipped: 0 },
    });
  });

  it('labels nodes without a model as unknown', () => {
    const doc = plan([{ subject: 'bare' }]);
    expect(summarizePlan(doc).modelDistribution).toBe('1 unknown');
  });

  it('refuses cyclic plans', () => {
    const doc = plan([node('a', { blockedBy: [1] }), node('b', { blockedBy: [0] })]);
    expect(() => summarizePlan(doc)).toThrow(CycleError);
  });
});
