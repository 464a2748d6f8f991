import {
  PLAN_SCHEMA_VERSION,
  PlanDocumentSchema,
  type PlanDocument,
  type PlanNodeInput,
} from '../plan/types';

/**
 * A node with a complete brief so validation raises no warnings unless the
 * test asks for them.
 */
export function node(subject: string, overrides: Partial<PlanNodeInput> = {}): PlanNodeInput {
  return {
    subject,
    description: `${subject} description`,
    agent: {
      role: `${subject}-role`,
      model: 'sonnet',
      approach: 'small steps',
      assumptions: [{ claim: 'repo builds', verify: 'npm run build', severity: 'blocking' }],
      acceptanceCriteria: [{ criterion: 'tests pass', check: 'npm test' }],
      rollbackTriggers: ['tests fail twice'],
      constraints: ['no new dependencies'],
    },
    ...overrides,
  };
}

export function plan(nodes: PlanNodeInput[], overrides: Partial<PlanDocument> = {}): PlanDocument {
  return PlanDocumentSchema.parse({
    schemaVersion: PLAN_SCHEMA_VERSION,
    goal: 'test goal',
    context: { stack: 'typescript' },
    nodes,
    ...overrides,
  });
}

/** Writes create/modify/read file lists in one go */
export function files(create: string[], modify: string[] = [], reads: string[] = []) {
  return { metadata: { files: { create, modify }, reads } };
}
