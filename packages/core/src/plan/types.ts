import { z } from 'zod';

export const PLAN_SCHEMA_VERSION = 3;

export const NODE_STATUSES = [
  'pending',
  'in_progress',
  'completed',
  'failed',
  'blocked',
  'skipped',
] as const;

export const NodeStatusSchema = z.enum(NODE_STATUSES);
export type NodeStatus = z.infer<typeof NodeStatusSchema>;

export const FileSetSchema = z
  .object({
    create: z.array(z.string()).default([]),
    modify: z.array(z.string()).default([]),
  })
  .default({});

export const NodeMetadataSchema = z
  .object({
    files: FileSetSchema,
    /** Paths the node reads but does not write */
    reads: z.array(z.string()).default([]),
  })
  .default({});

export const ContextFileSchema = z.object({
  path: z.string(),
  reason: z.string().default(''),
});

export const AssumptionSchema = z.object({
  claim: z.string(),
  /** Command or check that confirms the claim */
  verify: z.string().optional(),
  severity: z.enum(['blocking', 'warning']).default('warning'),
});

export const AcceptanceCriterionSchema = z.object({
  criterion: z.string(),
  check: z.string().default(''),
});

export const TrimmedAgentBriefSchema = z.object({
  trimmed: z.literal(true),
  role: z.string(),
  model: z.string(),
});

export const FullAgentBriefSchema = z.object({
  role: z.string().default(''),
  model: z.string().default(''),
  approach: z.string().default(''),
  contextFiles: z.array(ContextFileSchema).default([]),
  assumptions: z.array(AssumptionSchema).default([]),
  acceptanceCriteria: z.array(AcceptanceCriterionSchema).default([]),
  rollbackTriggers: z.array(z.string()).default([]),
  constraints: z.array(z.string()).default([]),
  fallback: z.string().optional(),
});

// Order matters: a trimmed brief also satisfies the full schema.
export const AgentBriefSchema = z.union([TrimmedAgentBriefSchema, FullAgentBriefSchema]);

export const PlanNodeSchema = z.object({
  subject: z.string(),
  description: z.string().default(''),
  status: NodeStatusSchema.default('pending'),
  result: z.string().nullable().default(null),
  attempts: z.number().int().nonnegative().default(0),
  blockedBy: z.array(z.number().int()).default([]),
  wave: z.number().int().positive().optional(),
  metadata: NodeMetadataSchema,
  agent: AgentBriefSchema.default({}),
  /** Later nodes whose file sets overlap this one, filled in by finalize */
  fileOverlaps: z.array(z.number().int()).optional(),
  /** The failed or blocked dependency that caused a cascaded skip */
  cascadedFrom: z.number().int().optional(),
});

export const PlanProgressSchema = z
  .object({
    completedNodes: z.array(z.number().int()).default([]),
    decisions: z.array(z.string()).default([]),
    surprises: z.array(z.string()).default([]),
  })
  .default({});

export const PlanDocumentSchema = z.object({
  schemaVersion: z.number().int(),
  goal: z.string().default(''),
  context: z.record(z.unknown()).default({}),
  nodes: z.array(PlanNodeSchema).default([]),
  progress: PlanProgressSchema,
});

export type FileSet = z.infer<typeof FileSetSchema>;
export type ContextFile = z.infer<typeof ContextFileSchema>;
export type Assumption = z.infer<typeof AssumptionSchema>;
export type AcceptanceCriterion = z.infer<typeof AcceptanceCriterionSchema>;
export type FullAgentBrief = z.infer<typeof FullAgentBriefSchema>;
export type TrimmedAgentBrief = z.infer<typeof TrimmedAgentBriefSchema>;
export type AgentBrief = z.infer<typeof AgentBriefSchema>;
export type PlanNode = z.infer<typeof PlanNodeSchema>;
export type PlanNodeInput = z.input<typeof PlanNodeSchema>;
export type PlanProgress = z.infer<typeof PlanProgressSchema>;
export type PlanDocument = z.infer<typeof PlanDocumentSchema>;
export type PlanDocumentInput = z.input<typeof PlanDocumentSchema>;

export type StatusCounts = Record<NodeStatus, number>;

export function isTrimmed(agent: AgentBrief): agent is TrimmedAgentBrief {
  return 'trimmed' in agent && agent.trimmed === true;
}

/**
 * Every path the node creates or modifies.
 */
export function writeSet(node: PlanNode): string[] {
  return [...node.metadata.files.create, ...node.metadata.files.modify];
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, in_progress: 0, completed: 0, failed: 0, blocked: 0, skipped: 0 };
}

export function statusCounts(nodes: readonly PlanNode[]): StatusCounts {
  const counts = emptyStatusCounts();
  for (const node of nodes) {
    counts[node.status]++;
  }
  return counts;
}
