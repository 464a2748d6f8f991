import {
  PlanNotFoundError,
  PlanSchemaError,
  readTextIfExists,
  writeJsonAtomic,
} from '@waveplan/shared';
import {
  PLAN_SCHEMA_VERSION,
  PlanDocumentSchema,
  statusCounts,
  type PlanDocument,
  type StatusCounts,
} from './types';

export interface PlanStatus {
  exists: true;
  schemaVersion: number;
  isResume: boolean;
  nodeCount: number;
  counts: StatusCounts;
}

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Reads and writes the authoritative plan document. Writes are atomic and
 * never best-effort.
 */
export class PlanStore {
  constructor(readonly planPath: string) {}

  /**
   * Parses the plan without checking its schema version.
   */
  async read(): Promise<PlanDocument> {
    const text = await readTextIfExists(this.planPath);
    if (text === undefined) {
      throw new PlanNotFoundError(this.planPath);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new PlanSchemaError('invalid_json', `Plan is not valid JSON: ${this.planPath}`, {
        cause: error,
      });
    }

    const parsed = PlanDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error.issues);
      throw new PlanSchemaError('malformed_plan', `Plan does not match the document schema`, {
        details: { issues },
      });
    }
    return parsed.data;
  }

  /**
   * Parses the plan and insists on the current schema version.
   */
  async load(): Promise<PlanDocument> {
    const doc = await this.read();
    if (doc.schemaVersion !== PLAN_SCHEMA_VERSION) {
      throw new PlanSchemaError(
        'bad_schema',
        `schemaVersion=${doc.schemaVersion}, expected ${PLAN_SCHEMA_VERSION}`,
        { details: { found: doc.schemaVersion, expected: PLAN_SCHEMA_VERSION } },
      );
    }
    return doc;
  }

  async save(doc: PlanDocument): Promise<void> {
    await writeJsonAtomic(this.planPath, PlanDocumentSchema.parse(doc));
  }

  async status(): Promise<PlanStatus> {
    const doc = await this.load();
    if (doc.nodes.length === 0) {
      throw new PlanSchemaError('empty_tasks', 'Plan has no nodes');
    }
    const counts = statusCounts(doc.nodes);
    return {
      exists: true,
      schemaVersion: doc.schemaVersion,
      isResume: doc.nodes.some((node) => node.status !== 'pending'),
      nodeCount: doc.nodes.length,
      counts,
    };
  }
}
