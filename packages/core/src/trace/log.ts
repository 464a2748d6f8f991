import { randomUUID } from 'node:crypto';
import { InvalidInputError, JsonlStore, type BestEffortResult, type JsonlInspection } from '@waveplan/shared';
import {
  AGENTLESS_EVENTS,
  TRACE_REQUIRED_FIELDS,
  TraceEntrySchema,
  TraceEventSchema,
  type TraceEntry,
  type TraceFilters,
} from './types';

export interface NewTraceEvent {
  sessionId: string;
  skill: string;
  event: string;
  agent?: string;
  role?: string;
  payload?: unknown;
}

export interface LatestSession {
  sessionId: string;
  skill: string;
  startTime: string;
  endTime: string;
  eventCount: number;
}

export interface TraceSummary {
  eventsByType: Record<string, number>;
  eventsBySession: Record<string, number>;
  sessionCount: number;
  agentCount: number;
  latestSession: LatestSession | null;
}

export interface TraceValidation {
  entryCount: number;
  malformed: number;
  warnings: string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the `--payload` flag. Absent means an empty object.
 */
export function parseTracePayload(raw: string | undefined): Record<string, unknown> {
  if (raw === undefined) {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new InvalidInputError('Payload is not valid JSON', { cause: error });
  }
  if (!isPlainObject(value)) {
    throw new InvalidInputError('Payload must be a JSON object');
  }
  return value;
}

function matches(entry: TraceEntry, filters: TraceFilters): boolean {
  return (
    (!filters.sessionId || entry.sessionId === filters.sessionId) &&
    (!filters.skill || entry.skill === filters.skill) &&
    (!filters.event || entry.event === filters.event) &&
    (!filters.agent || entry.agent === filters.agent)
  );
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Append-only log of skill and agent lifecycle events.
 */
export class TraceLog {
  private readonly store: JsonlStore<TraceEntry>;

  constructor(readonly filePath: string) {
    this.store = new JsonlStore(filePath, TraceEntrySchema);
  }

  /**
   * Validates and appends one event. Invalid input throws; a failed write is
   * returned in `written`.
   */
  async add(
    input: NewTraceEvent,
    now: Date = new Date(),
  ): Promise<{ entry: TraceEntry; written: BestEffortResult<void> }> {
    const event = TraceEventSchema.safeParse(input.event);
    if (!event.success) {
      throw new InvalidInputError(
        `Invalid event '${input.event}'. Must be one of: ${TraceEventSchema.options.join(', ')}`,
      );
    }
    if (!input.sessionId) {
      throw new InvalidInputError('Session id is required');
    }
    if (!input.skill) {
      throw new InvalidInputError('Skill is required');
    }
    if (!input.agent && !AGENTLESS_EVENTS.includes(event.data)) {
      throw new InvalidInputError(`Agent is required for event '${event.data}'`);
    }
    const payload = input.payload ?? {};
    if (!isPlainObject(payload)) {
      throw new InvalidInputError('Payload must be a JSON object');
    }

    const entry: TraceEntry = {
      id: randomUUID(),
      timestamp: now.toISOString(),
      sessionId: input.sessionId,
      skill: input.skill,
      event: event.data,
      payload,
    };
    if (input.agent) {
      entry.agent = input.agent;
    }
    if (input.role) {
      entry.role = input.role;
    }

    const written = await this.store.appendBestEffort(entry);
    return { entry, written };
  }

  /**
   * Entries matching every given filter, in file order.
   */
  async search(filters: TraceFilters = {}, limit?: number): Promise<TraceEntry[]> {
    const { records } = await this.store.read({ filter: (entry) => matches(entry, filters), limit });
    return records;
  }

  async summary(sessionId?: string): Promise<TraceSummary> {
    const events = await this.search({ sessionId });
    const eventsByType: Record<string, number> = {};
    const eventsBySession: Record<string, number> = {};
    const agents = new Set<string>();
    let latest: TraceEntry | undefined;

    for (const entry of events) {
      increment(eventsByType, entry.event);
      increment(eventsBySession, entry.sessionId);
      if (entry.agent) {
        agents.add(entry.agent);
      }
      if (latest === undefined || Date.parse(entry.timestamp) > Date.parse(latest.timestamp)) {
        latest = entry;
      }
    }

    return {
      eventsByType,
      eventsBySession,
      sessionCount: Object.keys(eventsBySession).length,
      agentCount: agents.size,
      latestSession: latest === undefined ? null : describeSession(events, latest),
    };
  }

  async validate(): Promise<TraceValidation> {
    const inspection: JsonlInspection = await this.store.inspect(TRACE_REQUIRED_FIELDS);
    return {
      entryCount: inspection.entryCount,
      malformed: inspection.invalidLines,
      warnings: inspection.warnings,
    };
  }
}

function describeSession(events: readonly TraceEntry[], latest: TraceEntry): LatestSession {
  const times = events
    .filter((entry) => entry.sessionId === latest.sessionId)
    .map((entry) => entry.timestamp)
    .sort((a, b) => Date.parse(a) - Date.parse(b));
  return {
    sessionId: latest.sessionId,
    skill: latest.skill,
    startTime: times[0] ?? latest.timestamp,
    endTime: times[times.length - 1] ?? latest.timestamp,
    eventCount: times.length,
  };
}
